type TimerHandle = ReturnType<typeof setTimeout>;

export type SimulationClockOptions = {
  intervalMs?: number;
  now?: () => number;
  setTimer?: (callback: () => void, delay_ms: number) => TimerHandle;
  clearTimer?: (handle: TimerHandle) => void;
  onTick: () => void | Promise<void>;
  onError?: (error: unknown) => void;
};

export type SimulationClock = {
  start: (options?: { paused?: boolean }) => void;
  stop: () => void;
  pause: () => void;
  resume: () => void;
  isPaused: () => boolean;
  isRunning: () => boolean;
  ticksIssued: () => number;
  intervalMs: number;
};

export const DEFAULT_TICK_INTERVAL_MS = 1000;

const normalizeInterval = (value?: number): number => {
  if (value === undefined || !Number.isFinite(value)) return DEFAULT_TICK_INTERVAL_MS;
  return Math.max(1, Math.floor(value));
};

/**
 * Fixed-interval driver for the engine. The next tick is only armed once
 * the previous tick's work has settled, so ticks never overlap; a clock
 * that falls behind re-bases on the current time instead of bursting.
 */
export const createSimulationClock = (options: SimulationClockOptions): SimulationClock => {
  const intervalMs = normalizeInterval(options.intervalMs);
  const now = options.now ?? Date.now;
  const setTimer = options.setTimer ?? ((cb, delay) => setTimeout(cb, delay));
  const clearTimer = options.clearTimer ?? ((handle) => clearTimeout(handle));
  const onError = options.onError ?? (() => undefined);

  let running = false;
  let paused = false;
  let inFlight = false;
  let timer: TimerHandle | undefined;
  let nextScheduledAt = 0;
  let issued = 0;

  const disarm = () => {
    if (timer !== undefined) {
      clearTimer(timer);
      timer = undefined;
    }
  };

  const arm = () => {
    if (!running || paused || inFlight || timer !== undefined) return;
    const delay = Math.max(0, nextScheduledAt - now());
    timer = setTimer(fire, delay);
  };

  const fire = () => {
    timer = undefined;
    if (!running || paused) return;
    inFlight = true;
    issued += 1;
    void Promise.resolve()
      .then(options.onTick)
      .catch(onError)
      .finally(() => {
        inFlight = false;
        nextScheduledAt += intervalMs;
        const current = now();
        if (current > nextScheduledAt) {
          nextScheduledAt = current + intervalMs;
        }
        arm();
      });
  };

  return {
    start: (startOptions) => {
      if (running) return;
      running = true;
      paused = startOptions?.paused ?? false;
      nextScheduledAt = now() + intervalMs;
      arm();
    },
    stop: () => {
      running = false;
      disarm();
    },
    pause: () => {
      paused = true;
      disarm();
    },
    resume: () => {
      if (!paused) return;
      paused = false;
      // an in-flight tick adds the interval itself when it settles
      nextScheduledAt = now() + (inFlight ? 0 : intervalMs);
      arm();
    },
    isPaused: () => paused,
    isRunning: () => running,
    ticksIssued: () => issued,
    intervalMs,
  };
};
