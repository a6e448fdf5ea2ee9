type PendingJob = {
  label: string;
  execute: () => Promise<void>;
};

/**
 * FIFO executor with a concurrency of one: the single point through which
 * every engine mutation (ticks, injections, policy changes) is applied.
 */
export class SerialExecutor {
  private running = false;
  private queue: PendingJob[] = [];

  run<T>(label: string, work: () => T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        label,
        execute: () => Promise.resolve().then(work).then(resolve, reject),
      });
      this.drain();
    });
  }

  get pending(): number {
    return this.queue.length;
  }

  get busy(): boolean {
    return this.running;
  }

  pendingLabels(): string[] {
    return this.queue.map((job) => job.label);
  }

  private drain(): void {
    if (this.running) {
      return;
    }
    const job = this.queue.shift();
    if (!job) {
      return;
    }
    this.running = true;
    void job.execute().finally(() => {
      this.running = false;
      this.drain();
    });
  }
}
