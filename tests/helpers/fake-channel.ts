import type { BrokerChannel } from "../../server/services/scheduler/broker";

export type SendMode = "instant" | "stall" | "fail";

/** In-memory broker channel that records frames and close calls. */
export class FakeChannel implements BrokerChannel {
  readonly sent: string[] = [];
  closed: { code: number; reason: string } | null = null;

  constructor(
    readonly id: string,
    public mode: SendMode = "instant",
  ) {}

  send(data: string): Promise<void> {
    if (this.mode === "stall") {
      return new Promise<void>(() => undefined);
    }
    if (this.mode === "fail") {
      return Promise.reject(new Error("socket is not open"));
    }
    this.sent.push(data);
    return Promise.resolve();
  }

  close(code: number, reason: string): void {
    this.closed = { code, reason };
  }

  frames(): unknown[] {
    return this.sent.map((frame) => JSON.parse(frame));
  }
}
