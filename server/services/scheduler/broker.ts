import {
  addProcessRequestSchema,
  describeIssues,
  handshakeSchema,
  type AddProcessReply,
  type AddProcessRequest,
  type ClientRole,
  type HandshakeReply,
  type Snapshot,
} from "@shared/scheduler";
import { truncateUtf8 } from "@shared/ws-data";
import { log, logError, logWarn } from "../../lib/log";
import { metrics, type EvictionReason } from "../../metrics";
import { reportError } from "../observability/error-reporter";
import { ConnectionLostError, errorMessage, InvalidProcessSpecError, ProtocolError } from "./errors";

/** Transport-neutral view of one client connection. */
export interface BrokerChannel {
  readonly id: string;
  /** Resolves once the frame has been handed to the transport. */
  send(data: string): Promise<void>;
  close(code: number, reason: string): void;
}

export type BrokerEvent =
  | { type: "registered"; id: string; role: ClientRole }
  | { type: "protocol-error"; id: string; error: ProtocolError }
  | { type: "evicted"; id: string; reason: EvictionReason }
  | { type: "connection-lost"; role: ClientRole | null; error: ConnectionLostError };

export type SessionBrokerOptions = {
  /** Write-only path into the engine; rejects with InvalidProcessSpecError. */
  submit: (request: AddProcessRequest) => Promise<number>;
  deliveryTimeoutMs?: number;
  outboundLimit?: number;
  onEvent?: (event: BrokerEvent) => void;
};

export type BrokerRoster = {
  renderers: string[];
  injectors: string[];
};

export const CLOSE_PROTOCOL_ERROR = 1008;
export const CLOSE_SLOW_CONSUMER = 1013;
export const CLOSE_GOING_AWAY = 1001;
export const CLOSE_INTERNAL_ERROR = 1011;

const DEFAULT_DELIVERY_TIMEOUT_MS = 2000;
const DEFAULT_OUTBOUND_LIMIT = 32;
// ws rejects close reasons longer than 123 bytes of UTF-8
const MAX_CLOSE_REASON_BYTES = 123;

type Session = {
  channel: BrokerChannel;
  role: ClientRole | null;
  closed: boolean;
  // renderer outbound frames, oldest first
  outbound: string[];
  pumping: boolean;
  // injector requests are answered strictly in arrival order
  pending: Promise<void>;
};

class DeliveryTimeout extends Error {
  constructor(timeoutMs: number) {
    super(`delivery exceeded ${timeoutMs}ms`);
    this.name = "DeliveryTimeout";
  }
}

const withTimeout = async <T>(promise: Promise<T>, timeoutMs: number): Promise<T> => {
  let timeoutHandle: NodeJS.Timeout | null = null;
  try {
    return await Promise.race([
      promise,
      new Promise<T>((_, reject) => {
        timeoutHandle = setTimeout(() => reject(new DeliveryTimeout(timeoutMs)), timeoutMs);
      }),
    ]);
  } finally {
    if (timeoutHandle) clearTimeout(timeoutHandle);
  }
};

const parseJson = (raw: string): { ok: true; value: unknown } | { ok: false } => {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
};

/**
 * Multiplexes one engine across any number of client connections: renderers
 * receive every snapshot, injectors submit add-process requests. Per-client
 * failures stay with that client.
 */
export class SessionBroker {
  private readonly sessions = new Map<string, Session>();
  // insertion order is registration order
  private readonly renderers = new Map<string, Session>();
  private readonly submit: SessionBrokerOptions["submit"];
  private readonly deliveryTimeoutMs: number;
  private readonly outboundLimit: number;
  private readonly onEvent: (event: BrokerEvent) => void;

  constructor(options: SessionBrokerOptions) {
    this.submit = options.submit;
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? DEFAULT_DELIVERY_TIMEOUT_MS;
    this.outboundLimit = Math.max(1, options.outboundLimit ?? DEFAULT_OUTBOUND_LIMIT);
    this.onEvent = options.onEvent ?? (() => undefined);
  }

  accept(channel: BrokerChannel): void {
    if (this.sessions.has(channel.id)) {
      throw new Error(`duplicate connection id ${channel.id}`);
    }
    this.sessions.set(channel.id, {
      channel,
      role: null,
      closed: false,
      outbound: [],
      pumping: false,
      pending: Promise.resolve(),
    });
    log(`client connected: ${channel.id}`, "broker");
  }

  receive(id: string, raw: string): void {
    const session = this.sessions.get(id);
    if (!session || session.closed) return;

    if (session.role === null) {
      this.handleHandshake(session, raw);
      return;
    }
    if (session.role === "renderer") {
      this.failProtocol(session, "renderers are read-only");
      return;
    }
    session.pending = session.pending
      .then(() => this.handleInjectorMessage(session, raw))
      .catch((error: unknown) => {
        logError(`injector ${id} request failed`, error, "broker");
        reportError(error, { connection: id });
      });
  }

  /** Transport reported the connection closed. */
  disconnect(id: string, reason = "closed by peer"): void {
    const session = this.sessions.get(id);
    if (!session) return;
    this.drop(session);
    const error = new ConnectionLostError(id, reason);
    log(`${error.name}: ${id} (${session.role ?? "no role"}) ${reason}`, "broker");
    this.onEvent({ type: "connection-lost", role: session.role, error });
  }

  /**
   * Serializes the snapshot once and queues the identical frame for every
   * renderer. Never waits on a socket.
   */
  broadcast(snapshot: Snapshot): string {
    const frame = JSON.stringify(snapshot);
    for (const session of Array.from(this.renderers.values())) {
      this.enqueue(session, frame);
    }
    return frame;
  }

  roster(): BrokerRoster {
    const injectors: string[] = [];
    for (const session of this.sessions.values()) {
      if (session.role === "injector") injectors.push(session.channel.id);
    }
    return { renderers: Array.from(this.renderers.keys()), injectors };
  }

  closeAll(reason = "server shutting down"): void {
    for (const session of Array.from(this.sessions.values())) {
      this.drop(session);
      this.closeChannel(session.channel, CLOSE_GOING_AWAY, reason);
    }
  }

  private handleHandshake(session: Session, raw: string): void {
    const parsed = parseJson(raw);
    if (!parsed.ok) {
      this.failProtocol(session, "handshake is not valid JSON");
      return;
    }
    const result = handshakeSchema.safeParse(parsed.value);
    if (!result.success) {
      this.failProtocol(session, `invalid handshake: ${describeIssues(result.error)}`);
      return;
    }
    const role = result.data.role;
    session.role = role;
    const reply: HandshakeReply = { ok: true };
    if (role === "renderer") {
      this.renderers.set(session.channel.id, session);
      this.enqueue(session, JSON.stringify(reply));
    } else {
      session.pending = this.reply(session, reply);
    }
    this.refreshGauges();
    log(`client ${session.channel.id} registered as ${role}`, "broker");
    this.onEvent({ type: "registered", id: session.channel.id, role });
  }

  private async handleInjectorMessage(session: Session, raw: string): Promise<void> {
    if (session.closed) return;
    const parsed = parseJson(raw);
    if (!parsed.ok) {
      this.failProtocol(session, "message is not valid JSON");
      return;
    }
    const result = addProcessRequestSchema.safeParse(parsed.value);
    if (!result.success) {
      metrics.recordInjection("rejected");
      await this.reply(session, { accepted: false, reason: describeIssues(result.error) });
      return;
    }

    let answer: AddProcessReply;
    try {
      const id = await this.submit(result.data);
      answer = { accepted: true, id };
      metrics.recordInjection("accepted");
      log(`injector ${session.channel.id} added process ${id}`, "broker");
    } catch (error) {
      metrics.recordInjection("rejected");
      if (error instanceof InvalidProcessSpecError) {
        answer = { accepted: false, reason: error.message };
      } else {
        logError(`submit failed for ${session.channel.id}`, error, "broker");
        reportError(error, { connection: session.channel.id });
        answer = { accepted: false, reason: "internal error" };
      }
    }
    await this.reply(session, answer);
  }

  private async reply(session: Session, payload: HandshakeReply | AddProcessReply): Promise<void> {
    if (session.closed) return;
    try {
      await withTimeout(session.channel.send(JSON.stringify(payload)), this.deliveryTimeoutMs);
    } catch (error) {
      this.disconnect(session.channel.id, `reply failed: ${errorMessage(error)}`);
      this.closeChannel(session.channel, CLOSE_INTERNAL_ERROR, "reply failed");
    }
  }

  private enqueue(session: Session, frame: string): void {
    if (session.closed) return;
    if (session.outbound.length >= this.outboundLimit) {
      this.evict(session, "overflow");
      return;
    }
    session.outbound.push(frame);
    if (!session.pumping) {
      void this.pump(session);
    }
  }

  private async pump(session: Session): Promise<void> {
    session.pumping = true;
    try {
      while (!session.closed) {
        const frame = session.outbound[0];
        if (frame === undefined) break;
        try {
          await withTimeout(session.channel.send(frame), this.deliveryTimeoutMs);
        } catch (error) {
          this.evict(session, error instanceof DeliveryTimeout ? "timeout" : "send_failed");
          return;
        }
        session.outbound.shift();
      }
    } finally {
      session.pumping = false;
    }
  }

  private evict(session: Session, reason: EvictionReason): void {
    if (session.closed) return;
    const id = session.channel.id;
    this.drop(session);
    metrics.recordEviction(reason);
    logWarn(`renderer ${id} evicted (${reason})`, "broker");
    this.closeChannel(session.channel, CLOSE_SLOW_CONSUMER, `renderer ${reason}`);
    this.onEvent({ type: "evicted", id, reason });
    this.onEvent({
      type: "connection-lost",
      role: session.role,
      error: new ConnectionLostError(id, `evicted: ${reason}`),
    });
  }

  private failProtocol(session: Session, reason: string): void {
    if (session.closed) return;
    const id = session.channel.id;
    const error = new ProtocolError(reason);
    const replyForHandshake = session.role === null;
    this.drop(session);
    metrics.recordProtocolError();
    logWarn(`${error.name} from ${id}: ${reason}`, "broker");
    this.onEvent({ type: "protocol-error", id, error });

    if (!replyForHandshake) {
      this.closeChannel(session.channel, CLOSE_PROTOCOL_ERROR, reason);
      return;
    }
    const rejection: HandshakeReply = { ok: false, reason };
    void withTimeout(session.channel.send(JSON.stringify(rejection)), this.deliveryTimeoutMs)
      .catch((sendError: unknown) => {
        log(`rejection to ${id} not delivered: ${errorMessage(sendError)}`, "broker");
      })
      .finally(() => this.closeChannel(session.channel, CLOSE_PROTOCOL_ERROR, reason));
  }

  private closeChannel(channel: BrokerChannel, code: number, reason: string): void {
    try {
      channel.close(code, truncateUtf8(reason, MAX_CLOSE_REASON_BYTES));
    } catch (error) {
      logError(`closing ${channel.id} failed`, error, "broker");
      reportError(error, { connection: channel.id });
    }
  }

  private drop(session: Session): void {
    if (session.closed) return;
    session.closed = true;
    session.outbound.length = 0;
    this.sessions.delete(session.channel.id);
    this.renderers.delete(session.channel.id);
    this.refreshGauges();
  }

  private refreshGauges(): void {
    const roster = this.roster();
    metrics.setClients("renderer", roster.renderers.length);
    metrics.setClients("injector", roster.injectors.length);
  }
}
