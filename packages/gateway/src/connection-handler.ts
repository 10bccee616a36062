import { v7 as uuidv7 } from "uuid";
import {
  asSessionId,
  ProtocolError,
  ToolLoopExceededError,
  type ConnectionId,
  type SessionId,
  type TraceContext,
} from "@agenda/types";
import { createTraceContext, getLogger } from "@agenda/core";
import type { SessionRegistry } from "@agenda/runtime";
import { envelopes, parseInbound, type InboundEnvelope, type OutboundEnvelope } from "./protocol.js";

const log = getLogger("connection");

export type ConnectionPhase = "connecting" | "open" | "processing" | "closing" | "closed" | "errored";

/** What the handler needs from the underlying socket. */
export interface ConnectionTransport {
  send(data: string): void;
  close(code?: number, reason?: string): void;
  readonly isOpen: boolean;
}

export interface ConnectionHandlerOptions {
  id: ConnectionId;
  transport: ConnectionTransport;
  sessions: SessionRegistry;
  /** Used by `message` envelopes without `session_id`; generated when omitted. */
  defaultSessionId?: SessionId;
  clock?: () => Date;
}

type Job =
  | { kind: "message"; sessionId: SessionId; content: string; trace: TraceContext }
  | { kind: "clear"; sessionId: SessionId; trace: TraceContext };

export const GENERIC_FAILURE_MESSAGE = "Agent processing failed";
export const TOOL_LIMIT_MESSAGE = "Agent exceeded the tool invocation limit";

/**
 * Per-connection state machine.
 *
 * connecting → open → (processing ⇄ open) → closing → closed, with
 * `errored` reachable from any live phase. `message` and `clear_history`
 * envelopes run one at a time in arrival order; `ping` is answered at once.
 * Results that arrive after the connection closed are dropped.
 */
export class ConnectionHandler {
  readonly id: ConnectionId;
  readonly defaultSessionId: SessionId;
  private readonly transport: ConnectionTransport;
  private readonly sessions: SessionRegistry;
  private readonly clock: () => Date;
  private readonly touched = new Set<SessionId>();
  private readonly queue: Job[] = [];
  private draining: Promise<void> | null = null;
  private currentPhase: ConnectionPhase = "connecting";
  private lastActivity: Date;

  constructor(options: ConnectionHandlerOptions) {
    this.id = options.id;
    this.transport = options.transport;
    this.sessions = options.sessions;
    this.clock = options.clock ?? (() => new Date());
    this.defaultSessionId = options.defaultSessionId ?? asSessionId(uuidv7());
    this.lastActivity = this.clock();
  }

  get phase(): ConnectionPhase {
    return this.currentPhase;
  }

  get lastActivityAt(): Date {
    return this.lastActivity;
  }

  /** Session ids this connection has addressed so far. */
  get sessionsTouched(): ReadonlySet<SessionId> {
    return this.touched;
  }

  get queued(): number {
    return this.queue.length;
  }

  /** Transport handshake finished. */
  open(): void {
    if (this.currentPhase !== "connecting") return;
    this.currentPhase = "open";
    this.send(envelopes.connected());
    log.info({ connectionId: this.id, defaultSessionId: this.defaultSessionId }, "Connection opened");
  }

  /** Handles one decoded text frame. Malformed frames get one error envelope. */
  receive(raw: string): void {
    if (!this.isLive) {
      log.debug({ connectionId: this.id, phase: this.currentPhase }, "Ignoring frame on a closed connection");
      return;
    }
    this.lastActivity = this.clock();
    const trace = createTraceContext();

    let envelope: InboundEnvelope;
    try {
      envelope = parseInbound(raw);
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      log.warn({ connectionId: this.id, traceId: trace.traceId, err }, "Rejected malformed envelope");
      this.send(envelopes.error(err.message));
      return;
    }

    log.info(
      { connectionId: this.id, traceId: trace.traceId, type: envelope.type, queued: this.queue.length },
      "Envelope received",
    );

    switch (envelope.type) {
      case "ping":
        this.send(envelopes.pong());
        return;
      case "message":
        this.enqueue({
          kind: "message",
          sessionId: envelope.session_id ? asSessionId(envelope.session_id) : this.defaultSessionId,
          content: envelope.content,
          trace,
        });
        return;
      case "clear_history":
        this.enqueue({ kind: "clear", sessionId: asSessionId(envelope.session_id), trace });
        return;
    }
  }

  /** Transport closed or server shutting down. Pending work is dropped. */
  close(): void {
    if (this.currentPhase === "closed" || this.currentPhase === "errored") return;
    this.currentPhase = "closing";
    const dropped = this.queue.splice(0).length;
    this.currentPhase = "closed";
    log.info({ connectionId: this.id, dropped, sessions: this.touched.size }, "Connection closed");
  }

  /** Unrecoverable transport failure. */
  fail(err: unknown): void {
    if (this.currentPhase === "closed" || this.currentPhase === "errored") return;
    this.queue.splice(0);
    this.currentPhase = "errored";
    log.error({ connectionId: this.id, err }, "Connection errored");
  }

  /** Resolves once every queued envelope has been handled. */
  async whenIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private get isLive(): boolean {
    return this.currentPhase === "open" || this.currentPhase === "processing";
  }

  private enqueue(job: Job): void {
    this.queue.push(job);
    this.draining ??= this.drain().finally(() => {
      this.draining = null;
    });
  }

  private async drain(): Promise<void> {
    for (let job = this.queue.shift(); job && this.isLive; job = this.queue.shift()) {
      if (job.kind === "message") {
        await this.runMessage(job.sessionId, job.content, job.trace);
      } else {
        await this.runClear(job.sessionId, job.trace);
      }
    }
  }

  private async runMessage(sessionId: SessionId, content: string, trace: TraceContext): Promise<void> {
    this.currentPhase = "processing";
    this.touched.add(sessionId);
    this.send(envelopes.processing());
    const started = Date.now();

    try {
      const reply = await this.sessions.getOrCreate(sessionId).process(content);
      log.info(
        { connectionId: this.id, sessionId, traceId: trace.traceId, ms: Date.now() - started, toolCalls: reply.toolCalls.length },
        "Agent reply ready",
      );
      this.send(envelopes.response(reply));
    } catch (err) {
      log.error({ connectionId: this.id, sessionId, traceId: trace.traceId, err }, "Agent processing failed");
      this.send(envelopes.error(err instanceof ToolLoopExceededError ? TOOL_LIMIT_MESSAGE : GENERIC_FAILURE_MESSAGE));
    } finally {
      if (this.currentPhase === "processing") {
        this.currentPhase = "open";
      }
    }
  }

  private async runClear(sessionId: SessionId, trace: TraceContext): Promise<void> {
    this.touched.add(sessionId);
    try {
      await this.sessions.clear(sessionId);
      this.send(envelopes.cleared(sessionId));
    } catch (err) {
      log.error({ connectionId: this.id, sessionId, traceId: trace.traceId, err }, "Clearing history failed");
      this.send(envelopes.error("Failed to clear history"));
    }
  }

  private send(envelope: OutboundEnvelope): void {
    if (!this.isLive || !this.transport.isOpen) {
      log.debug({ connectionId: this.id, type: envelope.type }, "Dropping envelope for a closed connection");
      return;
    }
    try {
      this.transport.send(JSON.stringify(envelope));
    } catch (err) {
      this.fail(err);
    }
  }
}
