import type { IncomingMessage } from "node:http";
import { v7 as uuidv7 } from "uuid";
import { WebSocket, WebSocketServer, type RawData } from "ws";
import type { ConnectionId, EventBus, ReminderNotification, Subscription } from "@agenda/types";
import { getLogger } from "@agenda/core";
import type { SessionRegistry } from "@agenda/runtime";
import { ConnectionHandler, type ConnectionTransport } from "./connection-handler.js";
import { envelopes, type OutboundEnvelope } from "./protocol.js";

const log = getLogger("gateway-server");

export interface GatewayServerOptions {
  host: string;
  /** 0 picks a free port; read it back from `port` after `start()`. */
  port: number;
  path: string;
  /** Ping interval; a socket that misses one round is terminated. 0 disables. */
  heartbeatIntervalMs: number;
  sessions: SessionRegistry;
  bus?: EventBus;
  /** Forward `reminder.due` bus events to every open connection. */
  broadcastReminders?: boolean;
}

interface ClientConnection {
  socket: WebSocket;
  handler: ConnectionHandler;
  isAlive: boolean;
}

/**
 * WebSocket front door: one Connection Handler per socket.
 */
export class AgentGatewayServer {
  private wss: WebSocketServer | null = null;
  private readonly clients = new Map<ConnectionId, ClientConnection>();
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private reminderSubscription: Subscription | null = null;

  constructor(private readonly options: GatewayServerOptions) {}

  async start(): Promise<void> {
    if (this.wss) return;

    const wss = new WebSocketServer({ host: this.options.host, port: this.options.port, path: this.options.path });
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        wss.off("listening", onListening);
        reject(err);
      };
      const onListening = (): void => {
        wss.off("error", onError);
        resolve();
      };
      wss.once("error", onError);
      wss.once("listening", onListening);
    });

    this.wss = wss;
    wss.on("connection", (socket, request) => this.handleConnection(socket, request));
    wss.on("error", (err) => {
      log.error({ err }, "WebSocket server error");
    });

    if (this.options.broadcastReminders && this.options.bus) {
      this.reminderSubscription = this.options.bus.subscribe<ReminderNotification>(
        { topics: ["reminder.due"] },
        (event) => {
          const delivered = this.broadcast(envelopes.reminder(event.payload));
          log.info({ scheduleId: event.payload.scheduleId, delivered }, "Reminder broadcast");
        },
      );
    }

    this.startHeartbeat();
    log.info({ host: this.options.host, port: this.port, path: this.options.path }, "Gateway listening");
  }

  /** Bound port; only meaningful after `start()`. */
  get port(): number {
    const address = this.wss?.address();
    return typeof address === "object" && address !== null ? address.port : this.options.port;
  }

  get connectionCount(): number {
    return this.clients.size;
  }

  /** Sends the envelope to every open connection. Returns how many got it. */
  broadcast(envelope: OutboundEnvelope): number {
    const data = JSON.stringify(envelope);
    let delivered = 0;
    for (const [id, client] of this.clients) {
      if (client.socket.readyState !== WebSocket.OPEN) continue;
      try {
        client.socket.send(data);
        delivered++;
      } catch (err) {
        log.warn({ err, connectionId: id }, "Broadcast send failed");
      }
    }
    return delivered;
  }

  async stop(): Promise<void> {
    this.stopHeartbeat();
    this.reminderSubscription?.unsubscribe();
    this.reminderSubscription = null;

    for (const client of this.clients.values()) {
      client.handler.close();
      client.socket.close(1001, "Server shutting down");
    }
    this.clients.clear();

    const wss = this.wss;
    this.wss = null;
    if (!wss) return;

    await new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
    log.info("Gateway stopped");
  }

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    const id = uuidv7() as ConnectionId;
    const transport: ConnectionTransport = {
      send: (data) => socket.send(data),
      close: (code, reason) => socket.close(code, reason),
      get isOpen() {
        return socket.readyState === WebSocket.OPEN;
      },
    };
    const handler = new ConnectionHandler({ id, transport, sessions: this.options.sessions });
    const client: ClientConnection = { socket, handler, isAlive: true };
    this.clients.set(id, client);

    log.info({ connectionId: id, remoteAddress: request.socket.remoteAddress }, "Client connected");

    socket.on("message", (data: RawData) => {
      handler.receive(rawDataToString(data));
    });
    socket.on("pong", () => {
      client.isAlive = true;
    });
    socket.on("close", (code: number, reason: Buffer) => {
      handler.close();
      this.clients.delete(id);
      log.info({ connectionId: id, code, reason: reason.toString() }, "Client disconnected");
    });
    socket.on("error", (err: Error) => {
      handler.fail(err);
      this.clients.delete(id);
      socket.terminate();
    });

    handler.open();
  }

  private startHeartbeat(): void {
    const interval = this.options.heartbeatIntervalMs;
    if (interval <= 0) return;

    this.heartbeatTimer = setInterval(() => {
      for (const [id, client] of this.clients) {
        if (!client.isAlive) {
          log.info({ connectionId: id }, "Client heartbeat timeout");
          client.handler.close();
          client.socket.terminate();
          this.clients.delete(id);
          continue;
        }
        client.isAlive = false;
        client.socket.ping();
      }
    }, interval);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}
