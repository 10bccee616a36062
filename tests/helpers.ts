import { WebSocket } from "ws";
import type { AgendaConfig } from "@agenda/gateway";

/** A ws client that buffers every envelope it receives. */
export interface TestClient {
  socket: WebSocket;
  next(): Promise<Record<string, unknown>>;
  send(envelope: unknown): void;
  close(): Promise<void>;
}

export async function connectClient(url: string): Promise<TestClient> {
  const socket = new WebSocket(url);
  const buffered: Record<string, unknown>[] = [];
  const waiting: Array<(envelope: Record<string, unknown>) => void> = [];

  socket.on("message", (data) => {
    const envelope: Record<string, unknown> = JSON.parse(data.toString());
    const waiter = waiting.shift();
    if (waiter) waiter(envelope);
    else buffered.push(envelope);
  });

  await new Promise<void>((resolve, reject) => {
    socket.once("open", () => resolve());
    socket.once("error", reject);
  });

  return {
    socket,
    next: () => {
      const envelope = buffered.shift();
      if (envelope) return Promise.resolve(envelope);
      return new Promise((resolve) => waiting.push(resolve));
    },
    send: (envelope) => socket.send(JSON.stringify(envelope)),
    close: () =>
      new Promise<void>((resolve) => {
        if (socket.readyState === WebSocket.CLOSED) return resolve();
        socket.once("close", () => resolve());
        socket.close();
      }),
  };
}

export function testConfig(schedulesFile: string, overrides: { broadcastReminders?: boolean } = {}): AgendaConfig {
  return {
    server: {
      host: "127.0.0.1",
      port: 0,
      path: "/",
      heartbeatIntervalMs: 0,
      broadcastReminders: overrides.broadcastReminders ?? false,
    },
    agent: { maxToolInvocations: 4 },
    model: {
      provider: "mock",
      baseUrl: "http://model.test/v1",
      model: "mock-model",
      temperature: 0,
    },
    schedules: { file: schedulesFile },
    notifier: { enabled: true, cron: "0 0 0 1 1 *" },
    log: { level: "silent" },
  };
}
