import type { SessionId } from "@agenda/types";
import { getLogger } from "@agenda/core";
import { AgentSession, type AgentSessionOptions } from "./agent-session.js";

const log = getLogger("session-registry");

export type SessionRegistryOptions = Omit<AgentSessionOptions, "id">;

/**
 * Process-wide map from session id to Agent Session.
 *
 * Creation is synchronous, so two callers racing on the same new id on
 * the event loop always receive the same object. Owned by the server;
 * built at startup and torn down by `shutdown()`.
 */
export class SessionRegistry {
  private readonly sessions = new Map<SessionId, AgentSession>();

  constructor(private readonly options: SessionRegistryOptions) {}

  getOrCreate(id: SessionId): AgentSession {
    let session = this.sessions.get(id);
    if (!session) {
      session = new AgentSession({ ...this.options, id });
      this.sessions.set(id, session);
      log.debug({ sessionId: id, sessions: this.sessions.size }, "Session created");
    }
    return session;
  }

  get(id: SessionId): AgentSession | undefined {
    return this.sessions.get(id);
  }

  has(id: SessionId): boolean {
    return this.sessions.has(id);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Resets the session's history, keeping its identity. Unknown ids are a no-op. */
  async clear(id: SessionId): Promise<void> {
    const session = this.sessions.get(id);
    if (!session) return;
    await session.clear();
    log.info({ sessionId: id }, "Session history cleared");
  }

  /** Drops the session; the next `getOrCreate` starts an empty one. */
  remove(id: SessionId): boolean {
    return this.sessions.delete(id);
  }

  shutdown(): void {
    const count = this.sessions.size;
    this.sessions.clear();
    log.info({ sessions: count }, "Session registry shut down");
  }
}
