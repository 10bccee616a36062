import type { SessionId, Timestamp } from "./foundational.js";

export type TurnRole = "user" | "assistant" | "tool";

/** A tool call requested by the model. */
export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly arguments: Record<string, unknown>;
}

/** A single turn in a session's history. */
export interface ConversationMessage {
  readonly role: TurnRole;
  readonly content: string;
  readonly timestamp: Timestamp;
  /** If role is "tool", the call that produced this turn. */
  readonly toolCall?: ToolCall;
  /**
   * If role is "assistant", the tool calls the model requested in this
   * round. `content` is then whatever text came with the request.
   */
  readonly toolCalls?: ReadonlyArray<ToolCall>;
}

/** Per-call record of one tool invocation, reported next to the reply. */
export interface ToolCallSummary {
  readonly id: string;
  readonly name: string;
  readonly arguments: Record<string, unknown>;
  readonly status: "completed" | "error";
  readonly result: string;
}

/**
 * The final output of one `process` call on an agent session.
 */
export interface AgentReply {
  readonly sessionId: SessionId;
  readonly content: string;
  /** Text the model produced alongside its tool-call requests, one entry per round. */
  readonly thoughts: ReadonlyArray<string>;
  readonly toolCalls: ReadonlyArray<ToolCallSummary>;
}
