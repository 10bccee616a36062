/**
 * Error codes for every failure the agent service distinguishes.
 * Uses a string union so handlers can switch exhaustively on `code`.
 */
export type AgendaErrorCode =
  | "PROTOCOL_ERROR"        // Malformed or unknown inbound envelope
  | "DUPLICATE_TOOL"        // Tool name registered twice
  | "TOOL_NOT_FOUND"        // Tool name not recognized
  | "INVALID_ARGUMENTS"     // Tool arguments failed the handler's schema
  | "TOOL_EXECUTION_ERROR"  // Tool handler threw
  | "TOOL_LOOP_EXCEEDED"    // Too many tool invocations in one turn
  | "NO_ASSISTANT_REPLY"    // Completion had no assistant message
  | "NOT_FOUND"             // Schedule id does not exist
  | "INVALID_TRANSITION"    // Schedule status would move backward
  | "MODEL_ERROR"           // Completion provider failed
  | "CONFIG_ERROR";         // Configuration file or environment is invalid

export interface ArgumentIssue {
  readonly path: string;
  readonly message: string;
}

export class AgendaError extends Error {
  readonly code: AgendaErrorCode;

  constructor(code: AgendaErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgendaError";
    this.code = code;
  }
}

export class ProtocolError extends AgendaError {
  constructor(message: string) {
    super("PROTOCOL_ERROR", message);
    this.name = "ProtocolError";
  }
}

export class DuplicateToolError extends AgendaError {
  constructor(readonly toolName: string) {
    super("DUPLICATE_TOOL", `Tool "${toolName}" is already registered`);
    this.name = "DuplicateToolError";
  }
}

export class UnknownToolError extends AgendaError {
  constructor(readonly toolName: string) {
    super("TOOL_NOT_FOUND", `Tool "${toolName}" not found`);
    this.name = "UnknownToolError";
  }
}

export class InvalidArgumentsError extends AgendaError {
  constructor(
    readonly toolName: string,
    readonly issues: ReadonlyArray<ArgumentIssue>,
  ) {
    const detail = issues.map((issue) => `${issue.path || "(root)"}: ${issue.message}`).join("; ");
    super("INVALID_ARGUMENTS", `Invalid arguments for tool "${toolName}": ${detail}`);
    this.name = "InvalidArgumentsError";
  }
}

export class ToolExecutionError extends AgendaError {
  constructor(
    readonly toolName: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("TOOL_EXECUTION_ERROR", `Tool "${toolName}" failed: ${reason}`, { cause });
    this.name = "ToolExecutionError";
  }
}

export class ToolLoopExceededError extends AgendaError {
  constructor(readonly limit: number) {
    super("TOOL_LOOP_EXCEEDED", `Tool invocation limit of ${limit} reached without a final reply`);
    this.name = "ToolLoopExceededError";
  }
}

export class NoAssistantReplyError extends AgendaError {
  constructor() {
    super("NO_ASSISTANT_REPLY", "Completion contained no assistant message");
    this.name = "NoAssistantReplyError";
  }
}

export class NotFoundError extends AgendaError {
  constructor(readonly id: string) {
    super("NOT_FOUND", `Schedule "${id}" not found`);
    this.name = "NotFoundError";
  }
}

export class InvalidTransitionError extends AgendaError {
  constructor(
    readonly id: string,
    readonly from: string,
    readonly to: string,
  ) {
    super("INVALID_TRANSITION", `Schedule "${id}" cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class ModelError extends AgendaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("MODEL_ERROR", message, options);
    this.name = "ModelError";
  }
}

export class ConfigError extends AgendaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
    this.name = "ConfigError";
  }
}
