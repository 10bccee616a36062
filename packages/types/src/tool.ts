/**
 * What a tool handler hands back to the registry.
 *
 * `output` is serialized into the tool turn the model sees next.
 * `reply`, when set, ends the agent cycle: it becomes the final reply
 * shown to the user (a terminal tool-driven prompt).
 */
export interface ToolOutcome {
  readonly output: unknown;
  readonly reply?: string;
}

/** Tool description handed to the model alongside the history. */
export interface ToolSchema {
  readonly name: string;
  readonly description: string;
  /** JSON Schema for the arguments object. */
  readonly parameters: Record<string, unknown>;
}

/**
 * Uniform JSON payload every bundled tool returns as its output:
 * `{ tool, success, message?, data?, error? }`.
 */
export interface ToolResultPayload<T = unknown> {
  readonly tool: string;
  readonly success: boolean;
  readonly message?: string;
  readonly data?: T;
  readonly error?: string;
}
