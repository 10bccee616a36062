import type { ToolOutcome, ToolResultPayload } from "@agenda/types";

/**
 * Wraps a tool's result in the uniform `{ tool, success, ... }` payload.
 * Absent fields are left out of the serialized JSON.
 */
export function toolResult<T>(
  tool: string,
  success: boolean,
  fields: { data?: T; message?: string; error?: string } = {},
): ToolOutcome {
  const payload: ToolResultPayload<T> = {
    tool,
    success,
    ...(fields.message ? { message: fields.message } : {}),
    ...(fields.data !== undefined ? { data: fields.data } : {}),
    ...(fields.error ? { error: fields.error } : {}),
  };
  return { output: payload };
}

export function toolFailure(tool: string, error: string): ToolOutcome {
  return toolResult(tool, false, { error });
}
