import { v7 as uuidv7 } from "uuid";
import { z } from "zod";
import type { ToolCall, ToolSchema, TurnRole } from "@agenda/types";

/**
 * A message as the model adapter receives it: the rendered system prompt
 * followed by the session's turns. Tool turns keep the call that produced
 * them, and each tool round opens with an assistant message carrying
 * `toolCalls`, so adapters can rebuild the provider's tool-call framing.
 */
export interface ChatMessage {
  role: "system" | TurnRole;
  content: string;
  toolCall?: ToolCall;
  toolCalls?: ReadonlyArray<ToolCall>;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  tools: ToolSchema[];
}

/** A complete message produced during a completion. */
export interface CompletionEntry {
  role: TurnRole;
  content: string;
}

/**
 * One element of a streamed completion:
 * - `delta`: a fragment of assistant text
 * - `entry`: a whole message
 * - `tool_call`: a request to run a tool
 */
export type CompletionChunk =
  | { type: "delta"; text: string }
  | { type: "entry"; entry: CompletionEntry }
  | { type: "tool_call"; call: ToolCall };

/**
 * Abstraction over the underlying LLM. Adapters hold no per-session state
 * and are shared by every session.
 */
export interface ModelAdapter {
  complete(request: CompletionRequest): AsyncIterable<CompletionChunk>;
}

// ─── Mock ───────────────────────────────────────────────────────────

const ToolPayloadSchema = z.object({
  tool: z.string(),
  success: z.boolean(),
  message: z.string().optional(),
  error: z.string().optional(),
});

export const MOCK_FALLBACK_REPLY =
  'I can help you manage your schedule. Try "remind me to <task> at YYYY-MM-DD HH:MM" or "show my schedules".';

/**
 * A deterministic adapter for local runs and tests.
 * Pattern-matches on the conversation and streams its reply word by word.
 *
 * Supported patterns:
 * - "remind me to X at YYYY-MM-DD HH:MM" → calls create_schedule
 * - "show/list ... schedules" → calls list_schedules
 * - last message is a tool turn → summarizes the tool result
 * - "My name is X" → "Hello X"
 * - "What is my name?" → scans the history for "My name is X"
 */
export class MockModelAdapter implements ModelAdapter {
  async *complete(request: CompletionRequest): AsyncIterable<CompletionChunk> {
    const { messages, tools } = request;
    const offered = new Set(tools.map((t) => t.name));
    const last = messages[messages.length - 1];

    if (last?.role === "tool") {
      yield* streamText(summarizeToolResult(last.content));
      return;
    }

    const text = [...messages].reverse().find((m) => m.role === "user")?.content ?? "";

    const reminder = text.match(/remind me (?:to )?(.+?) (?:at|on) (\d{4}-\d{2}-\d{2} \d{2}:\d{2})/i);
    if (reminder && offered.has("create_schedule")) {
      yield toolCall("create_schedule", { title: reminder[1], datetime: reminder[2] });
      return;
    }

    if (/\b(?:list|show)\b.*\bschedules?\b/i.test(text) && offered.has("list_schedules")) {
      yield toolCall("list_schedules", { status: "all" });
      return;
    }

    const name = text.match(/My name is (\w+)/i);
    if (name) {
      yield* streamText(`Hello ${name[1]}`);
      return;
    }

    if (/What is my name/i.test(text)) {
      for (const msg of messages) {
        const earlier = msg.role === "user" ? msg.content.match(/My name is (\w+)/i) : null;
        if (earlier) {
          yield* streamText(`Your name is ${earlier[1]}`);
          return;
        }
      }
      yield* streamText("I don't know your name.");
      return;
    }

    yield* streamText(MOCK_FALLBACK_REPLY);
  }
}

function toolCall(name: string, args: Record<string, unknown>): CompletionChunk {
  return { type: "tool_call", call: { id: `call_${uuidv7()}`, name, arguments: args } };
}

function* streamText(text: string): Generator<CompletionChunk> {
  for (const word of text.match(/\S+\s*/g) ?? [text]) {
    yield { type: "delta", text: word };
  }
}

function summarizeToolResult(content: string): string {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    return "Done.";
  }
  const payload = ToolPayloadSchema.safeParse(json);
  if (!payload.success) {
    return "Done.";
  }
  if (!payload.data.success) {
    return `Sorry, that did not work: ${payload.data.error ?? "unknown error"}`;
  }
  return payload.data.message ?? "Done.";
}
