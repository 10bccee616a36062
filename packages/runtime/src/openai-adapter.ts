import type { ReadableStream } from "node:stream/web";
import { z } from "zod";
import { ModelError, type ToolCall, type ToolSchema } from "@agenda/types";
import { getLogger } from "@agenda/core";
import type { ChatMessage, CompletionChunk, CompletionRequest, ModelAdapter } from "./model-adapter.js";

const log = getLogger("openai-adapter");

export const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";
export const DEFAULT_MODEL = "moonshotai/kimi-k2.5";

export interface OpenAIAdapterOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  /** Injected for tests; defaults to the global `fetch`. */
  fetch?: typeof fetch;
}

// ─── Wire types ─────────────────────────────────────────────────────

interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

type WireMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

const StreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number().int(),
                  id: z.string().nullish(),
                  function: z
                    .object({ name: z.string().nullish(), arguments: z.string().nullish() })
                    .nullish(),
                }),
              )
              .nullish(),
          })
          .nullish(),
      }),
    )
    .default([]),
});

interface PartialToolCall {
  id: string;
  name: string;
  args: string;
}

/**
 * ModelAdapter for OpenAI-compatible chat completion endpoints
 * (OpenRouter by default). Streams over server-sent events and uses
 * native function calling.
 */
export class OpenAIAdapter implements ModelAdapter {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAIAdapterOptions) {
    if (!options.apiKey) throw new ModelError("An API key is required for the OpenAI-compatible adapter");
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_MODEL;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.temperature = options.temperature ?? 0.7;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async *complete(request: CompletionRequest): AsyncIterable<CompletionChunk> {
    const body = {
      model: this.model,
      messages: toWireMessages(request.messages),
      temperature: this.temperature,
      stream: true,
      ...(request.tools.length > 0 ? { tools: request.tools.map(toWireTool) } : {}),
    };

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new ModelError(`Model request failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new ModelError(`Model API error ${response.status}: ${errorText}`);
    }
    if (!response.body) {
      throw new ModelError("Model API returned an empty body");
    }

    const pending = new Map<number, PartialToolCall>();

    for await (const data of readEvents(response.body)) {
      let json: unknown;
      try {
        json = JSON.parse(data);
      } catch (err) {
        log.warn({ err }, "Skipping unparsable stream event");
        continue;
      }
      const parsed = StreamChunkSchema.safeParse(json);
      if (!parsed.success) {
        log.warn({ issues: parsed.error.issues.slice(0, 3) }, "Skipping unexpected stream event");
        continue;
      }

      for (const choice of parsed.data.choices) {
        const delta = choice.delta;
        if (!delta) continue;
        if (delta.content) {
          yield { type: "delta", text: delta.content };
        }
        for (const fragment of delta.tool_calls ?? []) {
          const current = pending.get(fragment.index) ?? { id: "", name: "", args: "" };
          pending.set(fragment.index, {
            id: fragment.id ?? current.id,
            name: current.name + (fragment.function?.name ?? ""),
            args: current.args + (fragment.function?.arguments ?? ""),
          });
        }
      }
    }

    for (const [index, partial] of [...pending.entries()].sort(([a], [b]) => a - b)) {
      yield { type: "tool_call", call: toToolCall(partial, index) };
    }
  }
}

/** Yields the `data:` payload of every server-sent event until `[DONE]`. */
async function* readEvents(body: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });

      let newline = buffer.indexOf("\n");
      while (newline !== -1) {
        const line = buffer.slice(0, newline).trim();
        buffer = buffer.slice(newline + 1);
        newline = buffer.indexOf("\n");

        if (!line.startsWith("data:")) continue;
        const data = line.slice("data:".length).trim();
        if (data === "[DONE]") return;
        if (data) yield data;
      }
    }

    const rest = buffer.trim();
    if (rest.startsWith("data:")) {
      const data = rest.slice("data:".length).trim();
      if (data && data !== "[DONE]") yield data;
    }
  } finally {
    reader.releaseLock();
  }
}

function toToolCall(partial: PartialToolCall, index: number): ToolCall {
  let args: Record<string, unknown> = {};
  if (partial.args.trim()) {
    try {
      const parsed: unknown = JSON.parse(partial.args);
      if (isRecord(parsed)) {
        args = parsed;
      } else {
        log.warn({ tool: partial.name }, "Tool call arguments are not an object");
      }
    } catch (err) {
      log.warn({ err, tool: partial.name }, "Tool call arguments are not valid JSON");
    }
  }
  return { id: partial.id || `call_${index}`, name: partial.name, arguments: args };
}

function toWireTool(tool: ToolSchema) {
  return {
    type: "function" as const,
    function: { name: tool.name, description: tool.description, parameters: tool.parameters },
  };
}

/**
 * Rebuilds the provider's tool-call framing. Each round becomes one
 * assistant message whose `tool_calls` list the calls answered by the tool
 * turns that follow it, so unanswered calls (a loop cut short, or a
 * terminal reply mid-batch) never reach the provider. Tool turns with no
 * opening assistant turn get a synthesized one.
 */
export function toWireMessages(messages: ReadonlyArray<ChatMessage>): WireMessage[] {
  const wire: WireMessage[] = [];
  let i = 0;

  const takeToolRun = (): ChatMessage[] => {
    const run: ChatMessage[] = [];
    for (let next = messages[i]; next?.role === "tool"; next = messages[++i]) {
      run.push(next);
    }
    return run;
  };

  while (i < messages.length) {
    const message = messages[i];
    if (!message) break;

    if (message.role === "assistant" && message.toolCalls) {
      i++;
      pushRound(wire, message.content, takeToolRun());
      continue;
    }
    if (message.role === "tool") {
      pushRound(wire, "", takeToolRun());
      continue;
    }

    wire.push(
      message.role === "assistant"
        ? { role: "assistant", content: message.content }
        : { role: message.role, content: message.content },
    );
    i++;
  }

  return wire;
}

function pushRound(wire: WireMessage[], content: string, run: ReadonlyArray<ChatMessage>): void {
  const text = content.trim().length > 0 ? content : null;
  if (run.length === 0) {
    if (text !== null) wire.push({ role: "assistant", content: text });
    return;
  }

  const calls = run.map((turn, offset) => ({
    call: turn.toolCall ?? { id: `call_${wire.length}_${offset}`, name: "unknown", arguments: {} },
    content: turn.content,
  }));

  wire.push({
    role: "assistant",
    content: text,
    tool_calls: calls.map(({ call }) => ({
      id: call.id,
      type: "function",
      function: { name: call.name, arguments: JSON.stringify(call.arguments) },
    })),
  });
  for (const { call, content: result } of calls) {
    wire.push({ role: "tool", tool_call_id: call.id, content: result });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
