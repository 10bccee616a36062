import { NoAssistantReplyError, type ToolCall } from "@agenda/types";
import type { CompletionChunk, CompletionEntry } from "./model-adapter.js";

export interface AssembledCompletion {
  entries: CompletionEntry[];
  toolCalls: ToolCall[];
}

/**
 * Drains a streamed completion. Runs of consecutive `delta` chunks are
 * folded into one assistant entry, in stream order.
 */
export async function assembleCompletion(stream: AsyncIterable<CompletionChunk>): Promise<AssembledCompletion> {
  const entries: CompletionEntry[] = [];
  const toolCalls: ToolCall[] = [];
  let buffer = "";

  const flush = (): void => {
    if (buffer.length > 0) {
      entries.push({ role: "assistant", content: buffer });
      buffer = "";
    }
  };

  for await (const chunk of stream) {
    switch (chunk.type) {
      case "delta":
        buffer += chunk.text;
        break;
      case "entry":
        flush();
        entries.push(chunk.entry);
        break;
      case "tool_call":
        flush();
        toolCalls.push(chunk.call);
        break;
    }
  }
  flush();

  return { entries, toolCalls };
}

/** Content of the last assistant entry that is not blank. */
export function extractReply(completion: AssembledCompletion): string {
  for (let i = completion.entries.length - 1; i >= 0; i--) {
    const entry = completion.entries[i];
    if (entry && entry.role === "assistant" && entry.content.trim().length > 0) {
      return entry.content;
    }
  }
  throw new NoAssistantReplyError();
}
