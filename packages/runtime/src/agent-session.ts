import {
  ToolLoopExceededError,
  type AgentReply,
  type ConversationMessage,
  type SessionId,
  type Timestamp,
  type ToolCallSummary,
  type TurnRole,
} from "@agenda/types";
import { AsyncMutex, getLogger } from "@agenda/core";
import type { ChatMessage, ModelAdapter } from "./model-adapter.js";
import type { ToolRegistry } from "./tool-registry.js";
import { assembleCompletion, extractReply } from "./completion.js";

const log = getLogger("agent-session");

export const DEFAULT_MAX_TOOL_INVOCATIONS = 8;

export interface AgentSessionOptions {
  id: SessionId;
  model: ModelAdapter;
  tools: ToolRegistry;
  /** Rendered before every completion request so time placeholders stay current. */
  systemPrompt: () => string;
  maxToolInvocations?: number;
  clock?: () => Date;
}

/**
 * One conversation. Owns the ordered turn history and runs the
 * think → tool → think cycle for each user message. Every tool round is
 * recorded as an assistant turn carrying the requested calls, followed by
 * one tool turn per call that actually ran.
 *
 * `process` and `clear` are serialized on a per-session mutex, so two
 * connections sharing a session id never interleave their appends.
 */
export class AgentSession {
  readonly id: SessionId;
  readonly createdAt: Timestamp;
  private turns: ConversationMessage[] = [];
  private readonly mutex = new AsyncMutex();
  private readonly model: ModelAdapter;
  private readonly tools: ToolRegistry;
  private readonly systemPrompt: () => string;
  private readonly maxToolInvocations: number;
  private readonly clock: () => Date;

  constructor(options: AgentSessionOptions) {
    this.id = options.id;
    this.model = options.model;
    this.tools = options.tools;
    this.systemPrompt = options.systemPrompt;
    this.maxToolInvocations = options.maxToolInvocations ?? DEFAULT_MAX_TOOL_INVOCATIONS;
    this.clock = options.clock ?? (() => new Date());
    this.createdAt = this.now();
  }

  /** Snapshot of the history; later appends do not show up in it. */
  get history(): ReadonlyArray<ConversationMessage> {
    return [...this.turns];
  }

  get busy(): boolean {
    return this.mutex.isLocked;
  }

  async process(userText: string): Promise<AgentReply> {
    return this.mutex.runExclusive(() => this.run(userText));
  }

  /** Empties the history once any in-flight `process` has finished. */
  async clear(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.turns = [];
    });
  }

  private async run(userText: string): Promise<AgentReply> {
    this.append("user", userText);
    const toolCalls: ToolCallSummary[] = [];
    const thoughts: string[] = [];
    let invocations = 0;

    for (;;) {
      const completion = await assembleCompletion(
        this.model.complete({ messages: this.buildMessages(), tools: this.tools.schemas() }),
      );

      if (completion.toolCalls.length === 0) {
        const content = extractReply(completion);
        this.append("assistant", content);
        return { sessionId: this.id, content, thoughts, toolCalls };
      }

      const preamble = completion.entries
        .filter((entry) => entry.role === "assistant" && entry.content.trim().length > 0)
        .map((entry) => entry.content)
        .join("\n");
      this.append("assistant", preamble, { toolCalls: completion.toolCalls });
      if (preamble) {
        thoughts.push(preamble);
      }

      for (const call of completion.toolCalls) {
        if (invocations >= this.maxToolInvocations) {
          throw new ToolLoopExceededError(this.maxToolInvocations);
        }
        invocations++;

        log.debug({ sessionId: this.id, tool: call.name, invocation: invocations }, "Invoking tool");
        const outcome = await this.tools.invoke(call.name, call.arguments);
        const result = serializeOutput(outcome.output);
        this.append("tool", result, { toolCall: call });
        toolCalls.push({
          id: call.id,
          name: call.name,
          arguments: call.arguments,
          status: isFailurePayload(outcome.output) ? "error" : "completed",
          result,
        });

        if (outcome.reply !== undefined) {
          this.append("assistant", outcome.reply);
          return { sessionId: this.id, content: outcome.reply, thoughts, toolCalls };
        }
      }
    }
  }

  private buildMessages(): ChatMessage[] {
    return [
      { role: "system", content: this.systemPrompt() },
      ...this.turns.map((turn) => ({
        role: turn.role,
        content: turn.content,
        toolCall: turn.toolCall,
        toolCalls: turn.toolCalls,
      })),
    ];
  }

  private append(role: TurnRole, content: string, calls: Pick<ConversationMessage, "toolCall" | "toolCalls"> = {}): void {
    this.turns.push({ role, content, timestamp: this.now(), ...calls });
  }

  private now(): Timestamp {
    return this.clock().toISOString();
  }
}

function serializeOutput(output: unknown): string {
  return typeof output === "string" ? output : JSON.stringify(output);
}

function isFailurePayload(output: unknown): boolean {
  return typeof output === "object" && output !== null && "success" in output && output.success === false;
}
