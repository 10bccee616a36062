import { z } from "zod";
import { ProtocolError, type AgentReply, type ReminderNotification, type ToolCallSummary } from "@agenda/types";

// ─── Inbound ────────────────────────────────────────────────────────

const MessageEnvelopeSchema = z.object({
  type: z.literal("message"),
  content: z.string({ required_error: "Message content is required" }).refine((value) => value.trim().length > 0, {
    message: "Message content is required",
  }),
  session_id: z.string().min(1, "session_id must not be empty").optional(),
});

const ClearHistoryEnvelopeSchema = z.object({
  type: z.literal("clear_history"),
  session_id: z
    .string({ required_error: "clear_history requires session_id" })
    .min(1, "clear_history requires session_id"),
});

const PingEnvelopeSchema = z.object({ type: z.literal("ping") });

const InboundEnvelopeSchema = z.discriminatedUnion("type", [
  MessageEnvelopeSchema,
  ClearHistoryEnvelopeSchema,
  PingEnvelopeSchema,
]);

export type InboundEnvelope = z.infer<typeof InboundEnvelopeSchema>;

const KNOWN_TYPES: ReadonlySet<string> = new Set(InboundEnvelopeSchema.options.map((o) => o.shape.type.value));

/**
 * Decodes one client frame. A frame without `type` is a chat message.
 * Throws `ProtocolError` for anything that is not a well-formed envelope.
 */
export function parseInbound(raw: string): InboundEnvelope {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ProtocolError(`Invalid JSON format: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    throw new ProtocolError("Envelope must be a JSON object");
  }

  const candidate = "type" in json ? json : { ...json, type: "message" };
  if (typeof candidate.type !== "string" || !KNOWN_TYPES.has(candidate.type)) {
    throw new ProtocolError(`Unknown message type: ${String(candidate.type)}`);
  }

  const parsed = InboundEnvelopeSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ProtocolError(parsed.error.issues[0]?.message ?? "Malformed envelope");
  }
  return parsed.data;
}

// ─── Outbound ───────────────────────────────────────────────────────

export interface ThoughtView {
  content: string;
  source: "assistant";
}

export type OutboundEnvelope =
  | { type: "connection"; status: "connected"; message: string }
  | { type: "status"; status: "processing" | "success"; message: string }
  | {
      type: "response";
      content: string;
      session_id: string;
      thoughts: ThoughtView[];
      tool_calls: ToolCallSummary[];
    }
  | { type: "pong" }
  | { type: "error"; message: string }
  | { type: "reminder"; schedule_id: string; title: string; start_at: string; message: string };

export const envelopes = {
  connected: (): OutboundEnvelope => ({
    type: "connection",
    status: "connected",
    message: "Connected to the agenda assistant",
  }),
  processing: (): OutboundEnvelope => ({ type: "status", status: "processing", message: "Processing your message..." }),
  cleared: (sessionId: string): OutboundEnvelope => ({
    type: "status",
    status: "success",
    message: `History cleared for session ${sessionId}`,
  }),
  response: (reply: AgentReply): OutboundEnvelope => ({
    type: "response",
    content: reply.content,
    session_id: reply.sessionId,
    thoughts: reply.thoughts.map((content) => ({ content, source: "assistant" as const })),
    tool_calls: [...reply.toolCalls],
  }),
  pong: (): OutboundEnvelope => ({ type: "pong" }),
  error: (message: string): OutboundEnvelope => ({ type: "error", message }),
  reminder: (notification: ReminderNotification): OutboundEnvelope => ({
    type: "reminder",
    schedule_id: notification.scheduleId,
    title: notification.title,
    start_at: notification.startAt,
    message: notification.message,
  }),
};
