import { describe, it, expect } from "vitest";
import { asScheduleId, asSessionId, ProtocolError } from "@agenda/types";
import { envelopes, parseInbound } from "./protocol.js";

describe("parseInbound", () => {
  it("decodes the three client envelopes", () => {
    expect(parseInbound('{"type":"message","content":"hi","session_id":"s1"}')).toEqual({
      type: "message",
      content: "hi",
      session_id: "s1",
    });
    expect(parseInbound('{"type":"clear_history","session_id":"s1"}')).toEqual({
      type: "clear_history",
      session_id: "s1",
    });
    expect(parseInbound('{"type":"ping"}')).toEqual({ type: "ping" });
  });

  it("treats a frame without type as a message", () => {
    expect(parseInbound('{"content":"hello"}')).toEqual({ type: "message", content: "hello" });
  });

  it.each([
    ["not json", /^Invalid JSON format: /],
    ["[1,2]", /^Envelope must be a JSON object$/],
    ['{"type":"subscribe"}', /^Unknown message type: subscribe$/],
    ['{"type":"message","content":"   "}', /^Message content is required$/],
    ['{"type":"message"}', /^Message content is required$/],
    ['{"type":"clear_history"}', /^clear_history requires session_id$/],
    ['{"type":"clear_history","session_id":""}', /^clear_history requires session_id$/],
  ])("rejects %s", (raw, message) => {
    expect(() => parseInbound(raw)).toThrow(ProtocolError);
    expect(() => parseInbound(raw)).toThrow(message);
  });
});

describe("envelopes", () => {
  it("builds the clear acknowledgement and reminder envelopes", () => {
    expect(envelopes.cleared("s1")).toEqual({
      type: "status",
      status: "success",
      message: "History cleared for session s1",
    });
    expect(
      envelopes.reminder({
        scheduleId: asScheduleId("abc"),
        title: "Dentist",
        startAt: "2025-03-15T14:30:00.000Z",
        reminderMinutes: 15,
        message: "Starts soon",
        notifiedAt: "2025-03-15T14:15:00.000Z",
      }),
    ).toEqual({
      type: "reminder",
      schedule_id: "abc",
      title: "Dentist",
      start_at: "2025-03-15T14:30:00.000Z",
      message: "Starts soon",
    });
  });

  it("carries the reply's thoughts and tool calls in the response", () => {
    expect(
      envelopes.response({
        sessionId: asSessionId("s1"),
        content: "Deleted.",
        thoughts: ["Let me look it up first."],
        toolCalls: [{ id: "c1", name: "list_schedules", arguments: {}, status: "completed", result: "{}" }],
      }),
    ).toEqual({
      type: "response",
      content: "Deleted.",
      session_id: "s1",
      thoughts: [{ content: "Let me look it up first.", source: "assistant" }],
      tool_calls: [{ id: "c1", name: "list_schedules", arguments: {}, status: "completed", result: "{}" }],
    });
  });
});
