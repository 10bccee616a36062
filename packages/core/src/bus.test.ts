import { describe, it, expect, vi } from "vitest";
import { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";

describe("InMemoryEventBus", () => {
  it("delivers events to subscribers of the topic and propagates the trace context", async () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    bus.subscribe({ topics: ["reminder.due"] }, handler);

    const traceCtx = createTraceContext();
    const event = createEvent("reminder.due", { title: "Standup" }, traceCtx);
    await bus.publish(event);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler).toHaveBeenCalledWith(event);
    expect(handler.mock.calls[0]?.[0].traceCtx.traceId).toBe(traceCtx.traceId);
  });

  it("keeps delivering when one handler throws", async () => {
    const bus = new InMemoryEventBus();
    const failing = vi.fn(async () => {
      throw new Error("handler broke");
    });
    const healthy = vi.fn();
    bus.subscribe({ topics: ["reminder.due"] }, failing);
    bus.subscribe({ topics: ["reminder.due"] }, healthy);

    await expect(bus.publish(createEvent("reminder.due", {}, createTraceContext()))).resolves.toBeUndefined();
    expect(failing).toHaveBeenCalledTimes(1);
    expect(healthy).toHaveBeenCalledTimes(1);
  });

  it("applies predicates and stops delivering after unsubscribe", async () => {
    const bus = new InMemoryEventBus();
    const handler = vi.fn();
    const sub = bus.subscribe({ predicate: (e) => e.payload === "keep" }, handler);

    await bus.publish(createEvent("reminder.due", "skip", createTraceContext()));
    await bus.publish(createEvent("reminder.due", "keep", createTraceContext()));
    expect(handler).toHaveBeenCalledTimes(1);

    sub.unsubscribe();
    expect(bus.subscriberCount).toBe(0);
    await bus.publish(createEvent("reminder.due", "keep", createTraceContext()));
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it("creates child spans inside the parent's trace", () => {
    const root = createTraceContext();
    const child = createTraceContext(root);

    expect(child.traceId).toBe(root.traceId);
    expect(child.parentSpanId).toBe(root.spanId);
    expect(child.spanId).not.toBe(root.spanId);
  });
});
