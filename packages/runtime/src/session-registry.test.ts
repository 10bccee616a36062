import { describe, it, expect } from "vitest";
import { asSessionId } from "@agenda/types";
import { MockModelAdapter } from "./model-adapter.js";
import { SessionRegistry } from "./session-registry.js";
import { ToolRegistry } from "./tool-registry.js";

function newRegistry(): SessionRegistry {
  return new SessionRegistry({
    model: new MockModelAdapter(),
    tools: new ToolRegistry(),
    systemPrompt: () => "system",
  });
}

describe("SessionRegistry", () => {
  it("returns the same session object for the same id", () => {
    const registry = newRegistry();
    const a = registry.getOrCreate(asSessionId("a"));

    expect(registry.getOrCreate(asSessionId("a"))).toBe(a);
    expect(registry.getOrCreate(asSessionId("b"))).not.toBe(a);
    expect(registry.size).toBe(2);
  });

  it("clears one session without touching the others", async () => {
    const registry = newRegistry();
    const a = registry.getOrCreate(asSessionId("a"));
    const b = registry.getOrCreate(asSessionId("b"));
    await a.process("My name is Ada");
    await b.process("My name is Bo");

    await registry.clear(asSessionId("a"));

    expect(registry.getOrCreate(asSessionId("a"))).toBe(a);
    expect(a.history).toEqual([]);
    expect(b.history.map((t) => t.content)).toEqual(["My name is Bo", "Hello Bo"]);
  });

  it("treats clearing an unknown id as a no-op", async () => {
    const registry = newRegistry();

    await expect(registry.clear(asSessionId("nobody"))).resolves.toBeUndefined();
    expect(registry.has(asSessionId("nobody"))).toBe(false);
  });

  it("starts a fresh session after remove", async () => {
    const registry = newRegistry();
    const old = registry.getOrCreate(asSessionId("a"));
    await old.process("My name is Ada");

    expect(registry.remove(asSessionId("a"))).toBe(true);
    const fresh = registry.getOrCreate(asSessionId("a"));

    expect(fresh).not.toBe(old);
    expect(fresh.history).toEqual([]);
  });

  it("drops every session on shutdown", () => {
    const registry = newRegistry();
    registry.getOrCreate(asSessionId("a"));
    registry.getOrCreate(asSessionId("b"));

    registry.shutdown();

    expect(registry.size).toBe(0);
  });
});
