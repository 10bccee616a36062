import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { InvalidArgumentsError, ToolExecutionError, type ScheduleStore } from "@agenda/types";
import { ToolRegistry } from "@agenda/runtime";
import { JsonScheduleStore } from "@agenda/persistence";
import { registerDefaultTools } from "./index.js";

// Local wall-clock "now": 2025-03-15 08:00.
const clock = () => new Date(2025, 2, 15, 8, 0);

describe("schedule tools", () => {
  let dir: string;
  let store: JsonScheduleStore;
  let tools: ToolRegistry;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "agenda-tools-"));
    store = new JsonScheduleStore(path.join(dir, "schedules.json"), { clock });
    tools = registerDefaultTools(new ToolRegistry(), store, { clock });
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("registers every bundled tool", () => {
    expect(tools.names).toEqual([
      "create_schedule",
      "list_schedules",
      "update_schedule",
      "delete_schedule",
      "askUserQuestion",
    ]);
  });

  it("creates a pending schedule with the default reminder", async () => {
    const outcome = await tools.invoke("create_schedule", { title: "Dentist", datetime: "2025-03-15 14:30" });

    const [record] = await store.load();
    expect(record).toMatchObject({
      title: "Dentist",
      startAt: new Date(2025, 2, 15, 14, 30).toISOString(),
      status: "pending",
      reminderMinutes: 15,
      recurrence: "once",
    });
    expect(outcome.output).toEqual({
      tool: "create_schedule",
      success: true,
      message: 'Created schedule "Dentist" for 2025-03-15 14:30.',
      data: {
        schedule: {
          id: record?.id,
          title: "Dentist",
          datetime: "2025-03-15 14:30",
          status: "pending",
          reminder_minutes: 15,
          repeat: "once",
        },
      },
    });
    expect(outcome.reply).toBeUndefined();
  });

  it("rejects unparsable and past one-off times as failures", async () => {
    const bad = await tools.invoke("create_schedule", { title: "Call", datetime: "tomorrow afternoon" });
    const past = await tools.invoke("create_schedule", { title: "Call", datetime: "2025-03-14 09:00" });
    const pastDaily = await tools.invoke("create_schedule", {
      title: "Standup",
      datetime: "2025-03-14 09:00",
      repeat: "daily",
    });

    expect(bad.output).toEqual({
      tool: "create_schedule",
      success: false,
      error: 'Invalid datetime "tomorrow afternoon". Use the format YYYY-MM-DD HH:MM, e.g. 2025-03-15 14:30.',
    });
    expect(past.output).toEqual({
      tool: "create_schedule",
      success: false,
      error: "The time 2025-03-14 09:00 is in the past.",
    });
    expect(pastDaily.output).toMatchObject({ success: true });
    expect(await store.load()).toHaveLength(1);
  });

  it("rejects arguments outside the schema", async () => {
    await expect(
      tools.invoke("create_schedule", { title: "Call", datetime: "2025-03-16 09:00", repeat: "hourly" }),
    ).rejects.toBeInstanceOf(InvalidArgumentsError);
  });

  it("lists pending schedules by default, sorted by start time", async () => {
    await tools.invoke("create_schedule", { title: "Later", datetime: "2025-03-17 09:00" });
    await tools.invoke("create_schedule", { title: "Sooner", datetime: "2025-03-16 09:00" });
    const [, sooner] = await store.load();
    if (!sooner) throw new Error("expected two schedules");
    await store.update(sooner.id, { status: "cancelled" });

    const pending = await tools.invoke("list_schedules", {});
    const all = await tools.invoke("list_schedules", { status: "all", limit: 5 });

    expect(pending.output).toMatchObject({
      success: true,
      message: "Found 1 schedule(s).",
      data: { count: 1, schedules: [{ title: "Later" }] },
    });
    expect(all.output).toMatchObject({
      data: { count: 2, schedules: [{ title: "Sooner", status: "cancelled" }, { title: "Later" }] },
    });
  });

  it("reports an empty list", async () => {
    const outcome = await tools.invoke("list_schedules", { status: "notified" });

    expect(outcome.output).toEqual({
      tool: "list_schedules",
      success: true,
      message: "No schedules found.",
      data: { count: 0, schedules: [] },
    });
  });

  it("updates only the given fields", async () => {
    await tools.invoke("create_schedule", { title: "Review", datetime: "2025-03-16 09:00", description: "Room 4" });
    const [created] = await store.load();
    if (!created) throw new Error("expected a schedule");

    const outcome = await tools.invoke("update_schedule", {
      schedule_id: created.id,
      datetime: "2025-03-16 10:30",
      reminder_minutes: 5,
    });

    expect(outcome.output).toMatchObject({
      success: true,
      message: 'Updated schedule "Review".',
      data: {
        schedule: { datetime: "2025-03-16 10:30", reminder_minutes: 5, description: "Room 4" },
        updated_fields: ["reminder_minutes", "datetime"],
      },
    });
  });

  it("turns update problems into failures the model can read", async () => {
    await tools.invoke("create_schedule", { title: "Review", datetime: "2025-03-16 09:00" });
    const [created] = await store.load();
    if (!created) throw new Error("expected a schedule");
    await store.update(created.id, { status: "cancelled" });

    const empty = await tools.invoke("update_schedule", { schedule_id: created.id });
    const missing = await tools.invoke("update_schedule", { schedule_id: "missing", title: "x" });
    const backward = await tools.invoke("update_schedule", { schedule_id: created.id, status: "pending" });

    expect(empty.output).toEqual({
      tool: "update_schedule",
      success: false,
      error: "No fields to update were provided.",
    });
    expect(missing.output).toEqual({
      tool: "update_schedule",
      success: false,
      error: 'Schedule "missing" not found. Use list_schedules to look up valid ids.',
    });
    expect(backward.output).toEqual({
      tool: "update_schedule",
      success: false,
      error: `Schedule "${created.id}" cannot move from cancelled to pending`,
    });
  });

  it("deletes a schedule and reports unknown ids", async () => {
    await tools.invoke("create_schedule", { title: "Gym", datetime: "2025-03-16 18:00" });
    const [created] = await store.load();
    if (!created) throw new Error("expected a schedule");

    const deleted = await tools.invoke("delete_schedule", { schedule_id: created.id });
    const again = await tools.invoke("delete_schedule", { schedule_id: created.id });

    expect(deleted.output).toMatchObject({ success: true, message: 'Deleted schedule "Gym".' });
    expect(again.output).toMatchObject({ success: false });
    expect(await store.load()).toEqual([]);
  });

  it("surfaces store I/O failures as ToolExecutionError", async () => {
    const failing: ScheduleStore = {
      load: store.load.bind(store),
      save: store.save.bind(store),
      create: async () => {
        throw new Error("disk full");
      },
      list: store.list.bind(store),
      get: store.get.bind(store),
      update: store.update.bind(store),
      delete: store.delete.bind(store),
      mutate: store.mutate.bind(store),
    };
    const registry = registerDefaultTools(new ToolRegistry(), failing, { clock });

    await expect(
      registry.invoke("create_schedule", { title: "Call", datetime: "2025-03-16 09:00" }),
    ).rejects.toBeInstanceOf(ToolExecutionError);
  });
});
