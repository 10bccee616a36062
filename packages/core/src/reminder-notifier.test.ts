import { describe, it, expect, vi } from "vitest";
import {
  asScheduleId,
  type NewSchedule,
  type ReminderNotification,
  type ReminderSink,
  type ScheduleMutation,
  type ScheduleRecord,
  type ScheduleStore,
} from "@agenda/types";
import { ReminderNotifier, formatReminderMessage, isDue } from "./reminder-notifier.js";
import { BusReminderSink } from "./reminder-sink.js";
import { InMemoryEventBus } from "./bus.js";

/** Keeps records in memory; only what the notifier touches is implemented. */
class MemoryScheduleStore implements ScheduleStore {
  saves = 0;

  constructor(public records: ScheduleRecord[]) {}

  async load(): Promise<ScheduleRecord[]> {
    return [...this.records];
  }
  async save(records: ReadonlyArray<ScheduleRecord>): Promise<void> {
    this.saves++;
    this.records = [...records];
  }
  async mutate<T>(fn: (records: ScheduleRecord[]) => ScheduleMutation<T> | Promise<ScheduleMutation<T>>): Promise<T> {
    const { records, result } = await fn(await this.load());
    if (records) await this.save(records);
    return result;
  }
  async create(_input: NewSchedule): Promise<ScheduleRecord> {
    throw new Error("not used");
  }
  async list(): Promise<ScheduleRecord[]> {
    return this.load();
  }
  async get(): Promise<ScheduleRecord | undefined> {
    throw new Error("not used");
  }
  async update(): Promise<ScheduleRecord> {
    throw new Error("not used");
  }
  async delete(): Promise<ScheduleRecord> {
    throw new Error("not used");
  }
}

class CollectingSink implements ReminderSink {
  delivered: ReminderNotification[] = [];
  async deliver(notification: ReminderNotification): Promise<void> {
    this.delivered.push(notification);
  }
}

function record(overrides: Omit<Partial<ScheduleRecord>, "id"> & { id: string }): ScheduleRecord {
  return {
    title: "Untitled",
    startAt: "2025-03-15T10:10:00.000Z",
    status: "pending",
    reminderMinutes: 15,
    createdAt: "2025-03-01T00:00:00.000Z",
    ...overrides,
    id: asScheduleId(overrides.id),
  };
}

const NOW = new Date("2025-03-15T10:00:00.000Z");

describe("ReminderNotifier.tick", () => {
  it("marks due pending records as notified and emits one notification each", async () => {
    const store = new MemoryScheduleStore([
      record({ id: "due", title: "Dentist" }),
      record({ id: "later", startAt: "2025-03-15T10:30:00.000Z" }),
      record({ id: "already", status: "notified", startAt: "2025-03-15T09:00:00.000Z" }),
      record({ id: "gone", status: "cancelled", startAt: "2025-03-15T09:00:00.000Z" }),
    ]);
    const sink = new CollectingSink();
    const notifier = new ReminderNotifier({ store, sink });

    const emitted = await notifier.tick(NOW);

    expect(emitted.map((n) => n.scheduleId)).toEqual(["due"]);
    expect(sink.delivered).toEqual(emitted);
    expect(emitted[0]?.title).toBe("Dentist");
    expect(emitted[0]?.notifiedAt).toBe("2025-03-15T10:00:00.000Z");

    const stored = store.records.find((r) => r.id === "due");
    expect(stored?.status).toBe("notified");
    expect(stored?.notifiedAt).toBe("2025-03-15T10:00:00.000Z");
    expect(store.records.find((r) => r.id === "later")?.status).toBe("pending");
    expect(store.records.find((r) => r.id === "gone")?.status).toBe("cancelled");
  });

  it("never notifies the same record twice", async () => {
    const store = new MemoryScheduleStore([record({ id: "due" })]);
    const sink = new CollectingSink();
    const notifier = new ReminderNotifier({ store, sink });

    await notifier.tick(NOW);
    const second = await notifier.tick(new Date("2025-03-15T10:05:00.000Z"));

    expect(second).toEqual([]);
    expect(sink.delivered).toHaveLength(1);
    expect(store.saves).toBe(1);
  });

  it("leaves the file untouched when nothing is due", async () => {
    const store = new MemoryScheduleStore([record({ id: "later", startAt: "2025-03-16T10:00:00.000Z" })]);
    const notifier = new ReminderNotifier({ store, sink: new CollectingSink() });

    await expect(notifier.tick(NOW)).resolves.toEqual([]);
    expect(store.saves).toBe(0);
  });

  it("keeps delivering after one sink failure", async () => {
    const store = new MemoryScheduleStore([record({ id: "a" }), record({ id: "b" })]);
    const deliver = vi
      .fn<(n: ReminderNotification) => Promise<void>>()
      .mockRejectedValueOnce(new Error("sink down"))
      .mockResolvedValue(undefined);
    const notifier = new ReminderNotifier({ store, sink: { deliver } });

    const emitted = await notifier.tick(NOW);

    expect(emitted).toHaveLength(2);
    expect(deliver).toHaveBeenCalledTimes(2);
    expect(store.records.every((r) => r.status === "notified")).toBe(true);
  });

  it("survives a failing store", async () => {
    const store = new MemoryScheduleStore([]);
    vi.spyOn(store, "mutate").mockRejectedValue(new Error("disk unavailable"));
    const notifier = new ReminderNotifier({ store, sink: new CollectingSink() });

    await expect(notifier.tick(NOW)).resolves.toEqual([]);
  });

  it("delivers through the event bus as reminder.due", async () => {
    const bus = new InMemoryEventBus();
    const seen: unknown[] = [];
    bus.subscribe({ topics: ["reminder.due"] }, (event) => {
      seen.push(event.payload);
    });
    const store = new MemoryScheduleStore([record({ id: "due" })]);
    const notifier = new ReminderNotifier({ store, sink: new BusReminderSink(bus) });

    const emitted = await notifier.tick(NOW);

    expect(seen).toEqual(emitted);
  });
});

describe("isDue", () => {
  it("uses the reminder offset", () => {
    expect(isDue(record({ id: "x", startAt: "2025-03-15T10:15:00.000Z", reminderMinutes: 15 }), NOW)).toBe(true);
    expect(isDue(record({ id: "x", startAt: "2025-03-15T10:16:00.000Z", reminderMinutes: 15 }), NOW)).toBe(false);
    expect(isDue(record({ id: "x", startAt: "2025-03-15T10:00:00.000Z", reminderMinutes: 0 }), NOW)).toBe(true);
  });

  it("skips records with an unreadable start time", () => {
    expect(isDue(record({ id: "x", startAt: "someday" }), NOW)).toBe(false);
  });
});

describe("formatReminderMessage", () => {
  it("renders the local start time, offset and notes", () => {
    expect(
      formatReminderMessage({ startAt: "2025-03-15T14:30:00", reminderMinutes: 15, notes: "Bring slides" }),
    ).toBe("Starts at 2025-03-15 14:30 (reminder 15 min ahead) - Bring slides");
    expect(formatReminderMessage({ startAt: "2025-03-15T14:30:00", reminderMinutes: 0 })).toBe(
      "Starts at 2025-03-15 14:30",
    );
  });
});

describe("ReminderNotifier lifecycle", () => {
  it("starts and stops its cron job", () => {
    const notifier = new ReminderNotifier({ store: new MemoryScheduleStore([]), sink: new CollectingSink() });

    notifier.start();
    expect(notifier.running).toBe(true);
    notifier.stop();
    expect(notifier.running).toBe(false);
  });

  it("rejects an invalid cron expression", () => {
    const notifier = new ReminderNotifier({
      store: new MemoryScheduleStore([]),
      sink: new CollectingSink(),
      cron: "not a cron",
    });

    expect(() => notifier.start()).toThrow(/Invalid notifier cron/);
    expect(notifier.running).toBe(false);
  });
});
