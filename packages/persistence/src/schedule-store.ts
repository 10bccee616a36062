import { v7 as uuidv7 } from "uuid";
import { z } from "zod";
import {
  asScheduleId,
  InvalidTransitionError,
  NotFoundError,
  type NewSchedule,
  type ScheduleFilter,
  type ScheduleId,
  type ScheduleMutation,
  type SchedulePatch,
  type ScheduleRecord,
  type ScheduleStatus,
  type ScheduleStore,
} from "@agenda/types";
import { AsyncMutex, getLogger } from "@agenda/core";
import { atomicWrite, nodeFileSystem, type StoreFileSystem } from "./atomic-write.js";

const log = getLogger("schedule-store");

export const ScheduleStatusSchema = z.enum(["pending", "notified", "cancelled"]);
export const RecurrenceSchema = z.enum(["once", "daily", "weekly", "monthly"]);

const ScheduleRecordSchema = z.object({
  id: z.string().min(1).transform(asScheduleId),
  title: z.string(),
  startAt: z.string().min(1),
  recurrence: RecurrenceSchema.optional(),
  notes: z.string().optional(),
  status: ScheduleStatusSchema,
  reminderMinutes: z.number().int().nonnegative().default(0),
  createdAt: z.string().min(1),
  updatedAt: z.string().optional(),
  notifiedAt: z.string().optional(),
});

/** Records that passed validation, plus the raw entries that did not. */
interface ScheduleFile {
  records: ScheduleRecord[];
  rejected: unknown[];
}

/** Forward-only status moves. */
const ALLOWED_TRANSITIONS: Record<ScheduleStatus, ReadonlyArray<ScheduleStatus>> = {
  pending: ["notified", "cancelled"],
  notified: ["cancelled"],
  cancelled: [],
};

export function canTransition(from: ScheduleStatus, to: ScheduleStatus): boolean {
  return from === to || ALLOWED_TRANSITIONS[from].includes(to);
}

export interface JsonScheduleStoreOptions {
  /** Injected for tests; defaults to `node:fs/promises`. */
  fileSystem?: StoreFileSystem;
  clock?: () => Date;
}

/**
 * Schedule persistence in a single JSON file holding the array of records.
 *
 * Every public operation runs inside one mutex per instance and re-reads
 * the file, so the notifier and tool calls sharing an instance never lose
 * each other's updates. Writes go through `atomicWrite`.
 *
 * Entries that fail validation are invisible to callers but written back
 * unchanged on every save.
 */
export class JsonScheduleStore implements ScheduleStore {
  private readonly mutex = new AsyncMutex();
  private readonly fileSystem: StoreFileSystem;
  private readonly clock: () => Date;

  constructor(
    readonly filePath: string,
    options: JsonScheduleStoreOptions = {},
  ) {
    this.fileSystem = options.fileSystem ?? nodeFileSystem;
    this.clock = options.clock ?? (() => new Date());
  }

  async load(): Promise<ScheduleRecord[]> {
    return this.mutex.runExclusive(async () => (await this.read()).records);
  }

  async save(records: ReadonlyArray<ScheduleRecord>): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const { rejected } = await this.read();
      await this.write(records, rejected);
    });
  }

  async mutate<T>(
    fn: (records: ScheduleRecord[]) => ScheduleMutation<T> | Promise<ScheduleMutation<T>>,
  ): Promise<T> {
    return this.mutex.runExclusive(async () => {
      const current = await this.read();
      const { records, result } = await fn(current.records);
      if (records) {
        await this.write(records, current.rejected);
      }
      return result;
    });
  }

  async create(input: NewSchedule): Promise<ScheduleRecord> {
    return this.mutate((records) => {
      const taken = new Set<string>(records.map((r) => r.id));
      let id = asScheduleId(uuidv7());
      while (taken.has(id)) {
        id = asScheduleId(uuidv7());
      }

      const record: ScheduleRecord = {
        id,
        title: input.title,
        startAt: input.startAt,
        recurrence: input.recurrence,
        notes: input.notes,
        status: "pending",
        reminderMinutes: input.reminderMinutes ?? 0,
        createdAt: this.clock().toISOString(),
      };
      return { records: [...records, record], result: record };
    });
  }

  async list(filter: ScheduleFilter = {}): Promise<ScheduleRecord[]> {
    const records = await this.load();
    const matching = records
      .filter((r) => filter.status === undefined || r.status === filter.status)
      .sort((a, b) => Date.parse(a.startAt) - Date.parse(b.startAt));
    return filter.limit === undefined ? matching : matching.slice(0, filter.limit);
  }

  async get(id: ScheduleId): Promise<ScheduleRecord | undefined> {
    const records = await this.load();
    return records.find((r) => r.id === id);
  }

  async update(id: ScheduleId, patch: SchedulePatch): Promise<ScheduleRecord> {
    return this.mutate((records) => {
      const index = records.findIndex((r) => r.id === id);
      const existing = records[index];
      if (!existing) {
        throw new NotFoundError(id);
      }
      if (patch.status !== undefined && !canTransition(existing.status, patch.status)) {
        throw new InvalidTransitionError(id, existing.status, patch.status);
      }

      const updated: ScheduleRecord = {
        ...existing,
        title: patch.title ?? existing.title,
        startAt: patch.startAt ?? existing.startAt,
        recurrence: patch.recurrence ?? existing.recurrence,
        notes: patch.notes ?? existing.notes,
        status: patch.status ?? existing.status,
        reminderMinutes: patch.reminderMinutes ?? existing.reminderMinutes,
        updatedAt: this.clock().toISOString(),
      };
      const next = [...records];
      next[index] = updated;
      return { records: next, result: updated };
    });
  }

  async delete(id: ScheduleId): Promise<ScheduleRecord> {
    return this.mutate((records) => {
      const existing = records.find((r) => r.id === id);
      if (!existing) {
        throw new NotFoundError(id);
      }
      return { records: records.filter((r) => r.id !== id), result: existing };
    });
  }

  private async read(): Promise<ScheduleFile> {
    let raw: string;
    try {
      raw = await this.fileSystem.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) {
        return { records: [], rejected: [] };
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.warn({ err, filePath: this.filePath }, "Schedule file is not valid JSON; treating as empty");
      return { records: [], rejected: [] };
    }
    if (!Array.isArray(json)) {
      log.warn({ filePath: this.filePath }, "Schedule file is not an array; treating as empty");
      return { records: [], rejected: [] };
    }

    const file: ScheduleFile = { records: [], rejected: [] };
    json.forEach((entry: unknown, index) => {
      const parsed = ScheduleRecordSchema.safeParse(entry);
      if (parsed.success) {
        file.records.push(parsed.data);
        return;
      }
      file.rejected.push(entry);
      log.warn(
        { filePath: this.filePath, index, issues: parsed.error.issues.slice(0, 3) },
        "Skipping schedule entry that failed validation",
      );
    });
    return file;
  }

  private async write(records: ReadonlyArray<ScheduleRecord>, rejected: ReadonlyArray<unknown>): Promise<void> {
    await atomicWrite(this.filePath, `${JSON.stringify([...records, ...rejected], null, 2)}\n`, this.fileSystem);
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
