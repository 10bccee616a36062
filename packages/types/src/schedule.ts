import type { ScheduleId, Timestamp } from "./foundational.js";

export type ScheduleStatus = "pending" | "notified" | "cancelled";

export type Recurrence = "once" | "daily" | "weekly" | "monthly";

/**
 * A persisted reminder. The unit of the Schedule Store.
 *
 * A record is due once `startAt - reminderMinutes` is at or before now.
 */
export interface ScheduleRecord {
  readonly id: ScheduleId;
  readonly title: string;
  readonly startAt: Timestamp;
  readonly recurrence?: Recurrence;
  readonly notes?: string;
  readonly status: ScheduleStatus;
  readonly reminderMinutes: number;
  readonly createdAt: Timestamp;
  readonly updatedAt?: Timestamp;
  readonly notifiedAt?: Timestamp;
}

export interface NewSchedule {
  readonly title: string;
  readonly startAt: Timestamp;
  readonly recurrence?: Recurrence;
  readonly notes?: string;
  readonly reminderMinutes?: number;
}

export type SchedulePatch = Partial<
  Pick<ScheduleRecord, "title" | "startAt" | "recurrence" | "notes" | "status" | "reminderMinutes">
>;

export interface ScheduleFilter {
  /** Omit for every status. */
  readonly status?: ScheduleStatus;
  readonly limit?: number;
}

/**
 * Result of a `mutate` callback: the records to persist (or `undefined`
 * to leave the file untouched) and a value handed back to the caller.
 */
export interface ScheduleMutation<T> {
  readonly records?: ScheduleRecord[];
  readonly result: T;
}

/**
 * File-backed schedule persistence. Every operation is a read-modify-write
 * under one exclusion scope per store instance.
 */
export interface ScheduleStore {
  load(): Promise<ScheduleRecord[]>;
  save(records: ReadonlyArray<ScheduleRecord>): Promise<void>;
  create(input: NewSchedule): Promise<ScheduleRecord>;
  list(filter?: ScheduleFilter): Promise<ScheduleRecord[]>;
  get(id: ScheduleId): Promise<ScheduleRecord | undefined>;
  update(id: ScheduleId, patch: SchedulePatch): Promise<ScheduleRecord>;
  delete(id: ScheduleId): Promise<ScheduleRecord>;
  mutate<T>(fn: (records: ScheduleRecord[]) => ScheduleMutation<T> | Promise<ScheduleMutation<T>>): Promise<T>;
}

/** Emitted by the Reminder Notifier for each record it transitions to notified. */
export interface ReminderNotification {
  readonly scheduleId: ScheduleId;
  readonly title: string;
  readonly startAt: Timestamp;
  readonly reminderMinutes: number;
  readonly notes?: string;
  readonly message: string;
  readonly notifiedAt: Timestamp;
}

/** Notification egress for due reminders. */
export interface ReminderSink {
  deliver(notification: ReminderNotification): Promise<void>;
}
