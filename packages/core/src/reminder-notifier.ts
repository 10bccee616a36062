import { CronJob } from "cron";
import { format, isValid, parseISO, subMinutes } from "date-fns";
import type {
  ReminderNotification,
  ReminderSink,
  ScheduleRecord,
  ScheduleStore,
} from "@agenda/types";
import { getLogger } from "./logger.js";

const log = getLogger("notifier");

/** Every 30 seconds. */
export const DEFAULT_NOTIFIER_CRON = "*/30 * * * * *";

export interface ReminderNotifierOptions {
  store: ScheduleStore;
  sink: ReminderSink;
  /** Cron expression with a seconds field. */
  cron?: string;
  timezone?: string;
  clock?: () => Date;
}

/**
 * Periodically scans the schedule store, moves due pending records to
 * "notified" and hands one notification per moved record to the sink.
 *
 * The scan and the status change happen inside a single `store.mutate`,
 * so a concurrent tool call cannot interleave with a tick. Records are
 * persisted before anything is delivered: a crash after the save loses
 * the notification rather than repeating it.
 */
export class ReminderNotifier {
  private readonly store: ScheduleStore;
  private readonly sink: ReminderSink;
  private readonly cronExpr: string;
  private readonly timezone?: string;
  private readonly clock: () => Date;
  private job: CronJob | null = null;
  private inFlight = false;
  private overlapLogged = false;

  constructor(options: ReminderNotifierOptions) {
    this.store = options.store;
    this.sink = options.sink;
    this.cronExpr = options.cron ?? DEFAULT_NOTIFIER_CRON;
    this.timezone = options.timezone;
    this.clock = options.clock ?? (() => new Date());
  }

  get running(): boolean {
    return this.job !== null;
  }

  start(): void {
    if (this.job) return;

    try {
      this.job = CronJob.from({
        cronTime: this.cronExpr,
        onTick: () => {
          void this.guardedTick();
        },
        start: false,
        timeZone: this.timezone,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new Error(`Invalid notifier cron "${this.cronExpr}": ${message}`, { cause: err });
    }

    this.job.start();
    log.info({ cron: this.cronExpr, timezone: this.timezone ?? "local" }, "Reminder notifier started");
  }

  stop(): void {
    if (!this.job) return;
    this.job.stop();
    this.job = null;
    log.info("Reminder notifier stopped");
  }

  /**
   * One scan. Never throws: failures are logged and the next tick starts
   * from a fresh load.
   */
  async tick(now: Date = this.clock()): Promise<ReminderNotification[]> {
    let due: ReminderNotification[];
    try {
      due = await this.store.mutate((records) => markDue(records, now));
    } catch (err) {
      log.error({ err }, "Reminder tick failed");
      return [];
    }

    for (const notification of due) {
      try {
        await this.sink.deliver(notification);
        log.info({ scheduleId: notification.scheduleId }, "Reminder delivered");
      } catch (err) {
        log.error({ err, scheduleId: notification.scheduleId }, "Reminder delivery failed");
      }
    }

    return due;
  }

  private async guardedTick(): Promise<void> {
    if (this.inFlight) {
      if (!this.overlapLogged) {
        this.overlapLogged = true;
        log.warn("Previous reminder tick still running; skipping overlapping tick");
      }
      return;
    }

    this.inFlight = true;
    this.overlapLogged = false;
    try {
      await this.tick();
    } finally {
      this.inFlight = false;
    }
  }
}

function markDue(
  records: ScheduleRecord[],
  now: Date,
): { records?: ScheduleRecord[]; result: ReminderNotification[] } {
  const notifiedAt = now.toISOString();
  const fired: ReminderNotification[] = [];

  const next = records.map((record) => {
    if (!isDue(record, now)) return record;

    const updated: ScheduleRecord = { ...record, status: "notified", notifiedAt };
    fired.push(toNotification(updated, notifiedAt));
    return updated;
  });

  return fired.length > 0 ? { records: next, result: fired } : { result: fired };
}

export function isDue(record: ScheduleRecord, now: Date): boolean {
  if (record.status !== "pending") return false;

  const start = parseISO(record.startAt);
  if (!isValid(start)) {
    log.warn({ scheduleId: record.id, startAt: record.startAt }, "Skipping schedule with unreadable start time");
    return false;
  }

  return subMinutes(start, record.reminderMinutes).getTime() <= now.getTime();
}

export function formatReminderMessage(record: Pick<ScheduleRecord, "startAt" | "reminderMinutes" | "notes">): string {
  let message = `Starts at ${format(parseISO(record.startAt), "yyyy-MM-dd HH:mm")}`;
  if (record.reminderMinutes > 0) {
    message += ` (reminder ${record.reminderMinutes} min ahead)`;
  }
  if (record.notes) {
    message += ` - ${record.notes}`;
  }
  return message;
}

function toNotification(record: ScheduleRecord, notifiedAt: string): ReminderNotification {
  return {
    scheduleId: record.id,
    title: record.title,
    startAt: record.startAt,
    reminderMinutes: record.reminderMinutes,
    notes: record.notes,
    message: formatReminderMessage(record),
    notifiedAt,
  };
}
