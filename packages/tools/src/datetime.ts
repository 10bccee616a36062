import { format, isValid, parse, parseISO } from "date-fns";

/** Wall-clock format the model is asked to use, in server local time. */
export const SCHEDULE_DATETIME_FORMAT = "yyyy-MM-dd HH:mm";

/** Parses "YYYY-MM-DD HH:MM" (local time). Returns undefined when unreadable. */
export function parseScheduleDateTime(value: string): Date | undefined {
  const parsed = parse(value.trim(), SCHEDULE_DATETIME_FORMAT, new Date());
  return isValid(parsed) ? parsed : undefined;
}

export function formatScheduleDateTime(iso: string): string {
  const date = parseISO(iso);
  return isValid(date) ? format(date, SCHEDULE_DATETIME_FORMAT) : iso;
}
