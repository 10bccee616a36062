export { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
export { AsyncMutex } from "./lock.js";
export { initLogging, getLogger, setLogLevel, resetLogging, resolveLogConfig } from "./logger.js";
export type { Logger, LogConfig } from "./logger.js";
export {
  ReminderNotifier,
  DEFAULT_NOTIFIER_CRON,
  isDue,
  formatReminderMessage,
} from "./reminder-notifier.js";
export type { ReminderNotifierOptions } from "./reminder-notifier.js";
export { BusReminderSink } from "./reminder-sink.js";
