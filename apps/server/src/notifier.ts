/**
 * Runs only the reminder notifier, for deployments that keep it in its
 * own process next to the agent server.
 */
import "dotenv/config";
import path from "node:path";
import { BusReminderSink, InMemoryEventBus, ReminderNotifier, getLogger, setLogLevel } from "@agenda/core";
import { JsonScheduleStore } from "@agenda/persistence";
import { loadAgendaConfig } from "@agenda/gateway";
import { logReminders } from "./bootstrap.js";

const log = getLogger("notifier-main");

const config = await loadAgendaConfig({ requireApiKey: false }).catch((err: unknown) => {
  log.fatal({ err }, "Failed to load configuration");
  process.exit(1);
});
setLogLevel(config.log.level);

const bus = new InMemoryEventBus();
logReminders(bus);

const store = new JsonScheduleStore(path.resolve(config.schedules.file));
const notifier = new ReminderNotifier({
  store,
  sink: new BusReminderSink(bus),
  cron: config.notifier.cron,
  timezone: config.notifier.timezone,
});

notifier.start();
await notifier.tick();

const shutdown = (signal: NodeJS.Signals): void => {
  log.info({ signal }, "Stopping notifier");
  notifier.stop();
};
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
