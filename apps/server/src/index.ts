import "dotenv/config";
import { getLogger } from "@agenda/core";
import { loadAgendaConfig } from "@agenda/gateway";
import { startAgendaApp } from "./bootstrap.js";

const log = getLogger("main");

// ─── Start ──────────────────────────────────────────────────────────

const config = await loadAgendaConfig().catch((err: unknown) => {
  log.fatal({ err }, "Failed to load configuration");
  process.exit(1);
});

const app = await startAgendaApp(config);

// ─── Graceful shutdown ──────────────────────────────────────────────

let stopping = false;
const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
  if (stopping) return;
  stopping = true;
  log.info({ signal }, "Shutting down");
  try {
    await app.stop();
    process.exit(0);
  } catch (err) {
    log.error({ err }, "Shutdown failed");
    process.exit(1);
  }
};

process.once("SIGINT", (signal) => void shutdown(signal));
process.once("SIGTERM", (signal) => void shutdown(signal));
