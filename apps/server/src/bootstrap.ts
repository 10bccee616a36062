import path from "node:path";
import {
  BusReminderSink,
  InMemoryEventBus,
  ReminderNotifier,
  getLogger,
  setLogLevel,
} from "@agenda/core";
import { JsonScheduleStore } from "@agenda/persistence";
import {
  MockModelAdapter,
  OpenAIAdapter,
  SessionRegistry,
  ToolRegistry,
  buildSystemPrompt,
  loadPromptTemplate,
  type ModelAdapter,
} from "@agenda/runtime";
import { registerDefaultTools } from "@agenda/tools";
import { AgentGatewayServer, type AgendaConfig } from "@agenda/gateway";
import type { ReminderNotification } from "@agenda/types";

const log = getLogger("app");

export interface AgendaApp {
  readonly server: AgentGatewayServer;
  readonly sessions: SessionRegistry;
  readonly store: JsonScheduleStore;
  readonly bus: InMemoryEventBus;
  readonly notifier: ReminderNotifier | null;
  stop(): Promise<void>;
}

export function createModelAdapter(config: AgendaConfig): ModelAdapter {
  if (config.model.provider === "mock") {
    return new MockModelAdapter();
  }
  return new OpenAIAdapter({
    apiKey: config.model.apiKey ?? "",
    model: config.model.model,
    baseUrl: config.model.baseUrl,
    temperature: config.model.temperature,
  });
}

/** Logs every reminder published on the bus. */
export function logReminders(bus: InMemoryEventBus): void {
  bus.subscribe<ReminderNotification>({ topics: ["reminder.due"] }, (event) => {
    log.info(
      { scheduleId: event.payload.scheduleId, title: event.payload.title, traceId: event.traceCtx.traceId },
      `Reminder: ${event.payload.title}. ${event.payload.message}`,
    );
  });
}

/**
 * Builds and starts the agent server: schedule store, tools, model,
 * session registry, gateway and (when enabled) the reminder notifier.
 */
export async function startAgendaApp(config: AgendaConfig, model?: ModelAdapter): Promise<AgendaApp> {
  setLogLevel(config.log.level);

  const store = new JsonScheduleStore(path.resolve(config.schedules.file));
  const tools = registerDefaultTools(new ToolRegistry(), store);
  const template = config.agent.systemPromptFile
    ? await loadPromptTemplate(path.resolve(config.agent.systemPromptFile))
    : undefined;
  const toolSchemas = tools.schemas();

  const sessions = new SessionRegistry({
    model: model ?? createModelAdapter(config),
    tools,
    maxToolInvocations: config.agent.maxToolInvocations,
    systemPrompt: () => buildSystemPrompt({ template, modelName: config.model.model, tools: toolSchemas }),
  });

  const bus = new InMemoryEventBus();
  logReminders(bus);

  const server = new AgentGatewayServer({
    ...config.server,
    sessions,
    bus,
  });
  await server.start();

  let notifier: ReminderNotifier | null = null;
  if (config.notifier.enabled) {
    notifier = new ReminderNotifier({
      store,
      sink: new BusReminderSink(bus),
      cron: config.notifier.cron,
      timezone: config.notifier.timezone,
    });
    notifier.start();
  }

  log.info(
    { port: server.port, provider: config.model.provider, model: config.model.model, schedules: store.filePath },
    "Agenda server ready",
  );

  return {
    server,
    sessions,
    store,
    bus,
    notifier,
    async stop() {
      notifier?.stop();
      await server.stop();
      sessions.shutdown();
    },
  };
}
