import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "@agenda/types";
import { DEFAULT_NOTIFIER_CRON } from "@agenda/core";
import { DEFAULT_BASE_URL, DEFAULT_MAX_TOOL_INVOCATIONS, DEFAULT_MODEL } from "@agenda/runtime";

export const DEFAULT_CONFIG_FILE = "agenda.config.yaml";

const AgendaConfigSchema = z
  .object({
    server: z
      .object({
        host: z.string().min(1).default("127.0.0.1"),
        port: z.coerce.number().int().min(0).max(65535).default(8765),
        path: z.string().startsWith("/").default("/"),
        heartbeatIntervalMs: z.coerce.number().int().nonnegative().default(30_000),
        broadcastReminders: z.boolean().default(false),
      })
      .default({}),
    agent: z
      .object({
        maxToolInvocations: z.number().int().positive().default(DEFAULT_MAX_TOOL_INVOCATIONS),
        systemPromptFile: z.string().min(1).optional(),
      })
      .default({}),
    model: z
      .object({
        provider: z.enum(["openai", "mock"]).default("openai"),
        baseUrl: z.string().url().default(DEFAULT_BASE_URL),
        model: z.string().min(1).default(DEFAULT_MODEL),
        temperature: z.number().min(0).max(2).default(0.7),
        apiKey: z.string().min(1).optional(),
      })
      .default({}),
    schedules: z
      .object({
        file: z.string().min(1).default("data/schedules.json"),
      })
      .default({}),
    notifier: z
      .object({
        enabled: z.boolean().default(true),
        cron: z.string().min(1).default(DEFAULT_NOTIFIER_CRON),
        timezone: z.string().min(1).optional(),
      })
      .default({}),
    log: z
      .object({
        level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
      })
      .default({}),
  });

export type AgendaConfig = z.output<typeof AgendaConfigSchema>;

export interface LoadConfigOptions {
  /** Defaults to `AGENDA_CONFIG`, then `agenda.config.yaml` in the working directory. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Fail when the openai provider has no API key. Defaults to true. */
  requireApiKey?: boolean;
}

/**
 * Loads the YAML configuration, applies environment overrides and
 * validates the result. A missing file means all defaults.
 */
export async function loadAgendaConfig(options: LoadConfigOptions = {}): Promise<AgendaConfig> {
  const env = options.env ?? process.env;
  const filePath = path.resolve(options.path ?? env.AGENDA_CONFIG ?? DEFAULT_CONFIG_FILE);

  let document: unknown = {};
  try {
    document = yaml.load(await fs.readFile(filePath, "utf8")) ?? {};
  } catch (err) {
    if (!isMissingFile(err)) {
      throw new ConfigError(`Cannot read config ${filePath}: ${err instanceof Error ? err.message : String(err)}`, {
        cause: err,
      });
    }
  }

  if (!isRecord(document)) {
    throw new ConfigError(`Config ${filePath} must be a YAML mapping`);
  }

  const parsed = AgendaConfigSchema.safeParse(applyEnvOverrides(document, env));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration (${filePath}): ${detail}`);
  }

  const config = parsed.data;
  if (options.requireApiKey !== false && config.model.provider === "openai" && !config.model.apiKey) {
    throw new ConfigError(
      `Invalid configuration (${filePath}): model.apiKey: OPENROUTER_API_KEY or OPENAI_API_KEY must be set when model.provider is openai`,
    );
  }
  return config;
}

function applyEnvOverrides(document: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const section = (name: string): Record<string, unknown> => {
    const value = document[name];
    return isRecord(value) ? value : {};
  };

  return {
    ...document,
    server: { ...section("server"), ...defined({ host: env.AGENDA_HOST, port: env.AGENDA_PORT }) },
    model: {
      ...section("model"),
      ...defined({
        model: env.MODEL_NAME,
        baseUrl: env.OPENROUTER_BASE_URL,
        apiKey: env.OPENROUTER_API_KEY || env.OPENAI_API_KEY || undefined,
      }),
    },
    schedules: { ...section("schedules"), ...defined({ file: env.AGENDA_SCHEDULE_FILE }) },
  };
}

function defined(values: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined && value !== "") result[key] = value;
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
