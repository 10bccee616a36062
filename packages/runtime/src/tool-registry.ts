import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import {
  DuplicateToolError,
  InvalidArgumentsError,
  ToolExecutionError,
  UnknownToolError,
  type ToolOutcome,
  type ToolSchema,
} from "@agenda/types";
import { getLogger } from "@agenda/core";

const log = getLogger("tool-registry");

/**
 * A tool the agent can call. `schema` validates (and defaults) the raw
 * arguments the model sends before `execute` sees them.
 */
export interface ToolHandler<TSchema extends z.ZodTypeAny = z.ZodTypeAny> {
  readonly description: string;
  readonly schema: TSchema;
  execute(args: z.output<TSchema>): Promise<ToolOutcome>;
}

/** Identity helper that infers the handler's argument type from its schema. */
export function defineTool<TSchema extends z.ZodTypeAny>(handler: ToolHandler<TSchema>): ToolHandler<TSchema> {
  return handler;
}

/**
 * Fixed name → handler mapping. Populated once at startup and shared
 * read-only by every session.
 */
export class ToolRegistry {
  private readonly handlers = new Map<string, ToolHandler>();

  register(name: string, handler: ToolHandler): this {
    if (this.handlers.has(name)) {
      throw new DuplicateToolError(name);
    }
    this.handlers.set(name, handler);
    return this;
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  get names(): string[] {
    return [...this.handlers.keys()];
  }

  async invoke(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    const handler = this.handlers.get(name);
    if (!handler) {
      throw new UnknownToolError(name);
    }

    const parsed = handler.schema.safeParse(args);
    if (!parsed.success) {
      throw new InvalidArgumentsError(
        name,
        parsed.error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
      );
    }

    try {
      return await handler.execute(parsed.data);
    } catch (err) {
      log.warn({ err, tool: name }, "Tool handler threw");
      throw new ToolExecutionError(name, err);
    }
  }

  /** Descriptions handed to the model, parameters as JSON Schema. */
  schemas(): ToolSchema[] {
    return [...this.handlers.entries()].map(([name, handler]) => ({
      name,
      description: handler.description,
      parameters: toParameters(handler.schema),
    }));
  }
}

function toParameters(schema: z.ZodTypeAny): Record<string, unknown> {
  // The openApi3 target inlines everything and leaves out `$schema`.
  return Object.fromEntries(Object.entries(zodToJsonSchema(schema, { target: "openApi3", $refStrategy: "none" })));
}
