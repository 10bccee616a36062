import { z } from "zod";
import {
  asScheduleId,
  InvalidTransitionError,
  NotFoundError,
  type ScheduleRecord,
  type ScheduleStore,
} from "@agenda/types";
import { defineTool, type ToolHandler } from "@agenda/runtime";
import { RecurrenceSchema, ScheduleStatusSchema } from "@agenda/persistence";
import { formatScheduleDateTime, parseScheduleDateTime } from "./datetime.js";
import { toolFailure, toolResult } from "./result.js";

export interface ScheduleToolOptions {
  clock?: () => Date;
}

/** Record shape shown to the model: snake_case, local wall-clock time. */
export interface ScheduleView {
  id: string;
  title: string;
  datetime: string;
  status: string;
  reminder_minutes: number;
  repeat: string;
  description?: string;
}

export function toScheduleView(record: ScheduleRecord): ScheduleView {
  return {
    id: record.id,
    title: record.title,
    datetime: formatScheduleDateTime(record.startAt),
    status: record.status,
    reminder_minutes: record.reminderMinutes,
    repeat: record.recurrence ?? "once",
    ...(record.notes ? { description: record.notes } : {}),
  };
}

const DATETIME_HINT = "Use the format YYYY-MM-DD HH:MM, e.g. 2025-03-15 14:30.";

// ─── create_schedule ────────────────────────────────────────────────

const CreateScheduleArgs = z.object({
  title: z.string().trim().min(1).describe("Short title, e.g. 'Team meeting'"),
  datetime: z.string().describe("Start time in local time, format YYYY-MM-DD HH:MM"),
  description: z.string().optional().describe("Optional details"),
  reminder_minutes: z.number().int().nonnegative().default(15).describe("Minutes before the start to remind"),
  repeat: RecurrenceSchema.default("once").describe("Recurrence"),
});

export function createScheduleTool(store: ScheduleStore, options: ScheduleToolOptions = {}): ToolHandler {
  const clock = options.clock ?? (() => new Date());
  return defineTool({
    description: "Create a schedule with a reminder.",
    schema: CreateScheduleArgs,
    async execute(args) {
      const start = parseScheduleDateTime(args.datetime);
      if (!start) {
        return toolFailure("create_schedule", `Invalid datetime "${args.datetime}". ${DATETIME_HINT}`);
      }
      if (args.repeat === "once" && start.getTime() < clock().getTime()) {
        return toolFailure("create_schedule", `The time ${args.datetime} is in the past.`);
      }

      const record = await store.create({
        title: args.title,
        startAt: start.toISOString(),
        recurrence: args.repeat,
        notes: args.description?.trim() || undefined,
        reminderMinutes: args.reminder_minutes,
      });

      return toolResult("create_schedule", true, {
        message: `Created schedule "${record.title}" for ${args.datetime}.`,
        data: { schedule: toScheduleView(record) },
      });
    },
  });
}

// ─── list_schedules ─────────────────────────────────────────────────

const ListSchedulesArgs = z.object({
  status: z.enum(["pending", "notified", "cancelled", "all"]).default("pending").describe("Status filter"),
  limit: z.number().int().positive().default(10).describe("Maximum number of schedules"),
});

export function listSchedulesTool(store: ScheduleStore): ToolHandler {
  return defineTool({
    description: "List schedules sorted by start time.",
    schema: ListSchedulesArgs,
    async execute(args) {
      const records = await store.list({
        status: args.status === "all" ? undefined : args.status,
        limit: args.limit,
      });
      return toolResult("list_schedules", true, {
        message: records.length > 0 ? `Found ${records.length} schedule(s).` : "No schedules found.",
        data: { count: records.length, schedules: records.map(toScheduleView) },
      });
    },
  });
}

// ─── update_schedule ────────────────────────────────────────────────

const UpdateScheduleArgs = z.object({
  schedule_id: z.string().min(1).describe("Id from list_schedules"),
  title: z.string().trim().min(1).optional(),
  datetime: z.string().optional().describe("New start time, format YYYY-MM-DD HH:MM"),
  description: z.string().optional(),
  reminder_minutes: z.number().int().nonnegative().optional(),
  repeat: RecurrenceSchema.optional(),
  status: ScheduleStatusSchema.optional().describe("Status can only move forward"),
});

export function updateScheduleTool(store: ScheduleStore): ToolHandler {
  return defineTool({
    description: "Update fields of an existing schedule. Only the given fields change.",
    schema: UpdateScheduleArgs,
    async execute(args) {
      const { schedule_id: id, datetime, ...rest } = args;

      let startAt: string | undefined;
      if (datetime !== undefined) {
        const start = parseScheduleDateTime(datetime);
        if (!start) {
          return toolFailure("update_schedule", `Invalid datetime "${datetime}". ${DATETIME_HINT}`);
        }
        startAt = start.toISOString();
      }

      const patch = {
        title: rest.title,
        startAt,
        notes: rest.description,
        reminderMinutes: rest.reminder_minutes,
        recurrence: rest.repeat,
        status: rest.status,
      };
      const updatedFields = Object.entries({ ...rest, datetime })
        .filter(([, value]) => value !== undefined)
        .map(([key]) => key);
      if (updatedFields.length === 0) {
        return toolFailure("update_schedule", "No fields to update were provided.");
      }

      try {
        const record = await store.update(asScheduleId(id), patch);
        return toolResult("update_schedule", true, {
          message: `Updated schedule "${record.title}".`,
          data: { schedule: toScheduleView(record), updated_fields: updatedFields },
        });
      } catch (err) {
        const failure = describeStoreFailure(err);
        if (failure) return toolFailure("update_schedule", failure);
        throw err;
      }
    },
  });
}

// ─── delete_schedule ────────────────────────────────────────────────

const DeleteScheduleArgs = z.object({
  schedule_id: z.string().min(1).describe("Id from list_schedules"),
});

export function deleteScheduleTool(store: ScheduleStore): ToolHandler {
  return defineTool({
    description: "Delete a schedule permanently.",
    schema: DeleteScheduleArgs,
    async execute(args) {
      try {
        const record = await store.delete(asScheduleId(args.schedule_id));
        return toolResult("delete_schedule", true, {
          message: `Deleted schedule "${record.title}".`,
          data: { deleted_schedule: toScheduleView(record) },
        });
      } catch (err) {
        const failure = describeStoreFailure(err);
        if (failure) return toolFailure("delete_schedule", failure);
        throw err;
      }
    },
  });
}

/** Store errors the model can recover from; anything else propagates. */
function describeStoreFailure(err: unknown): string | undefined {
  if (err instanceof NotFoundError) {
    return `${err.message}. Use list_schedules to look up valid ids.`;
  }
  if (err instanceof InvalidTransitionError) {
    return err.message;
  }
  return undefined;
}
