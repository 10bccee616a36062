import type { ScheduleStore } from "@agenda/types";
import type { ToolRegistry } from "@agenda/runtime";
import { askUserQuestionTool } from "./ask-user-question.js";
import {
  createScheduleTool,
  deleteScheduleTool,
  listSchedulesTool,
  updateScheduleTool,
  type ScheduleToolOptions,
} from "./schedule-tools.js";

export * from "./ask-user-question.js";
export * from "./schedule-tools.js";
export * from "./datetime.js";
export * from "./result.js";

/** Registers every bundled tool under its public name. */
export function registerDefaultTools(
  registry: ToolRegistry,
  store: ScheduleStore,
  options: ScheduleToolOptions = {},
): ToolRegistry {
  return registry
    .register("create_schedule", createScheduleTool(store, options))
    .register("list_schedules", listSchedulesTool(store))
    .register("update_schedule", updateScheduleTool(store))
    .register("delete_schedule", deleteScheduleTool(store))
    .register("askUserQuestion", askUserQuestionTool());
}
