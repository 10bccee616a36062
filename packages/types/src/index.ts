export * from "./foundational.js";
export type * from "./observability.js";
export type * from "./agent.js";
export type * from "./tool.js";
export type * from "./schedule.js";
export type * from "./event-bus.js";
export * from "./error.js";
