export { JsonScheduleStore, canTransition, ScheduleStatusSchema, RecurrenceSchema } from "./schedule-store.js";
export type { JsonScheduleStoreOptions } from "./schedule-store.js";
export { atomicWrite, nodeFileSystem } from "./atomic-write.js";
export type { StoreFileSystem } from "./atomic-write.js";
