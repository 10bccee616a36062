import type { EventId, Timestamp } from "./foundational.js";
import type { TraceContext } from "./observability.js";
import type { ReminderNotification } from "./schedule.js";

/**
 * Every message flowing through the in-process bus is an `AgendaEvent`.
 *
 * @typeParam T - The topic-specific payload type.
 */
export interface AgendaEvent<T = unknown> {
  readonly id: EventId;
  readonly topic: EventTopic;
  readonly payload: T;
  readonly traceCtx: TraceContext;
  readonly timestamp: Timestamp;
}

/**
 * Enumerated event topics.
 * Using a string union rather than a numeric enum for debuggability.
 */
export type EventTopic = "reminder.due";

/** Payload type for each topic. */
export type ReminderDueEvent = AgendaEvent<ReminderNotification>;

/**
 * Predicate for filtering which events a subscriber receives.
 */
export interface EventFilter {
  /** Match specific topics. If empty, matches all topics. */
  readonly topics?: EventTopic[];
  /** Custom predicate for advanced filtering. */
  readonly predicate?: (event: AgendaEvent) => boolean;
}

/** Callback signature for event subscribers. */
export type EventHandler<T = unknown> = (event: AgendaEvent<T>) => void | Promise<void>;

/** Returned when subscribing; used to unsubscribe. */
export interface Subscription {
  readonly id: string;
  unsubscribe(): void;
}

export interface EventBus {
  /** Publish an event to all matching subscribers. */
  publish<T>(event: AgendaEvent<T>): Promise<void>;

  /** Subscribe to events matching the filter. */
  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription;
}
