/** Branded opaque identifier types for compile-time safety. */
type Brand<T, B extends string> = T & { readonly __brand: B };

export type SessionId = Brand<string, "SessionId">;
export type ScheduleId = Brand<string, "ScheduleId">;
export type ConnectionId = Brand<string, "ConnectionId">;
export type TraceId = Brand<string, "TraceId">;
export type SpanId = Brand<string, "SpanId">;
export type EventId = Brand<string, "EventId">;

/** ISO 8601 timestamp. */
export type Timestamp = string;

/** Brands a client-supplied or generated string as a session id. */
export function asSessionId(value: string): SessionId {
  return value as SessionId;
}

export function asScheduleId(value: string): ScheduleId {
  return value as ScheduleId;
}
