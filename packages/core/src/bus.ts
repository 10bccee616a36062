import { v7 as uuidv7 } from "uuid";
import type {
  EventBus,
  AgendaEvent,
  EventFilter,
  EventHandler,
  Subscription,
  EventTopic,
  TraceContext,
  EventId,
  SpanId,
  TraceId,
} from "@agenda/types";
import { getLogger } from "./logger.js";

const log = getLogger("bus");

interface Subscriber {
  readonly id: string;
  readonly filter: EventFilter;
  readonly handler: EventHandler<unknown>;
}

/**
 * In-memory implementation of the event bus.
 *
 * Handlers run concurrently; `publish` resolves once all of them settle.
 * A failing handler is logged and never affects the others.
 */
export class InMemoryEventBus implements EventBus {
  private subscribers = new Set<Subscriber>();

  async publish<T>(event: AgendaEvent<T>): Promise<void> {
    const pending: Promise<void>[] = [];

    for (const sub of this.subscribers) {
      if (!this.matches(event, sub.filter)) continue;
      pending.push(this.dispatch(sub, event));
    }

    await Promise.all(pending);
  }

  subscribe<T>(filter: EventFilter, handler: EventHandler<T>): Subscription {
    const id = uuidv7();
    const sub: Subscriber = {
      id,
      filter,
      handler: (event) => handler(event as AgendaEvent<T>),
    };
    this.subscribers.add(sub);

    return {
      id,
      unsubscribe: () => {
        this.subscribers.delete(sub);
      },
    };
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  private async dispatch(sub: Subscriber, event: AgendaEvent): Promise<void> {
    try {
      await sub.handler(event);
    } catch (err) {
      log.error({ err, topic: event.topic, subscriptionId: sub.id }, "Event handler failed");
    }
  }

  private matches(event: AgendaEvent, filter: EventFilter): boolean {
    if (filter.topics && filter.topics.length > 0 && !filter.topics.includes(event.topic)) {
      return false;
    }
    if (filter.predicate && !filter.predicate(event)) {
      return false;
    }
    return true;
  }
}

/**
 * Helper to create a new event with a fresh ID and timestamp.
 */
export function createEvent<T>(topic: EventTopic, payload: T, traceCtx: TraceContext): AgendaEvent<T> {
  return {
    id: uuidv7() as EventId,
    topic,
    payload,
    traceCtx,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Helper to create a root trace context, or a child span of `parent`.
 */
export function createTraceContext(parent?: TraceContext): TraceContext {
  if (parent) {
    return {
      traceId: parent.traceId,
      spanId: uuidv7() as SpanId,
      parentSpanId: parent.spanId,
    };
  }
  return {
    traceId: uuidv7() as TraceId,
    spanId: uuidv7() as SpanId,
  };
}
