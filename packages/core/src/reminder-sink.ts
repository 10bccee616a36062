import type { EventBus, ReminderNotification, ReminderSink } from "@agenda/types";
import { createEvent, createTraceContext } from "./bus.js";

/**
 * Publishes each due reminder on the event bus as `reminder.due`.
 * Delivery to people (client broadcast, logs) is up to the subscribers.
 */
export class BusReminderSink implements ReminderSink {
  constructor(private readonly bus: EventBus) {}

  async deliver(notification: ReminderNotification): Promise<void> {
    await this.bus.publish(createEvent("reminder.due", notification, createTraceContext()));
  }
}
