import type { RawEvent } from "../types/rawEvent";

/**
 * Inclusive calendar date range, both ends formatted `YYYY-MM-DD`.
 */
export interface DateRange {
  start: string;
  end: string;
}

/**
 * Supplier of raw per-user events for a date range.
 */
export interface EventSource {
  /** Name used in logs and errors */
  readonly name: string;

  /**
   * Fetch one user's raw events within the inclusive range, in source order.
   */
  fetchUserEvents(userId: string, range: DateRange): Promise<RawEvent[]>;
}

/**
 * Whether an exported event belongs to the given user. `amplitude_id` is
 * numeric in exports, so it is compared as a string.
 */
export function matchesUser(event: RawEvent, userId: string): boolean {
  if (event.user_id === userId || event.device_id === userId || event.uuid === userId) {
    return true;
  }
  const amplitudeId = event.amplitude_id;
  return amplitudeId !== undefined && amplitudeId !== null && String(amplitudeId) === userId;
}

/**
 * Whether an event's `event_time` falls inside the range. Events without a
 * recognizable date are kept.
 */
export function isWithinRange(event: RawEvent, range: DateRange): boolean {
  const eventTime = event.event_time;
  if (typeof eventTime !== "string" || !/^\d{4}-\d{2}-\d{2}/.test(eventTime)) {
    return true;
  }
  const day = eventTime.slice(0, 10);
  return day >= range.start && day <= range.end;
}

/**
 * Select one user's events from an export, preserving order.
 */
export function selectUserEvents(
  events: readonly RawEvent[],
  userId: string,
  range: DateRange
): RawEvent[] {
  return events.filter((event) => matchesUser(event, userId) && isWithinRange(event, range));
}

/**
 * Event source over events already held in memory.
 */
export class InMemoryEventSource implements EventSource {
  readonly name = "memory";
  private events: RawEvent[];

  constructor(events: readonly RawEvent[] = []) {
    this.events = [...events];
  }

  add(...events: RawEvent[]): void {
    this.events.push(...events);
  }

  async fetchUserEvents(userId: string, range: DateRange): Promise<RawEvent[]> {
    return selectUserEvents(this.events, userId, range);
  }
}
