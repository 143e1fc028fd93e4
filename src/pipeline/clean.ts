import type { RawEvent } from "../types/rawEvent";
import type { CleanEvent, CleanRecord } from "../types/cleanRecord";
import { extractUserAttributes, reduceEvent } from "./normalize";
import { shouldKeep } from "./filter";

/**
 * Outcome of building one user's clean record.
 *
 * - `built`: at least one event survived filtering
 * - `no_data`: the user had no raw events at all
 * - `no_remaining_events`: raw events existed but the filter removed all of them
 */
export type CleanRecordResult =
  | { status: "built"; record: CleanRecord; rawEventCount: number }
  | { status: "no_data"; rawEventCount: 0 }
  | { status: "no_remaining_events"; rawEventCount: number };

/**
 * Build a user's clean record from their raw events.
 *
 * Events are filtered and reduced in a single pass, keeping their original
 * order. User attributes always come from `rawEvents[0]`, whether or not
 * that event passes the filter.
 */
export function buildCleanRecord(
  rawEvents: readonly RawEvent[],
  userId: string,
  allowList: ReadonlySet<string>
): CleanRecordResult {
  const firstEvent = rawEvents[0];
  if (firstEvent === undefined) {
    return { status: "no_data", rawEventCount: 0 };
  }

  const events: CleanEvent[] = [];
  for (const rawEvent of rawEvents) {
    const eventType = typeof rawEvent.event_type === "string" ? rawEvent.event_type : null;
    if (!shouldKeep(eventType, allowList)) {
      continue;
    }
    events.push(reduceEvent(rawEvent));
  }

  if (events.length === 0) {
    return { status: "no_remaining_events", rawEventCount: rawEvents.length };
  }

  return {
    status: "built",
    record: {
      user_data: extractUserAttributes(firstEvent, userId),
      events,
      total_events: events.length,
    },
    rawEventCount: rawEvents.length,
  };
}
