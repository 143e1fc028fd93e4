import type { CleanEvent, CleanRecord } from "../types/cleanRecord";
import type { IsolatedRecord, NotFoundNotice } from "../types/isolatedRecord";

/**
 * Outcome of isolating one clean record on an anchor event type.
 * Only `anchor_found` is a success; the other two are recognized terminal
 * states, not errors.
 */
export type IsolationResult =
  | {
      status: "anchor_found";
      success: true;
      record: IsolatedRecord;
      anchorIndex: number;
      isolatedCount: number;
      totalCount: number;
    }
  | {
      status: "anchor_not_found";
      success: false;
      isolatedCount: 0;
      totalCount: number;
    }
  | {
      status: "no_events";
      success: false;
      isolatedCount: 0;
      totalCount: 0;
    };

/**
 * Index of the first event with the given type, or -1.
 */
export function findAnchorIndex(events: readonly CleanEvent[], anchorEventType: string): number {
  for (let i = 0; i < events.length; i++) {
    if (events[i]?.event_type === anchorEventType) {
      return i;
    }
  }
  return -1;
}

/**
 * Truncate a clean record so it starts at the first occurrence of
 * `anchorEventType` (anchor included).
 */
export function isolate(cleanRecord: CleanRecord, anchorEventType: string): IsolationResult {
  const events = cleanRecord.events;
  if (events.length === 0) {
    return { status: "no_events", success: false, isolatedCount: 0, totalCount: 0 };
  }

  const anchorIndex = findAnchorIndex(events, anchorEventType);
  const anchorEvent = events[anchorIndex];
  if (anchorIndex < 0 || anchorEvent === undefined) {
    return {
      status: "anchor_not_found",
      success: false,
      isolatedCount: 0,
      totalCount: events.length,
    };
  }

  const isolatedEvents = events.slice(anchorIndex);

  const record: IsolatedRecord = {
    user_data: {
      ...cleanRecord.user_data,
      cohort_data: { ...cleanRecord.user_data.cohort_data },
    },
    isolation_info: {
      isolation_event: anchorEventType,
      isolation_date: anchorEvent.event_time,
      events_before_isolation: anchorIndex,
      events_after_isolation: isolatedEvents.length,
    },
    events: isolatedEvents,
    total_events: isolatedEvents.length,
  };

  return {
    status: "anchor_found",
    success: true,
    record,
    anchorIndex,
    isolatedCount: isolatedEvents.length,
    totalCount: events.length,
  };
}

/**
 * Message stored in a not-found notice.
 */
export function notFoundMessage(anchorEventType: string): string {
  return `Optimization based on '${anchorEventType}' is not possible, as the event is not present in that user log`;
}

/**
 * Build the informational artifact written when a user's log lacks the
 * anchor event.
 */
export function buildNotFoundNotice(
  userId: string,
  anchorEventType: string,
  totalEvents: number,
  availableEvents: readonly string[]
): NotFoundNotice {
  return {
    user_id: userId,
    isolation_event: anchorEventType,
    status: "event_not_found",
    message: notFoundMessage(anchorEventType),
    total_events_in_user_data: totalEvents,
    available_events: [...availableEvents].sort(),
  };
}
