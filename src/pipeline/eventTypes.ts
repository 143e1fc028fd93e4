import type { CleanEvent, CleanRecord } from "../types/cleanRecord";

/** Label used when counting events that carry no type. */
export const UNKNOWN_EVENT_TYPE = "UNKNOWN";

/**
 * Sorted distinct event types over the first `sampleSize` records.
 */
export function collectEventTypes(records: readonly CleanRecord[], sampleSize: number): string[] {
  const eventTypes = new Set<string>();

  for (const record of records.slice(0, Math.max(0, sampleSize))) {
    for (const event of record.events) {
      if (typeof event.event_type === "string") {
        eventTypes.add(event.event_type);
      }
    }
  }

  return [...eventTypes].sort();
}

/**
 * Count events per type, most frequent first (ties by name). Non-string
 * types are counted under their string form.
 */
export function countEventTypes(events: readonly Pick<CleanEvent, "event_type">[]): Array<[string, number]> {
  const counts = new Map<string, number>();

  for (const event of events) {
    const value = event.event_type;
    const eventType =
      typeof value === "string" ? value : value === null || value === undefined ? UNKNOWN_EVENT_TYPE : String(value);
    counts.set(eventType, (counts.get(eventType) ?? 0) + 1);
  }

  return [...counts.entries()].sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/**
 * Pick the anchor for a non-interactive run: the first preferred event type
 * that is available, else the first available type.
 */
export function selectDefaultAnchor(
  available: readonly string[],
  preferred: readonly string[]
): string | null {
  const availableSet = new Set(available);
  for (const candidate of preferred) {
    if (availableSet.has(candidate)) {
      return candidate;
    }
  }
  return available[0] ?? null;
}
