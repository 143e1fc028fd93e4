import type { CohortField } from './rawEvent';

/**
 * User-level attributes, taken once from the user's first raw event.
 */
export interface UserData {
  /** Caller-supplied user identifier */
  user_id: string;

  /** Country copied from the first raw event (null when absent) */
  country: unknown;

  /** Language copied from the first raw event (null when absent) */
  language: unknown;

  /** `user_properties.af_status` of the first raw event, else null */
  af_status: unknown;

  /** Cohort fields present in the first raw event's user_properties */
  cohort_data: Partial<Record<CohortField, unknown>>;
}

/**
 * Reduced per-event record with the grouped user fields stripped out.
 */
export interface CleanEvent {
  /** Copied as found; usually a string, null when absent */
  event_type: unknown;

  event_time: unknown;

  event_properties: Record<string, unknown>;

  /** Present only when something remains after removing grouped fields */
  user_properties?: Record<string, unknown>;
}

/**
 * Per-user normalized event data. `total_events` always equals
 * `events.length`.
 */
export interface CleanRecord {
  user_data: UserData;
  events: CleanEvent[];
  total_events: number;
}
