import type { CleanEvent, UserData } from './cleanRecord';

/**
 * Metadata describing where a user's timeline was cut.
 */
export interface IsolationInfo {
  /** Anchor event type the timeline was isolated on */
  isolation_event: string;

  /** `event_time` of the anchor event */
  isolation_date: unknown;

  /** Index of the anchor event in the clean record */
  events_before_isolation: number;

  /** Number of events kept, anchor included */
  events_after_isolation: number;
}

/**
 * Clean record truncated to start at the first anchor event.
 */
export interface IsolatedRecord {
  user_data: UserData;
  isolation_info: IsolationInfo;
  events: CleanEvent[];
  total_events: number;
}

/**
 * Informational artifact written instead of an {@link IsolatedRecord} when
 * the user never emitted the anchor event.
 */
export interface NotFoundNotice {
  user_id: string;
  isolation_event: string;
  status: 'event_not_found';
  message: string;
  total_events_in_user_data: number;
  available_events: string[];
}
