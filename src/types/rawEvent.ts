/**
 * Raw event structure as exported by the analytics source.
 * Records are heterogeneous: every field is optional and values keep
 * whatever shape the export gave them.
 *
 * Fields read by the clean stage:
 * - `event_type`, `event_time`, `event_properties`
 * - `user_properties` (may carry `af_status` and the cohort fields)
 * - `country`, `language`
 *
 * User-identifying fields (`user_id`, `amplitude_id`, `device_id`, `uuid`)
 * are only used by event sources to match a user.
 */
export type RawEvent = Record<string, unknown>;

/**
 * Keys of `user_properties` that are lifted into {@link UserData}-level
 * cohort metadata.
 */
export const COHORT_FIELDS = [
  'cohort_month',
  'cohort_year',
  'cohort_day',
  'cohort_week',
] as const;

export type CohortField = (typeof COHORT_FIELDS)[number];

/** Key of `user_properties` holding the attribution status. */
export const AF_STATUS_FIELD = 'af_status';

/**
 * Every `user_properties` key that is grouped at user level and removed
 * from individual events.
 */
export const GROUPED_USER_PROPERTY_FIELDS: readonly string[] = [
  AF_STATUS_FIELD,
  ...COHORT_FIELDS,
];

/**
 * Identifier fields an event source checks when matching a user.
 */
export const USER_ID_FIELDS = ['user_id', 'amplitude_id', 'device_id', 'uuid'] as const;
