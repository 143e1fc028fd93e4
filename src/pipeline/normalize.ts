import {
  AF_STATUS_FIELD,
  COHORT_FIELDS,
  GROUPED_USER_PROPERTY_FIELDS,
  type CohortField,
  type RawEvent,
} from "../types/rawEvent";
import type { CleanEvent, UserData } from "../types/cleanRecord";

/**
 * Narrow a value to a plain (non-array) object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extract the user-level attributes from a user's first raw event.
 * Values are copied as they are; absent ones become null. Missing or
 * malformed `user_properties` simply yields no status/cohort data.
 */
export function extractUserAttributes(firstRawEvent: RawEvent, userId: string): UserData {
  const userData: UserData = {
    user_id: userId,
    country: firstRawEvent.country ?? null,
    language: firstRawEvent.language ?? null,
    af_status: null,
    cohort_data: {},
  };

  const userProps = firstRawEvent.user_properties;
  if (!isPlainObject(userProps)) {
    return userData;
  }

  if (AF_STATUS_FIELD in userProps) {
    userData.af_status = userProps[AF_STATUS_FIELD];
  }

  const cohortData: Partial<Record<CohortField, unknown>> = {};
  for (const field of COHORT_FIELDS) {
    if (field in userProps) {
      cohortData[field] = userProps[field];
    }
  }
  userData.cohort_data = cohortData;

  return userData;
}

/**
 * Reduce a raw event to its clean shape, dropping the user fields that are
 * grouped at user level.
 */
export function reduceEvent(rawEvent: RawEvent): CleanEvent {
  const eventProperties = rawEvent.event_properties;

  const cleanEvent: CleanEvent = {
    event_type: rawEvent.event_type ?? null,
    event_time: rawEvent.event_time ?? null,
    event_properties: isPlainObject(eventProperties) ? { ...eventProperties } : {},
  };

  const userProps = rawEvent.user_properties;
  if (isPlainObject(userProps)) {
    const remaining: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(userProps)) {
      if (!GROUPED_USER_PROPERTY_FIELDS.includes(key)) {
        remaining[key] = value;
      }
    }

    // Never emit an empty mapping
    if (Object.keys(remaining).length > 0) {
      cleanEvent.user_properties = remaining;
    }
  }

  return cleanEvent;
}
