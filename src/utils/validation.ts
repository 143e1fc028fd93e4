/**
 * Event Isolation Pipeline - Validation Utilities
 *
 * Zod schemas for the JSON artifacts the stages read back from disk.
 */

import { z } from 'zod';
import { ValidationError } from './errors';
import { COHORT_FIELDS, type CohortField, type RawEvent } from '../types/rawEvent';
import type { CleanEvent, CleanRecord, UserData } from '../types/cleanRecord';

// =============================================================================
// COMMON SCHEMAS
// =============================================================================

/**
 * Any JSON object (arrays and null rejected)
 */
export const JsonObjectSchema = z.record(z.unknown());

/**
 * Raw event file: a JSON array of event objects
 */
export const RawEventFileSchema = z.array(JsonObjectSchema);

// =============================================================================
// CLEAN RECORD SCHEMAS
// =============================================================================

export const UserDataSchema = z.object({
  user_id: z.string().min(1),
  country: z.unknown(),
  language: z.unknown(),
  af_status: z.unknown(),
  cohort_data: JsonObjectSchema.optional(),
});

export const CleanEventSchema = z.object({
  event_type: z.unknown(),
  event_time: z.unknown(),
  event_properties: JsonObjectSchema.optional(),
  user_properties: JsonObjectSchema.optional(),
});

export const CleanRecordSchema = z.object({
  user_data: UserDataSchema,
  events: z.array(CleanEventSchema),
  total_events: z.number().int().nonnegative(),
});

// =============================================================================
// VALIDATION HELPERS
// =============================================================================

/**
 * Validate data against a Zod schema
 *
 * @example
 * ```typescript
 * const events = validate(RawEventFileSchema, JSON.parse(text));
 * ```
 */
export function validate<T>(
  schema: z.ZodSchema<T>,
  data: unknown,
  fieldName?: string
): T {
  const result = schema.safeParse(data);

  if (!result.success) {
    const firstError = result.error.issues[0];
    const path = firstError ? firstError.path.join('.') : '';
    const field = fieldName || path;
    throw new ValidationError(firstError?.message ?? 'Invalid value', field, {
      path,
      errors: result.error.issues,
    });
  }

  return result.data;
}

/**
 * Validate a raw event file's parsed content
 */
export function parseRawEvents(data: unknown): RawEvent[] {
  return validate(RawEventFileSchema, data);
}

/**
 * Validate a clean record file's parsed content and normalize optional
 * fields to the in-memory shape.
 */
export function parseCleanRecord(data: unknown): CleanRecord {
  const parsed = validate(CleanRecordSchema, data);

  const cohortData: Partial<Record<CohortField, unknown>> = {};
  const sourceCohort = parsed.user_data.cohort_data ?? {};
  for (const field of COHORT_FIELDS) {
    if (field in sourceCohort) {
      cohortData[field] = sourceCohort[field];
    }
  }

  const userData: UserData = {
    user_id: parsed.user_data.user_id,
    country: parsed.user_data.country ?? null,
    language: parsed.user_data.language ?? null,
    af_status: parsed.user_data.af_status ?? null,
    cohort_data: cohortData,
  };

  const events = parsed.events.map((event): CleanEvent => {
    const cleanEvent: CleanEvent = {
      event_type: event.event_type ?? null,
      event_time: event.event_time ?? null,
      event_properties: event.event_properties ?? {},
    };
    if (event.user_properties && Object.keys(event.user_properties).length > 0) {
      cleanEvent.user_properties = event.user_properties;
    }
    return cleanEvent;
  });

  return {
    user_data: userData,
    events,
    total_events: events.length,
  };
}
