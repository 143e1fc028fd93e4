/**
 * Event Isolation Pipeline - Validation Tests
 */

import { describe, it, expect } from 'vitest';
import { CleanEventSchema, parseCleanRecord, parseRawEvents, validate } from '../validation';
import { ValidationError } from '../errors';

describe('validate', () => {
  it('should return parsed data', () => {
    expect(validate(CleanEventSchema, { event_type: 'A' })).toEqual({ event_type: 'A' });
  });

  it('should throw ValidationError with the failing path', () => {
    try {
      validate(CleanEventSchema, { event_type: 5 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe('event_type');
      }
    }
  });

  it('should prefer an explicit field name', () => {
    expect(() => validate(CleanEventSchema, null, 'event')).toThrow(ValidationError);
  });
});

describe('parseRawEvents', () => {
  it('should accept an array of objects', () => {
    expect(parseRawEvents([{ event_type: 'A' }, {}])).toEqual([{ event_type: 'A' }, {}]);
  });

  it('should reject anything else', () => {
    expect(() => parseRawEvents({ events: [] })).toThrow(ValidationError);
    expect(() => parseRawEvents([1, 2])).toThrow(ValidationError);
    expect(() => parseRawEvents([[]])).toThrow(ValidationError);
  });
});

describe('parseCleanRecord', () => {
  it('should normalize optional fields', () => {
    const record = parseCleanRecord({
      user_data: { user_id: 'u1', cohort_data: { cohort_month: '2025-01', extra: true } },
      events: [
        { event_type: 'A' },
        { event_type: 'B', event_time: '2025-01-02', event_properties: { a: 1 }, user_properties: {} },
        { user_properties: { plan: 'pro' } },
      ],
      total_events: 99,
    });

    expect(record).toEqual({
      user_data: {
        user_id: 'u1',
        country: null,
        language: null,
        af_status: null,
        cohort_data: { cohort_month: '2025-01' },
      },
      events: [
        { event_type: 'A', event_time: null, event_properties: {} },
        { event_type: 'B', event_time: '2025-01-02', event_properties: { a: 1 } },
        { event_type: null, event_time: null, event_properties: {}, user_properties: { plan: 'pro' } },
      ],
      total_events: 3,
    });
    expect('user_properties' in (record.events[1] ?? {})).toBe(false);
  });

  it('should read back non-string attribute and event values', () => {
    const record = parseCleanRecord({
      user_data: { user_id: 'u1', country: 276, language: ['de'], af_status: 'organic', cohort_data: {} },
      events: [{ event_type: 42, event_time: 1718000000000, event_properties: {} }],
      total_events: 1,
    });

    expect(record.user_data.country).toBe(276);
    expect(record.user_data.language).toEqual(['de']);
    expect(record.events).toEqual([{ event_type: 42, event_time: 1718000000000, event_properties: {} }]);
  });

  it('should reject a record without a user id', () => {
    expect(() => parseCleanRecord({ user_data: {}, events: [], total_events: 0 })).toThrow(ValidationError);
  });
});
