/**
 * Event Isolation Pipeline - Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import { extractUserAttributes, isPlainObject, reduceEvent } from '../normalize';

// =============================================================================
// isPlainObject
// =============================================================================

describe('isPlainObject', () => {
  it('should accept objects', () => {
    expect(isPlainObject({})).toBe(true);
    expect(isPlainObject({ a: 1 })).toBe(true);
  });

  it('should reject arrays, null and primitives', () => {
    expect(isPlainObject([])).toBe(false);
    expect(isPlainObject(null)).toBe(false);
    expect(isPlainObject('x')).toBe(false);
    expect(isPlainObject(3)).toBe(false);
  });
});

// =============================================================================
// extractUserAttributes
// =============================================================================

describe('extractUserAttributes', () => {
  it('should lift status and cohort fields from user_properties', () => {
    const userData = extractUserAttributes(
      {
        event_type: 'X',
        country: 'Germany',
        language: 'German',
        user_properties: {
          af_status: 'organic',
          cohort_month: '2025-01',
          cohort_week: 3,
          plan: 'pro',
        },
      },
      'user-1'
    );

    expect(userData).toEqual({
      user_id: 'user-1',
      country: 'Germany',
      language: 'German',
      af_status: 'organic',
      cohort_data: { cohort_month: '2025-01', cohort_week: 3 },
    });
  });

  it('should default missing attributes to null and empty cohort data', () => {
    expect(extractUserAttributes({ event_type: 'X' }, 'user-2')).toEqual({
      user_id: 'user-2',
      country: null,
      language: null,
      af_status: null,
      cohort_data: {},
    });
  });

  it('should copy country and language whatever their type', () => {
    const userData = extractUserAttributes({ country: 276, language: ['de'] }, 'user-5');
    expect(userData.country).toBe(276);
    expect(userData.language).toEqual(['de']);
  });

  it('should ignore user_properties that are not an object', () => {
    const userData = extractUserAttributes({ user_properties: ['af_status'] }, 'user-3');
    expect(userData.af_status).toBeNull();
    expect(userData.cohort_data).toEqual({});
  });

  it('should keep an explicit null status and cohort value', () => {
    const userData = extractUserAttributes(
      { user_properties: { af_status: null, cohort_day: null } },
      'user-4'
    );
    expect(userData.af_status).toBeNull();
    expect(userData.cohort_data).toEqual({ cohort_day: null });
  });
});

// =============================================================================
// reduceEvent
// =============================================================================

describe('reduceEvent', () => {
  it('should keep type, time and properties and strip grouped user fields', () => {
    const cleanEvent = reduceEvent({
      event_type: 'purchase',
      event_time: '2025-05-16 10:00:00.000000',
      event_properties: { price: 9.99 },
      user_properties: { af_status: 'organic', cohort_year: 2025, plan: 'pro' },
      country: 'Germany',
      user_id: 'user-1',
    });

    expect(cleanEvent).toEqual({
      event_type: 'purchase',
      event_time: '2025-05-16 10:00:00.000000',
      event_properties: { price: 9.99 },
      user_properties: { plan: 'pro' },
    });
  });

  it('should omit user_properties when only grouped fields existed', () => {
    const cleanEvent = reduceEvent({
      event_type: 'X',
      user_properties: { af_status: 'organic', cohort_month: '2025-01' },
    });

    expect('user_properties' in cleanEvent).toBe(false);
  });

  it('should omit user_properties when the source mapping is empty', () => {
    expect('user_properties' in reduceEvent({ event_type: 'X', user_properties: {} })).toBe(false);
  });

  it('should default missing fields', () => {
    expect(reduceEvent({})).toEqual({
      event_type: null,
      event_time: null,
      event_properties: {},
    });
  });

  it('should copy non-string type and time values unchanged', () => {
    expect(reduceEvent({ event_type: 42, event_time: 1718000000000 })).toEqual({
      event_type: 42,
      event_time: 1718000000000,
      event_properties: {},
    });
  });

  it('should copy event_properties rather than share them', () => {
    const properties = { screen: 'home' };
    const cleanEvent = reduceEvent({ event_type: 'X', event_properties: properties });

    cleanEvent.event_properties.screen = 'paywall';
    expect(properties.screen).toBe('home');
  });
});
