/**
 * Event Isolation Pipeline - User List Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  addDays,
  parseEventDay,
  parseUserDate,
  parseUserList,
  planDateRange,
  toCompactDate,
  toIsoDate,
} from '../userList';

function utc(year: number, month: number, day: number): Date {
  return new Date(Date.UTC(year, month - 1, day));
}

// =============================================================================
// DATE PARSING
// =============================================================================

describe('parseUserDate', () => {
  it('should parse full and abbreviated month names', () => {
    expect(parseUserDate('May 16, 2025')).toEqual(utc(2025, 5, 16));
    expect(parseUserDate('Jun 16, 2025')).toEqual(utc(2025, 6, 16));
    expect(parseUserDate('december 1,2024')).toEqual(utc(2024, 12, 1));
  });

  it('should ignore the time of day and zone of detailed dates', () => {
    expect(parseUserDate('June 11, 2025 1:32:45.275 PM GMT+2')).toEqual(utc(2025, 6, 11));
    expect(parseUserDate('Jan 2, 2025 11:00:00 AM')).toEqual(utc(2025, 1, 2));
  });

  it('should reject malformed and impossible dates', () => {
    expect(parseUserDate('not a date')).toBeNull();
    expect(parseUserDate('February 30, 2025')).toBeNull();
    expect(parseUserDate('Sept 3, 2025')).toBeNull();
    expect(parseUserDate('2025-06-01')).toBeNull();
  });
});

describe('date helpers', () => {
  it('should format ISO and compact dates', () => {
    expect(toIsoDate(utc(2025, 3, 9))).toBe('2025-03-09');
    expect(toCompactDate('2025-03-09')).toBe('20250309');
  });

  it('should cross month boundaries', () => {
    expect(toIsoDate(addDays(utc(2025, 3, 1), -1))).toBe('2025-02-28');
  });
});

describe('parseEventDay', () => {
  it('should take the calendar day of an event time', () => {
    expect(parseEventDay('2025-06-12 23:59:59.123000')).toEqual(utc(2025, 6, 12));
    expect(parseEventDay('2025-06-12')).toEqual(utc(2025, 6, 12));
  });

  it('should reject missing, non-string and impossible times', () => {
    expect(parseEventDay(undefined)).toBeNull();
    expect(parseEventDay(1718000000000)).toBeNull();
    expect(parseEventDay('12/06/2025')).toBeNull();
    expect(parseEventDay('2025-02-30 10:00:00')).toBeNull();
  });
});

// =============================================================================
// LIST PARSING
// =============================================================================

describe('parseUserList', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should parse every supported line format', () => {
    const content = [
      '# UserID|FirstSeen|LastSeen',
      'example_user|May 1, 2025|May 2, 2025',
      'REPLACE_WITH_USER_ID',
      'u1|May 16, 2025|Jun 16, 2025',
      'u2 | June 11, 2025 1:32:45.275 PM GMT+2',
      'u3',
      '',
      'u4|a|b|c',
      '|May 1, 2025',
      'u5|garbage',
    ].join('\n');

    expect(parseUserList(content)).toEqual([
      {
        userId: 'u1',
        firstSeen: utc(2025, 5, 16),
        lastSeen: utc(2025, 6, 16),
        firstSeenText: 'May 16, 2025',
        lastSeenText: 'Jun 16, 2025',
      },
      {
        userId: 'u2',
        firstSeen: utc(2025, 6, 11),
        lastSeen: null,
        firstSeenText: 'June 11, 2025 1:32:45.275 PM GMT+2',
      },
      { userId: 'u3', firstSeen: null, lastSeen: null },
      { userId: 'u5', firstSeen: null, lastSeen: null, firstSeenText: 'garbage' },
    ]);
  });

  it('should warn about unparseable dates and extra fields', () => {
    parseUserList('u4|a|b|c\nu5|garbage');
    expect(console.warn).toHaveBeenCalledTimes(2);
  });
});

// =============================================================================
// DATE RANGE PLANNING
// =============================================================================

describe('planDateRange', () => {
  const now = new Date(Date.UTC(2025, 5, 20, 23, 30));

  it('should start one day before first seen and end on last seen', () => {
    expect(
      planDateRange({ userId: 'u', firstSeen: utc(2025, 5, 16), lastSeen: utc(2025, 6, 16) }, now)
    ).toEqual({ start: '2025-05-15', end: '2025-06-16' });
  });

  it('should end today without a last-seen date', () => {
    expect(planDateRange({ userId: 'u', firstSeen: utc(2025, 6, 1), lastSeen: null }, now)).toEqual({
      start: '2025-05-31',
      end: '2025-06-20',
    });
  });

  it('should cover yesterday and today without dates', () => {
    expect(planDateRange({ userId: 'u', firstSeen: null, lastSeen: null }, now)).toEqual({
      start: '2025-06-19',
      end: '2025-06-20',
    });
  });
});
