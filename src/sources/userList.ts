/**
 * Event Isolation Pipeline - User List
 *
 * Parses the user-list file that drives the fetch stage and plans the date
 * range requested for each user.
 *
 * Accepted line formats:
 *   UserID|FirstSeen|LastSeen
 *   UserID|FirstSeen
 *   UserID
 *
 * Dates look like `May 16, 2025`, `Jun 16, 2025` or
 * `June 11, 2025 1:32:45.275 PM GMT+2` (time of day and zone are ignored).
 */

import type { DateRange } from './eventSource';
import { logger } from '../utils/logger';

// =============================================================================
// TYPES
// =============================================================================

export interface UserListEntry {
  userId: string;

  /** First-seen date (UTC midnight), null when absent or unparseable */
  firstSeen: Date | null;

  /** Last-seen date (UTC midnight), null when absent or unparseable */
  lastSeen: Date | null;

  /** First-seen text as written in the list */
  firstSeenText?: string;

  /** Last-seen text as written in the list */
  lastSeenText?: string;
}

// =============================================================================
// DATE PARSING
// =============================================================================

const MONTHS = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

const DAY_MS = 24 * 60 * 60 * 1000;

const SIMPLE_DATE = /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})$/;
const DETAILED_DATE =
  /^([A-Za-z]+)\s+(\d{1,2}),\s*(\d{4})\s+\d{1,2}:\d{2}:\d{2}(?:\.\d+)?\s*(?:AM|PM)(?:\s+GMT[+-]\d+)?$/i;

function monthIndex(name: string): number {
  const lower = name.toLowerCase();
  const full = MONTHS.indexOf(lower);
  if (full >= 0) {
    return full;
  }
  if (lower.length === 3) {
    return MONTHS.findIndex((month) => month.startsWith(lower));
  }
  return -1;
}

/**
 * Parse a user-list date into a UTC midnight Date, or null.
 */
export function parseUserDate(text: string): Date | null {
  const trimmed = text.trim();
  const match = SIMPLE_DATE.exec(trimmed) ?? DETAILED_DATE.exec(trimmed);
  if (!match) {
    return null;
  }

  const [, monthName = '', dayText = '', yearText = ''] = match;
  const month = monthIndex(monthName);
  const day = parseInt(dayText, 10);
  const year = parseInt(yearText, 10);
  if (month < 0) {
    return null;
  }

  const date = new Date(Date.UTC(year, month, day));
  // Reject overflowed days such as "February 30"
  if (date.getUTCDate() !== day || date.getUTCMonth() !== month) {
    return null;
  }
  return date;
}

/**
 * Calendar day of an `event_time` value (`YYYY-MM-DD...`), or null.
 */
export function parseEventDay(eventTime: unknown): Date | null {
  if (typeof eventTime !== 'string') {
    return null;
  }
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(eventTime);
  if (!match) {
    return null;
  }

  const [, yearText = '', monthText = '', dayText = ''] = match;
  const date = new Date(Date.UTC(parseInt(yearText, 10), parseInt(monthText, 10) - 1, parseInt(dayText, 10)));
  return toIsoDate(date) === eventTime.slice(0, 10) ? date : null;
}

/**
 * `YYYY-MM-DD` for a UTC date.
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * `YYYYMMDD` form used in raw file names.
 */
export function toCompactDate(isoDate: string): string {
  return isoDate.replace(/-/g, '');
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Truncate a Date to its UTC calendar day.
 */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

// =============================================================================
// LIST PARSING
// =============================================================================

function isTemplateText(text: string): boolean {
  const lower = text.toLowerCase();
  return lower.startsWith('example') || lower.includes('template') || lower.includes('replace');
}

function parseDateField(text: string, userId: string, field: string): Date | null {
  const date = parseUserDate(text);
  if (date === null) {
    logger.warn('Could not parse user-list date', { userId, field, value: text });
  }
  return date;
}

/**
 * Parse user-list file content. Comments, blank lines and template
 * placeholder lines are skipped.
 */
export function parseUserList(content: string): UserListEntry[] {
  const entries: UserListEntry[] = [];

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line || line.startsWith('#') || isTemplateText(line)) {
      return;
    }

    if (!line.includes('|')) {
      entries.push({ userId: line, firstSeen: null, lastSeen: null });
      return;
    }

    const parts = line.split('|').map((part) => part.trim());
    const userId = parts[0] ?? '';
    if (!userId) {
      return;
    }

    if (parts.length === 3) {
      const firstSeenText = parts[1] ?? '';
      const lastSeenText = parts[2] ?? '';
      entries.push({
        userId,
        firstSeen: parseDateField(firstSeenText, userId, 'firstSeen'),
        lastSeen: parseDateField(lastSeenText, userId, 'lastSeen'),
        firstSeenText,
        lastSeenText,
      });
    } else if (parts.length === 2) {
      const firstSeenText = parts[1] ?? '';
      entries.push({
        userId,
        firstSeen: parseDateField(firstSeenText, userId, 'firstSeen'),
        lastSeen: null,
        firstSeenText,
      });
    } else {
      logger.warn('Skipping user-list line with too many fields', { line: index + 1 });
    }
  });

  return entries;
}

// =============================================================================
// DATE RANGE PLANNING
// =============================================================================

/**
 * Inclusive range requested for one user. The start is pulled back one day
 * so events logged just before the recorded first-seen date are included.
 */
export function planDateRange(entry: UserListEntry, now: Date = new Date()): DateRange {
  const today = startOfUtcDay(now);

  if (entry.firstSeen && entry.lastSeen) {
    return { start: toIsoDate(addDays(entry.firstSeen, -1)), end: toIsoDate(entry.lastSeen) };
  }
  if (entry.firstSeen) {
    return { start: toIsoDate(addDays(entry.firstSeen, -1)), end: toIsoDate(today) };
  }
  return { start: toIsoDate(addDays(today, -1)), end: toIsoDate(today) };
}
