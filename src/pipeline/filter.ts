/**
 * Event Isolation Pipeline - Event Filter
 *
 * Allow-list filtering of raw events by type. The allow-list is read from
 * a plain text file: one event type per line, blank lines and lines
 * starting with `#` ignored. An empty list keeps every event.
 */

import * as fs from 'fs';
import { logger } from '../utils/logger';
import { errorMessage, systemErrorCode } from '../utils/errors';

// =============================================================================
// TYPES
// =============================================================================

export interface EventsFilter {
  /** Event types to keep, in file order */
  eventTypes: string[];

  /** Membership set over eventTypes */
  allowList: ReadonlySet<string>;

  /** Human-readable description for progress output */
  description: string;
}

// =============================================================================
// FILTERING
// =============================================================================

/**
 * Decide whether an event of the given type is retained. An empty
 * allow-list means no filtering is configured.
 */
export function shouldKeep(
  eventType: string | null,
  allowList: ReadonlySet<string>
): boolean {
  if (allowList.size === 0) {
    return true;
  }
  return eventType !== null && allowList.has(eventType);
}

// =============================================================================
// CONFIGURATION FILE
// =============================================================================

/**
 * Parse filter file content into an ordered, de-duplicated list.
 */
export function parseEventsFilter(content: string): string[] {
  const seen = new Set<string>();
  const eventTypes: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) {
      continue;
    }
    if (!seen.has(line)) {
      seen.add(line);
      eventTypes.push(line);
    }
  }

  return eventTypes;
}

/**
 * Build an {@link EventsFilter} from an ordered list of event types.
 */
export function createEventsFilter(eventTypes: readonly string[]): EventsFilter {
  const list = parseEventsFilter(eventTypes.join('\n'));
  return {
    eventTypes: list,
    allowList: new Set(list),
    description:
      list.length > 0
        ? `kept only ${list.length} specified event types`
        : 'kept all events (no filtering applied)',
  };
}

/**
 * Load the filter configuration file. A missing or unreadable file keeps
 * every event.
 */
export function loadEventsFilter(filePath: string): EventsFilter {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (systemErrorCode(error) === 'ENOENT') {
      logger.warn('Events filter file not found, keeping all events', { filePath });
    } else {
      logger.error('Could not read events filter file, keeping all events', {
        filePath,
        error: errorMessage(error),
      });
    }
    return createEventsFilter([]);
  }

  const filter = createEventsFilter(parseEventsFilter(content));
  if (filter.eventTypes.length > 0) {
    logger.info('Filter mode: include only', {
      filePath,
      eventTypes: [...filter.eventTypes].sort(),
    });
  } else {
    logger.info('Filter mode: keep all events', { filePath });
  }
  return filter;
}
