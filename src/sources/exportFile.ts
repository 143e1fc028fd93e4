/**
 * Event Isolation Pipeline - Export File Source
 *
 * Reads a newline-delimited JSON export (one event object per line) and
 * serves per-user slices of it.
 */

import * as fs from 'fs';
import type { RawEvent } from '../types/rawEvent';
import { selectUserEvents, type DateRange, type EventSource } from './eventSource';
import { isPlainObject } from '../pipeline/normalize';
import { EventSourceError, errorMessage } from '../utils/errors';
import { logger as defaultLogger, type LoggerLike } from '../utils/logger';

// =============================================================================
// PARSING
// =============================================================================

export interface ParsedExport {
  events: RawEvent[];

  /** 1-based line numbers that could not be parsed as JSON */
  invalidLines: number[];

  /** 1-based line numbers holding valid JSON that is not an object */
  skippedLines: number[];
}

/**
 * Parse newline-delimited JSON export content.
 */
export function parseExportLines(content: string): ParsedExport {
  const result: ParsedExport = { events: [], invalidLines: [], skippedLines: [] };

  content.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      result.invalidLines.push(index + 1);
      return;
    }

    if (isPlainObject(parsed)) {
      result.events.push(parsed);
    } else {
      result.skippedLines.push(index + 1);
    }
  });

  return result;
}

// =============================================================================
// SOURCE
// =============================================================================

export class ExportFileEventSource implements EventSource {
  readonly name: string;
  private filePath: string;
  private logger: LoggerLike;
  private cache: RawEvent[] | null = null;

  constructor(filePath: string, logger: LoggerLike = defaultLogger) {
    this.filePath = filePath;
    this.name = `export:${filePath}`;
    this.logger = logger.child({ source: 'export-file', filePath });
  }

  private async load(): Promise<RawEvent[]> {
    if (this.cache) {
      return this.cache;
    }

    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new EventSourceError(
        this.name,
        `could not read export file (${errorMessage(error)})`,
        error instanceof Error ? error : undefined
      );
    }

    const parsed = parseExportLines(content);
    for (const line of parsed.invalidLines) {
      this.logger.warn('JSON decode error in export file', { line });
    }
    if (parsed.skippedLines.length > 0) {
      this.logger.debug('Skipped non-object export lines', { lines: parsed.skippedLines });
    }
    this.logger.info('Loaded export file', { events: parsed.events.length });

    this.cache = parsed.events;
    return parsed.events;
  }

  async fetchUserEvents(userId: string, range: DateRange): Promise<RawEvent[]> {
    const events = await this.load();
    return selectUserEvents(events, userId, range);
  }
}
