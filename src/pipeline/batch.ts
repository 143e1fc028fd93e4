/**
 * Event Isolation Pipeline - Batch Reporter
 *
 * Runs the anchor isolator over every clean record of a session and
 * accumulates the before/after statistics. A failure on one record is
 * recorded and never aborts the batch.
 */

import type { CleanRecord } from '../types/cleanRecord';
import { isolate, type IsolationResult } from './isolate';
import { logger as defaultLogger, type LoggerLike } from '../utils/logger';
import { ValidationError, errorMessage } from '../utils/errors';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

/**
 * One user's clean record, as supplied by the caller.
 */
export interface BatchEntry {
  userId: string;
  record: CleanRecord;
}

/**
 * Per-record batch outcome.
 */
export type BatchItemResult =
  | { userId: string; index: number; outcome: 'isolated'; result: IsolationResult }
  | { userId: string; index: number; outcome: 'failed'; totalCount: number; error: string };

/**
 * Aggregate statistics for a batch.
 *
 * `filesProcessed` always equals the sum of the four outcome buckets.
 */
export interface BatchSummary {
  /** Anchor event type used for the batch */
  isolationEvent: string;

  /** Records processed */
  filesProcessed: number;

  /** Records where the anchor was found */
  successfulIsolations: number;

  /** Non-empty records that never contain the anchor */
  filesWithoutEvent: number;

  /** Records with no events at all */
  filesWithoutData: number;

  /** Records whose processing threw */
  filesFailed: number;

  /** Sum of each record's event count before isolation, failed records excluded */
  totalEventsBefore: number;

  /** Sum of events kept by successful isolations */
  totalEventsAfter: number;

  /** (before - after) / before * 100, omitted when before is 0 */
  reductionPercent?: number;
}

export interface BatchOptions {
  /** Handles each isolation result; a throw marks that record failed */
  onResult?: (item: BatchItemResult) => void;

  /** Called once per record with its final outcome, in input order */
  onProgress?: (item: BatchItemResult, total: number) => void;

  logger?: LoggerLike;
}

export interface BatchResult {
  summary: BatchSummary;
  items: BatchItemResult[];
}

// =============================================================================
// SUMMARY HELPERS
// =============================================================================

export function createEmptySummary(isolationEvent: string): BatchSummary {
  return {
    isolationEvent,
    filesProcessed: 0,
    successfulIsolations: 0,
    filesWithoutEvent: 0,
    filesWithoutData: 0,
    filesFailed: 0,
    totalEventsBefore: 0,
    totalEventsAfter: 0,
  };
}

/**
 * Percentage of events removed, undefined when nothing was counted.
 */
export function computeReductionPercent(before: number, after: number): number | undefined {
  if (before <= 0) {
    return undefined;
  }
  return ((before - after) / before) * 100;
}

function withReduction(summary: BatchSummary): BatchSummary {
  const result: BatchSummary = { ...summary };
  delete result.reductionPercent;

  const reductionPercent = computeReductionPercent(result.totalEventsBefore, result.totalEventsAfter);
  if (reductionPercent !== undefined) {
    result.reductionPercent = reductionPercent;
  }
  return result;
}

function accumulate(summary: BatchSummary, item: BatchItemResult): void {
  summary.filesProcessed++;

  // Failed records stay out of both event totals
  if (item.outcome === 'failed') {
    summary.filesFailed++;
    return;
  }

  const result = item.result;
  switch (result.status) {
    case 'anchor_found':
      summary.successfulIsolations++;
      summary.totalEventsBefore += result.totalCount;
      summary.totalEventsAfter += result.isolatedCount;
      break;
    case 'anchor_not_found':
      summary.filesWithoutEvent++;
      summary.totalEventsBefore += result.totalCount;
      break;
    case 'no_events':
      summary.filesWithoutData++;
      break;
  }
}

/**
 * Sum independent partial summaries (e.g. from parallel workers).
 */
export function mergeBatchSummaries(isolationEvent: string, parts: readonly BatchSummary[]): BatchSummary {
  const merged = createEmptySummary(isolationEvent);

  for (const part of parts) {
    if (part.isolationEvent !== isolationEvent) {
      throw new ValidationError(
        `Cannot merge summary for '${part.isolationEvent}' into '${isolationEvent}'`,
        'isolationEvent'
      );
    }
    merged.filesProcessed += part.filesProcessed;
    merged.successfulIsolations += part.successfulIsolations;
    merged.filesWithoutEvent += part.filesWithoutEvent;
    merged.filesWithoutData += part.filesWithoutData;
    merged.filesFailed += part.filesFailed;
    merged.totalEventsBefore += part.totalEventsBefore;
    merged.totalEventsAfter += part.totalEventsAfter;
  }

  return withReduction(merged);
}

// =============================================================================
// BATCH EXECUTION
// =============================================================================

/**
 * Isolate every entry on the anchor event type, in input order.
 */
export function runBatch(
  entries: readonly BatchEntry[],
  anchorEventType: string,
  options: BatchOptions = {}
): BatchResult {
  const log = options.logger ?? defaultLogger;
  const summary = createEmptySummary(anchorEventType);
  const items: BatchItemResult[] = [];

  entries.forEach((entry, index) => {
    let item: BatchItemResult;

    try {
      item = {
        userId: entry.userId,
        index,
        outcome: 'isolated',
        result: isolate(entry.record, anchorEventType),
      };
      options.onResult?.(item);
    } catch (error) {
      log.error('Failed to isolate user record', {
        userId: entry.userId,
        isolationEvent: anchorEventType,
        error: errorMessage(error),
      });
      item = {
        userId: entry.userId,
        index,
        outcome: 'failed',
        totalCount: entry.record.events.length,
        error: errorMessage(error),
      };
    }

    accumulate(summary, item);
    items.push(item);
    options.onProgress?.(item, entries.length);
  });

  return { summary: withReduction(summary), items };
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatCount(value: number): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Progress header for one record, e.g. `[ 3/12] Processing: user_1`.
 */
export function formatProgressLine(position: number, total: number, userId: string): string {
  return `[${String(position).padStart(2, ' ')}/${total}] Processing: ${userId}`;
}

/**
 * Outcome line printed under a record's progress header.
 */
export function formatItemOutcome(item: BatchItemResult): string {
  if (item.outcome === 'failed') {
    return `   failed to isolate: ${item.error}`;
  }

  const result = item.result;
  switch (result.status) {
    case 'anchor_found':
      return `   isolated ${result.isolatedCount} events (from ${result.totalCount} total)`;
    case 'anchor_not_found':
      return `   event not found (total events: ${result.totalCount})`;
    case 'no_events':
      return '   no events to isolate';
  }
}

/**
 * Report lines for a finished batch.
 */
export function formatBatchSummary(summary: BatchSummary): string[] {
  const lines = [
    `Isolation event: '${summary.isolationEvent}'`,
    `Files processed: ${formatCount(summary.filesProcessed)}`,
    `Successful isolations: ${formatCount(summary.successfulIsolations)}`,
    `Files without isolation event: ${formatCount(summary.filesWithoutEvent)}`,
    `Files without events: ${formatCount(summary.filesWithoutData)}`,
    `Files failed: ${formatCount(summary.filesFailed)}`,
    `Total events before isolation: ${formatCount(summary.totalEventsBefore)}`,
    `Total events after isolation: ${formatCount(summary.totalEventsAfter)}`,
  ];

  if (summary.reductionPercent !== undefined) {
    lines.push(`Event reduction: ${summary.reductionPercent.toFixed(1)}%`);
  }

  return lines;
}
