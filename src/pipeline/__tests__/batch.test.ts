/**
 * Event Isolation Pipeline - Batch Reporter Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  computeReductionPercent,
  createEmptySummary,
  formatBatchSummary,
  formatCount,
  formatItemOutcome,
  formatProgressLine,
  mergeBatchSummaries,
  runBatch,
  type BatchEntry,
  type BatchItemResult,
  type BatchSummary,
} from '../batch';
import type { CleanRecord } from '../../types/cleanRecord';
import type { LoggerLike } from '../../utils/logger';
import { ValidationError } from '../../utils/errors';

function createSilentLogger(): LoggerLike {
  const silent: LoggerLike = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => silent,
  };
  return silent;
}

function entry(userId: string, types: string[]): BatchEntry {
  const record: CleanRecord = {
    user_data: { user_id: userId, country: null, language: null, af_status: null, cohort_data: {} },
    events: types.map((type) => ({ event_type: type, event_time: null, event_properties: {} })),
    total_events: types.length,
  };
  return { userId, record };
}

const ENTRIES = [entry('u1', ['A', 'B', 'C', 'D']), entry('u2', ['A', 'B']), entry('u3', [])];

function bucketTotal(summary: BatchSummary): number {
  return (
    summary.successfulIsolations + summary.filesWithoutEvent + summary.filesWithoutData + summary.filesFailed
  );
}

// =============================================================================
// runBatch
// =============================================================================

describe('runBatch', () => {
  it('should accumulate every outcome bucket', () => {
    const { summary, items } = runBatch(ENTRIES, 'C', { logger: createSilentLogger() });

    expect(summary).toMatchObject({
      isolationEvent: 'C',
      filesProcessed: 3,
      successfulIsolations: 1,
      filesWithoutEvent: 1,
      filesWithoutData: 1,
      filesFailed: 0,
      totalEventsBefore: 6,
      totalEventsAfter: 2,
    });
    expect(summary.reductionPercent).toBeCloseTo(66.667, 2);
    expect(bucketTotal(summary)).toBe(summary.filesProcessed);
    expect(items.map((item) => item.userId)).toEqual(['u1', 'u2', 'u3']);
  });

  it('should omit the reduction when no events were counted', () => {
    const { summary } = runBatch([entry('u3', [])], 'C', { logger: createSilentLogger() });
    expect(summary.totalEventsBefore).toBe(0);
    expect('reductionPercent' in summary).toBe(false);
  });

  it('should return an empty summary for no entries', () => {
    const { summary, items } = runBatch([], 'C');
    expect(summary).toEqual(createEmptySummary('C'));
    expect(items).toEqual([]);
  });

  it('should hand each isolation result to onResult', () => {
    const onResult = vi.fn();
    runBatch(ENTRIES, 'C', { onResult, logger: createSilentLogger() });

    expect(onResult).toHaveBeenCalledTimes(3);
    const first = onResult.mock.calls[0]?.[0];
    expect(first).toMatchObject({ userId: 'u1', index: 0, outcome: 'isolated' });
  });

  it('should count a record as failed when handling it throws, and continue', () => {
    const logger = createSilentLogger();
    const { summary, items } = runBatch(ENTRIES, 'C', {
      logger,
      onResult: (item) => {
        if (item.userId === 'u1') throw new Error('disk full');
      },
    });

    expect(summary).toMatchObject({
      filesProcessed: 3,
      successfulIsolations: 0,
      filesWithoutEvent: 1,
      filesWithoutData: 1,
      filesFailed: 1,
      totalEventsBefore: 2,
      totalEventsAfter: 0,
      reductionPercent: 100,
    });
    expect(items[0]).toEqual({ userId: 'u1', index: 0, outcome: 'failed', totalCount: 4, error: 'disk full' });
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('should leave failed records out of the event totals', () => {
    const { summary } = runBatch([entry('a', ['X', 'Y']), entry('b', ['Y', 'X', 'Z'])], 'X', {
      logger: createSilentLogger(),
      onResult: (item) => {
        if (item.userId === 'b') throw new Error('disk full');
      },
    });

    expect(summary).toMatchObject({
      filesFailed: 1,
      successfulIsolations: 1,
      totalEventsBefore: 2,
      totalEventsAfter: 2,
      reductionPercent: 0,
    });
  });

  it('should report progress after each final outcome', () => {
    const seen: Array<[string, string, number]> = [];
    runBatch(ENTRIES, 'C', {
      logger: createSilentLogger(),
      onResult: (item) => {
        if (item.userId === 'u2') throw new Error('nope');
      },
      onProgress: (item, total) => seen.push([item.userId, item.outcome, total]),
    });

    expect(seen).toEqual([
      ['u1', 'isolated', 3],
      ['u2', 'failed', 3],
      ['u3', 'isolated', 3],
    ]);
  });

  it('should never count more events after than before', () => {
    const { summary } = runBatch(
      [entry('a', ['X']), entry('b', ['Y', 'X', 'X']), entry('c', ['Y'])],
      'X',
      { logger: createSilentLogger() }
    );
    expect(summary.totalEventsBefore).toBe(5);
    expect(summary.totalEventsAfter).toBe(3);
    expect(summary.totalEventsAfter).toBeLessThanOrEqual(summary.totalEventsBefore);
  });
});

// =============================================================================
// SUMMARY HELPERS
// =============================================================================

describe('computeReductionPercent', () => {
  it('should compute the removed share', () => {
    expect(computeReductionPercent(200, 50)).toBe(75);
  });

  it('should be undefined when nothing was counted', () => {
    expect(computeReductionPercent(0, 0)).toBeUndefined();
  });
});

describe('mergeBatchSummaries', () => {
  it('should sum partial summaries and recompute the reduction', () => {
    const left = runBatch([ENTRIES[0] ?? entry('x', [])], 'C', { logger: createSilentLogger() }).summary;
    const right = runBatch(ENTRIES.slice(1), 'C', { logger: createSilentLogger() }).summary;

    const merged = mergeBatchSummaries('C', [left, right]);
    const whole = runBatch(ENTRIES, 'C', { logger: createSilentLogger() }).summary;

    expect(merged).toEqual(whole);
  });

  it('should reject summaries for another anchor', () => {
    expect(() => mergeBatchSummaries('C', [createEmptySummary('D')])).toThrow(ValidationError);
  });
});

// =============================================================================
// FORMATTING
// =============================================================================

describe('formatCount', () => {
  it('should add thousands separators', () => {
    expect(formatCount(999)).toBe('999');
    expect(formatCount(1234567)).toBe('1,234,567');
  });
});

describe('formatProgressLine', () => {
  it('should pad the position to two characters', () => {
    expect(formatProgressLine(1, 10, 'user-1')).toBe('[ 1/10] Processing: user-1');
    expect(formatProgressLine(12, 12, 'user-12')).toBe('[12/12] Processing: user-12');
  });
});

describe('formatItemOutcome', () => {
  it('should describe each outcome', () => {
    const { items } = runBatch(ENTRIES, 'C', { logger: createSilentLogger() });
    expect(items.map(formatItemOutcome)).toEqual([
      '   isolated 2 events (from 4 total)',
      '   event not found (total events: 2)',
      '   no events to isolate',
    ]);

    const failed: BatchItemResult = {
      userId: 'u9',
      index: 0,
      outcome: 'failed',
      totalCount: 3,
      error: 'boom',
    };
    expect(formatItemOutcome(failed)).toBe('   failed to isolate: boom');
  });
});

describe('formatBatchSummary', () => {
  it('should render the report lines', () => {
    const summary: BatchSummary = {
      isolationEvent: 'trial_started',
      filesProcessed: 1200,
      successfulIsolations: 1000,
      filesWithoutEvent: 150,
      filesWithoutData: 40,
      filesFailed: 10,
      totalEventsBefore: 25000,
      totalEventsAfter: 5000,
      reductionPercent: 80,
    };

    expect(formatBatchSummary(summary)).toEqual([
      "Isolation event: 'trial_started'",
      'Files processed: 1,200',
      'Successful isolations: 1,000',
      'Files without isolation event: 150',
      'Files without events: 40',
      'Files failed: 10',
      'Total events before isolation: 25,000',
      'Total events after isolation: 5,000',
      'Event reduction: 80.0%',
    ]);
  });

  it('should leave out the reduction line when it is absent', () => {
    const lines = formatBatchSummary(createEmptySummary('X'));
    expect(lines).toHaveLength(8);
    expect(lines[7]).toBe('Total events after isolation: 0');
  });
});
