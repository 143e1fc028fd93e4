/**
 * Event Isolation Pipeline - Pipeline Module
 *
 * Exports the record transforms (normalize, filter, clean, isolate), the
 * batch reporter and the stage runners.
 */

// =============================================================================
// RECORD TRANSFORMS
// =============================================================================

export { isPlainObject, extractUserAttributes, reduceEvent } from './normalize';

export {
  type EventsFilter,
  shouldKeep,
  parseEventsFilter,
  createEventsFilter,
  loadEventsFilter,
} from './filter';

export { type CleanRecordResult, buildCleanRecord } from './clean';

export {
  type IsolationResult,
  findAnchorIndex,
  isolate,
  notFoundMessage,
  buildNotFoundNotice,
} from './isolate';

// =============================================================================
// BATCH REPORTER
// =============================================================================

export {
  type BatchEntry,
  type BatchItemResult,
  type BatchSummary,
  type BatchOptions,
  type BatchResult,
  createEmptySummary,
  computeReductionPercent,
  mergeBatchSummaries,
  runBatch,
  formatCount,
  formatProgressLine,
  formatItemOutcome,
  formatBatchSummary,
} from './batch';

export {
  UNKNOWN_EVENT_TYPE,
  collectEventTypes,
  countEventTypes,
  selectDefaultAnchor,
} from './eventTypes';

// =============================================================================
// STAGE RUNNERS
// =============================================================================

export {
  type StageOptions,
  type FetchStageOptions,
  type FetchStageSummary,
  type CleanStageSummary,
  type AnchorSelection,
  type IsolateStageOptions,
  type IsolateStageSummary,
  type EventTypeReport,
  type EndDateCheck,
  type VerifyStageSummary,
  type PipelineRunInput,
  type PipelineRunResult,
  runFetchStage,
  runCleanStage,
  resolveAnchor,
  runIsolateStage,
  runEventTypeReport,
  findMissingUsers,
  END_DATE_TOLERANCE_DAYS,
  runVerifyStage,
  runPipeline,
} from './run';
