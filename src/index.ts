/**
 * Event Isolation Pipeline
 *
 * Library entry point. The command line lives in ./cli.
 */

export * from './types';
export * from './pipeline';

export {
  type DateRange,
  type EventSource,
  matchesUser,
  isWithinRange,
  selectUserEvents,
  InMemoryEventSource,
} from './sources/eventSource';
export { type ParsedExport, parseExportLines, ExportFileEventSource } from './sources/exportFile';
export {
  type UserListEntry,
  parseUserDate,
  parseEventDay,
  parseUserList,
  planDateRange,
} from './sources/userList';

export {
  RecordStore,
  rawFileName,
  cleanFileName,
  isolatedFileName,
  userIdFromRawFile,
  userIdFromCleanFile,
  userIdFromIsolatedFile,
} from './storage/recordStore';

export {
  type PipelineConfig,
  type SessionContext,
  DEFAULT_ANCHOR_EVENTS,
  DEFAULT_PIPELINE_CONFIG,
  loadPipelineConfig,
  validatePipelineConfig,
  assertValidPipelineConfig,
  createSessionContext,
  sanitizeSessionName,
} from './config';

export {
  PipelineError,
  ValidationError,
  ConfigurationError,
  RecordReadError,
  EventSourceError,
  StorageError,
  isPipelineError,
  wrapError,
} from './utils/errors';

export { Logger, logger, type LogLevel, type LoggerLike } from './utils/logger';
