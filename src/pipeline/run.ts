import { v4 as uuidv4 } from "uuid";
import type { RawEvent } from "../types/rawEvent";
import type { CleanRecord } from "../types/cleanRecord";
import type { EventSource } from "../sources/eventSource";
import { parseEventDay, planDateRange, toIsoDate, type UserListEntry } from "../sources/userList";
import { RecordStore, userIdFromCleanFile, userIdFromRawFile } from "../storage/recordStore";
import { buildCleanRecord } from "./clean";
import type { EventsFilter } from "./filter";
import { buildNotFoundNotice } from "./isolate";
import {
  formatItemOutcome,
  formatProgressLine,
  runBatch,
  type BatchEntry,
  type BatchSummary,
} from "./batch";
import { collectEventTypes, countEventTypes, selectDefaultAnchor } from "./eventTypes";
import { DEFAULT_ANCHOR_EVENTS } from "../config";
import { logger as defaultLogger, type LoggerLike } from "../utils/logger";
import { RecordReadError, StorageError, ValidationError, errorMessage } from "../utils/errors";

/**
 * Options shared by every stage runner.
 */
export interface StageOptions {
  /** Receives human-readable progress lines */
  onProgress?: (line: string) => void;

  logger?: LoggerLike;
}

function stageLogger(options: StageOptions, stage: string, runId: string): LoggerLike {
  return (options.logger ?? defaultLogger).child({ stage, runId });
}

function progress(options: StageOptions): (line: string) => void {
  return options.onProgress ?? (() => {});
}

// =============================================================================
// FETCH
// =============================================================================

export interface FetchStageOptions extends StageOptions {
  /** Reference time for open-ended date ranges */
  now?: Date;

  /** Only fetch users that have no raw file in the session yet */
  missingOnly?: boolean;
}

export interface FetchStageSummary {
  runId: string;
  totalUsers: number;

  /** Users left out because a raw file already existed */
  skippedUsers: number;
  usersWithEvents: number;
  emptyOrFailed: number;
  files: string[];
}

/**
 * Fetch every listed user's raw events and write one raw file per user.
 * A source failure is logged and stored as an empty event list.
 */
export async function runFetchStage(
  store: RecordStore,
  users: readonly UserListEntry[],
  source: EventSource,
  options: FetchStageOptions = {}
): Promise<FetchStageSummary> {
  const runId = uuidv4();
  const log = stageLogger(options, "fetch", runId);
  const report = progress(options);
  const now = options.now ?? new Date();

  store.ensureDirectories();
  const pending = options.missingOnly ? findMissingUsers(store, users) : [...users];
  log.info("Fetch stage started", {
    users: pending.length,
    skipped: users.length - pending.length,
    source: source.name,
  });
  if (options.missingOnly) {
    report(`Found ${pending.length} missing users to fetch`);
  }

  const summary: FetchStageSummary = {
    runId,
    totalUsers: pending.length,
    skippedUsers: users.length - pending.length,
    usersWithEvents: 0,
    emptyOrFailed: 0,
    files: [],
  };

  for (const user of pending) {
    const range = planDateRange(user, now);
    report(`Processing user: ${user.userId} (${range.start} to ${range.end})`);

    let events: RawEvent[];
    try {
      events = await source.fetchUserEvents(user.userId, range);
    } catch (error) {
      log.warn("Event source failed, storing empty event list", {
        userId: user.userId,
        error: errorMessage(error),
      });
      events = [];
    }

    summary.files.push(store.writeRawEvents(user.userId, range, events));

    if (events.length > 0) {
      summary.usersWithEvents++;
      report(`   found ${events.length} events`);
    } else {
      summary.emptyOrFailed++;
      report("   no events found (created empty file)");
    }
  }

  log.info("Fetch stage finished", {
    totalUsers: summary.totalUsers,
    usersWithEvents: summary.usersWithEvents,
    emptyOrFailed: summary.emptyOrFailed,
  });

  return summary;
}

function rawFilesByUser(store: RecordStore): Map<string, string> {
  const files = new Map<string, string>();
  for (const file of store.listRawFiles()) {
    const userId = userIdFromRawFile(file);
    if (userId !== null) {
      files.set(userId, file);
    }
  }
  return files;
}

/**
 * Users of the list that have no raw file in the session.
 */
export function findMissingUsers(store: RecordStore, users: readonly UserListEntry[]): UserListEntry[] {
  const files = rawFilesByUser(store);
  return users.filter((user) => !files.has(user.userId));
}

// =============================================================================
// CLEAN
// =============================================================================

export interface CleanStageSummary {
  runId: string;
  filesFound: number;
  recordsWritten: number;
  noData: string[];
  noRemainingEvents: string[];
  unreadableFiles: string[];
  unrecognizedFiles: string[];

  /** Raw files whose clean record could not be saved */
  writeFailures: string[];
}

/**
 * Turn every raw user file into a clean record file. A file that cannot be
 * read or whose record cannot be saved is reported and skipped.
 */
export function runCleanStage(
  store: RecordStore,
  filter: EventsFilter,
  options: StageOptions = {}
): CleanStageSummary {
  const runId = uuidv4();
  const log = stageLogger(options, "clean", runId);
  const report = progress(options);

  store.ensureDirectories();
  const files = store.listRawFiles();
  log.info("Clean stage started", { files: files.length, filter: filter.description });
  report(`Found ${files.length} user files to process`);

  const summary: CleanStageSummary = {
    runId,
    filesFound: files.length,
    recordsWritten: 0,
    noData: [],
    noRemainingEvents: [],
    unreadableFiles: [],
    unrecognizedFiles: [],
    writeFailures: [],
  };

  for (const file of files) {
    report(`Processing: ${file}`);

    const userId = userIdFromRawFile(file);
    if (userId === null) {
      log.warn("Could not extract user id from file name", { file });
      summary.unrecognizedFiles.push(file);
      continue;
    }

    let rawEvents: RawEvent[];
    try {
      rawEvents = store.readRawEvents(file);
    } catch (error) {
      if (!(error instanceof RecordReadError)) throw error;
      log.error("Skipping unreadable raw file", { file, error: error.message });
      summary.unreadableFiles.push(file);
      report("   skipped: file could not be read");
      continue;
    }

    const result = buildCleanRecord(rawEvents, userId, filter.allowList);
    switch (result.status) {
      case "no_data":
        summary.noData.push(userId);
        report(`   no events found for user ${userId}`);
        break;
      case "no_remaining_events":
        summary.noRemainingEvents.push(userId);
        report(`   no events remaining after filtering for user ${userId}`);
        break;
      case "built":
        try {
          store.writeCleanRecord(result.record);
        } catch (error) {
          if (!(error instanceof StorageError)) throw error;
          log.error("Failed to write clean record", { file, userId, error: error.message });
          summary.writeFailures.push(file);
          report(`   failed to save clean record for user ${userId}`);
          break;
        }
        summary.recordsWritten++;
        report(
          `   processed ${result.record.total_events} events from ${result.rawEventCount} total (${filter.description})`
        );
        break;
    }
  }

  log.info("Clean stage finished", {
    recordsWritten: summary.recordsWritten,
    noData: summary.noData.length,
    noRemainingEvents: summary.noRemainingEvents.length,
    unreadable: summary.unreadableFiles.length,
    writeFailures: summary.writeFailures.length,
  });

  return summary;
}

// =============================================================================
// ISOLATE
// =============================================================================

/**
 * How the anchor event is chosen: given explicitly, or picked from the
 * available event types.
 */
export type AnchorSelection =
  | { mode: "explicit"; anchor: string }
  | { mode: "auto"; preferred?: readonly string[] };

export interface IsolateStageOptions extends StageOptions {
  /** Clean records scanned to list the available event types */
  sampleSize?: number;
}

export interface IsolateStageSummary {
  runId: string;
  isolationEvent: string;
  availableEvents: string[];
  batch: BatchSummary;
  noticesWritten: number;
  unreadableFiles: string[];
}

interface LoadedCleanRecords {
  entries: BatchEntry[];
  unreadableFiles: string[];
}

function loadCleanRecords(store: RecordStore, log: LoggerLike): LoadedCleanRecords {
  const loaded: LoadedCleanRecords = { entries: [], unreadableFiles: [] };

  for (const file of store.listCleanFiles()) {
    const userId = userIdFromCleanFile(file);
    if (userId === null) {
      continue;
    }
    try {
      loaded.entries.push({ userId, record: store.readCleanRecord(file) });
    } catch (error) {
      if (!(error instanceof RecordReadError)) throw error;
      log.error("Skipping unreadable clean record", { file, error: error.message });
      loaded.unreadableFiles.push(file);
    }
  }

  return loaded;
}

/**
 * Resolve the anchor event type for a run.
 */
export function resolveAnchor(selection: AnchorSelection, availableEvents: readonly string[]): string {
  if (selection.mode === "explicit") {
    const anchor = selection.anchor.trim().replace(/^['"]|['"]$/g, "");
    if (!anchor) {
      throw new ValidationError("Isolation event name cannot be empty", "anchor");
    }
    return anchor;
  }

  const anchor = selectDefaultAnchor(availableEvents, selection.preferred ?? DEFAULT_ANCHOR_EVENTS);
  if (anchor === null) {
    throw new ValidationError("No event types found in clean records; cannot select an anchor", "anchor");
  }
  return anchor;
}

/**
 * Isolate every clean record on the anchor event and write the isolated
 * records and not-found notices.
 */
export function runIsolateStage(
  store: RecordStore,
  selection: AnchorSelection,
  options: IsolateStageOptions = {}
): IsolateStageSummary {
  const runId = uuidv4();
  const log = stageLogger(options, "isolate", runId);
  const report = progress(options);

  store.ensureDirectories();
  const { entries, unreadableFiles } = loadCleanRecords(store, log);

  const records: CleanRecord[] = entries.map((entry) => entry.record);
  const availableEvents = collectEventTypes(records, options.sampleSize ?? 5);
  const isolationEvent = resolveAnchor(selection, availableEvents);

  log.info("Isolate stage started", {
    isolationEvent,
    records: entries.length,
    availableEvents: availableEvents.length,
  });
  report(`Isolating events from '${isolationEvent}' onwards (${entries.length} user files)`);

  let noticesWritten = 0;

  const { summary } = runBatch(entries, isolationEvent, {
    logger: log,
    onResult: (item) => {
      if (item.outcome !== "isolated") return;
      const result = item.result;
      if (result.status === "anchor_found") {
        store.writeIsolatedRecord(result.record);
      } else if (result.status === "anchor_not_found") {
        store.writeNotFoundNotice(
          buildNotFoundNotice(item.userId, isolationEvent, result.totalCount, availableEvents)
        );
        noticesWritten++;
      }
    },
    onProgress: (item, total) => {
      report(formatProgressLine(item.index + 1, total, item.userId));
      report(formatItemOutcome(item));
    },
  });

  log.info("Isolate stage finished", {
    filesProcessed: summary.filesProcessed,
    successfulIsolations: summary.successfulIsolations,
    filesWithoutEvent: summary.filesWithoutEvent,
    filesWithoutData: summary.filesWithoutData,
    filesFailed: summary.filesFailed,
  });

  return {
    runId,
    isolationEvent,
    availableEvents,
    batch: summary,
    noticesWritten,
    unreadableFiles,
  };
}

// =============================================================================
// EVENT TYPE REPORT
// =============================================================================

export interface EventTypeReport {
  records: number;
  totalEvents: number;
  counts: Array<[string, number]>;
  unreadableFiles: string[];
}

/**
 * Count event types across every clean record of the session.
 */
export function runEventTypeReport(store: RecordStore, options: StageOptions = {}): EventTypeReport {
  const log = stageLogger(options, "event-types", uuidv4());
  const { entries, unreadableFiles } = loadCleanRecords(store, log);
  const events = entries.flatMap((entry) => entry.record.events);

  return {
    records: entries.length,
    totalEvents: events.length,
    counts: countEventTypes(events),
    unreadableFiles,
  };
}

// =============================================================================
// VERIFY
// =============================================================================

/** Allowed distance in days between the last event and the last-seen date. */
export const END_DATE_TOLERANCE_DAYS = 2;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface EndDateCheck {
  userId: string;
  file: string;

  /** Last-seen date from the user list, `YYYY-MM-DD` */
  expectedEnd: string;

  /** Day of the file's last event, `YYYY-MM-DD` */
  lastEventDate: string;

  /** lastEventDate - expectedEnd, in days */
  daysDifference: number;
}

export interface VerifyStageSummary {
  runId: string;
  expectedUsers: number;

  /** Users of the list without a raw file */
  missingUsers: string[];

  /** Users whose last event lies within the tolerance */
  endDatesWithinTolerance: string[];

  endDateMismatches: EndDateCheck[];

  /** Users whose end date could not be compared (no last-seen date, no dated events) */
  uncheckedUsers: string[];

  unreadableFiles: string[];
}

/**
 * Compare the session's raw files with the user list: which users were
 * never fetched, and whose last event strays from the expected last-seen
 * date by more than {@link END_DATE_TOLERANCE_DAYS}.
 */
export function runVerifyStage(
  store: RecordStore,
  users: readonly UserListEntry[],
  options: StageOptions = {}
): VerifyStageSummary {
  const runId = uuidv4();
  const log = stageLogger(options, "verify", runId);
  const report = progress(options);

  store.ensureDirectories();
  const files = rawFilesByUser(store);
  report(`Expected users: ${users.length}, raw files: ${files.size}`);

  const summary: VerifyStageSummary = {
    runId,
    expectedUsers: users.length,
    missingUsers: [],
    endDatesWithinTolerance: [],
    endDateMismatches: [],
    uncheckedUsers: [],
    unreadableFiles: [],
  };

  for (const user of users) {
    const file = files.get(user.userId);
    if (file === undefined) {
      summary.missingUsers.push(user.userId);
      report(`   missing: ${user.userId}`);
      continue;
    }

    let events: RawEvent[];
    try {
      events = store.readRawEvents(file);
    } catch (error) {
      if (!(error instanceof RecordReadError)) throw error;
      log.error("Skipping unreadable raw file", { file, error: error.message });
      summary.unreadableFiles.push(file);
      continue;
    }

    const lastEvent = events[events.length - 1];
    const lastDay = lastEvent === undefined ? null : parseEventDay(lastEvent.event_time);
    if (user.lastSeen === null || lastDay === null) {
      summary.uncheckedUsers.push(user.userId);
      continue;
    }

    const daysDifference = Math.round((lastDay.getTime() - user.lastSeen.getTime()) / DAY_MS);
    if (Math.abs(daysDifference) <= END_DATE_TOLERANCE_DAYS) {
      summary.endDatesWithinTolerance.push(user.userId);
      continue;
    }

    const check: EndDateCheck = {
      userId: user.userId,
      file,
      expectedEnd: toIsoDate(user.lastSeen),
      lastEventDate: toIsoDate(lastDay),
      daysDifference,
    };
    summary.endDateMismatches.push(check);
    report(`   end date mismatch: ${check.userId} (expected ${check.expectedEnd}, got ${check.lastEventDate})`);
  }

  log.info("Verify stage finished", {
    expectedUsers: summary.expectedUsers,
    missing: summary.missingUsers.length,
    mismatches: summary.endDateMismatches.length,
    unchecked: summary.uncheckedUsers.length,
  });

  return summary;
}

// =============================================================================
// FULL PIPELINE
// =============================================================================

export interface PipelineRunInput {
  users: readonly UserListEntry[];
  source: EventSource;
  filter: EventsFilter;

  /** null skips the isolate stage */
  isolation: AnchorSelection | null;
}

export interface PipelineRunResult {
  fetch: FetchStageSummary;
  clean: CleanStageSummary;
  isolate: IsolateStageSummary | null;
}

/**
 * Fetch, clean and (optionally) isolate one session.
 */
export async function runPipeline(
  store: RecordStore,
  input: PipelineRunInput,
  options: FetchStageOptions & IsolateStageOptions = {}
): Promise<PipelineRunResult> {
  const fetch = await runFetchStage(store, input.users, input.source, options);
  const clean = runCleanStage(store, input.filter, options);
  const isolate = input.isolation ? runIsolateStage(store, input.isolation, options) : null;

  return { fetch, clean, isolate };
}
