/**
 * Event Isolation Pipeline - Record Store
 *
 * File naming and JSON persistence for the artifacts of one session:
 * - raw:      <rawDir>/user_<id>_events_<YYYYMMDD>_to_<YYYYMMDD>.json
 * - clean:    <cleanDir>/userClean_<id>.json
 * - isolated: <isolateDir>/userIsolated_<id>.json (record or not-found notice)
 *
 * Directory enumeration lives here; the pipeline core only ever receives
 * explicit lists of records.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SessionContext } from '../config';
import type { RawEvent } from '../types/rawEvent';
import type { CleanRecord } from '../types/cleanRecord';
import type { IsolatedRecord, NotFoundNotice } from '../types/isolatedRecord';
import type { DateRange } from '../sources/eventSource';
import { toCompactDate } from '../sources/userList';
import { parseCleanRecord, parseRawEvents } from '../utils/validation';
import { RecordReadError, StorageError, errorMessage } from '../utils/errors';

// =============================================================================
// FILE NAMES
// =============================================================================

const RAW_FILE_PATTERN = /^user_(.+?)_events_\d{8}_to_\d{8}\.json$/;
const CLEAN_FILE_PATTERN = /^userClean_(.+?)\.json$/;
const ISOLATED_FILE_PATTERN = /^userIsolated_(.+?)\.json$/;

export function rawFileName(userId: string, range: DateRange): string {
  return `user_${userId}_events_${toCompactDate(range.start)}_to_${toCompactDate(range.end)}.json`;
}

export function cleanFileName(userId: string): string {
  return `userClean_${userId}.json`;
}

export function isolatedFileName(userId: string): string {
  return `userIsolated_${userId}.json`;
}

function matchUserId(pattern: RegExp, fileName: string): string | null {
  const match = pattern.exec(path.basename(fileName));
  return match?.[1] ?? null;
}

/** User id encoded in a raw file name, or null. */
export function userIdFromRawFile(fileName: string): string | null {
  return matchUserId(RAW_FILE_PATTERN, fileName);
}

/** User id encoded in a clean file name, or null. */
export function userIdFromCleanFile(fileName: string): string | null {
  return matchUserId(CLEAN_FILE_PATTERN, fileName);
}

/** User id encoded in an isolated file name, or null. */
export function userIdFromIsolatedFile(fileName: string): string | null {
  return matchUserId(ISOLATED_FILE_PATTERN, fileName);
}

// =============================================================================
// STORE
// =============================================================================

export class RecordStore {
  constructor(private readonly session: SessionContext) {}

  get context(): SessionContext {
    return this.session;
  }

  /**
   * Create the three session directories if they are missing.
   */
  ensureDirectories(): void {
    for (const dir of [this.session.rawDir, this.session.cleanDir, this.session.isolateDir]) {
      try {
        fs.mkdirSync(dir, { recursive: true });
      } catch (error) {
        throw new StorageError(dir, 'could not create directory', error);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Raw events
  // ---------------------------------------------------------------------------

  writeRawEvents(userId: string, range: DateRange, events: readonly RawEvent[]): string {
    return this.writeJson(path.join(this.session.rawDir, rawFileName(userId, range)), events);
  }

  /** Raw user files, sorted by name. */
  listRawFiles(): string[] {
    return this.listFiles(this.session.rawDir, (name) => name.startsWith('user_') && name.endsWith('.json'));
  }

  readRawEvents(fileName: string): RawEvent[] {
    const filePath = path.join(this.session.rawDir, fileName);
    const data = this.readJson(filePath);
    try {
      return parseRawEvents(data);
    } catch (error) {
      throw new RecordReadError(filePath, `not a raw event array (${errorMessage(error)})`, error);
    }
  }

  // ---------------------------------------------------------------------------
  // Clean records
  // ---------------------------------------------------------------------------

  writeCleanRecord(record: CleanRecord): string {
    return this.writeJson(path.join(this.session.cleanDir, cleanFileName(record.user_data.user_id)), record);
  }

  /** Clean record files, sorted by name. */
  listCleanFiles(): string[] {
    return this.listFiles(this.session.cleanDir, (name) => CLEAN_FILE_PATTERN.test(name));
  }

  readCleanRecord(fileName: string): CleanRecord {
    const filePath = path.join(this.session.cleanDir, fileName);
    const data = this.readJson(filePath);
    try {
      return parseCleanRecord(data);
    } catch (error) {
      throw new RecordReadError(filePath, `not a clean record (${errorMessage(error)})`, error);
    }
  }

  // ---------------------------------------------------------------------------
  // Isolated records and notices
  // ---------------------------------------------------------------------------

  writeIsolatedRecord(record: IsolatedRecord): string {
    return this.writeJson(path.join(this.session.isolateDir, isolatedFileName(record.user_data.user_id)), record);
  }

  writeNotFoundNotice(notice: NotFoundNotice): string {
    return this.writeJson(path.join(this.session.isolateDir, isolatedFileName(notice.user_id)), notice);
  }

  /** Isolated record and notice files, sorted by name. */
  listIsolatedFiles(): string[] {
    return this.listFiles(this.session.isolateDir, (name) => ISOLATED_FILE_PATTERN.test(name));
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private listFiles(dir: string, accept: (name: string) => boolean): string[] {
    let names: string[];
    try {
      names = fs.readdirSync(dir);
    } catch (error) {
      throw new StorageError(dir, 'could not list directory', error);
    }
    return names.filter(accept).sort();
  }

  private readJson(filePath: string): unknown {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new RecordReadError(filePath, 'could not read file', error);
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new RecordReadError(filePath, 'invalid JSON', error);
    }
  }

  private writeJson(filePath: string, data: unknown): string {
    try {
      fs.writeFileSync(filePath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
    } catch (error) {
      throw new StorageError(filePath, 'could not write file', error);
    }
    return filePath;
  }
}
