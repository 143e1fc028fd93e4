#!/usr/bin/env node
/**
 * Event Isolation Pipeline - Command Line
 *
 * Usage:
 *   event-isolate fetch   --users <file> --export <file> [--session <name>] [--missing-only]
 *   event-isolate clean   [--session <name>] [--filter <file>]
 *   event-isolate isolate [--session <name>] (--anchor <type> | --auto)
 *   event-isolate run     --users <file> --export <file> [--session <name>]
 *                         [--filter <file>] [--anchor <type> | --auto | --skip-isolation]
 *   event-isolate event-types [--session <name>]
 *   event-isolate verify  --users <file> [--session <name>]
 *
 * Progress and summaries go to stdout, structured logs to stderr.
 */

import * as fs from 'fs';
import {
  assertValidPipelineConfig,
  createSessionContext,
  getLoggableConfig,
  loadPipelineConfig,
  type PipelineConfig,
} from './config';
import { parseUserList, type UserListEntry } from './sources/userList';
import { ExportFileEventSource } from './sources/exportFile';
import { RecordStore } from './storage/recordStore';
import { loadEventsFilter } from './pipeline/filter';
import { formatBatchSummary, formatCount } from './pipeline/batch';
import {
  runCleanStage,
  runEventTypeReport,
  runFetchStage,
  runIsolateStage,
  runVerifyStage,
  END_DATE_TOLERANCE_DAYS,
  type AnchorSelection,
  type CleanStageSummary,
  type FetchStageSummary,
  type IsolateStageSummary,
  type VerifyStageSummary,
} from './pipeline/run';
import { logger } from './utils/logger';
import { RecordReadError, ValidationError, errorMessage, isPipelineError } from './utils/errors';

// =============================================================================
// TYPE DEFINITIONS
// =============================================================================

export const COMMANDS = ['fetch', 'clean', 'isolate', 'run', 'event-types', 'verify'] as const;

export type Command = (typeof COMMANDS)[number];

export interface CommandLineArgs {
  command: Command | null;
  users?: string;
  exportFile?: string;
  session?: string;
  filter?: string;
  anchor?: string;
  auto: boolean;
  skipIsolation: boolean;
  missingOnly: boolean;
  help: boolean;
}

/**
 * Where command output is written.
 */
export interface CliOutput {
  out(line: string): void;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

// =============================================================================
// ARGUMENT PARSING
// =============================================================================

function requireValue(args: readonly string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new ValidationError(`${flag} requires a value`, flag);
  }
  return value;
}

/**
 * Parses command line arguments (without the node and script entries).
 */
export function parseArgs(args: readonly string[]): CommandLineArgs {
  const result: CommandLineArgs = {
    command: null,
    auto: false,
    skipIsolation: false,
    missingOnly: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    switch (arg) {
      case '--users':
        result.users = requireValue(args, ++i, arg);
        break;

      case '--export':
        result.exportFile = requireValue(args, ++i, arg);
        break;

      case '--session':
        result.session = requireValue(args, ++i, arg);
        break;

      case '--filter':
        result.filter = requireValue(args, ++i, arg);
        break;

      case '--anchor':
        result.anchor = requireValue(args, ++i, arg);
        break;

      case '--auto':
        result.auto = true;
        break;

      case '--skip-isolation':
        result.skipIsolation = true;
        break;

      case '--missing-only':
        result.missingOnly = true;
        break;

      case '--help':
      case '-h':
        result.help = true;
        break;

      default:
        if (result.command === null && isCommand(arg)) {
          result.command = arg;
        } else {
          throw new ValidationError(`Unknown argument: ${arg}`);
        }
    }
  }

  const isolationFlags = [result.anchor !== undefined, result.auto, result.skipIsolation].filter(Boolean);
  if (isolationFlags.length > 1) {
    throw new ValidationError('--anchor, --auto and --skip-isolation are mutually exclusive');
  }

  return result;
}

export function helpText(): string {
  return `
Event Isolation Pipeline

Usage:
  event-isolate <command> [options]

Commands:
  fetch         Fetch raw events for every user in the user list
  clean         Build clean records from the raw files of a session
  isolate       Isolate each clean record on an anchor event
  run           fetch, clean and isolate in one go
  event-types   Count event types across the clean records of a session
  verify        Check the raw files against the user list

Options:
  --users <file>      User list (UserID|FirstSeen|LastSeen per line)
  --export <file>     Newline-delimited JSON event export
  --session <name>    Session folder under PIPELINE_BASE_DIR
  --filter <file>     Event allow-list (default: EVENTS_FILTER_PATH)
  --anchor <type>     Anchor event type
  --auto              Pick the anchor from the configured defaults
  --skip-isolation    Stop the run after the clean stage
  --missing-only      Fetch only users without a raw file in the session
  --help, -h          Show this help message
`;
}

// =============================================================================
// OUTPUT
// =============================================================================

function section(output: CliOutput, title: string): void {
  output.out('='.repeat(60));
  output.out(`  ${title}`);
  output.out('='.repeat(60));
}

function printFetchSummary(output: CliOutput, summary: FetchStageSummary): void {
  section(output, 'Fetch Summary');
  output.out(`Users processed: ${formatCount(summary.totalUsers)}`);
  output.out(`Users with events: ${formatCount(summary.usersWithEvents)}`);
  output.out(`Users without events: ${formatCount(summary.emptyOrFailed)}`);
  if (summary.skippedUsers > 0) {
    output.out(`Users already fetched: ${formatCount(summary.skippedUsers)}`);
  }
}

function printCleanSummary(output: CliOutput, summary: CleanStageSummary): void {
  section(output, 'Clean Summary');
  output.out(`Files found: ${formatCount(summary.filesFound)}`);
  output.out(`Clean records written: ${formatCount(summary.recordsWritten)}`);
  output.out(`Users without events: ${formatCount(summary.noData.length)}`);
  output.out(`Users without events after filtering: ${formatCount(summary.noRemainingEvents.length)}`);
  if (summary.unreadableFiles.length > 0) {
    output.out(`Unreadable files: ${summary.unreadableFiles.join(', ')}`);
  }
  if (summary.writeFailures.length > 0) {
    output.out(`Records not saved: ${summary.writeFailures.join(', ')}`);
  }
}

function printVerifySummary(output: CliOutput, summary: VerifyStageSummary): void {
  section(output, 'Verification Summary');
  output.out(`Expected users: ${formatCount(summary.expectedUsers)}`);
  output.out(`End dates within ${END_DATE_TOLERANCE_DAYS} days: ${formatCount(summary.endDatesWithinTolerance.length)}`);
  output.out(`End date mismatches: ${formatCount(summary.endDateMismatches.length)}`);
  output.out(`Missing users: ${formatCount(summary.missingUsers.length)}`);
  for (const check of summary.endDateMismatches) {
    output.out(
      `  - ${check.userId}: expected ${check.expectedEnd}, got ${check.lastEventDate} (${check.daysDifference} days)`
    );
  }
  if (summary.missingUsers.length > 0) {
    output.out(`Missing: ${summary.missingUsers.join(', ')}`);
  }
}

function printIsolateSummary(output: CliOutput, summary: IsolateStageSummary): void {
  section(output, 'Isolation Summary');
  for (const line of formatBatchSummary(summary.batch)) {
    output.out(line);
  }
  if (summary.unreadableFiles.length > 0) {
    output.out(`Unreadable files: ${summary.unreadableFiles.join(', ')}`);
  }
}

// =============================================================================
// COMMANDS
// =============================================================================

function readUserList(filePath: string): UserListEntry[] {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new RecordReadError(filePath, 'could not read user list', error);
  }

  const users = parseUserList(content);
  if (users.length === 0) {
    throw new ValidationError(`No users found in ${filePath}`, 'users');
  }
  return users;
}

function requireArg(value: string | undefined, flag: string, command: Command): string {
  if (value === undefined) {
    throw new ValidationError(`${command} requires ${flag}`, flag);
  }
  return value;
}

function anchorSelection(args: CommandLineArgs, config: PipelineConfig): AnchorSelection | null {
  if (args.anchor !== undefined) {
    return { mode: 'explicit', anchor: args.anchor };
  }
  if (args.auto) {
    return { mode: 'auto', preferred: config.defaultAnchors };
  }
  return null;
}

async function executeCommand(
  command: Command,
  args: CommandLineArgs,
  config: PipelineConfig,
  output: CliOutput
): Promise<void> {
  const context = createSessionContext(config);
  const store = new RecordStore(context);
  const onProgress = (line: string) => output.out(line);
  const stageOptions = { onProgress, sampleSize: config.eventTypeSampleSize };

  output.out(`Session: ${context.sessionDir}`);

  const fetchStage = async () => {
    const users = readUserList(requireArg(args.users, '--users', command));
    const source = new ExportFileEventSource(requireArg(args.exportFile, '--export', command));
    section(output, `Fetching events for ${users.length} users`);
    printFetchSummary(
      output,
      await runFetchStage(store, users, source, { ...stageOptions, missingOnly: args.missingOnly })
    );
  };

  const cleanStage = () => {
    const filter = loadEventsFilter(args.filter ?? config.eventsFilterPath);
    section(output, `Cleaning raw files (${filter.description})`);
    printCleanSummary(output, runCleanStage(store, filter, stageOptions));
  };

  const isolateStage = (selection: AnchorSelection) => {
    section(output, 'Isolating events');
    printIsolateSummary(output, runIsolateStage(store, selection, stageOptions));
  };

  switch (command) {
    case 'fetch':
      await fetchStage();
      break;

    case 'clean':
      cleanStage();
      break;

    case 'isolate': {
      const selection = anchorSelection(args, config);
      if (selection === null) {
        throw new ValidationError('isolate requires --anchor <type> or --auto', '--anchor');
      }
      isolateStage(selection);
      break;
    }

    case 'run': {
      const selection: AnchorSelection = anchorSelection(args, config) ?? {
        mode: 'auto',
        preferred: config.defaultAnchors,
      };
      await fetchStage();
      cleanStage();
      if (args.skipIsolation) {
        output.out('Isolation skipped');
      } else {
        isolateStage(selection);
      }
      break;
    }

    case 'verify':
      printVerifySummary(
        output,
        runVerifyStage(store, readUserList(requireArg(args.users, '--users', command)), stageOptions)
      );
      break;

    case 'event-types': {
      const report = runEventTypeReport(store, stageOptions);
      section(output, 'Event Types');
      output.out(`Records analyzed: ${formatCount(report.records)}`);
      output.out(`Total events: ${formatCount(report.totalEvents)}`);
      for (const [eventType, count] of report.counts) {
        output.out(`  ${eventType.padEnd(40)} ${formatCount(count).padStart(8)}`);
      }
      break;
    }
  }
}

// =============================================================================
// MAIN
// =============================================================================

/**
 * Run the command line and return the process exit code.
 */
export async function main(
  argv: readonly string[],
  output: CliOutput = { out: (line) => console.log(line) },
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  let args: CommandLineArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    output.out(`Error: ${errorMessage(error)}`);
    output.out(helpText());
    return 1;
  }

  if (args.help || args.command === null) {
    output.out(helpText());
    return args.help ? 0 : 1;
  }

  try {
    const config = loadPipelineConfig(args.session !== undefined ? { sessionName: args.session } : undefined, env);
    logger.setLevel(config.logLevel);
    assertValidPipelineConfig(config);
    logger.debug('Loaded configuration', getLoggableConfig(config));

    await executeCommand(args.command, args, config, output);
    return 0;
  } catch (error) {
    logger.error('Command failed', {
      command: args.command,
      error: isPipelineError(error) ? error.toJSON() : errorMessage(error),
    });
    output.out(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

// =============================================================================
// SCRIPT EXECUTION
// =============================================================================

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`Fatal error: ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}
