/**
 * Event Isolation Pipeline - Configuration
 *
 * Configuration management for the fetch/clean/isolate stages.
 * All values can be overridden via environment variables.
 */

import * as path from 'path';
import { logger, isLogLevel, type LogLevel } from './utils/logger';
import { ConfigurationError } from './utils/errors';

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

export interface PipelineConfig {
  /** Root folder holding one sub-folder per session (PIPELINE_BASE_DIR) */
  baseDir: string;

  /** Session folder name under baseDir (PIPELINE_SESSION) */
  sessionName: string;

  /** Event allow-list file (EVENTS_FILTER_PATH) */
  eventsFilterPath: string;

  /** Clean records scanned when listing available event types (EVENT_TYPE_SAMPLE_SIZE) */
  eventTypeSampleSize: number;

  /** Anchor candidates tried in order by non-interactive runs (PIPELINE_DEFAULT_ANCHORS) */
  defaultAnchors: string[];

  /** Minimum log level (LOG_LEVEL) */
  logLevel: LogLevel;

  /** Enable debug logging (PIPELINE_DEBUG) */
  debug: boolean;
}

/**
 * Explicit per-run session descriptor handed to every stage.
 */
export interface SessionContext {
  sessionDir: string;
  rawDir: string;
  cleanDir: string;
  isolateDir: string;
}

// =============================================================================
// DEFAULT CONFIGURATION
// =============================================================================

export const DEFAULT_ANCHOR_EVENTS = ['trial_started', 'app_start', 'session_start', 'first_open'];

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  baseDir: 'userData',
  sessionName: 'default_session',
  eventsFilterPath: path.join('config', 'events_filter.txt'),
  eventTypeSampleSize: 5,
  defaultAnchors: DEFAULT_ANCHOR_EVENTS,
  logLevel: 'info',
  debug: false,
};

export const RAW_DIR_NAME = 'userData_raw';
export const CLEAN_DIR_NAME = 'userData_clean';
export const ISOLATE_DIR_NAME = 'userData_isolate';

// =============================================================================
// ENVIRONMENT VARIABLE PARSING
// =============================================================================

type EnvSource = Record<string, string | undefined>;

function parseStringEnv(env: EnvSource, key: string, defaultValue: string): string {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return value.trim();
}

function parseIntEnv(env: EnvSource, key: string, defaultValue: number): number {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    logger.warn(`Invalid integer value for ${key}: ${value}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseBoolEnv(env: EnvSource, key: string, defaultValue: boolean): boolean {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function parseListEnv(env: EnvSource, key: string, defaultValue: string[]): string[] {
  const value = env[key];
  if (value === undefined || value.trim() === '') {
    return [...defaultValue];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseLogLevelEnv(env: EnvSource, key: string, defaultValue: LogLevel): LogLevel {
  const value = env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  const normalized = value.toLowerCase();
  if (isLogLevel(normalized)) {
    return normalized;
  }
  logger.warn(`Invalid log level for ${key}: ${value}, using default: ${defaultValue}`);
  return defaultValue;
}

// =============================================================================
// CONFIGURATION LOADER
// =============================================================================

/**
 * Load pipeline configuration from environment variables.
 * Falls back to defaults for any missing values.
 */
export function loadPipelineConfig(
  overrides?: Partial<PipelineConfig>,
  env: EnvSource = process.env
): PipelineConfig {
  const config: PipelineConfig = {
    baseDir: parseStringEnv(env, 'PIPELINE_BASE_DIR', DEFAULT_PIPELINE_CONFIG.baseDir),
    sessionName: parseStringEnv(env, 'PIPELINE_SESSION', DEFAULT_PIPELINE_CONFIG.sessionName),
    eventsFilterPath: parseStringEnv(env, 'EVENTS_FILTER_PATH', DEFAULT_PIPELINE_CONFIG.eventsFilterPath),
    eventTypeSampleSize: parseIntEnv(env, 'EVENT_TYPE_SAMPLE_SIZE', DEFAULT_PIPELINE_CONFIG.eventTypeSampleSize),
    defaultAnchors: parseListEnv(env, 'PIPELINE_DEFAULT_ANCHORS', DEFAULT_PIPELINE_CONFIG.defaultAnchors),
    logLevel: parseLogLevelEnv(env, 'LOG_LEVEL', DEFAULT_PIPELINE_CONFIG.logLevel),
    debug: parseBoolEnv(env, 'PIPELINE_DEBUG', DEFAULT_PIPELINE_CONFIG.debug),
  };

  // Apply any overrides
  if (overrides) {
    Object.assign(config, overrides);
  }

  if (config.debug) {
    config.logLevel = 'debug';
  }

  return config;
}

// =============================================================================
// CONFIGURATION VALIDATION
// =============================================================================

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Validate pipeline configuration before a run.
 */
export function validatePipelineConfig(config: PipelineConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.baseDir.trim() === '') {
    errors.push('Base directory must not be empty');
  }

  if (config.sessionName.trim() === '') {
    errors.push('Session name must not be empty');
  }
  if (sanitizeSessionName(config.sessionName) !== config.sessionName) {
    warnings.push(`Session name '${config.sessionName}' contains path characters and will be sanitized`);
  }

  if (config.eventTypeSampleSize < 1) {
    errors.push('Event type sample size must be at least 1');
  }

  if (config.defaultAnchors.length === 0) {
    warnings.push('No default anchor events configured; automatic runs use the first available event type');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

/**
 * Validate and throw on the first blocking problem.
 */
export function assertValidPipelineConfig(config: PipelineConfig): void {
  const result = validatePipelineConfig(config);
  for (const warning of result.warnings) {
    logger.warn(warning);
  }
  if (!result.valid) {
    throw new ConfigurationError(result.errors.join('; '), { errors: result.errors });
  }
}

// =============================================================================
// SESSION CONTEXT
// =============================================================================

/**
 * Replace characters that cannot appear in a folder name.
 */
export function sanitizeSessionName(name: string): string {
  return name.replace(/[<>:"/\\|?*]/g, '_');
}

/**
 * Derive the session directories from configuration.
 */
export function createSessionContext(config: PipelineConfig): SessionContext {
  const sessionDir = path.join(config.baseDir, sanitizeSessionName(config.sessionName));
  return {
    sessionDir,
    rawDir: path.join(sessionDir, RAW_DIR_NAME),
    cleanDir: path.join(sessionDir, CLEAN_DIR_NAME),
    isolateDir: path.join(sessionDir, ISOLATE_DIR_NAME),
  };
}

// =============================================================================
// CONFIGURATION LOGGING
// =============================================================================

export function getLoggableConfig(config: PipelineConfig): Record<string, unknown> {
  return {
    baseDir: config.baseDir,
    sessionName: config.sessionName,
    eventsFilterPath: config.eventsFilterPath,
    eventTypeSampleSize: config.eventTypeSampleSize,
    defaultAnchors: config.defaultAnchors,
    logLevel: config.logLevel,
    debug: config.debug,
  };
}
