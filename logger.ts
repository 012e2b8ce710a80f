/**
 * Central Logger
 *
 * Leveled, timestamped, structured logging with redaction.
 * Every line goes to stderr: stdout carries the pricing output only.
 *
 * Env vars:
 *   LOG_LEVEL  = error | warn | info | debug | trace  (default: per mode)
 *   LOG_FORMAT = pretty | json                        (default: per mode)
 *   LOG_MODE   = dev | prod                           (default: dev)
 *
 * Usage:
 *   import { createLogger } from './logger';
 *   const log = createLogger('Cli');
 *   log.debug('args.parsed', { spot: 100, strike: 105 });
 */

import * as crypto from 'crypto';

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';
export type LogFormat = 'pretty' | 'json';
export type LogMode = 'dev' | 'prod';

type LogData = Record<string, unknown>;
type LogFn = (event: string, data?: LogData) => void;

export interface Logger {
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  trace: LogFn;
  isEnabled: (level: LogLevel) => boolean;
  /** Create a child logger with additional default fields */
  child: (fields: LogData) => Logger;
}

// =============================================================================
// LEVEL ORDERING
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

// =============================================================================
// REDACTION
// =============================================================================

const REDACT_KEYS = new Set([
  'authorization', 'cookie', 'apikey', 'secret', 'token', 'password',
]);

const MAX_STRING_LENGTH = 200;
const MAX_DEPTH = 3;

function shouldRedact(key: string): boolean {
  return REDACT_KEYS.has(key.toLowerCase());
}

function sanitizeValue(key: string, value: unknown, depth: number): unknown {
  if (shouldRedact(key)) return '[REDACTED]';
  if (value === null || value === undefined) return value;

  if (typeof value === 'string') {
    if (value.length > MAX_STRING_LENGTH) {
      return value.slice(0, MAX_STRING_LENGTH - 12) + ' [truncated]';
    }
    return value;
  }

  if (typeof value === 'number' || typeof value === 'boolean') return value;

  if (depth >= MAX_DEPTH) return '[depth limit]';

  if (Array.isArray(value)) {
    return value.slice(0, 10).map((v, i) => sanitizeValue(String(i), v, depth + 1));
  }

  if (typeof value === 'object') {
    const result: LogData = {};
    const entries = Object.entries(value);
    for (const [k, v] of entries.slice(0, 20)) {
      result[k] = sanitizeValue(k, v, depth + 1);
    }
    if (entries.length > 20) {
      result['...'] = `${entries.length - 20} more keys`;
    }
    return result;
  }

  return String(value);
}

export function sanitizeData(data: LogData): LogData {
  const result: LogData = {};
  for (const [k, v] of Object.entries(data)) {
    result[k] = sanitizeValue(k, v, 0);
  }
  return result;
}

// =============================================================================
// CONFIGURATION
// =============================================================================

const MODE_PRESETS: Record<LogMode, { level: LogLevel; format: LogFormat }> = {
  dev:  { level: 'warn', format: 'pretty' },
  prod: { level: 'info', format: 'json' },
};

function resolveMode(): LogMode {
  const env = (process.env.LOG_MODE || 'dev').toLowerCase();
  return env === 'prod' ? 'prod' : 'dev';
}

function resolveLevel(mode: LogMode): LogLevel {
  const explicit = process.env.LOG_LEVEL?.toLowerCase();
  if (explicit && isLogLevel(explicit)) return explicit;
  return MODE_PRESETS[mode].level;
}

function resolveFormat(mode: LogMode): LogFormat {
  const explicit = process.env.LOG_FORMAT?.toLowerCase();
  if (explicit === 'pretty' || explicit === 'json') return explicit;
  return MODE_PRESETS[mode].format;
}

const mode = resolveMode();
let currentLevel: LogLevel = resolveLevel(mode);
let currentFormat: LogFormat = resolveFormat(mode);

/** Process-scoped run ID for correlation */
export const RUN_ID: string = crypto.randomUUID().slice(0, 8);

/**
 * Override the log level at runtime.
 * Returns the previous level.
 */
export function setLogLevel(level: LogLevel): LogLevel {
  const prev = currentLevel;
  currentLevel = level;
  return prev;
}

/**
 * Override the output format at runtime.
 * Returns the previous format.
 */
export function setLogFormat(format: LogFormat): LogFormat {
  const prev = currentFormat;
  currentFormat = format;
  return prev;
}

// =============================================================================
// FORMATTING
// =============================================================================

const LEVEL_TAG: Record<LogLevel, string> = {
  error: 'ERR ',
  warn:  'WARN',
  info:  'INFO',
  debug: 'DBG ',
  trace: 'TRC ',
};

function formatPretty(
  ts: string,
  level: LogLevel,
  module: string,
  event: string,
  data: LogData,
): string {
  let line = `${ts} [${LEVEL_TAG[level]}] [${module}] ${event}`;

  const pairs = Object.entries(data)
    .filter(([, v]) => v !== undefined && v !== null)
    .map(([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`);
  if (pairs.length > 0) {
    line += ' | ' + pairs.join(' ');
  }

  return line;
}

function formatJson(
  ts: string,
  level: LogLevel,
  module: string,
  event: string,
  data: LogData,
): string {
  return JSON.stringify({ ts, level, module, event, ...data });
}

// =============================================================================
// CORE EMIT
// =============================================================================

function emit(
  level: LogLevel,
  module: string,
  event: string,
  baseFields: LogData,
  data?: LogData,
): void {
  if (LEVEL_ORDER[level] > LEVEL_ORDER[currentLevel]) return;

  const ts = new Date().toISOString();
  const merged: LogData = data ? { ...baseFields, ...sanitizeData(data) } : { ...baseFields };
  merged.runId = RUN_ID;

  const line = currentFormat === 'json'
    ? formatJson(ts, level, module, event, merged)
    : formatPretty(ts, level, module, event, merged);

  console.error(line);
}

// =============================================================================
// FACTORY
// =============================================================================

function makeLogger(module: string, baseFields: LogData): Logger {
  const logFn = (level: LogLevel): LogFn =>
    (event, data) => emit(level, module, event, baseFields, data);

  return {
    error: logFn('error'),
    warn: logFn('warn'),
    info: logFn('info'),
    debug: logFn('debug'),
    trace: logFn('trace'),
    isEnabled: (level) => LEVEL_ORDER[level] <= LEVEL_ORDER[currentLevel],
    child: (fields) => makeLogger(module, { ...baseFields, ...sanitizeData(fields) }),
  };
}

/**
 * Create a logger scoped to a module name.
 */
export function createLogger(module: string, fields?: LogData): Logger {
  return makeLogger(module, fields ? sanitizeData(fields) : {});
}

// =============================================================================
// SAFE ERROR EXTRACTION
// =============================================================================

/**
 * Extract structured, loggable fields from an unknown thrown value.
 * Own enumerable fields of an Error subclass (e.g. parameter, value) are kept.
 */
export function safeErrorData(err: unknown): LogData {
  if (err === null || err === undefined) return { error: 'unknown' };

  if (err instanceof Error) {
    const result: LogData = { error: err.message.slice(0, MAX_STRING_LENGTH), errorName: err.name };
    for (const [k, v] of Object.entries(err)) {
      if (k !== 'message' && k !== 'name' && k !== 'stack') {
        result[k] = v;
      }
    }
    return sanitizeData(result);
  }

  if (typeof err === 'string') return { error: err.slice(0, MAX_STRING_LENGTH) };

  return { error: String(err).slice(0, MAX_STRING_LENGTH) };
}
