// ============================================================================
// @resp3-value/core — Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events.
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

/**
 * Current log level (controlled by RESP3_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

function initLevel(): void {
  const flag = process.env.RESP3_DEBUG;
  if (flag === '1' || flag === 'true') {
    currentLevel = 'debug';
  } else if (flag === 'warn') {
    currentLevel = 'warn';
  } else if (flag === 'error') {
    currentLevel = 'error';
  } else {
    currentLevel = 'info';
  }
}

initLevel();

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Create a log entry, print it and emit it to callbacks.
 */
function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[resp3] ${message}${dataStr}`;

  switch (level) {
    case 'debug':
      console.debug(msg);
      break;
    case 'info':
      console.info(msg);
      break;
    case 'warn':
      console.warn(msg);
      break;
    case 'error':
      console.error(msg);
      break;
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[resp3] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only printed when RESP3_DEBUG=1 is set.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => callbacks.delete(callback);
}

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log a table growing its slot array.
 */
export function logTableResize(from: number, to: number, entries: number): void {
  debug(`table resized ${from} → ${to} slots (${entries} entries)`, {
    from,
    to,
    entries,
  });
}

/**
 * Log a duplicate key replacing an existing entry's value.
 */
export function logKeyOverwrite(key: string): void {
  debug(`duplicate key ${key} overwrote existing value`, { key });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}
