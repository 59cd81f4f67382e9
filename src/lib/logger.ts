/**
 * Logging System - Nearby Alerts
 *
 * - Colored logs in console (dev)
 * - Listeners for status views and tests
 * - PRIVACY: Masks GPS coords unless sensitive output is switched on
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogCategory =
  | 'boot'
  | 'targets'
  | 'permissions'
  | 'geofence'
  | 'relay'
  | 'notification'
  | 'gps'
  | 'state';

export interface LogEntry {
  id: string;
  level: LogLevel;
  category: LogCategory;
  message: string;
  metadata?: Record<string, unknown>;
  timestamp: Date;
}

export interface LoggerOptions {
  enableConsole?: boolean;
  showSensitiveData?: boolean;
}

// Configuration
const CONFIG = {
  enableConsole: process.env.NODE_ENV === 'development',
  maxStoredLogs: 500,
  enableColors: true,
  // PRIVACY: mask coordinates by default (even in dev)
  showSensitiveData: false,
};

const levelEmoji: Record<LogLevel, string> = {
  debug: '🔵',
  info: '🟢',
  warn: '🟡',
  error: '🔴',
};

const categoryColor: Record<LogCategory, string> = {
  boot: '\x1b[96m',         // light cyan
  targets: '\x1b[32m',      // green
  permissions: '\x1b[36m',  // cyan
  geofence: '\x1b[33m',     // yellow
  relay: '\x1b[34m',        // blue
  notification: '\x1b[31m', // red
  gps: '\x1b[94m',          // light blue
  state: '\x1b[95m',        // light magenta
};

// In-memory log storage
const logStorage: LogEntry[] = [];

type LogListener = (entry: LogEntry) => void;
const listeners: Set<LogListener> = new Set();

let logCounter = 0;

export function configureLogger(options: LoggerOptions): void {
  if (options.enableConsole !== undefined) CONFIG.enableConsole = options.enableConsole;
  if (options.showSensitiveData !== undefined) CONFIG.showSensitiveData = options.showSensitiveData;
}

// ============================================
// PRIVACY HELPERS
// ============================================

function isCoordinateKey(key: string): boolean {
  const k = key.toLowerCase();
  return k === 'lat' || k === 'latitude' || k === 'lng' || k === 'lon' || k === 'longitude';
}

/**
 * Sanitize metadata object - mask coordinate fields
 */
function sanitizeMetadata(metadata: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!metadata) return undefined;
  if (CONFIG.showSensitiveData) return metadata;

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(metadata)) {
    sanitized[key] = isCoordinateKey(key) && value !== undefined ? '[hidden]' : value;
  }
  return sanitized;
}

/**
 * Mask inline coordinates like "45.375171" (5+ decimal digits)
 */
function sanitizeMessage(message: string): string {
  if (CONFIG.showSensitiveData) return message;
  return message.replace(/-?\d{1,3}\.\d{5,}/g, '[coord]');
}

// ============================================
// CORE LOGGING
// ============================================

export function addLogListener(listener: LogListener): () => void {
  listeners.add(listener);
  return () => listeners.delete(listener);
}

function formatConsoleLine(entry: LogEntry): string {
  const color = CONFIG.enableColors ? categoryColor[entry.category] : '';
  const reset = CONFIG.enableColors ? '\x1b[0m' : '';
  const time = entry.timestamp.toLocaleTimeString('en-US');
  const meta = entry.metadata ? ` ${JSON.stringify(entry.metadata)}` : '';
  return `${levelEmoji[entry.level]} ${color}[${time}][${entry.category.toUpperCase()}]${reset} ${entry.message}${meta}`;
}

function record(entry: LogEntry): void {
  logStorage.push(entry);
  if (logStorage.length > CONFIG.maxStoredLogs) logStorage.shift();

  if (CONFIG.enableConsole) console.log(formatConsoleLine(entry));

  for (const listener of listeners) {
    try {
      listener(entry);
    } catch (error) {
      console.error('Log listener error:', error);
    }
  }
}

type LogFn = (category: LogCategory, message: string, metadata?: Record<string, unknown>) => void;

const writer =
  (level: LogLevel): LogFn =>
  (category, message, metadata) => {
    logCounter += 1;
    record({
      id: `log_${logCounter}`,
      level,
      category,
      message: sanitizeMessage(message),
      metadata: sanitizeMetadata(metadata),
      timestamp: new Date(),
    });
  };

export const logger: Record<LogLevel, LogFn> = {
  debug: writer('debug'),
  info: writer('info'),
  warn: writer('warn'),
  error: writer('error'),
};

// ============================================
// RETRIEVAL
// ============================================

export function getStoredLogs(category?: LogCategory): LogEntry[] {
  return category ? logStorage.filter(entry => entry.category === category) : [...logStorage];
}

export function clearLogs(): void {
  logStorage.length = 0;
}

/** One line per entry: [iso][LEVEL][category] message | metadata */
export function exportLogsAsText(): string {
  return logStorage
    .map(entry => {
      const meta = entry.metadata ? ` | ${JSON.stringify(entry.metadata)}` : '';
      return `[${entry.timestamp.toISOString()}][${entry.level.toUpperCase()}][${entry.category}] ${entry.message}${meta}`;
    })
    .join('\n');
}
