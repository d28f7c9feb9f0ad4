/**
 * Central Logger Module
 * Handles debug logging, session tracking, and error serialization.
 * User-facing output goes to the console; system logs go to the file.
 */
import fs from 'fs';
import path from 'path';
import { config } from '../config.js';

/** Log level type */
type LogLevel = 'DEBUG' | 'INFO' | 'ACTION' | 'WARN' | 'ERROR';

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  ACTION: 20,
  WARN: 30,
  ERROR: 40,
};

const THRESHOLDS: Record<string, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY,
};

const LOG_FILE = config.paths.debugLogFile;
const LOG_DIR = path.dirname(LOG_FILE);

function threshold(): number {
  const configured = (process.env.LOG_LEVEL || config.logging.level).toLowerCase();
  return THRESHOLDS[configured] ?? THRESHOLDS.info;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= threshold();
}

/**
 * Ensures the log directory exists.
 */
function ensureLogDirectory(): boolean {
  try {
    if (!fs.existsSync(LOG_DIR)) {
      fs.mkdirSync(LOG_DIR, { recursive: true });
    }
    return true;
  } catch {
    return false;
  }
}

/**
 * Rotates the log file if it exceeds the maximum size.
 */
function rotateLogIfNeeded(): void {
  try {
    if (!fs.existsSync(LOG_FILE)) return;
    const stats = fs.statSync(LOG_FILE);
    if (stats.size <= config.logging.maxLogSize) return;

    fs.renameSync(LOG_FILE, `${LOG_FILE}.${Date.now()}.old`);

    const base = path.basename(LOG_FILE);
    const backups = fs.readdirSync(LOG_DIR)
      .filter(f => f.startsWith(`${base}.`) && f.endsWith('.old'))
      .sort()
      .reverse();

    for (const stale of backups.slice(config.logging.maxBackups)) {
      fs.rmSync(path.join(LOG_DIR, stale), { force: true });
    }
  } catch {
    // Ignore rotation errors
  }
}

/**
 * Serializes error objects for logging.
 * @param error - The error to serialize
 */
function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      cause: error.cause,
    };
  }
  if (typeof error === 'object' && error !== null) {
    return error;
  }
  return { value: String(error) };
}

/**
 * Writes a log entry to the file.
 * @param level - Log level
 * @param message - Log message
 * @param data - Optional additional data
 */
function write(level: LogLevel, message: string, data?: unknown): void {
  if (!enabled(level)) return;

  const timestamp = new Date().toISOString();
  let content = `[${timestamp}] [${level.padEnd(6)}] ${message}`;

  if (data !== undefined) {
    try {
      const seen = new WeakSet<object>();
      const maxLen = config.logging.maxStringLength;
      const json = JSON.stringify(data, (_key, value: unknown) => {
        if (typeof value === 'object' && value !== null) {
          if (seen.has(value)) {
            return '[Circular Reference]';
          }
          seen.add(value);
        }
        if (typeof value === 'string' && value.length > maxLen) {
          return value.substring(0, maxLen) + `... [${value.length - maxLen} chars truncated]`;
        }
        return value;
      }, 2);
      content += `\nDATA: ${json}`;
    } catch {
      content += `\nDATA: [Unserializable Object]`;
    }
  }

  content += '\n' + '-'.repeat(60) + '\n';

  try {
    if (ensureLogDirectory()) {
      fs.appendFileSync(LOG_FILE, content);
    }
  } catch {
    // If logging fails, do not crash the agent
  }
}

/**
 * Logger interface for the application.
 */
export const logger = {
  /**
   * Starts a new logging session and rotates the file when it grew too large.
   */
  init(): void {
    if (!enabled('INFO') || !ensureLogDirectory()) return;

    rotateLogIfNeeded();

    const header = [
      '',
      '='.repeat(60),
      `[${new Date().toISOString()}] SESSION START`,
      `Platform: ${process.platform} | Node: ${process.version}`,
      `CWD: ${process.cwd()}`,
      '='.repeat(60),
      '',
    ].join('\n');

    try {
      fs.appendFileSync(LOG_FILE, header);
    } catch {
      // Ignore init errors
    }
  },

  info(msg: string, data?: unknown): void {
    write('INFO', msg, data);
  },

  warn(msg: string, data?: unknown): void {
    write('WARN', msg, data);
  },

  /**
   * Logs an error message.
   * @param msg - The message to log
   * @param error - Optional error object, serialized with its stack
   */
  error(msg: string, error?: unknown): void {
    write('ERROR', msg, error === undefined ? undefined : serializeError(error));
  },

  debug(msg: string, data?: unknown): void {
    write('DEBUG', msg, data);
  },

  /**
   * Logs a command the model asked the host to run.
   * @param command - Command label, e.g. `tool:ddg-search.search`
   * @param args - The command arguments
   */
  action(command: string, args: unknown): void {
    write('ACTION', `Command: ${command}`, args);
  },
};
