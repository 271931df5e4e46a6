import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

// ============================================================================
// File-based Logger with daily rotation
// ============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LoggerConfig {
  logDir: string;
  maxLogAgeDays: number;
  consoleOutput: boolean;
  minLevel: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

const LOG_FILE_PREFIX = 'laplogger-';

export function defaultLogDir(): string {
  return path.join(process.env.APPDATA || os.homedir(), 'LapLogger', 'logs');
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: defaultLogDir(),
  maxLogAgeDays: 7,
  consoleOutput: true,
  minLevel: 'INFO',
};

let config: LoggerConfig = { ...DEFAULT_CONFIG };
let fileLogging = false;
let currentLogFile: string | null = null;
let logStream: fs.WriteStream | null = null;

/**
 * Initialize the logger. Until this is called, entries only go to the console.
 */
export function initLogger(options: Partial<LoggerConfig> = {}): void {
  config = { ...DEFAULT_CONFIG, ...options };

  if (!fs.existsSync(config.logDir)) {
    fs.mkdirSync(config.logDir, { recursive: true });
  }

  fileLogging = true;
  cleanOldLogs();
  openLogFile();
}

export function setConsoleOutput(enabled: boolean): void {
  config.consoleOutput = enabled;
}

export function setLogLevel(level: LogLevel): void {
  config.minLevel = level;
}

/**
 * Get the current log file path (for today)
 */
function getLogFilePath(): string {
  const today = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
  return path.join(config.logDir, `${LOG_FILE_PREFIX}${today}.log`);
}

/**
 * Open or rotate log file if needed
 */
function openLogFile(): void {
  if (!fileLogging) return;

  const newLogFile = getLogFilePath();
  if (newLogFile === currentLogFile && logStream) {
    return;
  }

  if (logStream) {
    logStream.end();
  }

  currentLogFile = newLogFile;
  logStream = fs.createWriteStream(currentLogFile, { flags: 'a' });
}

/**
 * Remove log files older than maxLogAgeDays
 */
function cleanOldLogs(): void {
  const now = Date.now();
  const maxAge = config.maxLogAgeDays * 24 * 60 * 60 * 1000;

  try {
    for (const file of fs.readdirSync(config.logDir)) {
      if (!file.startsWith(LOG_FILE_PREFIX) || !file.endsWith('.log')) continue;

      const filePath = path.join(config.logDir, file);
      if (now - fs.statSync(filePath).mtime.getTime() > maxAge) {
        fs.unlinkSync(filePath);
      }
    }
  } catch (e) {
    console.warn(`Could not clean old logs in ${config.logDir}: ${describeError(e)}`);
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function formatMessage(level: LogLevel, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  let formatted = `[${timestamp}] [${level}] ${message}`;

  if (data !== undefined) {
    if (data instanceof Error) {
      formatted += ' ' + (data.stack ?? data.message);
    } else if (typeof data === 'object') {
      formatted += ' ' + JSON.stringify(data);
    } else {
      formatted += ' ' + String(data);
    }
  }

  return formatted;
}

function writeLog(level: LogLevel, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[config.minLevel]) return;

  // Handles day rollover
  openLogFile();

  const formatted = formatMessage(level, message, data);

  if (logStream) {
    logStream.write(formatted + '\n');
  }

  if (config.consoleOutput) {
    const consoleMethod = level === 'ERROR' ? console.error :
                          level === 'WARN' ? console.warn :
                          console.log;
    consoleMethod(formatted);
  }
}

// ============================================================================
// Public Logging Functions
// ============================================================================

export function debug(message: string, data?: unknown): void {
  writeLog('DEBUG', message, data);
}

export function info(message: string, data?: unknown): void {
  writeLog('INFO', message, data);
}

export function warn(message: string, data?: unknown): void {
  writeLog('WARN', message, data);
}

export function error(message: string, data?: unknown): void {
  writeLog('ERROR', message, data);
}

/**
 * Close the logger (call on shutdown)
 */
export function closeLogger(): void {
  if (logStream) {
    logStream.end();
  }
  logStream = null;
  currentLogFile = null;
  fileLogging = false;
}

export default {
  init: initLogger,
  setConsoleOutput,
  setLogLevel,
  debug,
  info,
  warn,
  error,
  close: closeLogger,
};
