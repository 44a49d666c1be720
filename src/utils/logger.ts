// src/utils/logger.ts
import fs from 'fs';
import path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES = ['DEBUG', 'INFO', 'WARN', 'ERROR'];
const COLORS = ['\x1b[36m', '\x1b[32m', '\x1b[33m', '\x1b[31m'];
const RESET = '\x1b[0m';

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

let minLevel = LogLevel.INFO;
let logFile: string | null = null;
let consoleEnabled = true;

export function parseLogLevel(name: string): LogLevel {
  return LEVELS_BY_NAME[name.toLowerCase()] ?? LogLevel.INFO;
}

// Console output goes to stderr: stdout belongs to the REPL, and to the
// MCP protocol when running as the weather server.
export function configureLogger(options: {
  level?: LogLevel;
  file?: string;
  console?: boolean;
}): void {
  if (options.level !== undefined) minLevel = options.level;
  if (options.file) {
    logFile = options.file;
    const dir = path.dirname(logFile);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }
  if (options.console !== undefined) consoleEnabled = options.console;
}

export function formatLine(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
  const timestamp = new Date().toISOString();
  const metaStr = meta ? ' ' + JSON.stringify(meta) : '';
  return `[${timestamp}] [${LEVEL_NAMES[level]}] ${message}${metaStr}`;
}

export function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
  if (level < minLevel) return;

  const line = formatLine(level, message, meta);

  if (consoleEnabled) {
    process.stderr.write(`${COLORS[level]}${line}${RESET}\n`);
  }

  if (logFile) {
    fs.appendFileSync(logFile, line + '\n');
  }
}

export const debug = (msg: string, meta?: Record<string, unknown>) => log(LogLevel.DEBUG, msg, meta);
export const info = (msg: string, meta?: Record<string, unknown>) => log(LogLevel.INFO, msg, meta);
export const warn = (msg: string, meta?: Record<string, unknown>) => log(LogLevel.WARN, msg, meta);
export const error = (msg: string, meta?: Record<string, unknown>) => log(LogLevel.ERROR, msg, meta);
