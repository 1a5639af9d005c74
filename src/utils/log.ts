import { LOG_LEVELS, LogLevel } from '../config.js';

// stdout carries the protocol, so every diagnostic goes to stderr
let threshold = LOG_LEVELS.indexOf('info');

export function setLogLevel(level: LogLevel): void {
  threshold = LOG_LEVELS.indexOf(level);
}

function write(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
  if (LOG_LEVELS.indexOf(level) > threshold) {
    return;
  }

  const suffix = fields && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : '';
  console.error(`[${new Date().toISOString()}] ${level.toUpperCase()} ${message}${suffix}`);
}

export const log = {
  error: (message: string, fields?: Record<string, unknown>) => write('error', message, fields),
  warn: (message: string, fields?: Record<string, unknown>) => write('warn', message, fields),
  info: (message: string, fields?: Record<string, unknown>) => write('info', message, fields),
  debug: (message: string, fields?: Record<string, unknown>) => write('debug', message, fields),
};
