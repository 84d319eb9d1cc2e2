import fs from 'fs-extra';
import path from 'path';

export type LogLevel = 'info' | 'warning' | 'error';

let logFilePath: string | null = null;

/**
 * Start mirroring log entries into `<logDir>/<name>-<YYYY-MM-DD>.log`.
 * Returns the path of the file being written.
 */
export function openLogFile(logDir: string, name: string, now: Date = new Date()): string {
  fs.ensureDirSync(logDir);
  const currentDate = now.toISOString().split('T')[0];
  logFilePath = path.join(logDir, `${name}-${currentDate}.log`);
  return logFilePath;
}

export function closeLogFile(): void {
  logFilePath = null;
}

export function formatLogLine(
  message: string,
  level: LogLevel,
  timestamp: string,
  metadata?: Record<string, unknown>
): string {
  const levelFormatted = level.toUpperCase().padEnd(7);
  const suffix = metadata ? ` ${JSON.stringify(metadata)}` : '';
  return `[${timestamp}] [${levelFormatted}] ${message}${suffix}`;
}

/**
 * Log an operational message to the console and, when a log file is open, to that file.
 */
export function logProcess(
  message: string,
  level: LogLevel = 'info',
  metadata?: Record<string, unknown>
): void {
  const line = formatLogLine(message, level, new Date().toISOString(), metadata);

  if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }

  if (logFilePath) {
    fs.appendFileSync(logFilePath, `${line}\n`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
