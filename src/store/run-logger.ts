import fs from 'node:fs';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Console logger that also appends every line to
 * `<agentsDir>/<runId>/<phase>/execution.log`. Debug lines only go to the file.
 */
export class RunLogger implements Logger {
  readonly logFile: string;

  constructor(agentsDir: string, runId: string, phase: string) {
    const logDir = path.join(agentsDir, runId, phase);
    fs.mkdirSync(logDir, { recursive: true });
    this.logFile = path.join(logDir, 'execution.log');
  }

  private write(level: LogLevel, message: string): void {
    const line = `${new Date().toISOString()} - ${level.toUpperCase()} - ${message}\n`;
    fs.appendFileSync(this.logFile, line);
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
    console.log(message);
  }

  warn(message: string): void {
    this.write('warn', message);
    console.warn(`WARNING: ${message}`);
  }

  error(message: string): void {
    this.write('error', message);
    console.error(`ERROR: ${message}`);
  }
}

/** Console-only logger for code that runs before a run ID exists. */
export const consoleLogger: Logger = {
  debug: () => undefined,
  info: (message) => console.log(message),
  warn: (message) => console.warn(`WARNING: ${message}`),
  error: (message) => console.error(`ERROR: ${message}`)
};
