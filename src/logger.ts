import { appendFileSync } from "fs";
import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  logFile?: string;
  verbose?: boolean;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Appends `[timestamp] LEVEL message` lines to the log file, if any, and
 * echoes them to stderr when verbose. stdout belongs to the notebook prompt.
 */
export class FileLogger implements Logger {
  private logFile: string | undefined;
  private verbose: boolean;

  constructor(options: LoggerOptions = {}) {
    this.logFile = options.logFile;
    this.verbose = options.verbose ?? false;
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string, error?: unknown): void {
    this.log("error", error === undefined ? message : `${message}: ${describeError(error)}`);
  }

  private log(level: LogLevel, message: string): void {
    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] ${level.toUpperCase()} ${message}`;

    if (this.verbose) {
      console.error(chalk.dim(line));
    }

    if (!this.logFile) {
      return;
    }

    try {
      appendFileSync(this.logFile, line + "\n");
    } catch (error) {
      console.error(chalk.yellow(`Log file ${this.logFile} is not writable, logging to it stopped: ${describeError(error)}`));
      this.logFile = undefined;
    }
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createLogger(options: LoggerOptions): Logger {
  if (!options.logFile && !options.verbose) {
    return silentLogger;
  }
  return new FileLogger(options);
}
