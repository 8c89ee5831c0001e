export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function timestamp(date: Date): string {
  return date.toTimeString().slice(0, 8);
}

/**
 * Writes timestamped lines to stderr so stdout stays free for reports.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = "info") {}

  debug(message: string): void {
    this.write("debug", "DEBUG", message);
  }

  info(message: string): void {
    this.write("info", "INFO", message);
  }

  warn(message: string): void {
    this.write("warn", "WARN", message);
  }

  error(message: string): void {
    this.write("error", "ERROR", message);
  }

  private write(level: LogLevel, label: string, message: string): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    console.error(`${timestamp(new Date())} [${label}] ${message}`);
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {}
};
