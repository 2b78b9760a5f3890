import { toUtcIsoSeconds } from "../utils/time";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogSink = (level: LogLevel, line: string) => void;

// stdout is reserved for command results.
export const consoleSink: LogSink = (_level, line) => {
  console.error(line);
};

export const silentSink: LogSink = () => undefined;

export interface RunLogOptions {
  sink?: LogSink;
  clock?: () => Date;
}

/**
 * Collects the formatted lines of one run so they can be embedded in the
 * descriptor, while forwarding each line to a sink as it is written.
 */
export class RunLog implements Logger {
  private readonly entries: string[] = [];
  private readonly sink: LogSink;
  private readonly clock: () => Date;

  constructor(options: RunLogOptions = {}) {
    this.sink = options.sink ?? consoleSink;
    this.clock = options.clock ?? (() => new Date());
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  lines(): string[] {
    return [...this.entries];
  }

  private write(level: LogLevel, message: string): void {
    const line = `${toUtcIsoSeconds(this.clock())} [${level.toUpperCase()}] ${message}`;
    this.entries.push(line);
    this.sink(level, line);
  }
}
