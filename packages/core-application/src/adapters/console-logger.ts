import type { LogLevel, Logger } from "../ports/logger";
import type { ConfigLogLevel } from "../application/config";
import { describeCause } from "../application/errors";

const LEVEL_ORDER: Record<ConfigLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

type Sink = {
  out: (line: string) => void;
  err: (line: string) => void;
};

const consoleSink: Sink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: ConfigLogLevel = "info",
    private readonly scope?: string,
    private readonly sink: Sink = consoleSink
  ) {}

  child(scope: string): ConsoleLogger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new ConsoleLogger(this.level, nested, this.sink);
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

  error(message: string, err?: unknown): void {
    this.write("error", err === undefined ? message : `${message}: ${describeCause(err)}`);
  }

  private write(level: LogLevel, message: string) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const prefix = this.scope ? `[${this.scope}] ` : "";
    const line = `${prefix}${message}`;
    if (level === "warn" || level === "error") this.sink.err(line);
    else this.sink.out(line);
  }
}
