import type { LogLevel, LogMeta, Logger } from "../ports/logger";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

type ConsoleLike = Pick<Console, "log" | "error">;

export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private readonly sink: ConsoleLike = console,
    private readonly now: () => Date = () => new Date()
  ) {}

  debug(message: string, meta?: LogMeta): void {
    this.write("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write("error", message, meta);
  }

  private write(level: LogLevel, message: string, meta?: LogMeta) {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) return;

    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    const line = `[${this.now().toISOString()}] ${level.toUpperCase()} ${message}${suffix}`;

    // stdout stays free for command output
    this.sink.error(line);
  }
}
