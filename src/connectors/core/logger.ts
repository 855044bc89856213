import type { Logger, LogLevel } from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export class ConsoleLogger implements Logger {
  private readonly scope: string;
  private readonly prefix: string;
  private readonly level: LogLevel;

  constructor(scope: string, level: LogLevel = "info") {
    this.scope = scope;
    this.prefix = `[${scope}]`;
    this.level = level;
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("debug")) return;
    console.debug(`${this.prefix} ${msg}${formatData(data)}`);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("info")) return;
    console.log(`${this.prefix} ${msg}${formatData(data)}`);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("warn")) return;
    console.warn(`${this.prefix} ⚠ ${msg}${formatData(data)}`);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    if (!this.enabled("error")) return;
    console.error(`${this.prefix} ✗ ${msg}${formatData(data)}`);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }
}

function formatData(data: Record<string, unknown> | undefined): string {
  return data ? ` ${JSON.stringify(data)}` : "";
}

export function createLogger(scope: string, level?: LogLevel): Logger {
  return new ConsoleLogger(scope, level);
}
