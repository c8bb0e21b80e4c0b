import fs from "node:fs";
import path from "node:path";
import pc from "picocolors";

export const LOG_LEVELS = ["debug", "info", "warning", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
}

export type ConsoleWriter = (entry: LogEntry) => void;

export interface RunLoggerOptions {
  filePath: string;
  /** Lowest level written to the log file. Defaults to "debug". */
  fileLevel?: LogLevel;
  /** Lowest level mirrored to the console. Defaults to "info". */
  consoleLevel?: LogLevel;
  console?: ConsoleWriter;
  clock?: () => Date;
}

export const RUN_DELIMITER = "---- New run ----";

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: pc.dim,
  info: pc.cyan,
  warning: pc.yellow,
  error: pc.red,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatTimestamp(date: Date): string {
  const pad = (n: number, len = 2) => String(n).padStart(len, "0");
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time},${pad(date.getMilliseconds(), 3)}`;
}

export function formatEntry(
  entry: LogEntry,
  paint: (level: LogLevel, text: string) => string = (_level, text) => text
): string {
  const label = paint(entry.level, entry.level.toUpperCase());
  return `${formatTimestamp(entry.timestamp)} - ${label} - ${entry.message}`;
}

export function writeConsoleEntry(entry: LogEntry): void {
  const line = formatEntry(entry, (level, text) => LEVEL_COLORS[level](text));
  if (entry.level === "warning" || entry.level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Append-only run log. Every entry lands in the log file; entries at or above
 * the console threshold are mirrored to the terminal.
 */
export class RunLogger {
  readonly filePath: string;
  private readonly fileRank: number;
  private readonly consoleRank: number;
  private readonly writeConsole: ConsoleWriter;
  private readonly clock: () => Date;

  constructor(options: RunLoggerOptions) {
    this.filePath = path.resolve(options.filePath);
    this.fileRank = LOG_LEVELS.indexOf(options.fileLevel ?? "debug");
    this.consoleRank = LOG_LEVELS.indexOf(options.consoleLevel ?? "info");
    this.writeConsole = options.console ?? writeConsoleEntry;
    this.clock = options.clock ?? (() => new Date());
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
  }

  startRun(): void {
    this.info(RUN_DELIMITER);
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warning(message: string): void {
    this.log("warning", message);
  }

  error(message: string, err?: unknown): void {
    const stack = err instanceof Error && err.stack ? `\n${err.stack}` : "";
    this.log("error", `${message}${stack}`);
  }

  private log(level: LogLevel, message: string): void {
    const rank = LOG_LEVELS.indexOf(level);
    const entry: LogEntry = { timestamp: this.clock(), level, message };
    if (rank >= this.fileRank) {
      fs.appendFileSync(this.filePath, `${formatEntry(entry)}\n`, "utf-8");
    }
    if (rank >= this.consoleRank) {
      this.writeConsole(entry);
    }
  }
}
