import path from "node:path";
import { isLogLevel, LOG_LEVELS, type LogLevel } from "./logger.js";

export const LOG_FILENAME = "organizer.log";

export interface OrganizerConfig {
  directory?: string;
  logFile: string;
  consoleLevel: LogLevel;
  picker: boolean;
  progress: boolean;
}

export interface CliFlags {
  logFile?: string;
  logLevel?: string;
  picker?: boolean;
  progress?: boolean;
}

function envFlag(value: string | undefined): boolean {
  return value === "1" || value?.toLowerCase() === "true";
}

/** Command-line flags win over environment variables, which win over defaults. */
export function loadConfig(
  directory: string | undefined,
  flags: CliFlags,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  warn: (message: string) => void = (message) => console.warn(`[folder-sorter] ${message}`)
): OrganizerConfig {
  const logFile = flags.logFile || env.FOLDER_SORTER_LOG_FILE || LOG_FILENAME;
  const level = flags.logLevel || env.FOLDER_SORTER_LOG_LEVEL || "info";
  if (!isLogLevel(level)) {
    warn(`Unknown log level "${level}", using info (expected ${LOG_LEVELS.join(", ")})`);
  }

  return {
    directory: directory?.trim() || undefined,
    logFile: path.resolve(cwd, logFile),
    consoleLevel: isLogLevel(level) ? level : "info",
    picker: flags.picker !== false && !envFlag(env.FOLDER_SORTER_NO_PICKER),
    progress: flags.progress !== false,
  };
}
