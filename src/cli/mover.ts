import fs from "node:fs";
import path from "node:path";
import { categorize, type CategoryLabel } from "./categories.js";
import { resolveCollision } from "./collisions.js";
import { describeError, type RunLogger } from "./logger.js";
import { SilentProgress, type ProgressReporter } from "./progress.js";

export type MoveStage = "mkdir" | "resolve" | "move";

export type FileOutcome =
  | { ok: true; source: string; destination: string; category: CategoryLabel }
  | { ok: false; source: string; stage: MoveStage; error: string };

export interface MoveReport {
  processed: number;
  failed: number;
  outcomes: FileOutcome[];
}

export interface OrganizeOptions {
  logger: RunLogger;
  progress?: ProgressReporter;
  /** Absolute paths left where they are, such as the active log file. */
  skip?: string[];
}

class StageError extends Error {
  constructor(
    readonly stage: MoveStage,
    cause: unknown
  ) {
    super(describeError(cause), { cause });
    this.name = "StageError";
  }
}

function runStage<T>(stage: MoveStage, fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw new StageError(stage, err);
  }
}

/** rename, or copy + unlink when source and destination sit on different devices. */
export function relocate(source: string, destination: string): void {
  try {
    fs.renameSync(source, destination);
  } catch (err) {
    if (!(err instanceof Error) || !("code" in err) || err.code !== "EXDEV") throw err;
    fs.copyFileSync(source, destination, fs.constants.COPYFILE_EXCL);
    fs.unlinkSync(source);
  }
}

function isDirectoryEntry(targetDir: string, entry: fs.Dirent): boolean {
  if (entry.isDirectory()) return true;
  if (!entry.isSymbolicLink()) return false;
  try {
    return fs.statSync(path.join(targetDir, entry.name)).isDirectory();
  } catch {
    // dangling link: moved like a file
    return false;
  }
}

function moveOne(targetDir: string, name: string, logger: RunLogger): FileOutcome {
  const source = path.join(targetDir, name);
  const category = categorize(name);
  logger.debug(`Classified ${name} as ${category}`);

  try {
    const folder = path.join(targetDir, category);
    runStage("mkdir", () => fs.mkdirSync(folder, { recursive: true }));
    const destName = runStage("resolve", () => resolveCollision(folder, name));
    const destination = path.join(folder, destName);
    runStage("move", () => relocate(source, destination));
    return { ok: true, source, destination, category };
  } catch (err) {
    if (err instanceof StageError) {
      logger.error(`Error moving ${source}: ${err.message}`, err.cause);
      return { ok: false, source, stage: err.stage, error: err.message };
    }
    throw err;
  }
}

/**
 * Moves every file directly inside `targetDir` into its category folder.
 * One file failing never stops the others; each result is reported.
 */
export function organizeFiles(targetDir: string, options: OrganizeOptions): MoveReport {
  const { logger } = options;
  const progress = options.progress ?? new SilentProgress();
  const skip = new Set((options.skip ?? []).map((p) => path.resolve(p)));

  logger.info(`Starting organization in: ${targetDir}`);
  const entries = fs.readdirSync(targetDir, { withFileTypes: true });
  const report: MoveReport = { processed: 0, failed: 0, outcomes: [] };

  progress.start(entries.length);
  try {
    for (const entry of entries) {
      progress.tick(entry.name);
      if (isDirectoryEntry(targetDir, entry)) continue;

      const source = path.join(targetDir, entry.name);
      if (skip.has(path.resolve(source))) {
        logger.debug(`Skipping ${source}`);
        continue;
      }

      const outcome = moveOne(targetDir, entry.name, logger);
      report.outcomes.push(outcome);
      if (outcome.ok) {
        report.processed++;
        logger.info(`Moved: ${outcome.source} -> ${outcome.destination}`);
      } else {
        report.failed++;
      }
    }
  } finally {
    progress.stop();
  }

  return report;
}
