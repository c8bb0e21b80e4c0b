import fs from "node:fs";
import { removeEmptyFolders } from "./cleanup.js";
import type { RunLogger } from "./logger.js";
import { organizeFiles } from "./mover.js";
import type { DirectoryPicker } from "./picker.js";
import type { ProgressReporter } from "./progress.js";
import type { Prompter } from "./prompt.js";

export type RunPhase =
  | "idle"
  | "path-resolution"
  | "validation"
  | "confirmation"
  | "executing"
  | "done";

export interface RunSummary {
  targetDir: string;
  processed: number;
  failed: number;
  removedFolders: string[];
  logFile: string;
}

export type RunOutcome =
  | { status: "completed"; summary: RunSummary }
  | { status: "aborted"; reason: "no-path" | "invalid-path" | "declined" };

export interface RunContext {
  logger: RunLogger;
  picker: DirectoryPicker;
  prompter: Prompter;
  progress: ProgressReporter;
  /** Directory given up front; skips the picker and the path prompt. */
  directory?: string;
  print?: (line: string) => void;
}

async function resolveTargetDirectory(ctx: RunContext): Promise<string> {
  if (ctx.directory) return ctx.directory;

  if (!ctx.picker.interactive) {
    return (await ctx.prompter.ask("Enter folder path: ")).trim();
  }

  const picked = ctx.picker.pick();
  switch (picked.status) {
    case "selected":
      return picked.path;
    case "cancelled":
      return (await ctx.prompter.ask("No folder selected. Enter folder path manually: ")).trim();
    case "failed":
      ctx.logger.warning(`GUI folder picker failed: ${picked.error}`);
      return (await ctx.prompter.ask("Enter folder path: ")).trim();
  }
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

export async function runOrganizer(ctx: RunContext): Promise<RunOutcome> {
  const { logger } = ctx;
  const print = ctx.print ?? ((line: string) => console.log(line));
  let phase: RunPhase = "idle";
  const enter = (next: RunPhase) => {
    logger.debug(`Phase: ${phase} -> ${next}`);
    phase = next;
  };

  logger.startRun();

  enter("path-resolution");
  const targetDir = await resolveTargetDirectory(ctx);
  if (!targetDir) {
    logger.error("No folder provided. Exiting.");
    enter("done");
    return { status: "aborted", reason: "no-path" };
  }

  enter("validation");
  if (!isDirectory(targetDir)) {
    logger.error(`Invalid path: ${targetDir}`);
    print("❌ Invalid path! Please check again.");
    enter("done");
    return { status: "aborted", reason: "invalid-path" };
  }

  enter("confirmation");
  print(`Organize files in: ${targetDir}`);
  const answer = await ctx.prompter.ask("Proceed with organizing? (y/n): ");
  if (answer.trim().toLowerCase() !== "y") {
    logger.info("Operation cancelled by user.");
    print("❌ Operation cancelled.");
    enter("done");
    return { status: "aborted", reason: "declined" };
  }

  enter("executing");
  const report = organizeFiles(targetDir, {
    logger,
    progress: ctx.progress,
    skip: [logger.filePath],
  });
  const removedFolders = removeEmptyFolders(targetDir, logger);
  logger.info(
    `Finished. Processed ${report.processed} files. Removed ${removedFolders.length} empty folders.`
  );

  print("");
  print(`✅ Done! Processed ${report.processed} files. Removed ${removedFolders.length} empty folders.`);
  if (report.failed > 0) {
    print(`${report.failed} file(s) could not be moved. See the log for details.`);
  }
  print(`Log saved to: ${logger.filePath}`);
  enter("done");

  return {
    status: "completed",
    summary: {
      targetDir,
      processed: report.processed,
      failed: report.failed,
      removedFolders,
      logFile: logger.filePath,
    },
  };
}
