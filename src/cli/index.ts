#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig, type CliFlags } from "./config.js";
import { RunLogger, writeConsoleEntry } from "./logger.js";
import { NoDirectoryPicker, probeDirectoryPicker } from "./picker.js";
import { selectProgress } from "./progress.js";
import { ConsolePrompter } from "./prompt.js";
import { runOrganizer } from "./run.js";

const program = new Command();

program
  .name("folder-sorter")
  .description("Sort the files in a folder into category subfolders by extension")
  .argument("[directory]", "Folder to organize (opens a picker or prompts when omitted)")
  .option("--log-file <path>", "Log file to append to")
  .option("--log-level <level>", "Lowest level echoed to the console (debug, info, warning, error)")
  .option("--no-picker", "Never open the graphical folder picker")
  .option("--no-progress", "Hide the progress spinner")
  .action(async (directory: string | undefined, flags: CliFlags) => {
    const config = loadConfig(directory, flags);
    const progress = selectProgress(config.progress);
    const logger = new RunLogger({
      filePath: config.logFile,
      consoleLevel: config.consoleLevel,
      console: (entry) => progress.interrupt(() => writeConsoleEntry(entry)),
    });
    const prompter = new ConsolePrompter();

    try {
      await runOrganizer({
        logger,
        prompter,
        directory: config.directory,
        picker: config.picker ? probeDirectoryPicker() : new NoDirectoryPicker(),
        progress,
      });
    } finally {
      prompter.close();
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error("[folder-sorter] Unexpected error:", err);
  process.exitCode = 1;
});
