import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { RunLogger, type LogEntry, type LogLevel } from "../cli/logger.js";
import type { DirectoryPicker, PickResult } from "../cli/picker.js";
import type { ProgressReporter } from "../cli/progress.js";
import type { Prompter } from "../cli/prompt.js";

export function makeTempDir(prefix = "folder-sorter-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function touch(dir: string, name: string, content = name): string {
  const file = path.join(dir, name);
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, content);
  return file;
}

export function listing(dir: string): string[] {
  return fs.readdirSync(dir).sort();
}

export function makeLogger(logDir: string, consoleLevel: LogLevel = "info") {
  const entries: LogEntry[] = [];
  const logger = new RunLogger({
    filePath: path.join(logDir, "organizer.log"),
    consoleLevel,
    console: (entry) => entries.push(entry),
  });
  return { logger, entries };
}

export class FakePrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? "";
  }

  close(): void {
    this.closed = true;
  }
}

export class FakePicker implements DirectoryPicker {
  readonly interactive = true;
  calls = 0;

  constructor(private readonly result: PickResult) {}

  pick(): PickResult {
    this.calls++;
    return this.result;
  }
}

export class RecordingProgress implements ProgressReporter {
  readonly events: string[] = [];

  start(total: number): void {
    this.events.push(`start:${total}`);
  }

  tick(name: string): void {
    this.events.push(`tick:${name}`);
  }

  stop(): void {
    this.events.push("stop");
  }

  interrupt(write: () => void): void {
    this.events.push("interrupt");
    write();
  }
}
