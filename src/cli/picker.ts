import { spawnSync, type SpawnSyncReturns } from "node:child_process";
import { describeError } from "./logger.js";

export type PickResult =
  | { status: "selected"; path: string }
  | { status: "cancelled" }
  | { status: "failed"; error: string };

export interface DirectoryPicker {
  readonly interactive: boolean;
  pick(): PickResult;
}

export interface DialogCommand {
  command: string;
  args: string[];
}

export type SpawnRunner = (command: string, args: string[]) => SpawnSyncReturns<string>;

const DIALOG_TITLE = "Select folder to organize";

const runSpawn: SpawnRunner = (command, args) =>
  spawnSync(command, args, { encoding: "utf-8", windowsHide: true });

export class NoDirectoryPicker implements DirectoryPicker {
  readonly interactive = false;

  pick(): PickResult {
    return { status: "failed", error: "No interactive folder picker available" };
  }
}

/** Modal native folder dialog run as a child process. */
export class DialogDirectoryPicker implements DirectoryPicker {
  readonly interactive = true;

  constructor(
    private readonly dialog: DialogCommand,
    private readonly run: SpawnRunner = runSpawn
  ) {}

  pick(): PickResult {
    let result: SpawnSyncReturns<string>;
    try {
      result = this.run(this.dialog.command, this.dialog.args);
    } catch (err) {
      return { status: "failed", error: describeError(err) };
    }

    if (result.error) return { status: "failed", error: describeError(result.error) };

    const selected = (result.stdout ?? "").trim();
    if (result.status === 0) {
      return selected ? { status: "selected", path: selected } : { status: "cancelled" };
    }
    // zenity and osascript both exit 1 with no output when the user cancels
    if (result.status === 1 && !selected) return { status: "cancelled" };

    const stderr = (result.stderr ?? "").trim();
    return {
      status: "failed",
      error: stderr || `${this.dialog.command} exited with status ${String(result.status)}`,
    };
  }
}

export function dialogCommandFor(
  platform: NodeJS.Platform,
  env: NodeJS.ProcessEnv
): DialogCommand | null {
  switch (platform) {
    case "darwin":
      return {
        command: "osascript",
        args: ["-e", `POSIX path of (choose folder with prompt "${DIALOG_TITLE}")`],
      };
    case "win32":
      return {
        command: "powershell.exe",
        args: [
          "-NoProfile",
          "-Command",
          "Add-Type -AssemblyName System.Windows.Forms; " +
            "$d = New-Object System.Windows.Forms.FolderBrowserDialog; " +
            `$d.Description = '${DIALOG_TITLE}'; ` +
            "if ($d.ShowDialog() -eq 'OK') { $d.SelectedPath } else { exit 1 }",
        ],
      };
    default:
      if (!env.DISPLAY && !env.WAYLAND_DISPLAY) return null;
      return {
        command: "zenity",
        args: ["--file-selection", "--directory", `--title=${DIALOG_TITLE}`],
      };
  }
}

/**
 * Picks the dialog variant when the platform has one and its binary answers,
 * otherwise the prompt-only variant.
 */
export function probeDirectoryPicker(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  run: SpawnRunner = runSpawn
): DirectoryPicker {
  const dialog = dialogCommandFor(platform, env);
  if (!dialog) return new NoDirectoryPicker();

  if (dialog.command === "zenity") {
    const probe = run("zenity", ["--version"]);
    if (probe.error || probe.status !== 0) return new NoDirectoryPicker();
  }

  return new DialogDirectoryPicker(dialog, run);
}
