import type { SpawnSyncReturns } from "node:child_process";
import { describe, expect, it, vi } from "vitest";
import {
  DialogDirectoryPicker,
  dialogCommandFor,
  NoDirectoryPicker,
  probeDirectoryPicker,
  type DialogCommand,
} from "../cli/picker.js";

function spawnResult(partial: Partial<SpawnSyncReturns<string>>): SpawnSyncReturns<string> {
  return { pid: 1, output: [], stdout: "", stderr: "", status: 0, signal: null, ...partial };
}

const ZENITY: DialogCommand = { command: "zenity", args: ["--file-selection", "--directory"] };

describe("DialogDirectoryPicker", () => {
  it("returns the selected folder", () => {
    const run = vi.fn(() => spawnResult({ stdout: "/home/sam/Downloads\n" }));
    const picker = new DialogDirectoryPicker(ZENITY, run);

    expect(picker.pick()).toEqual({ status: "selected", path: "/home/sam/Downloads" });
    expect(run).toHaveBeenCalledWith("zenity", ["--file-selection", "--directory"]);
  });

  it("treats exit status 1 with no output as a cancellation", () => {
    const picker = new DialogDirectoryPicker(ZENITY, () => spawnResult({ status: 1 }));
    expect(picker.pick()).toEqual({ status: "cancelled" });
  });

  it("treats an empty selection as a cancellation", () => {
    const picker = new DialogDirectoryPicker(ZENITY, () => spawnResult({ stdout: "  \n" }));
    expect(picker.pick()).toEqual({ status: "cancelled" });
  });

  it("reports a spawn error", () => {
    const picker = new DialogDirectoryPicker(ZENITY, () =>
      spawnResult({ status: null, error: new Error("spawn zenity ENOENT") })
    );
    expect(picker.pick()).toEqual({ status: "failed", error: "spawn zenity ENOENT" });
  });

  it("reports other exit statuses with their stderr", () => {
    const picker = new DialogDirectoryPicker(ZENITY, () =>
      spawnResult({ status: 255, stderr: "cannot open display\n" })
    );
    expect(picker.pick()).toEqual({ status: "failed", error: "cannot open display" });
  });

  it("names the command when stderr is empty", () => {
    const picker = new DialogDirectoryPicker(ZENITY, () => spawnResult({ status: 5 }));
    expect(picker.pick()).toEqual({ status: "failed", error: "zenity exited with status 5" });
  });
});

describe("dialogCommandFor", () => {
  it("needs a display on Linux", () => {
    expect(dialogCommandFor("linux", {})).toBeNull();
    expect(dialogCommandFor("linux", { DISPLAY: ":0" })?.command).toBe("zenity");
    expect(dialogCommandFor("linux", { WAYLAND_DISPLAY: "wayland-0" })?.command).toBe("zenity");
  });

  it("uses the native dialog on macOS and Windows", () => {
    expect(dialogCommandFor("darwin", {})?.command).toBe("osascript");
    expect(dialogCommandFor("win32", {})?.command).toBe("powershell.exe");
  });
});

describe("probeDirectoryPicker", () => {
  it("falls back to prompts without a display", () => {
    const run = vi.fn(() => spawnResult({}));
    const picker = probeDirectoryPicker("linux", {}, run);

    expect(picker.interactive).toBe(false);
    expect(run).not.toHaveBeenCalled();
  });

  it("falls back to prompts when zenity is missing", () => {
    const run = () => spawnResult({ status: null, error: new Error("spawn zenity ENOENT") });
    expect(probeDirectoryPicker("linux", { DISPLAY: ":0" }, run).interactive).toBe(false);
  });

  it("uses the dialog when zenity answers", () => {
    const run = vi.fn(() => spawnResult({ stdout: "4.0.1\n" }));
    const picker = probeDirectoryPicker("linux", { DISPLAY: ":0" }, run);

    expect(picker.interactive).toBe(true);
    expect(run).toHaveBeenCalledWith("zenity", ["--version"]);
  });

  it("does not probe on macOS", () => {
    const run = vi.fn(() => spawnResult({}));
    expect(probeDirectoryPicker("darwin", {}, run).interactive).toBe(true);
    expect(run).not.toHaveBeenCalled();
  });
});

describe("NoDirectoryPicker", () => {
  it("always reports that no picker is available", () => {
    const picker = new NoDirectoryPicker();
    expect(picker.interactive).toBe(false);
    expect(picker.pick()).toEqual({
      status: "failed",
      error: "No interactive folder picker available",
    });
  });
});
