import fs from "node:fs";
import path from "node:path";
import { describeError, type RunLogger } from "./logger.js";

/**
 * Removes the immediate subdirectories of `targetDir` that are empty when
 * checked. Single pass: a folder emptied by a sibling's removal stays.
 */
export function removeEmptyFolders(targetDir: string, logger: RunLogger): string[] {
  const removed: string[] = [];

  for (const entry of fs.readdirSync(targetDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const folder = path.join(targetDir, entry.name);

    try {
      if (fs.readdirSync(folder).length > 0) continue;
      fs.rmdirSync(folder);
      removed.push(folder);
      logger.info(`Removed empty folder: ${folder}`);
    } catch (err) {
      logger.warning(`Could not remove folder ${folder}: ${describeError(err)}`);
    }
  }

  return removed;
}
