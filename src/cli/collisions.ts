import fs from "node:fs";
import path from "node:path";

export type ExistsProbe = (filePath: string) => boolean;

/**
 * Returns a name that does not exist yet inside `folder`. Taken names get a
 * `_copy_<n>` suffix between stem and extension, counting up from 1.
 */
export function resolveCollision(
  folder: string,
  filename: string,
  exists: ExistsProbe = fs.existsSync
): string {
  if (!exists(path.join(folder, filename))) return filename;

  const { name, ext } = path.parse(filename);
  let counter = 1;
  let candidate = `${name}_copy_${counter}${ext}`;
  while (exists(path.join(folder, candidate))) {
    counter++;
    candidate = `${name}_copy_${counter}${ext}`;
  }
  return candidate;
}
