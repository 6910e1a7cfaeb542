// Helper availability check. A plain search-path walk against the filesystem,
// the same lookup `command -v` performs, without spawning anything.
import { accessSync, statSync, constants } from "node:fs";
import { delimiter, join } from "node:path";

/** Regular file (symlinks followed) that the current user may execute. */
export function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve `name` against `searchPath` (a PATH-style list). Names containing a
 * slash are checked as given. An empty list entry stands for the current
 * directory; an empty list finds nothing.
 */
export function findExecutable(name: string, searchPath: string): string | null {
  if (name === "") return null;
  if (name.includes("/")) return isExecutableFile(name) ? name : null;
  if (searchPath === "") return null;

  for (const dir of searchPath.split(delimiter)) {
    const candidate = dir === "" ? join(".", name) : join(dir, name);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}
