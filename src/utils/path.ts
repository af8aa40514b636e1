/**
 * Path validation and manipulation utilities
 */

import * as os from "node:os";
import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(normalizedDir + path.sep) ||
    normalizedPath === normalizedDir
  );
}

/**
 * Expand a leading `~` to the current user's home directory.
 */
export function expandHome(input: string): string {
  if (input === "~") return os.homedir();
  if (input.startsWith("~/") || input.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

/**
 * Slot ids always use forward slashes, whatever the platform.
 */
export function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

/**
 * Directory holding a slot's archives: `<backupRoot>/<slotId>`.
 */
export function slotBackupDir(backupRoot: string, slotId: string): string {
  return path.join(backupRoot, ...slotId.split("/"));
}
