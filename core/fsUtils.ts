/**
 * Small filesystem helpers shared by the store, workspace and snapshot code
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";

export function isErrnoException(
  error: unknown,
  code?: string,
): error is NodeJS.ErrnoException {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (code === undefined || error.code === code)
  );
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a UTF-8 file, or null if it does not exist
 */
export async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error: unknown) {
    if (isErrnoException(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

/**
 * Write through a temp file in the same directory, then rename over the target
 */
export async function writeFileAtomic(
  filePath: string,
  content: string | Buffer,
): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });

  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`,
  );

  try {
    await fs.writeFile(tempPath, content);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
