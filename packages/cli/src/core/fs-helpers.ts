/**
 * Shared filesystem helpers used across CLI modules.
 */
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { RootDirectoryError, errorMessage } from "@protonlink/core";
import { isNotFound, type FileSystemClient } from "./fs-client.js";

export async function readFileIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

/**
 * Make sure a release root exists, is a directory (possibly through a
 * symlink) and accepts new entries.
 */
export async function ensureWritableDirectory(dir: string, fsClient: FileSystemClient): Promise<void> {
  const resolved = await fsClient.resolve(dir);
  if (resolved === null) {
    try {
      await fsClient.mkdir(dir);
    } catch (error) {
      throw new RootDirectoryError(dir, `could not be created: ${errorMessage(error)}`, { cause: error });
    }
  } else if ((await fsClient.entryKind(resolved)) !== "directory") {
    throw new RootDirectoryError(dir, "exists but is not a directory");
  }

  const testFile = path.join(dir, `.protonlink-write-test-${process.pid}`);
  try {
    await fsClient.writeFile(testFile, "");
    await fsClient.unlink(testFile);
  } catch (error) {
    throw new RootDirectoryError(dir, `is not writable: ${errorMessage(error)}`, { cause: error });
  }
}
