/**
 * Filesystem provider used by the link pipeline.
 *
 * Lookups report absence as a value; only genuine failures (permission
 * denied, I/O errors) are thrown, and they keep Node's error `code`.
 */

import * as fs from "node:fs/promises";

// ============================================================================
// Types
// ============================================================================

export type PathKind = "absent" | "directory" | "file" | "symlink";

export interface FileSystemClient {
  /** Names of the immediate children of a directory */
  readDir(dir: string): Promise<string[]>;
  /** What occupies a path, without following a symlink at the path itself */
  entryKind(p: string): Promise<PathKind>;
  /** Raw value stored in a symlink */
  readLink(p: string): Promise<string>;
  /** Fully resolved real path, or null when it does not resolve (missing or dangling) */
  resolve(p: string): Promise<string | null>;
  /** Create a directory symlink at `linkPath` whose stored value is `target` */
  symlink(target: string, linkPath: string): Promise<void>;
  unlink(p: string): Promise<void>;
  removeTree(p: string): Promise<void>;
  mkdir(p: string): Promise<void>;
  writeFile(p: string, data: string): Promise<void>;
}

// ============================================================================
// Error classification
// ============================================================================

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function isNotFound(error: unknown): boolean {
  const code = errorCode(error);
  return code === "ENOENT" || code === "ENOTDIR";
}

export function isPermissionDenied(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EACCES" || code === "EPERM";
}

// ============================================================================
// Node implementation
// ============================================================================

export class NodeFileSystemClient implements FileSystemClient {
  async readDir(dir: string): Promise<string[]> {
    return fs.readdir(dir);
  }

  async entryKind(p: string): Promise<PathKind> {
    try {
      const stats = await fs.lstat(p);
      if (stats.isSymbolicLink()) return "symlink";
      if (stats.isDirectory()) return "directory";
      return "file";
    } catch (error) {
      if (isNotFound(error)) return "absent";
      throw error;
    }
  }

  async readLink(p: string): Promise<string> {
    return fs.readlink(p);
  }

  async resolve(p: string): Promise<string | null> {
    try {
      return await fs.realpath(p);
    } catch (error) {
      // ELOOP: a symlink cycle never resolves either
      if (isNotFound(error) || errorCode(error) === "ELOOP") return null;
      throw error;
    }
  }

  async symlink(target: string, linkPath: string): Promise<void> {
    await fs.symlink(target, linkPath, "dir");
  }

  async unlink(p: string): Promise<void> {
    await fs.unlink(p);
  }

  async removeTree(p: string): Promise<void> {
    await fs.rm(p, { recursive: true });
  }

  async mkdir(p: string): Promise<void> {
    await fs.mkdir(p, { recursive: true });
  }

  async writeFile(p: string, data: string): Promise<void> {
    await fs.writeFile(p, data, "utf-8");
  }
}

export const nodeFileSystem: FileSystemClient = new NodeFileSystemClient();
