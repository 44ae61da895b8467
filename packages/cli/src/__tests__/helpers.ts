/**
 * Shared fixtures for filesystem tests: temp release roots, an in-memory
 * trace logger and a filesystem wrapper that records mutations and injects
 * failures.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createLogEntry, type LogEntry, type LogLevel } from "@protonlink/core";
import { nodeFileSystem, type FileSystemClient, type PathKind } from "../core/fs-client.js";
import type { TraceFields, TraceLogger } from "../core/tracer.js";

// ============================================================================
// Release roots
// ============================================================================

/** Fresh directory under the OS temp dir, returned as its real path */
export function makeTmpRoot(): string {
  return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "protonlink-test-")));
}

export function makeReleases(root: string, names: readonly string[]): void {
  for (const name of names) {
    fs.mkdirSync(path.join(root, name), { recursive: true });
    fs.writeFileSync(path.join(root, name, "version"), name);
  }
}

export function readLinkOrNull(p: string): string | null {
  try {
    return fs.readlinkSync(p);
  } catch {
    return null;
  }
}

// ============================================================================
// Logger
// ============================================================================

export interface MemoryLogger extends TraceLogger {
  entries: LogEntry[];
}

export function createMemoryLogger(cmd = "test"): MemoryLogger {
  const entries: LogEntry[] = [];
  const traceId = `${cmd}-00000000`;
  const log = (level: LogLevel) => (fields: TraceFields) => {
    entries.push(createLogEntry({ ...fields, traceId, level, cmd }));
  };
  return {
    entries,
    traceId,
    debug: log("debug"),
    info: log("info"),
    warn: log("warn"),
    error: log("error"),
  };
}

// ============================================================================
// Filesystem wrapper
// ============================================================================

export type FsOperation = keyof FileSystemClient;

const MUTATIONS: readonly FsOperation[] = ["symlink", "unlink", "removeTree", "mkdir", "writeFile"];

const ERRNO_DESCRIPTIONS: Record<string, string> = {
  EACCES: "permission denied",
  EPERM: "operation not permitted",
  EIO: "i/o error",
};

export interface RecordedCall {
  op: FsOperation;
  path: string;
}

/**
 * Delegates to a real filesystem client. Records every mutating call and
 * throws a Node-style error for calls registered with `failOn`.
 */
export class RecordingFileSystem implements FileSystemClient {
  readonly mutations: RecordedCall[] = [];
  private readonly faults = new Map<string, string>();

  constructor(private readonly inner: FileSystemClient = nodeFileSystem) {}

  /** Make `op` on `p` fail with the given errno code */
  failOn(op: FsOperation, p: string, code = "EACCES"): void {
    this.faults.set(`${op}:${p}`, code);
  }

  resetMutations(): void {
    this.mutations.length = 0;
  }

  private before(op: FsOperation, p: string): void {
    const code = this.faults.get(`${op}:${p}`);
    if (code !== undefined) {
      const description = ERRNO_DESCRIPTIONS[code] ?? "failed";
      throw Object.assign(new Error(`${code}: ${description}, ${op} '${p}'`), { code });
    }
    if (MUTATIONS.includes(op)) {
      this.mutations.push({ op, path: p });
    }
  }

  async readDir(dir: string): Promise<string[]> {
    this.before("readDir", dir);
    return this.inner.readDir(dir);
  }

  async entryKind(p: string): Promise<PathKind> {
    this.before("entryKind", p);
    return this.inner.entryKind(p);
  }

  async readLink(p: string): Promise<string> {
    this.before("readLink", p);
    return this.inner.readLink(p);
  }

  async resolve(p: string): Promise<string | null> {
    this.before("resolve", p);
    return this.inner.resolve(p);
  }

  async symlink(target: string, linkPath: string): Promise<void> {
    this.before("symlink", linkPath);
    return this.inner.symlink(target, linkPath);
  }

  async unlink(p: string): Promise<void> {
    this.before("unlink", p);
    return this.inner.unlink(p);
  }

  async removeTree(p: string): Promise<void> {
    this.before("removeTree", p);
    return this.inner.removeTree(p);
  }

  async mkdir(p: string): Promise<void> {
    this.before("mkdir", p);
    return this.inner.mkdir(p);
  }

  async writeFile(p: string, data: string): Promise<void> {
    this.before("writeFile", p);
    return this.inner.writeFile(p, data);
  }
}
