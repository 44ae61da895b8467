import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { NodeFileSystemClient, errorCode, isNotFound, isPermissionDenied } from "./fs-client.js";
import { makeTmpRoot } from "../__tests__/helpers.js";

function errnoError(code: string): Error {
  return Object.assign(new Error(code), { code });
}

describe("fs-client", () => {
  describe("error classification", () => {
    it("reads the errno code", () => {
      expect(errorCode(errnoError("EACCES"))).toBe("EACCES");
      expect(errorCode(new Error("plain"))).toBeUndefined();
      expect(errorCode("EACCES")).toBeUndefined();
    });

    it("treats ENOENT and ENOTDIR as not found", () => {
      expect(isNotFound(errnoError("ENOENT"))).toBe(true);
      expect(isNotFound(errnoError("ENOTDIR"))).toBe(true);
      expect(isNotFound(errnoError("EACCES"))).toBe(false);
    });

    it("treats EACCES and EPERM as permission denied", () => {
      expect(isPermissionDenied(errnoError("EACCES"))).toBe(true);
      expect(isPermissionDenied(errnoError("EPERM"))).toBe(true);
      expect(isPermissionDenied(errnoError("ENOENT"))).toBe(false);
    });
  });

  describe("NodeFileSystemClient", () => {
    const client = new NodeFileSystemClient();
    let root: string;

    beforeEach(() => {
      root = makeTmpRoot();
    });

    afterEach(() => {
      fs.rmSync(root, { recursive: true, force: true });
    });

    it("reports each kind of entry without following symlinks", async () => {
      fs.mkdirSync(path.join(root, "dir"));
      fs.writeFileSync(path.join(root, "file"), "");
      fs.symlinkSync(path.join(root, "dir"), path.join(root, "link"));

      expect(await client.entryKind(path.join(root, "dir"))).toBe("directory");
      expect(await client.entryKind(path.join(root, "file"))).toBe("file");
      expect(await client.entryKind(path.join(root, "link"))).toBe("symlink");
      expect(await client.entryKind(path.join(root, "missing"))).toBe("absent");
    });

    it("resolves a symlink to its real path", async () => {
      fs.mkdirSync(path.join(root, "GE-Proton10-20"));
      await client.symlink("GE-Proton10-20", path.join(root, "GE-Proton"));

      expect(await client.readLink(path.join(root, "GE-Proton"))).toBe("GE-Proton10-20");
      expect(await client.resolve(path.join(root, "GE-Proton"))).toBe(path.join(root, "GE-Proton10-20"));
    });

    it("returns null for a dangling symlink", async () => {
      fs.symlinkSync(path.join(root, "gone"), path.join(root, "GE-Proton"));
      expect(await client.resolve(path.join(root, "GE-Proton"))).toBeNull();
    });

    it("returns null for a symlink cycle", async () => {
      fs.symlinkSync(path.join(root, "b"), path.join(root, "a"));
      fs.symlinkSync(path.join(root, "a"), path.join(root, "b"));
      expect(await client.resolve(path.join(root, "a"))).toBeNull();
    });

    it("removes a directory tree", async () => {
      fs.mkdirSync(path.join(root, "GE-Proton9-15", "files"), { recursive: true });
      await client.removeTree(path.join(root, "GE-Proton9-15"));
      expect(fs.existsSync(path.join(root, "GE-Proton9-15"))).toBe(false);
    });

    it("throws with the errno code when reading a missing directory", async () => {
      const error = await client.readDir(path.join(root, "missing")).catch((e: unknown) => e);
      expect(isNotFound(error)).toBe(true);
    });
  });
});
