import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as path from "node:path";
import { RootDirectoryError } from "@protonlink/core";
import { ensureWritableDirectory, readFileIfExists } from "./fs-helpers.js";
import { RecordingFileSystem, makeTmpRoot } from "../__tests__/helpers.js";

describe("fs-helpers", () => {
  let root: string;

  beforeEach(() => {
    root = makeTmpRoot();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe("readFileIfExists", () => {
    it("returns file content when file exists", async () => {
      fs.writeFileSync(path.join(root, "config.yaml"), "family: Proton-EM\n");
      expect(await readFileIfExists(path.join(root, "config.yaml"))).toBe("family: Proton-EM\n");
    });

    it("returns null when file does not exist", async () => {
      expect(await readFileIfExists(path.join(root, "missing.yaml"))).toBeNull();
    });
  });

  describe("ensureWritableDirectory", () => {
    it("creates a missing directory", async () => {
      const dir = path.join(root, "compat", "tools");
      await ensureWritableDirectory(dir, new RecordingFileSystem());
      expect(fs.statSync(dir).isDirectory()).toBe(true);
    });

    it("leaves no test file behind", async () => {
      await ensureWritableDirectory(root, new RecordingFileSystem());
      expect(fs.readdirSync(root)).toEqual([]);
    });

    it("accepts a symlink to a directory", async () => {
      fs.mkdirSync(path.join(root, "real"));
      fs.symlinkSync(path.join(root, "real"), path.join(root, "alias"));
      await expect(ensureWritableDirectory(path.join(root, "alias"), new RecordingFileSystem())).resolves.toBeUndefined();
    });

    it("rejects a path that is a file", async () => {
      const file = path.join(root, "not-a-dir");
      fs.writeFileSync(file, "");
      await expect(ensureWritableDirectory(file, new RecordingFileSystem())).rejects.toThrow(
        `Release root ${file} exists but is not a directory`
      );
    });

    it("reports an unwritable directory", async () => {
      const fsClient = new RecordingFileSystem();
      const testFile = path.join(root, `.protonlink-write-test-${process.pid}`);
      fsClient.failOn("writeFile", testFile);

      const error = await ensureWritableDirectory(root, fsClient).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(RootDirectoryError);
      expect(error).toHaveProperty(
        "message",
        `Release root ${root} is not writable: EACCES: permission denied, writeFile '${testFile}'`
      );
    });
  });
});
