import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";

describe("Tracer", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "protonlink-tracer-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("createTrace returns a logger with convenience methods", async () => {
    const { Tracer } = await import("./tracer.js");
    const tracer = new Tracer(path.join(tmpDir, "trace.db"));
    const log = tracer.createTrace("link");

    log.info({ scope: "reconcile", op: "symlink", msg: "created link", slot: "primary" });
    log.error({ scope: "reconcile", op: "symlink", msg: "failed", slot: "fallback", error: "EACCES" });

    const all = tracer.query({ cmd: "link" });
    expect(all).toHaveLength(2);
    expect(all[0].traceId).toMatch(/^link-[0-9a-f]{8}$/);
    expect(all[1].traceId).toBe(log.traceId);

    tracer.close();
  });

  it("auto-creates snapshot on error", async () => {
    const snapshotDir = path.join(tmpDir, "snapshots");
    const { Tracer } = await import("./tracer.js");
    const tracer = new Tracer(path.join(tmpDir, "trace.db"), { snapshotDir });
    const log = tracer.createTrace("link");

    log.info({ scope: "scan", op: "list", msg: "found 3 releases" });
    log.error({ scope: "reconcile", op: "symlink", msg: "EACCES", slot: "fallback", error: "permission denied" });

    const snapshots = fs.readdirSync(snapshotDir);
    expect(snapshots.length).toBe(1);
    expect(snapshots[0]).toMatch(/\.jsonl$/);

    const content = fs.readFileSync(path.join(snapshotDir, snapshots[0]), "utf-8");
    const lines = content.trim().split("\n");
    expect(lines.length).toBe(2); // both entries from same trace
    expect(JSON.parse(lines[1]).error).toBe("permission denied");

    tracer.close();
  });

  it("debug level entries are skipped when debugMode is false", async () => {
    const { Tracer } = await import("./tracer.js");
    const tracer = new Tracer(path.join(tmpDir, "trace.db"), { debugMode: false });
    const log = tracer.createTrace("ls");

    log.debug({ scope: "scan", op: "stat", msg: "verbose detail" });
    log.info({ scope: "scan", op: "list", msg: "normal" });

    const all = tracer.query({});
    expect(all).toHaveLength(1);
    expect(all[0].level).toBe("info");

    tracer.close();
  });

  it("debug level entries are kept in debugMode", async () => {
    const { Tracer } = await import("./tracer.js");
    const tracer = new Tracer(path.join(tmpDir, "nested", "trace.db"), { debugMode: true });
    const log = tracer.createTrace("ls");

    log.debug({ scope: "scan", op: "stat", msg: "verbose detail" });

    expect(tracer.query({ level: "debug" })).toHaveLength(1);
    tracer.close();
  });
});
