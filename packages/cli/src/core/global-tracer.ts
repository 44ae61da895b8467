import path from "node:path";
import { getProtonLinkHome } from "@protonlink/core";
import { Tracer } from "./tracer.js";

export interface GlobalTracerOptions {
  maxRows?: number;
}

let _tracer: Tracer | null = null;

/**
 * Process-wide tracer under ~/.protonlink/traces. Options only apply to the
 * first call; later calls return the same instance.
 */
export function getTracer(opts?: GlobalTracerOptions): Tracer {
  if (!_tracer) {
    const tracesDir = path.join(getProtonLinkHome(), "traces");
    _tracer = new Tracer(path.join(tracesDir, "trace.db"), {
      snapshotDir: path.join(tracesDir, "snapshots"),
      debugMode: process.argv.includes("--debug"),
      maxRows: opts?.maxRows,
    });
  }
  return _tracer;
}

export function closeTracer(): void {
  if (_tracer) {
    _tracer.vacuum();
    _tracer.close();
    _tracer = null;
  }
}

// Auto-vacuum on process exit
process.on("exit", () => {
  if (_tracer) {
    try {
      _tracer.vacuum();
      _tracer.close();
    } catch (error) {
      process.stderr.write(`protonlink: failed to close trace store: ${String(error)}\n`);
    }
    _tracer = null;
  }
});
