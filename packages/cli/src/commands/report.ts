/**
 * Report command: query the trace log.
 *
 *   protonlink report --since 1d --level error
 *   protonlink --family Proton-EM report --format table
 */
import { Command, InvalidArgumentError, Option, type OptionValues } from "commander";
import type { LogEntry, LogLevel } from "@protonlink/core";
import { getTracer } from "../core/global-tracer.js";
import type { TraceQueryOptions } from "../core/trace-store.js";
import { runAction } from "./context.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const UNIT_MS = { m: 60_000, h: 3_600_000, d: 86_400_000 };

/** "30m", "1h", "7d" or an ISO date → epoch milliseconds */
export function parseSince(since: string, now: number = Date.now()): number {
  const match = /^(\d+)([mhd])$/.exec(since);
  if (match) {
    const unit = match[2] === "m" ? UNIT_MS.m : match[2] === "h" ? UNIT_MS.h : UNIT_MS.d;
    return now - Number.parseInt(match[1], 10) * unit;
  }
  const ts = new Date(since).getTime();
  if (Number.isNaN(ts)) {
    throw new InvalidArgumentError("Expected 30m, 1h, 7d or an ISO date.");
  }
  return ts;
}

export function parseLimit(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0 || String(n) !== value) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

function stringValue(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function buildTraceQuery(values: OptionValues): TraceQueryOptions {
  const level = LOG_LEVELS.find((l) => l === values.level);
  return {
    family: stringValue(values.family),
    cmd: stringValue(values.cmd),
    level,
    tag: stringValue(values.tag),
    traceId: stringValue(values.trace),
    since: typeof values.since === "number" ? values.since : undefined,
    limit: typeof values.limit === "number" ? values.limit : undefined,
  };
}

export function formatTraceTable(entries: readonly LogEntry[]): string[] {
  const lines = [
    `${"TIME".padEnd(24)} ${"LEVEL".padEnd(6)} ${"CMD".padEnd(8)} ${"FAMILY".padEnd(10)} ${"SLOT".padEnd(10)} MSG`,
  ];
  for (const e of entries) {
    const time = new Date(e.ts).toISOString().slice(0, 23);
    lines.push(
      `${time.padEnd(24)} ${e.level.padEnd(6)} ${e.cmd.padEnd(8)} ${(e.family ?? "-").padEnd(10)} ${(e.slot ?? "-").padEnd(10)} ${e.msg}`
    );
  }
  return lines;
}

export const reportCommand = new Command("report")
  .description("Query the trace log")
  .option("--cmd <cmd>", "Filter by command (link, ls, rm, relink)")
  .addOption(new Option("--level <level>", "Filter by log level").choices(LOG_LEVELS))
  .option("--tag <tag>", "Filter by release tag")
  .option("--trace <traceId>", "Filter by trace ID")
  .option("--since <time>", "Time filter: 30m, 1h, 7d or an ISO date", parseSince)
  .option("--limit <n>", "Max entries to return", parseLimit, 100)
  .addOption(new Option("--format <fmt>", "Output format").choices(["jsonl", "table"]).default("jsonl"))
  .action(async (_options: unknown, command: Command) => {
    await runAction(async () => {
      const values = command.optsWithGlobals();
      const entries = getTracer().query(buildTraceQuery(values));
      const lines = values.format === "table" ? formatTraceTable(entries) : entries.map((e) => JSON.stringify(e));
      for (const line of lines) {
        console.log(line);
      }
    });
  });
