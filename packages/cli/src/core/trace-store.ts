import Database from "better-sqlite3";
import type { LogEntry, LogLevel } from "@protonlink/core";

export interface TraceQueryOptions {
  traceId?: string;
  level?: LogLevel;
  cmd?: string;
  scope?: string;
  op?: string;
  family?: string;
  slot?: string;
  tag?: string;
  since?: number;
  limit?: number;
}

export interface TraceStoreOptions {
  maxRows?: number;
}

interface EventRow {
  id: number;
  ts: number;
  trace_id: string;
  level: string;
  cmd: string;
  scope: string;
  op: string;
  family: string | null;
  slot: string | null;
  tag: string | null;
  path: string | null;
  target: string | null;
  msg: string;
  dur: number | null;
  error: string | null;
  data: string | null;
}

const COLUMNS = [
  "ts", "trace_id", "level", "cmd", "scope", "op", "family", "slot",
  "tag", "path", "target", "msg", "dur", "error", "data",
] as const;

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function toLevel(value: string): LogLevel {
  return LEVELS.find((level) => level === value) ?? "info";
}

function parseData(raw: string | null): Record<string, unknown> | undefined {
  if (raw === null) return undefined;
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return { value: parsed };
}

export class TraceStore {
  private db: Database.Database;
  private maxRows: number;
  private insertStmt: Database.Statement;

  constructor(dbPath: string, opts?: TraceStoreOptions) {
    this.maxRows = opts?.maxRows ?? 50_000;
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.init();
    this.insertStmt = this.db.prepare(`
      INSERT INTO events (${COLUMNS.join(", ")})
      VALUES (${COLUMNS.map(() => "?").join(", ")})
    `);
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ts INTEGER NOT NULL,
        trace_id TEXT NOT NULL,
        level TEXT NOT NULL,
        cmd TEXT,
        scope TEXT,
        op TEXT,
        family TEXT,
        slot TEXT,
        tag TEXT,
        path TEXT,
        target TEXT,
        msg TEXT NOT NULL,
        dur INTEGER,
        error TEXT,
        data TEXT
      );
      CREATE INDEX IF NOT EXISTS idx_trace ON events(trace_id);
      CREATE INDEX IF NOT EXISTS idx_level ON events(level);
      CREATE INDEX IF NOT EXISTS idx_cmd ON events(cmd);
      CREATE INDEX IF NOT EXISTS idx_family ON events(family);
      CREATE INDEX IF NOT EXISTS idx_tag ON events(tag);
      CREATE INDEX IF NOT EXISTS idx_ts ON events(ts);
    `);
  }

  insert(entry: LogEntry): void {
    this.insertStmt.run(
      entry.ts,
      entry.traceId,
      entry.level,
      entry.cmd,
      entry.scope,
      entry.op,
      entry.family ?? null,
      entry.slot ?? null,
      entry.tag ?? null,
      entry.path ?? null,
      entry.target ?? null,
      entry.msg,
      entry.dur ?? null,
      entry.error ?? null,
      entry.data ? JSON.stringify(entry.data) : null,
    );
  }

  query(opts: TraceQueryOptions): LogEntry[] {
    const conditions: string[] = [];
    const params: unknown[] = [];

    const addFilter = (col: string, val: string | undefined) => {
      if (val !== undefined) {
        conditions.push(`${col} = ?`);
        params.push(val);
      }
    };

    addFilter("trace_id", opts.traceId);
    addFilter("level", opts.level);
    addFilter("cmd", opts.cmd);
    addFilter("scope", opts.scope);
    addFilter("op", opts.op);
    addFilter("family", opts.family);
    addFilter("slot", opts.slot);
    addFilter("tag", opts.tag);

    if (opts.since !== undefined) {
      conditions.push("ts >= ?");
      params.push(opts.since);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    params.push(opts.limit ?? 500);

    const rows = this.db
      .prepare(`SELECT * FROM events ${where} ORDER BY ts ASC, id ASC LIMIT ?`)
      .all(...params) as EventRow[];

    return rows.map((row) => ({
      ts: row.ts,
      traceId: row.trace_id,
      level: toLevel(row.level),
      cmd: row.cmd,
      scope: row.scope,
      op: row.op,
      family: row.family ?? undefined,
      slot: row.slot ?? undefined,
      tag: row.tag ?? undefined,
      path: row.path ?? undefined,
      target: row.target ?? undefined,
      msg: row.msg,
      dur: row.dur ?? undefined,
      error: row.error ?? undefined,
      data: parseData(row.data),
    }));
  }

  exportJsonl(opts: TraceQueryOptions): string {
    const entries = this.query(opts);
    return entries.map((e) => JSON.stringify(e)).join("\n");
  }

  count(): number {
    const row = this.db.prepare("SELECT COUNT(*) AS c FROM events").get() as { c: number };
    return row.c;
  }

  vacuum(): void {
    const count = this.count();
    if (count > this.maxRows) {
      const deleteCount = count - this.maxRows;
      this.db.prepare("DELETE FROM events WHERE id IN (SELECT id FROM events ORDER BY ts ASC, id ASC LIMIT ?)").run(deleteCount);
    }
  }

  close(): void {
    this.db.close();
  }
}
