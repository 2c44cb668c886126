import { z } from "zod";
import { JournalCorruptError } from "@acid-handle/core";
import type { CheckpointRecord, Journal, LogEntry, Recovered } from "../types";
import { openDb, type DB, type Statement } from "./db";

const eventRow = z.object({
  seq: z.number().int(),
  ts: z.string(),
  tag: z.string(),
  args_json: z.string().nullable(),
});

const checkpointRow = z.object({
  seq: z.number().int(),
  ts: z.string(),
  state_json: z.string(),
});

const countRow = z.object({ n: z.number().int() });

/**
 * Journal stored in SQLite: one row per event, one row per checkpoint.
 */
export class SqliteJournal implements Journal {
  public readonly name = "sqlite";
  readonly db: DB;
  private readonly ownsDb: boolean;
  private readonly insertEvent: Statement;
  private readonly insertCheckpoint: Statement;
  private readonly txAppend: (entries: LogEntry[]) => void;

  constructor(dbOrPath: DB | string) {
    this.db = openDb(dbOrPath);
    this.ownsDb = typeof dbOrPath === "string";

    this.insertEvent = this.db.prepare(
      `INSERT INTO events (seq, ts, tag, args_json, version)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(seq) DO NOTHING`,
    );
    this.insertCheckpoint = this.db.prepare(
      `INSERT INTO checkpoints (seq, ts, state_json, version)
       VALUES (?, ?, ?, ?)
       ON CONFLICT(seq) DO UPDATE SET ts = excluded.ts, state_json = excluded.state_json`,
    );
    this.txAppend = this.db.transaction((entries: LogEntry[]) => {
      for (const e of entries) {
        const args = e.args === undefined ? null : JSON.stringify(e.args);
        this.insertEvent.run(e.seq, e.ts, e.tag, args, e.version);
      }
    });
  }

  async open(): Promise<Recovered> {
    const checkpoint = this.latestCheckpoint();
    const after = checkpoint?.seq ?? 0;
    const rows = this.db.prepare(`SELECT seq, ts, tag, args_json FROM events WHERE seq > ? ORDER BY seq`).all(after);
    const entries = rows.map((row): LogEntry => {
      const parsed = eventRow.safeParse(row);
      if (!parsed.success) throw new JournalCorruptError(this.name, "malformed events row");
      const { seq, ts, tag, args_json } = parsed.data;
      return { seq, ts, tag, args: args_json === null ? undefined : parseJson(this.name, args_json), version: 1 };
    });
    return { checkpoint, entries };
  }

  /** Throws if `args` has no JSON form. */
  accepts(args: unknown): void {
    JSON.stringify(args);
  }

  appendBatch(entries: LogEntry[]): void {
    this.txAppend(entries);
  }

  checkpoint(record: CheckpointRecord): void {
    this.insertCheckpoint.run(record.seq, record.ts, JSON.stringify(record.state ?? null), record.version);
  }

  /** Number of stored events, including those covered by a checkpoint. */
  eventCount(): number {
    return count(this.db.prepare(`SELECT COUNT(*) AS n FROM events`).get());
  }

  checkpointCount(): number {
    return count(this.db.prepare(`SELECT COUNT(*) AS n FROM checkpoints`).get());
  }

  /** Delete events the newest checkpoint already covers. Returns how many were removed. */
  prune(): number {
    const checkpoint = this.latestCheckpoint();
    if (!checkpoint) return 0;
    return this.db.prepare(`DELETE FROM events WHERE seq <= ?`).run(checkpoint.seq).changes;
  }

  async health(): Promise<{ ok: boolean; detail?: string }> {
    try {
      this.db.prepare(`SELECT 1`).get();
      return { ok: true };
    } catch (err) {
      return { ok: false, detail: err instanceof Error ? err.message : String(err) };
    }
  }

  async drain(): Promise<void> {
    // Synchronous driver; nothing buffered. Only close connections we opened.
    if (this.ownsDb) this.db.close();
  }

  private latestCheckpoint(): CheckpointRecord | null {
    const row = this.db.prepare(`SELECT seq, ts, state_json FROM checkpoints ORDER BY seq DESC LIMIT 1`).get();
    if (row === undefined) return null;
    const parsed = checkpointRow.safeParse(row);
    if (!parsed.success) throw new JournalCorruptError(this.name, "malformed checkpoints row");
    const { seq, ts, state_json } = parsed.data;
    return { seq, ts, state: parseJson(this.name, state_json), version: 1 };
  }
}

function parseJson(journal: string, text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    throw new JournalCorruptError(journal, err instanceof Error ? err.message : String(err));
  }
}

function count(row: unknown): number {
  return countRow.parse(row).n;
}
