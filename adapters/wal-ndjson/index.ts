import { promises as fsp } from "fs";
import { constants } from "fs";
import { join } from "path";
import type { Logger } from "pino";
import { z } from "zod";
import { JournalCorruptError, StateLockedError } from "@acid-handle/core";
import type { CheckpointRecord, Journal, LogEntry, Recovered } from "../types";
import { appendAndFsync, isErrno, writeFileAtomic, type Handle } from "./fs-append";

const SEGMENT = /^events-(\d{12})\.ndjson$/;
const CHECKPOINT = "checkpoint.json";
const LOCK = "open.lock";
const ARCHIVE = "archive";

const entrySchema = z.object({
  seq: z.number().int().positive(),
  ts: z.string(),
  tag: z.string(),
  args: z.unknown(),
  version: z.literal(1),
});

const checkpointSchema = z.object({
  seq: z.number().int().nonnegative(),
  ts: z.string(),
  state: z.unknown(),
  version: z.literal(1),
});

export function segmentName(firstSeq: number): string {
  return `events-${String(firstSeq).padStart(12, "0")}.ndjson`;
}

type Segment = { name: string; start: number };

/**
 * On-disk journal: NDJSON log segments plus an atomically replaced checkpoint.
 * A checkpoint closes the current segment so that older segments can be archived.
 */
export class WalNdjsonJournal implements Journal {
  public readonly name = "wal-ndjson";
  private handle: Handle | null = null;
  private lock: Handle | null = null;
  private lastSeq = 0;
  private checkpointSeq = 0;

  constructor(
    readonly dir: string,
    private readonly opts: { logger?: Logger } = {},
  ) {}

  async open(): Promise<Recovered> {
    await fsp.mkdir(this.dir, { recursive: true });
    await this.acquireLock();
    try {
      const checkpoint = await this.readCheckpoint();
      this.checkpointSeq = checkpoint?.seq ?? 0;
      this.lastSeq = this.checkpointSeq;
      const entries = await this.readEntries();
      return { checkpoint, entries };
    } catch (err) {
      await this.releaseLock();
      throw err;
    }
  }

  /** Throws if `args` cannot be written as an NDJSON line. */
  accepts(args: unknown): void {
    assertNoBinary(args);
    JSON.stringify(args);
  }

  async appendBatch(entries: LogEntry[]): Promise<void> {
    for (const e of entries) this.accepts(e.args);
    const fresh = entries.filter(e => e.seq > this.lastSeq);
    if (!fresh.length) return;
    const handle = await this.segment(fresh[0].seq);
    const { size } = await handle.stat();
    const lines = fresh.map(e => JSON.stringify(e)).join("\n") + "\n";
    try {
      await appendAndFsync(handle, lines);
    } catch (err) {
      await this.rollback(handle, size);
      throw err;
    }
    this.lastSeq = fresh[fresh.length - 1].seq;
  }

  async checkpoint(record: CheckpointRecord): Promise<void> {
    await writeFileAtomic(join(this.dir, CHECKPOINT), JSON.stringify(record));
    this.checkpointSeq = record.seq;
    // next append starts a new segment
    if (this.handle) {
      await this.handle.close();
      this.handle = null;
    }
  }

  /**
   * Move log segments wholly covered by the last checkpoint into `archive/`.
   * Returns the archived file names, oldest first.
   */
  async createArchive(): Promise<string[]> {
    const segments = await this.listSegments();
    const archived: string[] = [];
    for (let i = 0; i + 1 < segments.length; i++) {
      if (segments[i + 1].start - 1 > this.checkpointSeq) break;
      if (!archived.length) await fsp.mkdir(join(this.dir, ARCHIVE), { recursive: true });
      const { name } = segments[i];
      await fsp.rename(join(this.dir, name), join(this.dir, ARCHIVE, name));
      archived.push(name);
    }
    return archived;
  }

  async health(): Promise<{ ok: boolean; detail?: string }> {
    try {
      await fsp.access(this.dir, constants.W_OK);
      return { ok: true };
    } catch (err) {
      return { ok: false, detail: err instanceof Error ? err.message : String(err) };
    }
  }

  async drain(): Promise<void> {
    if (this.handle) {
      await this.handle.sync();
      await this.handle.close();
      this.handle = null;
    }
    await this.releaseLock();
  }

  private async segment(firstSeq: number): Promise<Handle> {
    if (!this.handle) this.handle = await fsp.open(join(this.dir, segmentName(firstSeq)), "a");
    return this.handle;
  }

  private async rollback(handle: Handle, size: number): Promise<void> {
    try {
      await handle.truncate(size);
    } catch (err) {
      this.opts.logger?.warn({ err, size }, "could not truncate a partially written batch");
    }
  }

  private async listSegments(): Promise<Segment[]> {
    const names = await fsp.readdir(this.dir);
    const segments: Segment[] = [];
    for (const name of names) {
      const m = SEGMENT.exec(name);
      if (m) segments.push({ name, start: Number(m[1]) });
    }
    return segments.sort((a, b) => a.start - b.start);
  }

  private async readCheckpoint(): Promise<CheckpointRecord | null> {
    let text: string;
    try {
      text = await fsp.readFile(join(this.dir, CHECKPOINT), "utf8");
    } catch (err) {
      if (isErrno(err, "ENOENT")) return null;
      throw err;
    }
    const parsed = checkpointSchema.safeParse(parseLine(text));
    if (!parsed.success) throw new JournalCorruptError(this.name, `${CHECKPOINT} is malformed`);
    return { ...parsed.data, state: parsed.data.state };
  }

  /** Entries after the checkpoint, in seq order. Repeated entries from a retried batch are skipped. */
  private async readEntries(): Promise<LogEntry[]> {
    const out: LogEntry[] = [];
    const segments = await this.listSegments();
    for (const [i, seg] of segments.entries()) {
      const file = join(this.dir, seg.name);
      const text = await fsp.readFile(file, "utf8");
      const end = text.lastIndexOf("\n") + 1;
      if (end < text.length) {
        if (i !== segments.length - 1) throw new JournalCorruptError(this.name, `${seg.name} ends mid-entry`);
        this.opts.logger?.warn({ file, bytes: text.length - end }, "dropping torn entry at end of log");
        await fsp.truncate(file, Buffer.byteLength(text.slice(0, end), "utf8"));
      }
      const lines = text.slice(0, end).split("\n").filter(line => line.length > 0);
      for (const [n, line] of lines.entries()) {
        const parsed = entrySchema.safeParse(parseLine(line));
        if (!parsed.success) throw new JournalCorruptError(this.name, `${seg.name}:${n + 1} is malformed`);
        const entry: LogEntry = { ...parsed.data, args: parsed.data.args };
        if (entry.seq <= this.lastSeq) continue;
        if (entry.seq !== this.lastSeq + 1) {
          throw new JournalCorruptError(this.name, `expected seq ${this.lastSeq + 1}, found ${entry.seq}`);
        }
        out.push(entry);
        this.lastSeq = entry.seq;
      }
    }
    return out;
  }

  private async acquireLock(): Promise<void> {
    const path = join(this.dir, LOCK);
    let handle: Handle;
    try {
      handle = await createLock(path, this.dir);
    } catch (err) {
      if (!(err instanceof StateLockedError) || !(await this.isStale(path))) throw err;
      await fsp.rm(path, { force: true });
      handle = await createLock(path, this.dir);
    }
    this.lock = handle;
    await handle.writeFile(String(process.pid), { encoding: "utf8" });
  }

  /** A lock is stale when the process it names is gone. */
  private async isStale(path: string): Promise<boolean> {
    let text: string;
    try {
      text = await fsp.readFile(path, "utf8");
    } catch (err) {
      if (isErrno(err, "ENOENT")) return true;
      throw err;
    }
    const holder = text.trim();
    // an empty lock is one whose owner has not written its pid yet
    if (!holder) return false;
    const pid = Number(holder);
    if (Number.isInteger(pid) && pid > 0 && isAlive(pid)) return false;
    this.opts.logger?.warn({ path, holder }, "taking over a lock left by a process that is gone");
    return true;
  }

  private async releaseLock(): Promise<void> {
    if (!this.lock) return;
    await this.lock.close();
    this.lock = null;
    await fsp.unlink(join(this.dir, LOCK));
  }
}

async function createLock(path: string, dir: string): Promise<Handle> {
  try {
    return await fsp.open(path, "wx");
  } catch (err) {
    if (isErrno(err, "EEXIST")) throw new StateLockedError(dir);
    throw err;
  }
}

function isAlive(pid: number): boolean {
  try {
    // signal 0 only checks that the process exists
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return isErrno(err, "EPERM");
  }
}

function parseLine(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

function assertNoBinary(x: unknown): void {
  const visit = (v: unknown): void => {
    if (v == null) return;
    if (v instanceof Uint8Array) throw new Error("wal-ndjson cannot serialize binary values");
    if (Array.isArray(v)) {
      for (const it of v) visit(it);
      return;
    }
    if (typeof v === "object") for (const it of Object.values(v)) visit(it);
  };
  visit(x);
}
