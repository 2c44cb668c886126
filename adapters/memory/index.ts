import type { CheckpointRecord, Journal, LogEntry, Recovered } from "../types";

/** Journal that keeps everything in process memory. */
export class MemoryJournal implements Journal {
  public readonly name = "memory";
  private readonly log: LogEntry[];
  private last: CheckpointRecord | null;

  constructor(seed: Partial<Recovered> = {}) {
    this.log = [...(seed.entries ?? [])];
    this.last = seed.checkpoint ?? null;
  }

  async open(): Promise<Recovered> {
    const after = this.last?.seq ?? 0;
    return { checkpoint: this.last, entries: this.log.filter(e => e.seq > after) };
  }

  appendBatch(entries: LogEntry[]): void {
    const tail = this.log.length ? this.log[this.log.length - 1].seq : 0;
    for (const e of entries) if (e.seq > tail) this.log.push(e);
  }

  checkpoint(record: CheckpointRecord): void {
    this.last = record;
  }

  /** Entries appended so far, including those covered by a checkpoint. */
  entries(): readonly LogEntry[] {
    return this.log;
  }

  lastCheckpoint(): CheckpointRecord | null {
    return this.last;
  }

  async health(): Promise<{ ok: boolean }> {
    return { ok: true };
  }

  async drain(): Promise<void> {
    // nothing buffered
  }
}
