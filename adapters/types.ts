export type LogEntry = {
  seq: number;
  ts: string;
  tag: string;
  args: unknown;
  version: 1;
};

export type CheckpointRecord = {
  /** Last log entry the state includes. */
  seq: number;
  ts: string;
  state: unknown;
  version: 1;
};

/** What a journal holds on open: the newest checkpoint and the entries after it, in order. */
export type Recovered = {
  checkpoint: CheckpointRecord | null;
  entries: LogEntry[];
};

/**
 * Durability collaborator of a backend. The host applies updates in memory
 * and hands the journal ordered batches to persist.
 */
export interface Journal {
  name: string;
  /** Acquire the underlying storage and load what it holds. */
  open(): Promise<Recovered>;
  /**
   * Persist a batch. Resolves once the batch is durable. A batch may be
   * retried after a failure, so entries whose `seq` is already stored must be
   * tolerated.
   */
  appendBatch(entries: LogEntry[]): Promise<void> | void;
  /** Throws if the journal cannot store `args`. Checked before an update is applied. */
  accepts?(args: unknown): void;
  checkpoint(record: CheckpointRecord): Promise<void> | void;
  health?(): Promise<{ ok: boolean; detail?: string }>;
  /** Flush and release resources. */
  drain(): Promise<void>;
}
