import type { Logger } from "pino";
import {
  AcidCore,
  AcidStateClosedError,
  EncodeError,
  FutureCell,
  JournalCorruptError,
  JournalError,
  attempt,
  encodeJson,
  type AcidOps,
  type Acidic,
  type QueryEvent,
  type Tagged,
  type UpdateEvent,
} from "@acid-handle/core";
import type { Journal, LogEntry } from "../adapters/types";
import { getRootLogger } from "./logger";
import { Metrics } from "./metrics";

export type HostOptions = {
  clock?: () => string;
  batch?: { size?: number; intervalMs?: number };
  retry?: { attempts?: number; baseDelayMs?: number; maxDelayMs?: number };
  logger?: Logger;
  metrics?: Metrics;
};

type Pending = {
  entry: LogEntry;
  settle: () => void;
  fail: (err: unknown) => void;
};

type Barrier = { seq: number; cell: FutureCell<void> };

/**
 * Single-writer executor shared by every backend.
 *
 * Updates are applied to the in-memory state as they arrive and handed to the
 * journal in ordered batches; a cell is set once its batch is durable. Journal
 * calls never overlap.
 */
export class AcidHost<S> implements AcidOps<S> {
  readonly metrics: Metrics;
  private readonly logger: Logger;
  private readonly now: () => string;
  private readonly batchSize: number;
  private readonly batchIntervalMs: number;
  private readonly retry: { attempts: number; baseDelayMs: number; maxDelayMs: number };
  private seq: number;
  private durable: number;
  private checkpointed: number;
  private readonly queue: Pending[] = [];
  private barriers: Barrier[] = [];
  private readonly checkpoints = new Set<Promise<void>>();
  private flushing = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private lane: Promise<void> = Promise.resolve();
  private closed = false;
  private closing: Promise<void> | null = null;
  private failure: JournalError | null = null;

  private constructor(
    private readonly core: AcidCore<S>,
    readonly journal: Journal,
    seq: number,
    opts: HostOptions,
  ) {
    this.seq = seq;
    this.durable = seq;
    this.checkpointed = 0;
    this.now = opts.clock ?? (() => new Date().toISOString());
    this.batchSize = opts.batch?.size ?? 128;
    this.batchIntervalMs = opts.batch?.intervalMs ?? 0;
    this.retry = {
      attempts: opts.retry?.attempts ?? 5,
      baseDelayMs: opts.retry?.baseDelayMs ?? 100,
      maxDelayMs: opts.retry?.maxDelayMs ?? 2000,
    };
    this.logger = opts.logger ?? getRootLogger();
    this.metrics = opts.metrics ?? new Metrics({ state: core.name, journal: journal.name });
    this.metrics.set("acid_durable_seq", seq, "Highest journaled sequence number");
  }

  /**
   * Open `journal`, restore its checkpoint and replay the entries after it.
   * The journal is drained again if recovery fails.
   */
  static async open<S>(acidic: Acidic<S>, journal: Journal, opts: HostOptions = {}): Promise<AcidHost<S>> {
    const logger = (opts.logger ?? getRootLogger()).child({ component: journal.name, state: acidic.name });
    const recovered = await journal.open();
    try {
      const core = new AcidCore(acidic, acidic.initial());
      let seq = 0;
      if (recovered.checkpoint) {
        core.restore(core.decodeState(recovered.checkpoint.state));
        seq = recovered.checkpoint.seq;
      }
      for (const e of recovered.entries) {
        if (e.seq !== seq + 1) throw new JournalCorruptError(journal.name, `expected seq ${seq + 1}, found ${e.seq}`);
        core.replay(e.tag, e.args);
        seq = e.seq;
      }
      logger.info({ seq, replayed: recovered.entries.length }, "state opened");
      const host = new AcidHost(core, journal, seq, { ...opts, logger });
      host.checkpointed = recovered.checkpoint?.seq ?? 0;
      return host;
    } catch (err) {
      await journal.drain();
      throw err;
    }
  }

  /** True once `closeAcidState` has been called. */
  get isClosed(): boolean {
    return this.closed;
  }

  /** Sequence number of the last applied update. */
  get lastSeq(): number {
    return this.seq;
  }

  /** Sequence number of the last update known to be durable. */
  get durableSeq(): number {
    return this.durable;
  }

  /** Current state, including updates not yet durable. */
  snapshot(): S {
    return this.core.state();
  }

  async health(): Promise<{ ok: boolean; detail?: string }> {
    if (this.closed) return { ok: false, detail: "closed" };
    if (this.failure) return { ok: false, detail: this.failure.message };
    return (await this.journal.health?.()) ?? { ok: true };
  }

  scheduleUpdate<R>(event: UpdateEvent<S, R>): FutureCell<R> {
    this.assertWritable("scheduleUpdate");
    return this.schedule(event);
  }

  scheduleColdUpdate(event: Tagged): FutureCell<Uint8Array> {
    this.assertWritable("scheduleColdUpdate");
    const decoded = attempt(() => this.core.decodeColdUpdate(event));
    if (!decoded.ok) {
      this.metrics.inc("acid_update_errors_total");
      return FutureCell.rejected(decoded.error);
    }
    return this.schedule(decoded.value).map(encodeJson);
  }

  async query<R>(event: QueryEvent<S, R>): Promise<R> {
    this.assertOpen("query");
    this.metrics.inc("acid_queries_total", 1, "Queries answered");
    return this.core.runQuery(event);
  }

  async queryCold(event: Tagged): Promise<Uint8Array> {
    this.assertOpen("queryCold");
    this.metrics.inc("acid_queries_total", 1, "Queries answered");
    return encodeJson(this.core.runQuery(this.core.decodeColdQuery(event)));
  }

  /**
   * Persist the state as of now. Waits until the log is durable up to this
   * point; updates scheduled meanwhile are accepted and journaled as usual.
   */
  createCheckpoint(): Promise<void> {
    try {
      this.assertWritable("createCheckpoint");
    } catch (err) {
      return Promise.reject(err);
    }
    const run = this.checkpoint(this.seq, this.core.encodeState());
    this.checkpoints.add(run);
    const forget = () => {
      this.checkpoints.delete(run);
    };
    void run.then(forget, forget);
    return run;
  }

  /**
   * Refuse new work, wait for in-flight updates and checkpoints, then drain
   * the journal. Calling it again returns the first call's promise.
   */
  closeAcidState(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async checkpoint(seq: number, state: unknown): Promise<void> {
    await this.whenDurable(seq);
    const written = await this.exclusive(async () => {
      // a newer checkpoint already landed
      if (seq < this.checkpointed) return false;
      await this.journal.checkpoint({ seq, ts: this.now(), state, version: 1 });
      this.checkpointed = seq;
      return true;
    });
    if (!written) return;
    this.metrics.inc("acid_checkpoints_total", 1, "Checkpoints written");
    this.logger.info({ seq }, "checkpoint written");
  }

  private async shutdown(): Promise<void> {
    this.closed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    try {
      void this.flush();
      await this.whenDurable(this.seq);
      await Promise.allSettled([...this.checkpoints]);
    } finally {
      await this.journal.drain();
      this.logger.info({ seq: this.seq }, "state closed");
    }
  }

  private schedule<R>(event: UpdateEvent<S, R>): FutureCell<R> {
    // checked before applying so a refused update leaves no trace
    const storable = attempt(() => this.journal.accepts?.(event.args));
    if (!storable.ok) {
      this.metrics.inc("acid_update_errors_total", 1, "Updates that failed before reaching the journal");
      return FutureCell.rejected(new EncodeError(`arguments of ${event.tag}`, storable.error));
    }
    const applied = attempt(() => this.core.applyUpdate(event));
    if (!applied.ok) {
      this.metrics.inc("acid_update_errors_total", 1, "Updates that failed before reaching the journal");
      return FutureCell.rejected(applied.error);
    }
    this.metrics.inc("acid_updates_total", 1, "Updates applied");
    const result = applied.value;
    const cell = new FutureCell<R>();
    this.enqueue({
      entry: { seq: ++this.seq, ts: this.now(), tag: event.tag, args: event.args, version: 1 },
      settle: () => cell.fill(result),
      fail: err => cell.fail(err),
    });
    return cell;
  }

  private enqueue(p: Pending): void {
    this.queue.push(p);
    this.metrics.set("acid_journal_queue_depth", this.queue.length, "Updates waiting for the journal");
    if (this.queue.length >= this.batchSize) {
      void this.flush();
    } else if (!this.timer) {
      this.timer = setTimeout(() => {
        this.timer = null;
        void this.flush();
      }, this.batchIntervalMs);
    }
  }

  private async flush(): Promise<void> {
    if (this.flushing || this.failure || !this.queue.length) return;
    this.flushing = true;
    const batch = this.queue.splice(0, this.batchSize);
    try {
      await this.exclusive(() => this.appendWithRetry(batch.map(p => p.entry)));
      this.durable = batch[batch.length - 1].entry.seq;
      this.metrics.set("acid_durable_seq", this.durable);
      for (const p of batch) p.settle();
      this.releaseBarriers();
    } catch (err) {
      this.poison(err, batch);
    } finally {
      this.flushing = false;
      this.metrics.set("acid_journal_queue_depth", this.queue.length);
      // keep draining in order
      if (this.queue.length) queueMicrotask(() => void this.flush());
    }
  }

  private async appendWithRetry(entries: LogEntry[]): Promise<void> {
    for (let tries = 1; ; tries++) {
      try {
        await this.journal.appendBatch(entries);
        this.metrics.inc("acid_journal_batches_total", 1, "Batches written to the journal");
        return;
      } catch (err) {
        if (tries >= this.retry.attempts) throw err;
        const delay = Math.min(this.retry.baseDelayMs * 2 ** (tries - 1), this.retry.maxDelayMs);
        this.metrics.inc("acid_journal_retries_total", 1, "Journal appends retried");
        this.logger.warn({ err, attempt: tries, delay }, "journal append failed; retrying");
        await new Promise<void>(resolve => setTimeout(resolve, delay));
      }
    }
  }

  /** Updates already applied in memory can no longer be made durable: fail them and refuse new ones. */
  private poison(err: unknown, batch: Pending[]): void {
    const failure = new JournalError(this.journal.name, err);
    this.failure = failure;
    for (const p of [...batch, ...this.queue.splice(0)]) p.fail(failure);
    for (const b of this.barriers.splice(0)) b.cell.fail(failure);
    this.logger.error({ err }, "journal append failed; refusing further updates");
  }

  private whenDurable(seq: number): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    if (seq <= this.durable) return Promise.resolve();
    const cell = new FutureCell<void>();
    this.barriers.push({ seq, cell });
    return cell.take();
  }

  private releaseBarriers(): void {
    const ready = this.barriers.filter(b => b.seq <= this.durable);
    this.barriers = this.barriers.filter(b => b.seq > this.durable);
    for (const b of ready) b.cell.fill();
  }

  /** Run `fn` after every journal call issued before it. Failures reach the caller through the returned promise. */
  private exclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const run = this.lane.then(fn);
    this.lane = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private assertOpen(operation: string): void {
    if (this.closed) throw new AcidStateClosedError(operation);
  }

  private assertWritable(operation: string): void {
    this.assertOpen(operation);
    if (this.failure) throw this.failure;
  }
}
