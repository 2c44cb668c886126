import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fsp } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { JournalCorruptError, StateLockedError } from '@acid-handle/core';
import type { LogEntry } from '../../types';
import { WalNdjsonJournal, segmentName } from '../index';

const ts = '2024-01-01T00:00:00.000Z';
const entry = (seq: number, args: unknown = seq): LogEntry => ({ seq, ts, tag: 'add', args, version: 1 });
const line = (e: LogEntry) => JSON.stringify(e) + '\n';

describe('WalNdjsonJournal', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(join(tmpdir(), 'acid-wal-'));
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it('names segments after their first seq', () => {
    expect(segmentName(1)).toBe('events-000000000001.ndjson');
    expect(segmentName(1234)).toBe('events-000000001234.ndjson');
  });

  it('starts empty and recovers appended entries', async () => {
    const wal = new WalNdjsonJournal(dir);
    expect(await wal.open()).toEqual({ checkpoint: null, entries: [] });
    await wal.appendBatch([entry(1), entry(2)]);
    await wal.appendBatch([entry(3)]);
    await wal.drain();

    expect((await fsp.readdir(dir)).sort()).toEqual(['events-000000000001.ndjson']);
    const again = new WalNdjsonJournal(dir);
    expect(await again.open()).toEqual({ checkpoint: null, entries: [entry(1), entry(2), entry(3)] });
    await again.drain();
  });

  it('does not write an entry twice when a batch is retried', async () => {
    const wal = new WalNdjsonJournal(dir);
    await wal.open();
    await wal.appendBatch([entry(1), entry(2)]);
    await wal.appendBatch([entry(2), entry(3)]);
    await wal.drain();
    const text = await fsp.readFile(join(dir, segmentName(1)), 'utf8');
    expect(text).toBe(line(entry(1)) + line(entry(2)) + line(entry(3)));
  });

  it('skips repeated entries found on disk', async () => {
    await fsp.writeFile(join(dir, segmentName(1)), line(entry(1)) + line(entry(2)) + line(entry(2)) + line(entry(3)));
    const wal = new WalNdjsonJournal(dir);
    const { entries } = await wal.open();
    expect(entries.map(e => e.seq)).toEqual([1, 2, 3]);
    await wal.drain();
  });

  it('keeps entries without arguments', async () => {
    const wal = new WalNdjsonJournal(dir);
    await wal.open();
    await wal.appendBatch([{ seq: 1, ts, tag: 'reset', args: undefined, version: 1 }]);
    await wal.drain();
    const again = new WalNdjsonJournal(dir);
    const { entries } = await again.open();
    expect(entries).toEqual([{ seq: 1, ts, tag: 'reset', args: undefined, version: 1 }]);
    await again.drain();
  });

  it('cuts a segment at each checkpoint and archives covered segments', async () => {
    const wal = new WalNdjsonJournal(dir);
    await wal.open();
    await wal.appendBatch([entry(1), entry(2)]);
    await wal.checkpoint({ seq: 2, ts, state: { value: 3 }, version: 1 });
    await wal.appendBatch([entry(3)]);

    const segments = (await fsp.readdir(dir)).filter(n => n.endsWith('.ndjson')).sort();
    expect(segments).toEqual([segmentName(1), segmentName(3)]);
    expect(await wal.createArchive()).toEqual([segmentName(1)]);
    expect(await fsp.readdir(join(dir, 'archive'))).toEqual([segmentName(1)]);
    expect(await wal.createArchive()).toEqual([]);
    await wal.drain();

    const again = new WalNdjsonJournal(dir);
    expect(await again.open()).toEqual({
      checkpoint: { seq: 2, ts, state: { value: 3 }, version: 1 },
      entries: [entry(3)],
    });
    await again.drain();
  });

  it('leaves the current segment alone when no checkpoint covers it', async () => {
    const wal = new WalNdjsonJournal(dir);
    await wal.open();
    await wal.appendBatch([entry(1)]);
    expect(await wal.createArchive()).toEqual([]);
    await wal.drain();
  });

  it('drops a torn entry at the end of the log', async () => {
    const file = join(dir, segmentName(1));
    await fsp.writeFile(file, line(entry(1)) + '{"seq":2,"ts"');
    const wal = new WalNdjsonJournal(dir);
    const { entries } = await wal.open();
    expect(entries).toEqual([entry(1)]);
    expect(await fsp.readFile(file, 'utf8')).toBe(line(entry(1)));
    await wal.appendBatch([entry(2)]);
    await wal.drain();

    const again = new WalNdjsonJournal(dir);
    expect((await again.open()).entries).toEqual([entry(1), entry(2)]);
    await again.drain();
  });

  it('refuses a torn entry in the middle of the log and releases the lock', async () => {
    await fsp.writeFile(join(dir, segmentName(1)), line(entry(1)) + '{"seq":2');
    await fsp.writeFile(join(dir, segmentName(2)), line(entry(2)));
    const wal = new WalNdjsonJournal(dir);
    await expect(wal.open()).rejects.toThrow(`journal wal-ndjson is corrupt: ${segmentName(1)} ends mid-entry`);
    expect(await fsp.readdir(dir)).not.toContain('open.lock');
  });

  it('refuses a gap in the log', async () => {
    await fsp.writeFile(join(dir, segmentName(1)), line(entry(1)) + line(entry(3)));
    const wal = new WalNdjsonJournal(dir);
    await expect(wal.open()).rejects.toThrow('journal wal-ndjson is corrupt: expected seq 2, found 3');
  });

  it('refuses malformed lines and checkpoints', async () => {
    await fsp.writeFile(join(dir, segmentName(1)), 'garbage\n');
    await expect(new WalNdjsonJournal(dir).open()).rejects.toThrow(`${segmentName(1)}:1 is malformed`);

    await fsp.writeFile(join(dir, 'checkpoint.json'), '{"seq":-1}');
    await expect(new WalNdjsonJournal(dir).open()).rejects.toBeInstanceOf(JournalCorruptError);
  });

  it('allows one open journal per directory', async () => {
    const first = new WalNdjsonJournal(dir);
    await first.open();
    await expect(new WalNdjsonJournal(dir).open()).rejects.toBeInstanceOf(StateLockedError);
    await first.drain();

    const second = new WalNdjsonJournal(dir);
    await expect(second.open()).resolves.toEqual({ checkpoint: null, entries: [] });
    await second.drain();
  });

  it('takes over a lock left by a process that is gone and recovers a torn log', async () => {
    const file = join(dir, segmentName(1));
    await fsp.writeFile(file, line(entry(1)) + '{"seq":2');
    // above any pid the kernel hands out
    await fsp.writeFile(join(dir, 'open.lock'), '2147483647');
    const wal = new WalNdjsonJournal(dir);
    expect(await wal.open()).toEqual({ checkpoint: null, entries: [entry(1)] });
    expect(await fsp.readFile(join(dir, 'open.lock'), 'utf8')).toBe(String(process.pid));
    expect(await fsp.readFile(file, 'utf8')).toBe(line(entry(1)));
    await wal.drain();
    expect(await fsp.readdir(dir)).not.toContain('open.lock');
  });

  it('keeps a lock whose process is alive', async () => {
    await fsp.writeFile(join(dir, 'open.lock'), String(process.pid));
    await expect(new WalNdjsonJournal(dir).open()).rejects.toBeInstanceOf(StateLockedError);
    expect(await fsp.readFile(join(dir, 'open.lock'), 'utf8')).toBe(String(process.pid));
  });

  it('keeps a lock whose owner has not written its pid yet', async () => {
    await fsp.writeFile(join(dir, 'open.lock'), '');
    await expect(new WalNdjsonJournal(dir).open()).rejects.toBeInstanceOf(StateLockedError);
  });

  it('takes over a lock with unreadable contents', async () => {
    await fsp.writeFile(join(dir, 'open.lock'), 'not-a-pid');
    const wal = new WalNdjsonJournal(dir);
    await expect(wal.open()).resolves.toEqual({ checkpoint: null, entries: [] });
    await wal.drain();
  });

  it('tells which arguments it cannot store', () => {
    const wal = new WalNdjsonJournal(dir);
    expect(() => wal.accepts({ data: new Uint8Array([1]) })).toThrow('wal-ndjson cannot serialize binary values');
    expect(() => wal.accepts([1, 2n])).toThrow(TypeError);
    expect(() => wal.accepts({ nested: ['ok', 1, null] })).not.toThrow();
    expect(() => wal.accepts(undefined)).not.toThrow();
  });

  it('rejects raw binary arguments', async () => {
    const wal = new WalNdjsonJournal(dir);
    await wal.open();
    await expect(wal.appendBatch([entry(1, { data: new Uint8Array([1, 2, 3]) })])).rejects.toThrow(
      'wal-ndjson cannot serialize binary values',
    );
    await wal.drain();
  });

  it('reports a writable directory as healthy', async () => {
    const wal = new WalNdjsonJournal(dir);
    expect(await wal.health()).toEqual({ ok: true });
  });
});
