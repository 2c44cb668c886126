import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { promises as fsp } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { LogEntry } from '../../types';
import { SqliteJournal } from '../index';

const ts = '2024-01-01T00:00:00.000Z';
const entry = (seq: number, args: unknown = seq): LogEntry => ({ seq, ts, tag: 'add', args, version: 1 });

describe('SqliteJournal', () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(':memory:');
  });

  afterEach(() => {
    if (db.open) db.close();
  });

  it('starts empty and recovers appended entries in order', async () => {
    const journal = new SqliteJournal(db);
    expect(await journal.open()).toEqual({ checkpoint: null, entries: [] });
    journal.appendBatch([entry(1), entry(2, { nested: [1, 'two'] })]);
    journal.appendBatch([entry(3)]);
    expect((await new SqliteJournal(db).open()).entries).toEqual([entry(1), entry(2, { nested: [1, 'two'] }), entry(3)]);
  });

  it('ignores entries it already stored', async () => {
    const journal = new SqliteJournal(db);
    journal.appendBatch([entry(1), entry(2)]);
    journal.appendBatch([entry(2, 99), entry(3)]);
    expect(journal.eventCount()).toBe(3);
    expect((await journal.open()).entries).toEqual([entry(1), entry(2), entry(3)]);
  });

  it('stores missing arguments as null', async () => {
    const journal = new SqliteJournal(db);
    journal.appendBatch([{ seq: 1, ts, tag: 'reset', args: undefined, version: 1 }]);
    expect(db.prepare('SELECT args_json FROM events').get()).toEqual({ args_json: null });
    expect((await journal.open()).entries).toEqual([{ seq: 1, ts, tag: 'reset', args: undefined, version: 1 }]);
  });

  it('recovers the newest checkpoint and the events after it', async () => {
    const journal = new SqliteJournal(db);
    journal.appendBatch([entry(1), entry(2), entry(3)]);
    journal.checkpoint({ seq: 1, ts, state: { value: 1 }, version: 1 });
    journal.checkpoint({ seq: 2, ts, state: { value: 3 }, version: 1 });
    expect(journal.checkpointCount()).toBe(2);
    expect(await journal.open()).toEqual({
      checkpoint: { seq: 2, ts, state: { value: 3 }, version: 1 },
      entries: [entry(3)],
    });
  });

  it('prunes events covered by the newest checkpoint', () => {
    const journal = new SqliteJournal(db);
    journal.appendBatch([entry(1), entry(2), entry(3)]);
    expect(journal.prune()).toBe(0);
    journal.checkpoint({ seq: 2, ts, state: { value: 3 }, version: 1 });
    expect(journal.prune()).toBe(2);
    expect(journal.eventCount()).toBe(1);
  });

  it('refuses arguments without a JSON form', () => {
    const journal = new SqliteJournal(db);
    expect(() => journal.accepts({ big: 1n })).toThrow(TypeError);
    expect(() => journal.accepts({ n: 1 })).not.toThrow();
  });

  it('reports corrupt rows', async () => {
    const journal = new SqliteJournal(db);
    db.prepare(`INSERT INTO events (seq, ts, tag, args_json, version) VALUES (1, ?, 'add', '{oops', 1)`).run(ts);
    await expect(journal.open()).rejects.toThrow(/^journal sqlite is corrupt: /);
  });

  it('reports health and leaves a borrowed connection open', async () => {
    const journal = new SqliteJournal(db);
    expect(await journal.health()).toEqual({ ok: true });
    await journal.drain();
    expect(db.open).toBe(true);
  });

  it('closes a connection it opened itself', async () => {
    const dir = await fsp.mkdtemp(join(tmpdir(), 'acid-sqlite-'));
    try {
      const journal = new SqliteJournal(join(dir, 'state.db'));
      journal.appendBatch([entry(1)]);
      await journal.drain();
      expect(journal.db.open).toBe(false);

      const reopened = new SqliteJournal(join(dir, 'state.db'));
      expect((await reopened.open()).entries).toEqual([entry(1)]);
      await reopened.drain();
    } finally {
      await fsp.rm(dir, { recursive: true, force: true });
    }
  });
});
