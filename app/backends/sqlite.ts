import { castToSubType, makeAcidState, subtypeKey, type AcidState, type Acidic, type SubtypeKey } from "@acid-handle/core";
import type { DB } from "../../adapters/sqlite/db";
import { SqliteJournal } from "../../adapters/sqlite";
import { AcidHost, type HostOptions } from "../../host/acid-host";
import { HostedState } from "./hosted";

export const SQLITE_TAG = "sqlite";

export class SqliteAcidState<S> extends HostedState<S> {
  constructor(
    host: AcidHost<S>,
    private readonly journal: SqliteJournal,
  ) {
    super(host);
  }

  eventCount(): number {
    this.assertOpen("eventCount");
    return this.journal.eventCount();
  }

  checkpointCount(): number {
    this.assertOpen("checkpointCount");
    return this.journal.checkpointCount();
  }

  /** Delete events the newest checkpoint covers. */
  prune(): number {
    this.assertOpen("prune");
    return this.journal.prune();
  }
}

export function sqliteSubtype<S>(): SubtypeKey<SqliteAcidState<S>> {
  return subtypeKey(SQLITE_TAG, (v: unknown): v is SqliteAcidState<S> => v instanceof SqliteAcidState);
}

/** Open the state stored in a SQLite database. A connection passed in is left open on close. */
export async function openSqliteState<S>(
  acidic: Acidic<S>,
  dbOrPath: DB | string,
  opts: HostOptions = {},
): Promise<AcidState<S>> {
  const journal = new SqliteJournal(dbOrPath);
  const host = await AcidHost.open(acidic, journal, opts);
  return makeAcidState(SQLITE_TAG, host, castToSubType(new SqliteAcidState(host, journal)));
}
