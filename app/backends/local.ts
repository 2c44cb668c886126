import { castToSubType, makeAcidState, subtypeKey, type AcidState, type Acidic, type SubtypeKey } from "@acid-handle/core";
import { WalNdjsonJournal } from "../../adapters/wal-ndjson";
import { AcidHost, type HostOptions } from "../../host/acid-host";
import { HostedState } from "./hosted";

export const LOCAL_TAG = "local";

/** State journaled to NDJSON segments in a directory. */
export class LocalAcidState<S> extends HostedState<S> {
  constructor(
    host: AcidHost<S>,
    private readonly journal: WalNdjsonJournal,
  ) {
    super(host);
  }

  get directory(): string {
    return this.journal.dir;
  }

  /** Move log segments covered by the last checkpoint to `archive/`. */
  async createArchive(): Promise<string[]> {
    this.assertOpen("createArchive");
    return this.journal.createArchive();
  }
}

export function localSubtype<S>(): SubtypeKey<LocalAcidState<S>> {
  return subtypeKey(LOCAL_TAG, (v: unknown): v is LocalAcidState<S> => v instanceof LocalAcidState);
}

/** Open (or create) the state stored in `dir`. Fails with `StateLockedError` if it is already open. */
export async function openLocalState<S>(acidic: Acidic<S>, dir: string, opts: HostOptions = {}): Promise<AcidState<S>> {
  const journal = new WalNdjsonJournal(dir, { logger: opts.logger });
  const host = await AcidHost.open(acidic, journal, opts);
  return makeAcidState(LOCAL_TAG, host, castToSubType(new LocalAcidState(host, journal)));
}
