import { castToSubType, makeAcidState, subtypeKey, type AcidState, type Acidic, type SubtypeKey } from "@acid-handle/core";
import { MemoryJournal } from "../../adapters/memory";
import type { CheckpointRecord, LogEntry } from "../../adapters/types";
import { AcidHost, type HostOptions } from "../../host/acid-host";
import { HostedState } from "./hosted";

export const MEMORY_TAG = "memory";

/** State held in process memory. Checkpoints and the log live as long as the journal object. */
export class MemoryAcidState<S> extends HostedState<S> {
  constructor(
    host: AcidHost<S>,
    readonly journal: MemoryJournal,
  ) {
    super(host);
  }

  lastCheckpoint(): CheckpointRecord | null {
    this.assertOpen("lastCheckpoint");
    return this.journal.lastCheckpoint();
  }

  entries(): readonly LogEntry[] {
    this.assertOpen("entries");
    return this.journal.entries();
  }
}

export function memorySubtype<S>(): SubtypeKey<MemoryAcidState<S>> {
  return subtypeKey(MEMORY_TAG, (v: unknown): v is MemoryAcidState<S> => v instanceof MemoryAcidState);
}

/**
 * Open an in-memory state. Pass the `journal` of a closed memory state to
 * reopen what it recorded.
 */
export async function openMemoryState<S>(
  acidic: Acidic<S>,
  opts: HostOptions & { journal?: MemoryJournal } = {},
): Promise<AcidState<S>> {
  const journal = opts.journal ?? new MemoryJournal();
  const host = await AcidHost.open(acidic, journal, opts);
  return makeAcidState(MEMORY_TAG, host, castToSubType(new MemoryAcidState(host, journal)));
}
