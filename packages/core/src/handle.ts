import type { FutureCell } from './future';
import type { Subtype } from './subtype';
import type { QueryEvent, Tagged, UpdateEvent } from './types';

/**
 * Operations a backend supplies for its state.
 */
export interface AcidOps<S> {
  /**
   * Issue an update and return at once. The update is not durable until the
   * cell is set, but order is honoured: an update scheduled after another
   * returned is applied after it.
   */
  scheduleUpdate<R>(event: UpdateEvent<S, R>): FutureCell<R>;
  scheduleColdUpdate(event: Tagged): FutureCell<Uint8Array>;
  query<R>(event: QueryEvent<S, R>): Promise<R>;
  queryCold(event: Tagged): Promise<Uint8Array>;
  /** Persist a snapshot of the state. Updates may run concurrently. */
  createCheckpoint(): Promise<void>;
  /** Release the state's resources. Later calls to any other operation fail. */
  closeAcidState(): Promise<void>;
}

/**
 * Backend-agnostic handle to a state container with ACID guarantees.
 */
export interface AcidState<S> extends AcidOps<S> {
  /** Backend family; decides what `subtype` holds. */
  readonly tag: string;
  readonly subtype: Subtype;
}

/** Assemble an immutable handle over a backend's operations. */
export function makeAcidState<S>(tag: string, ops: AcidOps<S>, subtype: Subtype): AcidState<S> {
  return Object.freeze({
    tag,
    subtype,
    scheduleUpdate: <R>(event: UpdateEvent<S, R>) => ops.scheduleUpdate(event),
    scheduleColdUpdate: (event: Tagged) => ops.scheduleColdUpdate(event),
    query: <R>(event: QueryEvent<S, R>) => ops.query(event),
    queryCold: (event: Tagged) => ops.queryCold(event),
    createCheckpoint: () => ops.createCheckpoint(),
    closeAcidState: () => ops.closeAcidState(),
  });
}

export function scheduleUpdate<S, R>(acid: AcidState<S>, event: UpdateEvent<S, R>): FutureCell<R> {
  return acid.scheduleUpdate(event);
}

/**
 * Issue an update and wait for its result. Once this resolves the change is durable.
 */
export async function update<S, R>(acid: AcidState<S>, event: UpdateEvent<S, R>): Promise<R> {
  return acid.scheduleUpdate(event).take();
}

export async function query<S, R>(acid: AcidState<S>, event: QueryEvent<S, R>): Promise<R> {
  return acid.query(event);
}
