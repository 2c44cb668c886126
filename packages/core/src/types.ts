import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Outcome of applying an update: the next state and the caller's result.
 */
export type Transition<S, R> = { readonly state: S; readonly result: R };

/**
 * State-mutating event bound to its arguments.
 * `run` must not mutate the state it receives.
 */
export type UpdateEvent<S, R> = {
  readonly kind: 'update';
  readonly tag: string;
  readonly args: unknown;
  readonly run: (state: S) => Transition<S, R>;
};

/** Read-only event bound to its arguments. */
export type QueryEvent<S, R> = {
  readonly kind: 'query';
  readonly tag: string;
  readonly args: unknown;
  readonly run: (state: S) => R;
};

/** Type-erased event: a method tag plus its JSON-encoded arguments. */
export type Tagged = { readonly tag: string; readonly payload: Uint8Array };

export type ArgsSchema<A> = ZodType<A, ZodTypeDef, unknown>;

export interface UpdateMethod<S, A, R> {
  readonly kind: 'update';
  readonly tag: string;
  /** Bind typed arguments. */
  event(args: A): UpdateEvent<S, R>;
  /** Validate raw arguments (cold path, journal replay). Throws `DecodeError`. */
  decode(raw: unknown): UpdateEvent<S, R>;
}

export interface QueryMethod<S, A, R> {
  readonly kind: 'query';
  readonly tag: string;
  event(args: A): QueryEvent<S, R>;
  decode(raw: unknown): QueryEvent<S, R>;
}

export type Method<S> = UpdateMethod<S, never, unknown> | QueryMethod<S, never, unknown>;

/**
 * Method table of a state type.
 */
export interface Acidic<S> {
  readonly name: string;
  initial(): S;
  /** Decodes a checkpointed state. */
  readonly state: ArgsSchema<S>;
  /** Encodes the state for a checkpoint; defaults to the state itself. */
  serialize?(state: S): unknown;
  readonly methods: readonly Method<S>[];
}
