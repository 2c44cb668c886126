export type AcidErrorCode =
  | 'DOWNCAST_MISMATCH'
  | 'CLOSED'
  | 'UNKNOWN_METHOD'
  | 'DECODE_FAILED'
  | 'ENCODE_FAILED'
  | 'CELL_ALREADY_SET'
  | 'JOURNAL_FAILED'
  | 'JOURNAL_CORRUPT'
  | 'LOCKED';

/**
 * Base class for every error raised by a handle or a backend.
 */
export class AcidError extends Error {
  constructor(
    readonly code: AcidErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Raised by `downcast` when the handle belongs to another backend family. */
export class DowncastMismatchError extends AcidError {
  constructor(
    readonly actual: string,
    readonly expected: string,
  ) {
    super('DOWNCAST_MISMATCH', `Invalid subtype cast: ${actual} -> ${expected}`);
  }
}

export class AcidStateClosedError extends AcidError {
  constructor(readonly operation: string) {
    super('CLOSED', `${operation} called on a closed AcidState`);
  }
}

export class UnknownMethodError extends AcidError {
  constructor(
    readonly tag: string,
    readonly kind: 'update' | 'query',
  ) {
    super('UNKNOWN_METHOD', `no ${kind} method registered for tag "${tag}"`);
  }
}

/** Payload bytes or a persisted value did not match the expected shape. */
export class DecodeError extends AcidError {
  constructor(
    readonly subject: string,
    cause: unknown,
  ) {
    super('DECODE_FAILED', `failed to decode ${subject}: ${describe(cause)}`, { cause });
  }
}

/** A value could not be put in the form a journal stores. */
export class EncodeError extends AcidError {
  constructor(
    readonly subject: string,
    cause: unknown,
  ) {
    super('ENCODE_FAILED', `failed to encode ${subject}: ${describe(cause)}`, { cause });
  }
}

export class CellAlreadySetError extends AcidError {
  constructor() {
    super('CELL_ALREADY_SET', 'future cell has already been set');
  }
}

export class JournalError extends AcidError {
  constructor(
    readonly journal: string,
    cause: unknown,
  ) {
    super('JOURNAL_FAILED', `journal ${journal} failed: ${describe(cause)}`, { cause });
  }
}

export class JournalCorruptError extends AcidError {
  constructor(
    readonly journal: string,
    detail: string,
  ) {
    super('JOURNAL_CORRUPT', `journal ${journal} is corrupt: ${detail}`);
  }
}

export class StateLockedError extends AcidError {
  constructor(readonly path: string) {
    super('LOCKED', `state at ${path} is already open`);
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
