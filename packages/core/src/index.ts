export type {
  Acidic,
  ArgsSchema,
  Method,
  QueryEvent,
  QueryMethod,
  Tagged,
  Transition,
  UpdateEvent,
  UpdateMethod,
} from './types';
export type { AcidOps, AcidState } from './handle';
export type { Downcastable, Subtype, SubtypeKey } from './subtype';
export type { Outcome } from './future';
export type { AcidErrorCode } from './errors';
export {
  AcidError,
  AcidStateClosedError,
  CellAlreadySetError,
  DecodeError,
  DowncastMismatchError,
  EncodeError,
  JournalCorruptError,
  JournalError,
  StateLockedError,
  UnknownMethodError,
} from './errors';
export { defineQuery, defineUpdate, transition } from './method';
export { FutureCell, attempt } from './future';
export { castToSubType, downcast, subtypeKey, tryDowncast } from './subtype';
export { makeAcidState, query, scheduleUpdate, update } from './handle';
export { decodeJson, encodeJson, tagged } from './codec';
export { AcidCore } from './core';
