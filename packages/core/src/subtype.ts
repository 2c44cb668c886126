import { DowncastMismatchError } from './errors';

const payload = Symbol('acid.subtype');

/**
 * Opaque holder for a backend's own handle. Only `castToSubType` creates one
 * and only a `SubtypeKey` can read it back.
 */
export interface Subtype {
  readonly [payload]: unknown;
}

/** Identifies a backend family and recognises its handle at runtime. */
export interface SubtypeKey<H> {
  readonly tag: string;
  matches(value: unknown): value is H;
}

/** Anything carrying a family tag and a subtype payload, e.g. an `AcidState`. */
export type Downcastable = { readonly tag: string; readonly subtype: Subtype };

/** Wrap a backend handle for storage in `AcidState.subtype`. For backend factories only. */
export function castToSubType(value: unknown): Subtype {
  return Object.freeze({ [payload]: value });
}

export function subtypeKey<H>(tag: string, matches: (value: unknown) => value is H): SubtypeKey<H> {
  return Object.freeze({ tag, matches });
}

/**
 * Narrow a generic handle to the backend handle `key` describes.
 * Returns `undefined` when the handle belongs to another family.
 */
export function tryDowncast<H>(key: SubtypeKey<H>, acid: Downcastable): H | undefined {
  if (acid.tag !== key.tag) return undefined;
  const value = acid.subtype[payload];
  return key.matches(value) ? value : undefined;
}

/**
 * Like `tryDowncast`, but a mismatch throws `DowncastMismatchError`.
 */
export function downcast<H>(key: SubtypeKey<H>, acid: Downcastable): H {
  const found = tryDowncast(key, acid);
  if (found === undefined) throw new DowncastMismatchError(acid.tag, key.tag);
  return found;
}
