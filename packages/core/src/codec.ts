import type { Tagged } from './types';

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

/** Encode a value as UTF-8 JSON. `undefined` is the empty payload. */
export function encodeJson(value: unknown): Uint8Array {
  if (value === undefined) return new Uint8Array(0);
  return encoder.encode(JSON.stringify(value));
}

/** Decode UTF-8 JSON; the empty payload is `undefined`. Throws on invalid UTF-8 or JSON. */
export function decodeJson(bytes: Uint8Array): unknown {
  if (bytes.byteLength === 0) return undefined;
  const parsed: unknown = JSON.parse(decoder.decode(bytes));
  return parsed;
}

export function tagged(tag: string, value?: unknown): Tagged {
  return { tag, payload: encodeJson(value) };
}
