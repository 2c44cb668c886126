import { decodeJson } from './codec';
import { DecodeError, UnknownMethodError } from './errors';
import type { Acidic, Method, QueryEvent, QueryMethod, Tagged, UpdateEvent, UpdateMethod } from './types';

/**
 * Owner of the live state and its method table. Backends run every update
 * through one instance, one at a time.
 */
export class AcidCore<S> {
  private current: S;
  private readonly methods = new Map<string, Method<S>>();

  constructor(
    private readonly acidic: Acidic<S>,
    initial: S,
  ) {
    for (const m of acidic.methods) {
      if (this.methods.has(m.tag)) throw new Error(`${acidic.name}: duplicate method tag "${m.tag}"`);
      this.methods.set(m.tag, m);
    }
    this.current = initial;
  }

  get name(): string {
    return this.acidic.name;
  }

  state(): S {
    return this.current;
  }

  /** Apply an update. If it throws, the state is left as it was. */
  applyUpdate<R>(event: UpdateEvent<S, R>): R {
    this.updateMethod(event.tag);
    const { state, result } = event.run(this.current);
    this.current = state;
    return result;
  }

  runQuery<R>(event: QueryEvent<S, R>): R {
    this.queryMethod(event.tag);
    return event.run(this.current);
  }

  /** Re-apply a journaled update. */
  replay(tag: string, args: unknown): void {
    this.applyUpdate(this.updateMethod(tag).decode(args));
  }

  decodeColdUpdate(event: Tagged): UpdateEvent<S, unknown> {
    const method = this.updateMethod(event.tag);
    return method.decode(decodePayload(event));
  }

  decodeColdQuery(event: Tagged): QueryEvent<S, unknown> {
    const method = this.queryMethod(event.tag);
    return method.decode(decodePayload(event));
  }

  encodeState(): unknown {
    return this.acidic.serialize ? this.acidic.serialize(this.current) : this.current;
  }

  decodeState(raw: unknown): S {
    const parsed = this.acidic.state.safeParse(raw);
    if (!parsed.success) throw new DecodeError(`${this.acidic.name} checkpoint`, parsed.error);
    return parsed.data;
  }

  /** Replace the live state, used once when restoring a checkpoint. */
  restore(state: S): void {
    this.current = state;
  }

  private updateMethod(tag: string): UpdateMethod<S, never, unknown> {
    const m = this.methods.get(tag);
    if (!m || m.kind !== 'update') throw new UnknownMethodError(tag, 'update');
    return m;
  }

  private queryMethod(tag: string): QueryMethod<S, never, unknown> {
    const m = this.methods.get(tag);
    if (!m || m.kind !== 'query') throw new UnknownMethodError(tag, 'query');
    return m;
  }
}

function decodePayload(event: Tagged): unknown {
  try {
    return decodeJson(event.payload);
  } catch (err) {
    throw new DecodeError(`payload of ${event.tag}`, err);
  }
}
