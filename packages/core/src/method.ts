import { DecodeError } from './errors';
import type {
  ArgsSchema,
  QueryEvent,
  QueryMethod,
  Transition,
  UpdateEvent,
  UpdateMethod,
} from './types';

function parseArgs<A>(tag: string, schema: ArgsSchema<A>, raw: unknown): A {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) throw new DecodeError(`arguments of ${tag}`, parsed.error);
  return parsed.data;
}

/** Define a state-mutating method. */
export function defineUpdate<S, A, R>(def: {
  tag: string;
  args: ArgsSchema<A>;
  apply: (state: S, args: A) => Transition<S, R>;
}): UpdateMethod<S, A, R> {
  const event = (args: A): UpdateEvent<S, R> => ({
    kind: 'update',
    tag: def.tag,
    args,
    run: state => def.apply(state, args),
  });
  return {
    kind: 'update',
    tag: def.tag,
    event,
    decode: raw => event(parseArgs(def.tag, def.args, raw)),
  };
}

/** Define a read-only method. */
export function defineQuery<S, A, R>(def: {
  tag: string;
  args: ArgsSchema<A>;
  run: (state: S, args: A) => R;
}): QueryMethod<S, A, R> {
  const event = (args: A): QueryEvent<S, R> => ({
    kind: 'query',
    tag: def.tag,
    args,
    run: state => def.run(state, args),
  });
  return {
    kind: 'query',
    tag: def.tag,
    event,
    decode: raw => event(parseArgs(def.tag, def.args, raw)),
  };
}

export function transition<S, R>(state: S, result: R): Transition<S, R> {
  return { state, result };
}
