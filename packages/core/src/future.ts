import { CellAlreadySetError } from './errors';

export type Outcome<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: unknown };

type Listener<T> = { onValue: (value: T) => void; onError: (error: unknown) => void };

/** Run `fn`, capturing a throw as a failed outcome. */
export function attempt<T>(fn: () => T): Outcome<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * One-shot broadcast cell delivering the outcome of a scheduled update.
 *
 * Set exactly once by its producer; read by any number of consumers. Readers
 * that arrive before the cell is set wait; readers after it is set get the
 * stored outcome at once. Rejections are created per reader, so a failed cell
 * nobody reads does not surface as an unhandled rejection.
 */
export class FutureCell<T> {
  private outcome: Outcome<T> | undefined;
  private listeners: Listener<T>[] = [];

  static resolved<T>(value: T): FutureCell<T> {
    const cell = new FutureCell<T>();
    cell.fill(value);
    return cell;
  }

  static rejected<T>(error: unknown): FutureCell<T> {
    const cell = new FutureCell<T>();
    cell.fail(error);
    return cell;
  }

  get isSet(): boolean {
    return this.outcome !== undefined;
  }

  fill(value: T): void {
    this.settle({ ok: true, value });
  }

  fail(error: unknown): void {
    this.settle({ ok: false, error });
  }

  /** Current outcome, or `undefined` while the cell is empty. */
  peek(): Outcome<T> | undefined {
    return this.outcome;
  }

  /** Wait for the value. Every call observes the same outcome. */
  take(): Promise<T> {
    return new Promise<T>((resolve, reject) => this.listen({ onValue: resolve, onError: reject }));
  }

  /** Derive a cell set from this one's outcome. A throw in `fn` fails the derived cell. */
  map<U>(fn: (value: T) => U): FutureCell<U> {
    const next = new FutureCell<U>();
    this.listen({
      onValue: value => {
        const mapped = attempt(() => fn(value));
        if (mapped.ok) next.fill(mapped.value);
        else next.fail(mapped.error);
      },
      onError: error => next.fail(error),
    });
    return next;
  }

  private listen(listener: Listener<T>): void {
    const outcome = this.outcome;
    if (!outcome) {
      this.listeners.push(listener);
    } else if (outcome.ok) {
      listener.onValue(outcome.value);
    } else {
      listener.onError(outcome.error);
    }
  }

  private settle(outcome: Outcome<T>): void {
    if (this.outcome) throw new CellAlreadySetError();
    this.outcome = outcome;
    const listeners = this.listeners;
    this.listeners = [];
    for (const l of listeners) {
      if (outcome.ok) l.onValue(outcome.value);
      else l.onError(outcome.error);
    }
  }
}
