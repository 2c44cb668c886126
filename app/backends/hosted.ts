import { AcidStateClosedError } from "@acid-handle/core";
import type { AcidHost } from "../../host/acid-host";
import type { Metrics } from "../../host/metrics";

/** Operations every backend handle shares. */
export abstract class HostedState<S> {
  protected constructor(protected readonly host: AcidHost<S>) {}

  /** Current state, including updates not yet durable. */
  snapshot(): S {
    return this.host.snapshot();
  }

  get lastSeq(): number {
    return this.host.lastSeq;
  }

  get durableSeq(): number {
    return this.host.durableSeq;
  }

  get metrics(): Metrics {
    return this.host.metrics;
  }

  health(): Promise<{ ok: boolean; detail?: string }> {
    return this.host.health();
  }

  /** Backend operations touch the journal, which close releases. */
  protected assertOpen(operation: string): void {
    if (this.host.isClosed) throw new AcidStateClosedError(operation);
  }
}
