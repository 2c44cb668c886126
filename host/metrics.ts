type Sample = { name: string; help?: string; value: number };

/**
 * Counters and gauges for one host, rendered in Prometheus text format.
 */
export class Metrics {
  private readonly counters = new Map<string, Sample>();
  private readonly gauges = new Map<string, Sample>();

  constructor(private readonly labels: Record<string, string> = {}) {}

  inc(name: string, by = 1, help?: string): void {
    const c = this.sample(this.counters, name, help);
    c.value += by;
  }

  set(name: string, value: number, help?: string): void {
    const g = this.sample(this.gauges, name, help);
    g.value = value;
  }

  /** Current value, or 0 for a metric never touched. */
  get(name: string): number {
    return this.counters.get(name)?.value ?? this.gauges.get(name)?.value ?? 0;
  }

  render(): string {
    const lines: string[] = [];
    const suffix = this.renderLabels();
    const emit = (s: Sample, type: "counter" | "gauge") => {
      if (s.help) lines.push(`# HELP ${s.name} ${s.help}`);
      lines.push(`# TYPE ${s.name} ${type}`);
      lines.push(`${s.name}${suffix} ${s.value}`);
    };
    for (const c of this.counters.values()) emit(c, "counter");
    for (const g of this.gauges.values()) emit(g, "gauge");
    return lines.join("\n") + "\n";
  }

  private sample(into: Map<string, Sample>, name: string, help?: string): Sample {
    let s = into.get(name);
    if (!s) {
      s = { name, help, value: 0 };
      into.set(name, s);
    }
    return s;
  }

  private renderLabels(): string {
    const pairs = Object.entries(this.labels).map(([k, v]) => `${k}="${v.replace(/["\\\n]/g, ch => (ch === "\n" ? "\\n" : `\\${ch}`))}"`);
    return pairs.length ? `{${pairs.join(",")}}` : "";
  }
}
