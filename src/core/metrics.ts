export interface Metrics {
  increment(name: string, value?: number): void;
}

/** Per-connection counters; one instance lives as long as its gateway. */
export class InMemoryMetrics implements Metrics {
  private readonly counters = new Map<string, number>();

  increment(name: string, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  get(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.counters.entries());
  }
}
