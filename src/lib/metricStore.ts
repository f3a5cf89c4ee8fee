export class StoreError extends Error {}

/**
 * Storage backend for ingested metrics. Gauges hold the last reported value,
 * counters hold the running sum of reported deltas. A backend signals a
 * failed write by rejecting; callers must not assume the write happened.
 */
export interface MetricStore {
  updateGauge(name: string, value: number): Promise<void>;
  updateCounter(name: string, delta: bigint): Promise<void>;
}

export type MetricsSnapshot = {
  gauges: Record<string, number>;
  counters: Record<string, bigint>;
  ts: number;
};

const INT64_BITS = 64;

/**
 * In-memory backend. Each update reads and writes its entry without yielding
 * to the event loop, so updates to one name apply in call order and none is lost.
 */
export class MemStorage implements MetricStore {
  private readonly gauges = new Map<string, number>();
  private readonly counters = new Map<string, bigint>();

  async updateGauge(name: string, value: number): Promise<void> {
    this.gauges.set(name, value);
  }

  async updateCounter(name: string, delta: bigint): Promise<void> {
    const prev = this.counters.get(name) ?? 0n;
    // int64 wrap-around
    this.counters.set(name, BigInt.asIntN(INT64_BITS, prev + delta));
  }

  // Read accessors below exist for verification only; nothing serves them over HTTP.

  getGauge(name: string): number | undefined {
    return this.gauges.get(name);
  }

  getCounter(name: string): bigint | undefined {
    return this.counters.get(name);
  }

  snapshot(): MetricsSnapshot {
    return {
      gauges: Object.fromEntries(this.gauges),
      counters: Object.fromEntries(this.counters),
      ts: Date.now(),
    };
  }
}
