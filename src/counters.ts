import { naturalCompare } from './utils.js';

const MAX_SAFE_COUNTER = BigInt(Number.MAX_SAFE_INTEGER);

// a point-in-time read of every counter
export type CounterSnapshot = Readonly<Record<string, bigint>>;

// process-wide named counters, monotonic for the lifetime of the registry
//
// every update is a synchronous read-modify-write on a single Map entry, so concurrent
// transactions interleaving on the event loop never lose an increment
export class CounterRegistry {
  private counters: Map<string, bigint>;

  constructor(names: readonly string[] = []) {
    this.counters = new Map();
    for (const name of names) {
      this.register(name);
    }
  }

  // declare a counter at zero so it shows up before first use
  register(name: string): void {
    if (!this.counters.has(name)) {
      this.counters.set(name, 0n);
    }
  }

  // add `delta` to a counter, creating it at zero first; invalid deltas are ignored
  increment(name: string, delta: number | bigint = 1): void {
    if (typeof delta === 'number' && !Number.isSafeInteger(delta)) return;
    const amount = BigInt(delta);
    if (amount < 0n) return;
    this.counters.set(name, (this.counters.get(name) ?? 0n) + amount);
  }

  get(name: string): bigint {
    return this.counters.get(name) ?? 0n;
  }

  has(name: string): boolean {
    return this.counters.has(name);
  }

  // frozen name -> value mapping, keys in natural order
  snapshot(): CounterSnapshot {
    const snapshot: Record<string, bigint> = {};
    for (const name of [...this.counters.keys()].sort(naturalCompare)) {
      snapshot[name] = this.get(name);
    }
    return Object.freeze(snapshot);
  }

  // JSON-friendly snapshot for the management API
  // values past Number.MAX_SAFE_INTEGER are written as decimal strings to keep every digit
  toJSON(): Record<string, number | string> {
    const json: Record<string, number | string> = {};
    for (const [name, value] of Object.entries(this.snapshot())) {
      json[name] = value <= MAX_SAFE_COUNTER ? Number(value) : value.toString();
    }
    return json;
  }

  // Prometheus text exposition, one counter sample per entry
  prometheusText(prefix = 'dns_proxy'): string {
    const lines: string[] = [];
    for (const [name, value] of Object.entries(this.snapshot())) {
      const metric = `${prefix}_${name.replace(/[^a-zA-Z0-9_]/g, '_')}_total`;
      lines.push(`# TYPE ${metric} counter`);
      lines.push(`${metric} ${value}`);
    }
    return `${lines.join('\n')}\n`;
  }
}
