import { CounterRegistry } from '../src/counters.js';

describe('CounterRegistry', () => {
  test('should start registered counters at zero', () => {
    const counters = new CounterRegistry(['queries', 'responses']);

    expect(counters.has('queries')).toBe(true);
    expect(counters.get('queries')).toBe(0n);
    expect(counters.snapshot()).toEqual({ queries: 0n, responses: 0n });
  });

  test('should read unknown counters as zero without creating them', () => {
    const counters = new CounterRegistry();

    expect(counters.get('frontend-udp-refused')).toBe(0n);
    expect(counters.has('frontend-udp-refused')).toBe(false);
    expect(counters.snapshot()).toEqual({});
  });

  test('should not reset a counter registered twice', () => {
    const counters = new CounterRegistry();
    counters.increment('cache-hits', 5);
    counters.register('cache-hits');

    expect(counters.get('cache-hits')).toBe(5n);
  });

  test('should create counters on first increment', () => {
    const counters = new CounterRegistry();
    counters.increment('rule-nxdomain');
    counters.increment('rule-nxdomain');
    counters.increment('rule-nxdomain', 3n);

    expect(counters.get('rule-nxdomain')).toBe(5n);
  });

  test('should ignore negative and non-integer deltas', () => {
    const counters = new CounterRegistry(['queries']);
    counters.increment('queries', -1);
    counters.increment('queries', -2n);
    counters.increment('queries', 1.5);
    counters.increment('queries', Number.NaN);

    expect(counters.get('queries')).toBe(0n);
  });

  test('should count past the safe integer range', () => {
    const counters = new CounterRegistry();
    counters.increment('queries', Number.MAX_SAFE_INTEGER);
    counters.increment('queries', Number.MAX_SAFE_INTEGER);

    expect(counters.get('queries')).toBe(18014398509481982n);
  });

  test('should return frozen snapshots in natural order', () => {
    const counters = new CounterRegistry(['rule-10', 'rule-2', 'rule-1']);
    const snapshot = counters.snapshot();

    expect(Object.keys(snapshot)).toEqual(['rule-1', 'rule-2', 'rule-10']);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  test('should not change a snapshot after later increments', () => {
    const counters = new CounterRegistry(['queries']);
    const before = counters.snapshot();
    counters.increment('queries');

    expect(before.queries).toBe(0n);
    expect(counters.snapshot().queries).toBe(1n);
  });

  test('should serialize to plain numbers', () => {
    const counters = new CounterRegistry(['responses']);
    counters.increment('responses', 7);

    expect(counters.toJSON()).toEqual({ responses: 7 });
    expect(JSON.stringify(counters)).toBe('{"responses":7}');
  });

  test('should keep every digit of counters past the safe integer range', () => {
    const counters = new CounterRegistry();
    counters.increment('queries', Number.MAX_SAFE_INTEGER);
    counters.increment('responses', Number.MAX_SAFE_INTEGER);
    counters.increment('responses');

    expect(counters.toJSON()).toEqual({ queries: 9007199254740991, responses: '9007199254740992' });
  });

  test('should render Prometheus text', () => {
    const counters = new CounterRegistry();
    counters.increment('cache-hits', 3);

    expect(counters.prometheusText()).toBe(
      '# TYPE dns_proxy_cache_hits_total counter\ndns_proxy_cache_hits_total 3\n'
    );
    expect(counters.prometheusText('edge')).toBe(
      '# TYPE edge_cache_hits_total counter\nedge_cache_hits_total 3\n'
    );
  });
});
