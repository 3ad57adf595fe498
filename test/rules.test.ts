import { CounterRegistry } from '../src/counters.js';
import { ConfigurationError } from '../src/errors.js';
import {
  compileRules,
  compileSelector,
  defaultRuleName,
  frontendCounterNames,
  isFrontendAccounted,
  RuleEngine,
  synthesizeResponse,
} from '../src/rules.js';
import type { RuleSelector } from '../src/types.js';
import { createTestQuery, TEST_RULES } from './proxy-test-helpers.js';

describe('Rules', () => {
  describe('compileSelector', () => {
    const matches = (selector: RuleSelector, name: string, type: 'A' | 'AAAA' | 'TXT' = 'A') =>
      compileSelector(selector)(createTestQuery(name, { type }));

    test('should match everything with all', () => {
      expect(matches({ kind: 'all' }, 'anything.test')).toBe(true);
    });

    test('should match a name and its subdomains with qname', () => {
      const selector: RuleSelector = { kind: 'qname', names: ['Cache.Metrics.Test.'] };

      expect(matches(selector, 'cache.metrics.test')).toBe(true);
      expect(matches(selector, 'www.cache.metrics.test')).toBe(true);
      expect(matches(selector, 'nocache.metrics.test')).toBe(false);
      expect(matches(selector, 'metrics.test')).toBe(false);
    });

    test('should match only the listed names with exact', () => {
      const selector: RuleSelector = { kind: 'exact', names: ['a.test', 'b.test'] };

      expect(matches(selector, 'B.TEST')).toBe(true);
      expect(matches(selector, 'www.a.test')).toBe(false);
    });

    test('should match regular expressions case-insensitively', () => {
      const selector: RuleSelector = { kind: 'regex', pattern: '^rcode-[a-z]+\\.' };

      expect(matches(selector, 'RCODE-nxdomain.metrics.test')).toBe(true);
      expect(matches(selector, 'www.rcode-nxdomain.metrics.test')).toBe(false);
    });

    test('should reject an invalid pattern', () => {
      expect(() => compileSelector({ kind: 'regex', pattern: '(' })).toThrow(ConfigurationError);
    });

    test('should match query types', () => {
      const selector: RuleSelector = { kind: 'qtype', types: ['AAAA', 'TXT'] };

      expect(matches(selector, 'a.test', 'AAAA')).toBe(true);
      expect(matches(selector, 'a.test', 'A')).toBe(false);
    });

    test('should combine selectors with and and not', () => {
      const selector: RuleSelector = {
        kind: 'and',
        selectors: [
          { kind: 'qname', names: ['metrics.test'] },
          { kind: 'not', selector: { kind: 'qtype', types: ['TXT'] } },
        ],
      };

      expect(matches(selector, 'x.metrics.test', 'A')).toBe(true);
      expect(matches(selector, 'x.metrics.test', 'TXT')).toBe(false);
      expect(matches(selector, 'x.other.test', 'A')).toBe(false);
    });
  });

  describe('compileRules', () => {
    test('should name rules by their action when unnamed', () => {
      const rules = compileRules([
        { selector: { kind: 'all' }, action: { kind: 'synthesize', rcode: 'NXDOMAIN' } },
        { selector: { kind: 'all' }, action: { kind: 'route', pool: 'cache' } },
      ]);

      expect(rules.map(rule => rule.name)).toEqual(['nxdomain', 'pool-cache']);
      expect(defaultRuleName({ kind: 'synthesize', rcode: 'SERVFAIL' })).toBe('servfail');
    });

    test('should reject routes to unknown pools', () => {
      expect(() => compileRules(TEST_RULES, new Set(['']))).toThrow(
        "Rule routes to unknown pool 'cache'"
      );
      expect(compileRules(TEST_RULES, new Set(['', 'cache']))).toHaveLength(4);
    });
  });

  describe('synthesizeResponse', () => {
    test('should answer with empty sections and no recursion flags', () => {
      const query = createTestQuery('rcode-refused.metrics.test', { id: 9 });

      expect(synthesizeResponse(query, 'REFUSED')).toEqual({
        id: 9,
        rcode: 'REFUSED',
        flags: [],
        question: query,
        answers: [],
        authorities: [],
        additionals: [],
        provenance: 'rule-synthesized',
      });
    });

    test('should set RA only when RD was asked for', () => {
      const query = createTestQuery('rcode-refused.metrics.test', { recursionDesired: true });

      expect(synthesizeResponse(query, 'NXDOMAIN').flags).toEqual(['RD', 'RA']);
    });
  });

  describe('Frontend accounting helpers', () => {
    test('should name per-frontend and aggregate counters', () => {
      expect(frontendCounterNames('dot', 'NXDOMAIN')).toEqual(['frontend-dot-nxdomain', 'frontend-nxdomain']);
    });

    test('should exempt REFUSED', () => {
      expect(isFrontendAccounted('REFUSED')).toBe(false);
      expect(isFrontendAccounted('SERVFAIL')).toBe(true);
      expect(isFrontendAccounted('NOERROR')).toBe(true);
    });
  });

  describe('RuleEngine', () => {
    const setup = () => {
      const counters = new CounterRegistry();
      const engine = new RuleEngine(counters, compileRules(TEST_RULES));
      return { counters, engine };
    };

    test('should register counters for synthesizing rules only', () => {
      const { counters } = setup();

      expect(counters.snapshot()).toEqual({
        'rule-nxdomain': 0n,
        'rule-refused': 0n,
        'rule-servfail': 0n,
        'self-answered': 0n,
      });
    });

    test('should synthesize and count on a match', () => {
      const { counters, engine } = setup();
      const query = createTestQuery('rcode-servfail.metrics.test');

      const verdict = engine.evaluate('udp', query);

      expect(verdict).toEqual({
        kind: 'synthesized',
        rule: 'servfail',
        response: synthesizeResponse(query, 'SERVFAIL'),
      });
      expect(counters.snapshot()).toEqual({
        'frontend-servfail': 1n,
        'frontend-udp-servfail': 1n,
        'rule-nxdomain': 0n,
        'rule-refused': 0n,
        'rule-servfail': 1n,
        'self-answered': 1n,
      });
    });

    test('should count REFUSED on the rule without any frontend counter', () => {
      const { counters, engine } = setup();

      engine.evaluate('tcp', createTestQuery('rcode-refused.metrics.test'));

      expect(counters.get('rule-refused')).toBe(1n);
      expect(counters.has('frontend-tcp-refused')).toBe(false);
      expect(counters.has('frontend-refused')).toBe(false);
    });

    test('should route without counting', () => {
      const { counters, engine } = setup();
      const before = counters.snapshot();

      const verdict = engine.evaluate('doh', createTestQuery('www.cache.metrics.test'));

      expect(verdict).toEqual({ kind: 'routed', pool: 'cache', rule: 'pool-cache' });
      expect(counters.snapshot()).toEqual(before);
    });

    test('should send unmatched queries to the default pool', () => {
      const counters = new CounterRegistry();
      const engine = new RuleEngine(counters, compileRules(TEST_RULES), 'fallback');

      expect(engine.evaluate('udp', createTestQuery('elsewhere.test'))).toEqual({
        kind: 'routed',
        pool: 'fallback',
        rule: null,
      });
    });

    test('should stop at the first matching rule', () => {
      const counters = new CounterRegistry();
      const engine = new RuleEngine(
        counters,
        compileRules([
          { name: 'first', selector: { kind: 'all' }, action: { kind: 'synthesize', rcode: 'NXDOMAIN' } },
          { name: 'second', selector: { kind: 'all' }, action: { kind: 'synthesize', rcode: 'REFUSED' } },
        ])
      );

      engine.evaluate('udp', createTestQuery('a.test'));

      expect(counters.get('rule-first')).toBe(1n);
      expect(counters.get('rule-second')).toBe(0n);
    });
  });
});
