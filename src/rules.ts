import {
  COUNTER_SELF_ANSWERED,
  DEFAULT_POOL,
  FLAG_RECURSION_AVAILABLE,
  FLAG_RECURSION_DESIRED,
  FRONTEND_EXEMPT_RCODES,
  PROVENANCE_RULE_SYNTHESIZED,
} from './constants.js';
import type { CounterRegistry } from './counters.js';
import { ConfigurationError } from './errors.js';
import type {
  DnsFlag,
  DnsQuery,
  DnsResponse,
  DnsResponseType,
  FrontendName,
  QueryPredicate,
  Rule,
  RuleAction,
  RuleDefinition,
  RuleSelector,
  Verdict,
} from './types.js';
import { isSubdomainOf, normalizeName, rcodeCounterName } from './utils.js';

// counter for a rule's action
export function ruleCounterName(rule: string): string {
  return `rule-${rule}`;
}

// counters for a frontend and rcode: per listener, and summed over all listeners
export function frontendCounterNames(frontend: FrontendName, rcode: DnsResponseType): string[] {
  const name = rcodeCounterName(rcode);
  return [`frontend-${frontend}-${name}`, `frontend-${name}`];
}

// whether responses with this rcode are attributed to a frontend at all
export function isFrontendAccounted(rcode: DnsResponseType): boolean {
  return !FRONTEND_EXEMPT_RCODES.some(exempt => exempt === rcode);
}

// compile a selector into a predicate
export function compileSelector(selector: RuleSelector): QueryPredicate {
  switch (selector.kind) {
    case 'all':
      return () => true;
    case 'qname': {
      const suffixes = selector.names.map(normalizeName);
      return query => suffixes.some(suffix => isSubdomainOf(query.name, suffix));
    }
    case 'exact': {
      const names = new Set(selector.names.map(normalizeName));
      return query => names.has(query.name);
    }
    case 'regex': {
      let pattern: RegExp;
      try {
        pattern = new RegExp(selector.pattern, 'i');
      } catch (error) {
        throw new ConfigurationError(`Invalid rule pattern '${selector.pattern}': ${String(error)}`);
      }
      return query => pattern.test(query.name);
    }
    case 'qtype': {
      const types = new Set(selector.types);
      return query => types.has(query.type);
    }
    case 'and': {
      const predicates = selector.selectors.map(compileSelector);
      return query => predicates.every(predicate => predicate(query));
    }
    case 'not': {
      const predicate = compileSelector(selector.selector);
      return query => !predicate(query);
    }
  }
}

// default rule name: the rcode for synthesis, the pool for routing
export function defaultRuleName(action: RuleAction): string {
  return action.kind === 'synthesize' ? rcodeCounterName(action.rcode) : `pool-${action.pool}`;
}

// compile configured rules, rejecting routes to pools that do not exist
export function compileRules(definitions: readonly RuleDefinition[], pools?: ReadonlySet<string>): Rule[] {
  return definitions.map(definition => {
    const { action } = definition;
    if (action.kind === 'route' && pools && !pools.has(action.pool)) {
      throw new ConfigurationError(`Rule routes to unknown pool '${action.pool}'`);
    }
    return {
      name: definition.name ?? defaultRuleName(action),
      matches: compileSelector(definition.selector),
      action,
    };
  });
}

// build the response a synthesize action sends
// RA mirrors the query's RD rather than advertising recursion
export function synthesizeResponse(query: DnsQuery, rcode: DnsResponseType): DnsResponse {
  const flags: DnsFlag[] = query.recursionDesired
    ? [FLAG_RECURSION_DESIRED, FLAG_RECURSION_AVAILABLE]
    : [];
  return {
    id: query.id,
    rcode,
    flags,
    question: query,
    answers: [],
    authorities: [],
    additionals: [],
    provenance: PROVENANCE_RULE_SYNTHESIZED,
  };
}

// ordered first-match rule list
export class RuleEngine {
  readonly rules: readonly Rule[];
  readonly defaultPool: string;
  private counters: CounterRegistry;

  constructor(counters: CounterRegistry, rules: readonly Rule[], defaultPool: string = DEFAULT_POOL) {
    this.counters = counters;
    this.rules = rules;
    this.defaultPool = defaultPool;
    this.counters.register(COUNTER_SELF_ANSWERED);
    for (const rule of rules) {
      if (rule.action.kind === 'synthesize') {
        this.counters.register(ruleCounterName(rule.name));
      }
    }
  }

  // first matching rule decides; unmatched queries go to the default pool
  evaluate(frontend: FrontendName, query: DnsQuery): Verdict {
    const rule = this.rules.find(candidate => candidate.matches(query));
    if (!rule) {
      return { kind: 'routed', pool: this.defaultPool, rule: null };
    }

    const { action } = rule;
    if (action.kind === 'route') {
      return { kind: 'routed', pool: action.pool, rule: rule.name };
    }

    this.counters.increment(ruleCounterName(rule.name));
    this.counters.increment(COUNTER_SELF_ANSWERED);
    if (isFrontendAccounted(action.rcode)) {
      for (const name of frontendCounterNames(frontend, action.rcode)) {
        this.counters.increment(name);
      }
    }
    return { kind: 'synthesized', response: synthesizeResponse(query, action.rcode), rule: rule.name };
  }
}
