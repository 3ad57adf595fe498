import { FrontendAccounting } from './accounting.js';
import { cacheKey } from './caches/keys.js';
import {
  BUILTIN_COUNTERS,
  COUNTER_BACKEND_ERRORS,
  COUNTER_QUERIES,
  DEFAULT_POOL,
  FLAG_RECURSION_DESIRED,
  PROVENANCE_BACKEND,
} from './constants.js';
import { CounterRegistry } from './counters.js';
import { BackendError, ConfigurationError, toProxyError } from './errors.js';
import { createLogger } from './logger.js';
import { decodeQuery, encodeResponse } from './packets.js';
import { PoolRegistry, type PoolDefinition } from './pools.js';
import { compileRules, RuleEngine } from './rules.js';
import type {
  BackendQuery,
  DnsFlag,
  DnsQuery,
  DnsResponse,
  FrontendName,
  RuleDefinition,
  TransactionState,
} from './types.js';

const log = createLogger('proxy-core');

// options for DnsProxyCore
export interface DnsProxyOptions {
  backend: BackendQuery; // answers queries routed to a pool
  pools: PoolDefinition[]; // the default pool is added when missing
  rules: RuleDefinition[];
  defaultPool: string;
  counters: CounterRegistry; // injected so tests get isolated registries
}

// default options for DnsProxyCore, minus the backend which has no default
export const DEFAULT_OPTIONS: Omit<DnsProxyOptions, 'backend' | 'counters'> = {
  pools: [],
  rules: [],
  defaultPool: DEFAULT_POOL,
};

// every query, whatever transport carried it, goes through one DnsProxyCore:
// Received -> RuleEvaluated -> Synthesized | CacheChecked -> [BackendCalled] -> Completed
export class DnsProxyCore {
  readonly counters: CounterRegistry;
  readonly rules: RuleEngine;
  readonly pools: PoolRegistry;
  readonly accounting: FrontendAccounting;
  private backend: BackendQuery;

  constructor(opts: Partial<DnsProxyOptions> & Pick<DnsProxyOptions, 'backend'>) {
    const options = { ...DEFAULT_OPTIONS, ...opts };
    this.counters = opts.counters ?? new CounterRegistry();
    for (const name of BUILTIN_COUNTERS) {
      this.counters.register(name);
    }

    const pools = options.pools.some(pool => pool.name === options.defaultPool)
      ? options.pools
      : [{ name: options.defaultPool }, ...options.pools];
    this.pools = new PoolRegistry(this.counters, pools);
    this.rules = new RuleEngine(
      this.counters,
      compileRules(options.rules, this.pools.names()),
      options.defaultPool
    );
    this.accounting = new FrontendAccounting(this.counters);
    this.backend = options.backend;
  }

  // run a transaction up to the response; the caller must call recordCompletion() once
  public async resolve(frontend: FrontendName, query: DnsQuery): Promise<DnsResponse> {
    this.trace('received', frontend, query);
    this.counters.increment(COUNTER_QUERIES);

    const verdict = this.rules.evaluate(frontend, query);
    this.trace('rule-evaluated', frontend, query, { verdict: verdict.kind, rule: verdict.rule });

    if (verdict.kind === 'synthesized') {
      this.trace('synthesized', frontend, query, { rcode: verdict.response.rcode });
      return verdict.response;
    }

    const pool = this.pools.get(verdict.pool);
    if (!pool) {
      // compileRules() rejects unknown pools, so only a hand-built rule list gets here
      throw new ConfigurationError(`Query routed to unknown pool '${verdict.pool}'`);
    }

    const { cache } = pool;
    const key = cacheKey(query);
    if (cache) {
      const cached = cache.lookup(key);
      this.trace('cache-checked', frontend, query, { key, hit: cached !== null });
      if (cached) {
        return this.answerFromCache(query, cached);
      }
    }

    const response = await this.callBackend(query, pool.name);
    this.trace('backend-called', frontend, query, { pool: pool.name, rcode: response.rcode });

    // stored even if the client has gone away by now
    cache?.store(key, response);
    return response;
  }

  // the Completed transition: exactly one call per transaction
  public recordCompletion(frontend: FrontendName, response: DnsResponse): void {
    this.accounting.recordCompletion(frontend, response);
    this.trace('completed', frontend, response.question, {
      rcode: response.rcode,
      provenance: response.provenance,
    });
  }

  // resolve and record completion in one step
  public async handleQuery(frontend: FrontendName, query: DnsQuery): Promise<DnsResponse> {
    const response = await this.resolve(frontend, query);
    this.recordCompletion(frontend, response);
    return response;
  }

  // wire-format entry point for listeners; null when the packet is not a usable query
  public async handlePacket(frontend: FrontendName, message: Buffer): Promise<Buffer | null> {
    let query: DnsQuery;
    try {
      query = decodeQuery(message);
    } catch (error) {
      log.warn({ frontend, err: toProxyError(error) }, 'dropping malformed query');
      return null;
    }
    const response = await this.handleQuery(frontend, query);
    return encodeResponse(response);
  }

  // a cached response carries the new query's id and RD bit
  protected answerFromCache(query: DnsQuery, cached: DnsResponse): DnsResponse {
    const flags: DnsFlag[] = cached.flags.filter(flag => flag !== FLAG_RECURSION_DESIRED);
    if (query.recursionDesired) {
      flags.push(FLAG_RECURSION_DESIRED);
    }
    return { ...cached, id: query.id, flags, question: query };
  }

  // answers go out under the client's transaction id; a backend that throws has failed,
  // so answer SERVFAIL on its behalf
  protected async callBackend(query: DnsQuery, pool: string): Promise<DnsResponse> {
    try {
      const response = await this.backend(query, pool);
      return { ...response, id: query.id, provenance: PROVENANCE_BACKEND };
    } catch (error) {
      const failure = new BackendError(toProxyError(error).message, pool);
      log.warn({ pool, name: query.name, type: query.type, err: failure }, 'backend query failed');
      this.counters.increment(COUNTER_BACKEND_ERRORS);
      return {
        id: query.id,
        rcode: 'SERVFAIL',
        flags: query.recursionDesired ? [FLAG_RECURSION_DESIRED] : [],
        question: query,
        answers: [],
        authorities: [],
        additionals: [],
        provenance: PROVENANCE_BACKEND,
      };
    }
  }

  private trace(
    state: TransactionState,
    frontend: FrontendName,
    query: DnsQuery | null,
    fields: Record<string, unknown> = {}
  ): void {
    log.debug({ state, frontend, id: query?.id, name: query?.name, ...fields }, 'transaction');
  }
}

export { FrontendAccounting } from './accounting.js';
export { cacheKey } from './caches/keys.js';
export { DEFAULT_CACHE_OPTIONS, ResponseCache } from './caches/responses.js';
export * from './constants.js';
export { CounterRegistry, type CounterSnapshot } from './counters.js';
export * from './errors.js';
export { createLogger } from './logger.js';
export { createQuery, decodeQuery, decodeResponse, encodeQuery, encodeResponse } from './packets.js';
export { PoolRegistry, type Pool, type PoolDefinition } from './pools.js';
export {
  compileRules,
  compileSelector,
  ruleCounterName,
  RuleEngine,
  synthesizeResponse,
} from './rules.js';
export * from './types.js';
