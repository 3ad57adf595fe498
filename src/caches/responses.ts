import {
  CACHE_MAX_NEGATIVE_TTL,
  CACHE_MAX_TTL,
  CACHE_MIN_TTL,
  CACHE_TEMP_FAILURE_TTL,
  COUNTER_CACHE_EVICTIONS,
  COUNTER_CACHE_HITS,
  COUNTER_CACHE_INSERTIONS,
  COUNTER_CACHE_MISSES,
  PROVENANCE_BACKEND,
  PROVENANCE_CACHE_HIT,
} from '../constants.js';
import type { CounterRegistry } from '../counters.js';
import { ConfigurationError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { CacheEntry, CacheOptions, DnsResponse, PacketAnswer } from '../types.js';
import { getRecordTtl, withRecordTtl } from '../utils.js';

const log = createLogger('response-cache');

// default packet cache options
export const DEFAULT_CACHE_OPTIONS: CacheOptions = {
  maxEntries: 1000,
  maxTTL: CACHE_MAX_TTL,
  minTTL: CACHE_MIN_TTL,
  tempFailureTTL: CACHE_TEMP_FAILURE_TTL,
  maxNegativeTTL: CACHE_MAX_NEGATIVE_TTL,
  now: () => Date.now(),
};

// copy a response so the cache never shares arrays with a caller
function cloneResponse(response: DnsResponse): DnsResponse {
  return {
    ...response,
    flags: [...response.flags],
    answers: [...response.answers],
    authorities: [...response.authorities],
    additionals: [...response.additionals],
  };
}

// the SOA MINIMUM field, null for any other record
function getSoaMinimum(record: PacketAnswer): number | null {
  if (record.type !== 'SOA') return null;
  const data: unknown = record.data;
  if (typeof data === 'object' && data !== null && 'minimum' in data) {
    return typeof data.minimum === 'number' ? data.minimum : null;
  }
  return null;
}

// age every record TTL by `elapsed` whole seconds
function ageRecords(records: PacketAnswer[], elapsed: number): PacketAnswer[] {
  return records.map(record => {
    const ttl = getRecordTtl(record);
    return ttl === null ? record : withRecordTtl(record, Math.max(0, ttl - elapsed));
  });
}

// response cache shared by every frontend and pool that points at it
//
// expiry is lazy: an expired entry is a miss on read and is dropped then, there is no sweeper
export class ResponseCache {
  readonly options: CacheOptions;
  private cache: Map<string, CacheEntry>;
  private counters: CounterRegistry;

  constructor(counters: CounterRegistry, opts: Partial<CacheOptions> = {}) {
    this.options = {
      maxEntries: opts.maxEntries ?? DEFAULT_CACHE_OPTIONS.maxEntries,
      maxTTL: opts.maxTTL ?? DEFAULT_CACHE_OPTIONS.maxTTL,
      minTTL: opts.minTTL ?? DEFAULT_CACHE_OPTIONS.minTTL,
      tempFailureTTL: opts.tempFailureTTL ?? DEFAULT_CACHE_OPTIONS.tempFailureTTL,
      maxNegativeTTL: opts.maxNegativeTTL ?? DEFAULT_CACHE_OPTIONS.maxNegativeTTL,
      now: opts.now ?? DEFAULT_CACHE_OPTIONS.now,
    };
    this.validateOptions();
    this.cache = new Map();
    this.counters = counters;
    this.counters.register(COUNTER_CACHE_HITS);
    this.counters.register(COUNTER_CACHE_MISSES);
  }

  private validateOptions(): void {
    const { maxEntries, maxTTL, minTTL, tempFailureTTL, maxNegativeTTL } = this.options;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new ConfigurationError(`Invalid cache size: ${maxEntries}`);
    }
    for (const [name, value] of Object.entries({ maxTTL, minTTL, tempFailureTTL, maxNegativeTTL })) {
      if (!Number.isInteger(value) || value < 0) {
        throw new ConfigurationError(`Invalid cache ${name}: ${value}`);
      }
    }
  }

  // stored response for `key`, or null on a miss; counts exactly one hit or miss
  lookup(key: string): DnsResponse | null {
    const entry = this.cache.get(key);
    const now = this.options.now();

    if (!entry || now - entry.insertedAt >= entry.ttlSeconds * 1000) {
      if (entry) {
        this.cache.delete(key);
      }
      this.counters.increment(COUNTER_CACHE_MISSES);
      return null;
    }

    // move to end (most recently used) so capacity eviction hits cold entries first
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.counters.increment(COUNTER_CACHE_HITS);
    const elapsed = Math.floor((now - entry.insertedAt) / 1000);
    const response = cloneResponse(entry.response);
    return {
      ...response,
      answers: ageRecords(response.answers, elapsed),
      authorities: ageRecords(response.authorities, elapsed),
      additionals: ageRecords(response.additionals, elapsed),
      provenance: PROVENANCE_CACHE_HIT,
    };
  }

  // store a backend response, replacing whatever `key` held; returns false when not cacheable,
  // in which case an older entry for `key` is dropped
  store(key: string, response: DnsResponse, ttlSeconds?: number): boolean {
    if (response.provenance !== PROVENANCE_BACKEND) {
      log.debug({ key, provenance: response.provenance }, 'not caching non-backend response');
      return false;
    }

    const ttl = this.clampTtl(ttlSeconds ?? this.getResponseTtl(response));
    if (ttl === null) {
      // the newest backend answer decides, so an older entry must not outlive it
      this.cache.delete(key);
      log.debug({ key, rcode: response.rcode }, 'response is not cacheable');
      return false;
    }

    if (!this.cache.has(key) && this.cache.size >= this.options.maxEntries) {
      this.makeRoom();
    }

    // last writer wins
    this.cache.delete(key);
    this.cache.set(key, {
      response: cloneResponse(response),
      insertedAt: this.options.now(),
      ttlSeconds: ttl,
    });
    this.counters.increment(COUNTER_CACHE_INSERTIONS);
    return true;
  }

  // the TTL a response would be cached with, before clamping
  getResponseTtl(response: DnsResponse): number | null {
    const negative =
      response.rcode === 'NXDOMAIN' || (response.rcode === 'NOERROR' && response.answers.length === 0);

    // negative answers live as long as the SOA says, bounded by maxNegativeTTL
    if (negative) {
      for (const record of response.authorities) {
        const minimum = getSoaMinimum(record);
        if (minimum !== null) {
          const soaTtl = getRecordTtl(record) ?? minimum;
          return Math.min(soaTtl, minimum, this.options.maxNegativeTTL);
        }
      }
    }

    const ttls = [...response.answers, ...response.authorities]
      .map(getRecordTtl)
      .filter((ttl): ttl is number => ttl !== null);
    if (ttls.length > 0) {
      return Math.min(...ttls);
    }

    if (response.rcode === 'SERVFAIL' || response.rcode === 'REFUSED') {
      return this.options.tempFailureTTL;
    }
    return null;
  }

  private clampTtl(ttl: number | null): number | null {
    if (ttl === null) return null;
    const capped = Math.min(Math.floor(ttl), this.options.maxTTL);
    if (capped <= 0 || capped < this.options.minTTL) return null;
    return capped;
  }

  // drop expired entries, then the least recently used one if still full
  private makeRoom(): void {
    this.purgeExpired();
    if (this.cache.size < this.options.maxEntries) return;

    const oldest = this.cache.keys().next();
    if (!oldest.done) {
      this.cache.delete(oldest.value);
      this.counters.increment(COUNTER_CACHE_EVICTIONS);
    }
  }

  // remove expired entries, returns how many were removed
  purgeExpired(): number {
    const now = this.options.now();
    let removed = 0;
    for (const [key, entry] of this.cache) {
      if (now - entry.insertedAt >= entry.ttlSeconds * 1000) {
        this.cache.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }
}
