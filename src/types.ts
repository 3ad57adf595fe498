import type { Answer, Question, RecordType } from 'dns-packet';
import type {
  DNS_FLAGS,
  DNS_RECORD_CLASSES,
  DNS_RESPONSE_CODES,
  FRONTEND_TRANSPORTS,
  PROVENANCES,
} from './constants.js';

//--------------------------------
// dns-packet types
//--------------------------------

// just aliases for convenience
export type PacketQuestion = Question;
export type PacketAnswer = Answer;
export type DnsRecordType = RecordType;

// the DNS record class, e.g. 'IN' for Internet, 'CH' for CHAOS
export type DnsRecordClass = keyof typeof DNS_RECORD_CLASSES;

// the type of DNS response code, e.g. 'NOERROR', 'SERVFAIL', etc
export type DnsResponseType = keyof typeof DNS_RESPONSE_CODES;

// the numeric DNS response code, e.g. 0 for NOERROR, 2 for SERVFAIL, etc
export type DnsResponseCode = (typeof DNS_RESPONSE_CODES)[DnsResponseType];

// any DNS header flag
export type DnsFlag = keyof typeof DNS_FLAGS;

// built-in listener transports; frontends may use any name
export type FrontendTransport = (typeof FRONTEND_TRANSPORTS)[number];

// the listener a query arrived on, used in `frontend-<name>-<rcode>` counters
export type FrontendName = FrontendTransport | (string & {});

// where a response came from
export type Provenance = (typeof PROVENANCES)[number];

//--------------------------------
// queries and responses
//--------------------------------

// a normalized DNS question, owned by a single in-flight transaction
export interface DnsQuery {
  readonly id: number; // transaction id
  readonly name: string; // lowercased, fully qualified (trailing dot)
  readonly type: DnsRecordType;
  readonly class: DnsRecordClass;
  readonly recursionDesired: boolean;
  readonly checkingDisabled: boolean;
}

// loosely specified query, see createQuery()
export interface DnsQueryInit {
  id?: number;
  name: string;
  type?: DnsRecordType;
  class?: DnsRecordClass;
  recursionDesired?: boolean;
  checkingDisabled?: boolean;
}

// a DNS response plus its provenance
export interface DnsResponse {
  id: number;
  rcode: DnsResponseType;
  flags: DnsFlag[];
  question: DnsQuery | null;
  answers: PacketAnswer[];
  authorities: PacketAnswer[];
  additionals: PacketAnswer[];
  provenance: Provenance;
}

//--------------------------------
// rules
//--------------------------------

// serializable rule selectors
export type RuleSelector =
  | { kind: 'all' }
  | { kind: 'qname'; names: readonly string[] } // suffix match
  | { kind: 'exact'; names: readonly string[] }
  | { kind: 'regex'; pattern: string }
  | { kind: 'qtype'; types: readonly DnsRecordType[] }
  | { kind: 'and'; selectors: readonly RuleSelector[] }
  | { kind: 'not'; selector: RuleSelector };

// what a matching rule does
export type RuleAction =
  | { kind: 'synthesize'; rcode: DnsResponseType }
  | { kind: 'route'; pool: string };

// a configured rule
export interface RuleDefinition {
  name?: string;
  selector: RuleSelector;
  action: RuleAction;
}

// a pure predicate over a query
export type QueryPredicate = (query: DnsQuery) => boolean;

// a compiled rule, read-only while serving
export interface Rule {
  readonly name: string;
  readonly matches: QueryPredicate;
  readonly action: RuleAction;
}

// the outcome of evaluating the rule list
export type Verdict =
  | { kind: 'synthesized'; response: DnsResponse; rule: string }
  | { kind: 'routed'; pool: string; rule: string | null };

//--------------------------------
// cache
//--------------------------------

// packet cache settings
export interface CacheOptions {
  maxEntries: number; // upper bound on stored entries
  maxTTL: number; // TTLs are capped to this many seconds
  minTTL: number; // responses with a lower TTL are not cached
  tempFailureTTL: number; // TTL for SERVFAIL/REFUSED responses without records, 0 disables
  maxNegativeTTL: number; // cap for NXDOMAIN/NODATA TTLs derived from the SOA
  now: () => number; // clock in ms
}

// a stored response
export interface CacheEntry {
  response: DnsResponse;
  insertedAt: number; // ms
  ttlSeconds: number;
}

//--------------------------------
// backends and transactions
//--------------------------------

// external collaborator that picks a backend in `pool` and returns its answer
export interface BackendQuery {
  (query: DnsQuery, pool: string): Promise<DnsResponse>;
}

// states a transaction moves through, in order
export type TransactionState =
  | 'received'
  | 'rule-evaluated'
  | 'synthesized'
  | 'cache-checked'
  | 'backend-called'
  | 'completed';
