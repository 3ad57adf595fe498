import type { RecordType } from 'dns-packet';

// frontend transport types
export const FRONTEND_UDP = 'udp'; // plain DNS over UDP
export const FRONTEND_TCP = 'tcp'; // plain DNS over TCP
export const FRONTEND_DOT = 'dot'; // DNS-over-TLS
export const FRONTEND_DOH = 'doh'; // DNS-over-HTTPS
export const FRONTEND_TRANSPORTS = [FRONTEND_UDP, FRONTEND_TCP, FRONTEND_DOT, FRONTEND_DOH] as const;

// response provenance, never written to the wire
export const PROVENANCE_CACHE_HIT = 'cache-hit';
export const PROVENANCE_RULE_SYNTHESIZED = 'rule-synthesized';
export const PROVENANCE_BACKEND = 'backend';
export const PROVENANCES = [
  PROVENANCE_CACHE_HIT,
  PROVENANCE_RULE_SYNTHESIZED,
  PROVENANCE_BACKEND,
] as const;

// the pool used when no rule routes a query elsewhere
export const DEFAULT_POOL = '';

// record types that rules and configs may name
export const DNS_RECORD_TYPES = [
  'A',
  'AAAA',
  'CAA',
  'CNAME',
  'DNAME',
  'DNSKEY',
  'DS',
  'HINFO',
  'MX',
  'NAPTR',
  'NS',
  'NSEC',
  'NSEC3',
  'PTR',
  'RRSIG',
  'SOA',
  'SRV',
  'SSHFP',
  'TLSA',
  'TXT',
] as const satisfies readonly RecordType[];

// DNS record classes
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-2
export const DNS_RECORD_CLASSES = {
  IN: 1, // Internet
  CS: 2, // CSNET (obsolete)
  CH: 3, // CHAOS
  HS: 4, // Hesiod
  ANY: 255, // ANY (query class)
} as const;

// dns packet header flags
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-12
export const FLAG_AUTHORITATIVE_ANSWER = 'AA';
export const FLAG_AUTHENTIC_DATA = 'AD';
export const FLAG_TRUNCATED_RESPONSE = 'TC';
export const FLAG_RECURSION_AVAILABLE = 'RA';
export const FLAG_RECURSION_DESIRED = 'RD';
export const FLAG_CHECKING_DISABLED = 'CD';

// header flag bits (rcode lives in the low 4 bits)
export const DNS_FLAGS = {
  [FLAG_AUTHORITATIVE_ANSWER]: 1 << 10, // 1024
  [FLAG_TRUNCATED_RESPONSE]: 1 << 9, // 512
  [FLAG_RECURSION_DESIRED]: 1 << 8, // 256
  [FLAG_RECURSION_AVAILABLE]: 1 << 7, // 128
  [FLAG_AUTHENTIC_DATA]: 1 << 5, // 32
  [FLAG_CHECKING_DISABLED]: 1 << 4, // 16
} as const;

// header flags in wire order
export const DNS_FLAG_NAMES = [
  FLAG_AUTHORITATIVE_ANSWER,
  FLAG_TRUNCATED_RESPONSE,
  FLAG_RECURSION_DESIRED,
  FLAG_RECURSION_AVAILABLE,
  FLAG_AUTHENTIC_DATA,
  FLAG_CHECKING_DISABLED,
] as const;

// DNS response codes that fit in the 4-bit header field
// https://www.iana.org/assignments/dns-parameters/dns-parameters.xhtml#dns-parameters-6
export const DNS_RESPONSE_CODES = {
  NOERROR: 0, // No Error	[RFC1035]
  FORMERR: 1, // Format Error	[RFC1035]
  SERVFAIL: 2, // Server Failure	[RFC1035]
  NXDOMAIN: 3, // Non-Existent Domain	[RFC1035]
  NOTIMP: 4, // Not Implemented	[RFC1035]
  REFUSED: 5, // Query Refused	[RFC1035]
  YXDOMAIN: 6, // Name Exists when it should not	[RFC2136][RFC6672]
  YXRRSET: 7, // RR Set Exists when it should not	[RFC2136]
  NXRRSET: 8, // RR Set that should exist does not	[RFC2136]
  NOTAUTH: 9, // Server Not Authoritative for zone	[RFC2136]
  NOTZONE: 10, // Name not contained in zone	[RFC2136]
  DSOTYPENI: 11, // DSO-TYPE Not Implemented	[RFC8490]
} as const;

// counter names
export const COUNTER_QUERIES = 'queries';
export const COUNTER_RESPONSES = 'responses';
export const COUNTER_SELF_ANSWERED = 'self-answered';
export const COUNTER_SERVFAIL_RESPONSES = 'servfail-responses';
export const COUNTER_BACKEND_ERRORS = 'backend-errors';
export const COUNTER_CACHE_HITS = 'cache-hits';
export const COUNTER_CACHE_MISSES = 'cache-misses';
export const COUNTER_CACHE_INSERTIONS = 'cache-insertions';
export const COUNTER_CACHE_EVICTIONS = 'cache-evictions';

// counters that exist from start-up, even before the first query
export const BUILTIN_COUNTERS = [
  COUNTER_QUERIES,
  COUNTER_RESPONSES,
  COUNTER_SELF_ANSWERED,
  COUNTER_SERVFAIL_RESPONSES,
  COUNTER_BACKEND_ERRORS,
  COUNTER_CACHE_HITS,
  COUNTER_CACHE_MISSES,
  COUNTER_CACHE_INSERTIONS,
  COUNTER_CACHE_EVICTIONS,
  'frontend-noerror',
  'frontend-nxdomain',
  'frontend-servfail',
] as const;

// rcodes that are never attributed to a frontend counter
export const FRONTEND_EXEMPT_RCODES = ['REFUSED'] as const;

// packet cache defaults
export const CACHE_MAX_TTL = 86_400; // one day
export const CACHE_MIN_TTL = 0;
export const CACHE_TEMP_FAILURE_TTL = 60; // SERVFAIL/REFUSED with no records
export const CACHE_MAX_NEGATIVE_TTL = 3_600; // NXDOMAIN/NODATA, from the SOA minimum

// management API
export const API_KEY_HEADER = 'x-api-key';
export const STATISTICS_PATH = '/api/v1/servers/localhost';
export const METRICS_PATH = '/metrics';
