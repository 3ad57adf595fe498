import { DNS_FLAG_NAMES, DNS_FLAGS, DNS_RECORD_TYPES, DNS_RESPONSE_CODES } from './constants.js';
import type { DnsFlag, DnsRecordType, DnsResponseType, PacketAnswer } from './types.js';

// natural sort comparison function for strings with numeric handling
export function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, undefined, {
    numeric: true,
    sensitivity: 'accent',
  });
}

// check for empty values: undefined, null, empty or blank string
export function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null) {
    return true;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed === '' || trimmed === 'null' || trimmed === 'undefined';
  }
  return false;
}

// lowercase, trim and make fully qualified; the root zone stays '.'
export const normalizeName = (name: string): string => {
  if (isEmpty(name)) return '.';
  const host = String(name)
    .trim()
    .toLowerCase()
    .replace(/^[.]+|[.]+$/g, '');
  return host === '' ? '.' : `${host}.`;
};

// true when `name` equals `suffix` or sits below it, both normalized
export function isSubdomainOf(name: string, suffix: string): boolean {
  if (suffix === '.') return true;
  return name === suffix || name.endsWith(`.${suffix}`);
}

// rcode name as used in counter names, e.g. 'servfail'
export function rcodeCounterName(rcode: DnsResponseType): string {
  return rcode.toLowerCase();
}

// whether `value` is a record type rules and configs may name
export function isRecordType(value: string): value is DnsRecordType {
  return DNS_RECORD_TYPES.some(type => type === value);
}

// whether `value` is a known rcode name
export function isResponseType(value: string): value is DnsResponseType {
  return Object.hasOwn(DNS_RESPONSE_CODES, value);
}

// parse an rcode name or number, case-insensitive
export function toResponseType(value: string | number): DnsResponseType | null {
  if (typeof value === 'string') {
    const upper = value.toUpperCase();
    return isResponseType(upper) ? upper : null;
  }
  for (const [name, code] of Object.entries(DNS_RESPONSE_CODES)) {
    if (code === value && isResponseType(name)) return name;
  }
  return null;
}

// pass the flag constants and get a bitmask for them
export function getFlagsBitmask(flags: readonly DnsFlag[]): number {
  return flags.reduce((mask, flag) => mask | DNS_FLAGS[flag], 0);
}

// list the header flags set in a bitmask
export function getFlagsFromBitmask(bitmask: number): DnsFlag[] {
  return DNS_FLAG_NAMES.filter(flag => (bitmask & DNS_FLAGS[flag]) !== 0);
}

// the TTL of a resource record, null for the OPT pseudo-record
export function getRecordTtl(record: PacketAnswer): number | null {
  if (record.type === 'OPT') return null;
  return 'ttl' in record && typeof record.ttl === 'number' ? record.ttl : null;
}

// copy of a resource record with a new TTL, the OPT pseudo-record is left alone
export function withRecordTtl(record: PacketAnswer, ttl: number): PacketAnswer {
  if (record.type === 'OPT') return record;
  return Object.assign({}, record, { ttl });
}
