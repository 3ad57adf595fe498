import type { DnsQuery } from '../types.js';
import { normalizeName } from '../utils.js';

// canonical cache key for a query
// the transport and the RD bit are not part of the key: a response is shared by every
// frontend and RD is rewritten from the query on the way out
export function cacheKey(query: DnsQuery): string {
  const name = normalizeName(query.name);
  const cd = query.checkingDisabled ? 'cd' : '';
  return `${name}:${query.type}:${query.class}:${cd}`;
}
