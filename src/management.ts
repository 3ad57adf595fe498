import { randomBytes, scryptSync, timingSafeEqual } from 'crypto';
import http from 'http';
import type { AddressInfo } from 'net';
import { API_KEY_HEADER, METRICS_PATH, STATISTICS_PATH } from './constants.js';
import type { CounterRegistry } from './counters.js';
import { ConfigurationError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('management');

const SCRYPT_PREFIX = '$scrypt$';

// read-only management endpoint settings
export interface ManagementOptions {
  host: string;
  port: number; // 0 picks a free port
  apiKey: string; // plain text or a `$scrypt$...` hash
}

// scrypt parameters and digest parsed from `$scrypt$ln=10,p=1,r=8$<salt>$<hash>`
interface ScryptHash {
  N: number;
  r: number;
  p: number;
  salt: Buffer;
  hash: Buffer;
}

function parseScryptHash(value: string): ScryptHash | null {
  const [, scheme, params, salt, hash] = value.split('$');
  if (scheme !== 'scrypt' || !params || !salt || !hash) return null;

  const settings = new Map(
    params.split(',').map(pair => {
      const [name, raw] = pair.split('=');
      return [name, Number(raw)] as const;
    })
  );
  const ln = settings.get('ln');
  const r = settings.get('r');
  const p = settings.get('p');
  if (ln === undefined || r === undefined || p === undefined) return null;
  if (!Number.isInteger(ln) || !Number.isInteger(r) || !Number.isInteger(p)) return null;

  const digest = Buffer.from(hash, 'base64');
  if (digest.length === 0) return null;
  return { N: 2 ** ln, r, p, salt: Buffer.from(salt, 'base64'), hash: digest };
}

// scrypt needs 128 * N * r bytes; Node's 32 MiB default is too small from ln=15, r=8
function deriveKey(key: string, salt: Buffer, length: number, N: number, r: number, p: number): Buffer {
  return scryptSync(key, salt, length, { N, r, p, maxmem: 256 * N * r });
}

// hash an API key so the plain key never has to be stored in the configuration
export function hashApiKey(key: string, salt: Buffer = randomBytes(16), ln = 10, r = 8, p = 1): string {
  const hash = deriveKey(key, salt, 32, 2 ** ln, r, p);
  return `${SCRYPT_PREFIX}ln=${ln},p=${p},r=${r}$${salt.toString('base64')}$${hash.toString('base64')}`;
}

// compare a presented key with the configured plain or hashed key, in constant time
export function verifyApiKey(configured: string, presented: string): boolean {
  if (configured.startsWith(SCRYPT_PREFIX)) {
    const parsed = parseScryptHash(configured);
    if (!parsed) return false;
    const candidate = deriveKey(presented, parsed.salt, parsed.hash.length, parsed.N, parsed.r, parsed.p);
    return timingSafeEqual(candidate, parsed.hash);
  }

  const expected = Buffer.from(configured);
  const actual = Buffer.from(presented);
  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

// request handler serving the counters; there is no write or reset route
export function createManagementHandler(
  counters: CounterRegistry,
  apiKey: string
): http.RequestListener {
  if (apiKey.startsWith(SCRYPT_PREFIX)) {
    const parsed = parseScryptHash(apiKey);
    if (!parsed) {
      throw new ConfigurationError('Malformed scrypt hash for the management API key');
    }
    // a trial derivation, so unusable parameters fail here and not on every request
    try {
      deriveKey('', parsed.salt, parsed.hash.length, parsed.N, parsed.r, parsed.p);
    } catch (error) {
      throw new ConfigurationError(`Unusable scrypt parameters for the management API key: ${String(error)}`);
    }
  }

  return (req, res) => {
    if (req.method !== 'GET') {
      res.setHeader('allow', 'GET');
      sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    const presented = req.headers[API_KEY_HEADER];
    if (typeof presented !== 'string' || !verifyApiKey(apiKey, presented)) {
      sendJson(res, 401, { error: 'Unauthorized' });
      return;
    }

    const { pathname } = new URL(req.url ?? '/', 'http://localhost');
    switch (pathname) {
      case STATISTICS_PATH:
        sendJson(res, 200, { type: 'Server', id: 'localhost', statistics: counters.toJSON() });
        return;
      case METRICS_PATH:
        res.writeHead(200, { 'content-type': 'text/plain; version=0.0.4' });
        res.end(counters.prometheusText());
        return;
      default:
        sendJson(res, 404, { error: 'Not found' });
    }
  };
}

// start the management server; resolves once it is listening
export async function startManagementServer(
  counters: CounterRegistry,
  options: ManagementOptions
): Promise<{ server: http.Server; address: AddressInfo }> {
  const server = http.createServer(createManagementHandler(counters, options.apiKey));

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  const address = server.address();
  if (address === null || typeof address === 'string') {
    server.close();
    throw new ConfigurationError('Management server is not bound to a TCP address');
  }
  log.info({ host: address.address, port: address.port }, 'management server listening');
  return { server, address };
}
