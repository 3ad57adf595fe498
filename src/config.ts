import { readFileSync } from 'fs';
import { z } from 'zod';
import { DEFAULT_POOL, DNS_RESPONSE_CODES } from './constants.js';
import { ConfigurationError } from './errors.js';
import { DnsProxyCore } from './index.js';
import type { PoolDefinition } from './pools.js';
import type { BackendQuery, DnsRecordType, DnsResponseType, RuleDefinition, RuleSelector } from './types.js';
import { isRecordType, toResponseType } from './utils.js';

const nameListSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

const recordTypeSchema = z.string().transform((value, ctx): DnsRecordType => {
  const type = value.toUpperCase();
  if (!isRecordType(type)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unsupported record type ${value}` });
    return z.NEVER;
  }
  return type;
});

const responseTypeSchema = z.string().transform((value, ctx): DnsResponseType => {
  const rcode = toResponseType(value);
  if (rcode === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected one of ${Object.keys(DNS_RESPONSE_CODES).join(', ')}`,
    });
    return z.NEVER;
  }
  return rcode;
});

const selectorSchema: z.ZodType<RuleSelector, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({ all: z.literal(true) }).transform((): RuleSelector => ({ kind: 'all' })),
    z.object({ qname: nameListSchema }).transform(
      ({ qname }): RuleSelector => ({ kind: 'qname', names: toList(qname) })
    ),
    z.object({ exact: nameListSchema }).transform(
      ({ exact }): RuleSelector => ({ kind: 'exact', names: toList(exact) })
    ),
    z.object({ regex: z.string().min(1) }).transform(
      ({ regex }): RuleSelector => ({ kind: 'regex', pattern: regex })
    ),
    z.object({ qtype: z.union([recordTypeSchema, z.array(recordTypeSchema).min(1)]) }).transform(
      ({ qtype }): RuleSelector => ({ kind: 'qtype', types: toList(qtype) })
    ),
    z.object({ and: z.array(selectorSchema).min(1) }).transform(
      ({ and }): RuleSelector => ({ kind: 'and', selectors: and })
    ),
    z.object({ not: selectorSchema }).transform(
      ({ not }): RuleSelector => ({ kind: 'not', selector: not })
    ),
  ])
);

const ruleSchema = z
  .object({
    name: z.string().min(1).optional(),
    // a bare string matches the name and everything below it
    selector: z.union([z.string().min(1), selectorSchema]),
    rcode: responseTypeSchema.optional(),
    pool: z.string().optional(),
  })
  .refine(rule => (rule.rcode === undefined) !== (rule.pool === undefined), {
    message: 'a rule needs exactly one of rcode or pool',
  })
  .transform((rule): RuleDefinition => {
    const selector: RuleSelector =
      typeof rule.selector === 'string' ? { kind: 'qname', names: [rule.selector] } : rule.selector;
    const action: RuleDefinition['action'] =
      rule.rcode !== undefined
        ? { kind: 'synthesize', rcode: rule.rcode }
        : { kind: 'route', pool: rule.pool ?? DEFAULT_POOL };
    return { ...(rule.name !== undefined && { name: rule.name }), selector, action };
  });

const ttlSchema = z.number().int().nonnegative();

const cacheSchema = z.object({
  maxEntries: z.number().int().positive(),
  maxTTL: ttlSchema.optional(),
  minTTL: ttlSchema.optional(),
  tempFailureTTL: ttlSchema.optional(),
  maxNegativeTTL: ttlSchema.optional(),
});

const poolSchema = z.object({
  name: z.string(),
  cache: cacheSchema.optional(),
});

const webserverSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(8083),
  apiKey: z.string().min(1),
});

export const configSchema = z.object({
  defaultPool: z.string().default(DEFAULT_POOL),
  pools: z.array(poolSchema).default([]),
  rules: z.array(ruleSchema).default([]),
  webserver: webserverSchema.optional(),
});

// validated configuration
export interface ProxyConfig {
  defaultPool: string;
  pools: PoolDefinition[];
  rules: RuleDefinition[];
  webserver?: z.output<typeof webserverSchema>;
}

function toList<T>(value: T | T[]): T[] {
  return Array.isArray(value) ? value : [value];
}

// validate a parsed configuration document
export function parseConfig(value: unknown): ProxyConfig {
  const result = configSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }

  const config = result.data;
  const pools = new Set(config.pools.map(pool => pool.name));
  pools.add(config.defaultPool);
  for (const rule of config.rules) {
    if (rule.action.kind === 'route' && !pools.has(rule.action.pool)) {
      throw new ConfigurationError(`Rule routes to unknown pool '${rule.action.pool}'`);
    }
  }
  return config;
}

// read and validate a JSON configuration file
export function loadConfig(path: string): ProxyConfig {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration '${path}': ${String(error)}`);
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Configuration '${path}' is not valid JSON: ${String(error)}`);
  }
  return parseConfig(value);
}

// build a proxy core from a validated configuration
export function createCoreFromConfig(config: ProxyConfig, backend: BackendQuery): DnsProxyCore {
  return new DnsProxyCore({
    backend,
    pools: config.pools,
    rules: config.rules,
    defaultPool: config.defaultPool,
  });
}
