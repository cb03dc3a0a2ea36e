import net from 'net';
import { normalizeReverseName, parseIPv6, type AddressFamily } from './address-normalizer.js';
import { RCODE } from './dns-protocol.js';
import { MalformedAddressError, StoreUnavailableError } from './errors.js';
import { logger } from './logger.js';
import type { RecordStore, RecordFilter } from './record-store.js';
import type { RouteMatch, RouteHandler } from './query-router.js';
import type { Answer, DnsRecord, FailureRcode, RecordType, ResolutionOutcome } from './types.js';

export interface HandlerContext {
  store: RecordStore;
  suffix: string;
  ttl: number;
}

export const outcomes = {
  answered(answers: Answer[], ttl: number): ResolutionOutcome {
    return { kind: 'answered', answers, ttl };
  },
  failed(rcode: FailureRcode): ResolutionOutcome {
    return { kind: 'failed', rcode };
  },
  forwarded(): ResolutionOutcome {
    return { kind: 'forwarded' };
  },
};

export const LOOPBACK_IPV4 = '127.0.0.1';
export const LOOPBACK_IPV6 = '::1';

/**
 * Turns a store row into the answer for its type. Rows missing the field their
 * type needs are skipped.
 */
export function recordToAnswer(record: DnsRecord): Answer | null {
  switch (record.type) {
    case 'A':
      if (record.ipv4Address && net.isIPv4(record.ipv4Address)) {
        return { type: 'A', address: record.ipv4Address };
      }
      break;
    case 'AAAA':
      if (record.ipv6Address && parseIPv6(record.ipv6Address)) {
        return { type: 'AAAA', address: record.ipv6Address };
      }
      break;
    case 'CNAME':
      if (record.cname) {
        return { type: 'CNAME', target: record.cname };
      }
      break;
    case 'MX':
      if (record.cname) {
        return { type: 'MX', priority: record.priority ?? 0, exchange: record.cname };
      }
      break;
  }

  logger.warn('Skipping record without data for its type', { id: record.id, name: record.name, type: record.type });
  return null;
}

const LOCAL_TYPES: Record<'local-a' | 'local-aaaa' | 'local-cname' | 'local-mx', RecordType> = {
  'local-a': 'A',
  'local-aaaa': 'AAAA',
  'local-cname': 'CNAME',
  'local-mx': 'MX',
};

/**
 * Local zone lookups fail closed: a miss is NXDOMAIN and a store outage SERVFAIL.
 */
export async function resolveLocal(ctx: HandlerContext, label: string, type: RecordType): Promise<ResolutionOutcome> {
  let records: DnsRecord[];
  try {
    records = await ctx.store.lookup({ kind: 'byNameAndType', name: label, type });
  } catch (error) {
    if (error instanceof StoreUnavailableError) {
      return outcomes.failed(RCODE.SERVFAIL);
    }
    throw error;
  }

  const answers: Answer[] = [];
  for (const record of records) {
    const answer = recordToAnswer(record);
    if (answer) answers.push(answer);
  }

  if (answers.length === 0) {
    logger.debug('No local record', { label, type });
    return outcomes.failed(RCODE.NXDOMAIN);
  }

  // A name holds at most one CNAME
  return outcomes.answered(type === 'CNAME' ? answers.slice(0, 1) : answers, ctx.ttl);
}

/**
 * Reverse lookups fail open: misses and store outages go to the upstream
 * resolvers, since most addresses asked about are not ours.
 */
export async function resolvePtr(
  ctx: HandlerContext,
  family: AddressFamily,
  labels: readonly string[],
): Promise<ResolutionOutcome> {
  let filter: RecordFilter;
  try {
    const reverse = normalizeReverseName(labels, family);
    filter =
      family === 'ipv4'
        ? { kind: 'byIPv4', address: reverse.address }
        : { kind: 'byIPv6', candidates: reverse.candidates };
  } catch (error) {
    if (error instanceof MalformedAddressError) {
      logger.debug('Refusing malformed reverse lookup', { name: error.input });
      return outcomes.failed(RCODE.REFUSED);
    }
    throw error;
  }

  let records: DnsRecord[];
  try {
    records = await ctx.store.lookup(filter);
  } catch (error) {
    if (error instanceof StoreUnavailableError) {
      return outcomes.forwarded();
    }
    throw error;
  }

  if (records.length === 0) {
    return outcomes.forwarded();
  }

  const targets = new Set<string>();
  const answers: Answer[] = [];
  for (const record of records) {
    const target = `${record.name}.${ctx.suffix}`;
    if (targets.has(target.toLowerCase())) continue;
    targets.add(target.toLowerCase());
    answers.push({ type: 'PTR', target });
  }
  return outcomes.answered(answers, ctx.ttl);
}

export async function resolveMatch(match: RouteMatch, ctx: HandlerContext): Promise<ResolutionOutcome> {
  const handler: RouteHandler = match.rule.handler;
  const { capture } = match;

  switch (handler) {
    case 'localhost-a':
      return outcomes.answered([{ type: 'A', address: LOOPBACK_IPV4 }], ctx.ttl);
    case 'localhost-aaaa':
      return outcomes.answered([{ type: 'AAAA', address: LOOPBACK_IPV6 }], ctx.ttl);
    case 'local-a':
    case 'local-aaaa':
    case 'local-cname':
    case 'local-mx':
      if (capture.kind !== 'label') break;
      return resolveLocal(ctx, capture.label, LOCAL_TYPES[handler]);
    case 'ptr-ipv4':
    case 'ptr-ipv6':
      if (capture.kind !== 'reverse') break;
      return resolvePtr(ctx, capture.family, capture.labels);
    case 'forward':
      return outcomes.forwarded();
  }

  // A rule whose matcher does not produce what its handler needs is a wiring bug
  throw new Error(`Route ${handler} matched with ${capture.kind} capture`);
}
