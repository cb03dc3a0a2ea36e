import {
  MAX_UDP_PAYLOAD,
  QCLASS_IN,
  RCODE,
  buildErrorResponse,
  buildResponse,
  isResponse,
  parseQuery,
  rcodeName,
  readRcode,
  truncateResponse,
  typeName,
  type ParsedQuery,
  type Rcode,
} from './dns-protocol.js';
import { UpstreamExhaustedError } from './errors.js';
import { logger, toError } from './logger.js';
import { recordDNSQuery } from './otel-metrics.js';
import { QueryRouter } from './query-router.js';
import { outcomes, resolveMatch, type HandlerContext } from './resolution-handlers.js';
import type { RecordStore } from './record-store.js';
import type { UpstreamForwarder } from './upstream-forwarder.js';
import { describeEndpoint, type Query, type ResolutionOutcome, type TransportProtocol } from './types.js';

const OPCODE_QUERY = 0;

export interface ResolverOptions {
  suffix: string;
  ttl: number;
  store: RecordStore;
  forwarder: UpstreamForwarder;
  router?: QueryRouter;
}

export interface ResolverStats {
  startTime: number;
  totalQueries: number;
  answered: number;
  forwarded: number;
  failed: Record<string, number>;
  formatErrors: number;
  droppedResponses: number;
  upstreamFailures: number;
}

/**
 * The resolution engine: route, run the handler, forward when the handler
 * delegates, and encode exactly one response per parsable query.
 */
export class Resolver {
  private readonly router: QueryRouter;
  private readonly forwarder: UpstreamForwarder;
  private readonly context: HandlerContext;
  private readonly stats: ResolverStats = {
    startTime: Date.now(),
    totalQueries: 0,
    answered: 0,
    forwarded: 0,
    failed: {},
    formatErrors: 0,
    droppedResponses: 0,
    upstreamFailures: 0,
  };

  constructor(options: ResolverOptions) {
    this.router = options.router ?? new QueryRouter(options.suffix);
    this.forwarder = options.forwarder;
    this.context = { store: options.store, suffix: options.suffix, ttl: options.ttl };
  }

  /**
   * Local disposition of a query. Never rejects: anything unexpected becomes
   * SERVFAIL.
   */
  async resolve(query: Query): Promise<ResolutionOutcome> {
    try {
      const match = this.router.route(query);
      logger.debug('Routed query', { name: query.name, type: typeName(query.type), handler: match.rule.handler });
      return await resolveMatch(match, this.context);
    } catch (error) {
      logger.error('Unexpected error while resolving query', toError(error), {
        name: query.name,
        type: typeName(query.type),
      });
      return outcomes.failed(RCODE.SERVFAIL);
    }
  }

  /**
   * Full round trip for one wire message. Returns null for input too short to
   * carry a DNS header and for messages that are themselves responses.
   */
  async handleMessage(message: Buffer, transport: TransportProtocol, clientIp: string): Promise<Buffer | null> {
    if (isResponse(message)) {
      this.stats.droppedResponses++;
      logger.debug('Dropping DNS response sent as a query', { clientIp, transport });
      return null;
    }

    const startTime = Date.now();
    this.stats.totalQueries++;

    const parsed = parseQuery(message);
    if (!parsed) {
      this.stats.formatErrors++;
      logger.debug('Unparsable DNS message', { clientIp, transport, length: message.length });
      return buildErrorResponse(message, RCODE.FORMERR);
    }

    const opcode = (parsed.flags >> 11) & 0xf;
    if (opcode !== OPCODE_QUERY) {
      return this.finish(message, parsed, { kind: 'local', rcode: RCODE.NOTIMP }, transport, startTime);
    }

    const query: Query = { name: parsed.name, type: parsed.type, transaction: { message, transport, clientIp } };
    // Only the IN class is served locally
    const outcome = parsed.qclass === QCLASS_IN ? await this.resolve(query) : outcomes.forwarded();

    if (outcome.kind !== 'forwarded') {
      return this.finish(message, parsed, { kind: 'local', outcome }, transport, startTime);
    }

    try {
      const { response, endpoint } = await this.forwarder.forward(message);
      logger.debug('Forwarded query', { name: parsed.name, upstream: describeEndpoint(endpoint) });
      return this.finish(message, parsed, { kind: 'upstream', response }, transport, startTime);
    } catch (error) {
      if (!(error instanceof UpstreamExhaustedError)) {
        logger.error('Unexpected forwarding error', toError(error), { name: parsed.name });
      }
      this.stats.upstreamFailures++;
      return this.finish(message, parsed, { kind: 'local', rcode: RCODE.SERVFAIL }, transport, startTime);
    }
  }

  getStats(): ResolverStats {
    return { ...this.stats, failed: { ...this.stats.failed } };
  }

  private finish(
    message: Buffer,
    parsed: ParsedQuery,
    result:
      | { kind: 'local'; outcome: ResolutionOutcome }
      | { kind: 'local'; rcode: Rcode }
      | { kind: 'upstream'; response: Buffer },
    transport: TransportProtocol,
    startTime: number,
  ): Buffer {
    let response: Buffer;
    let outcomeKind: 'answered' | 'failed' | 'forwarded';

    if (result.kind === 'upstream') {
      // The reply may have come over TCP after a truncated UDP attempt
      response =
        transport === 'udp' ? truncateResponse(result.response, message, parsed, MAX_UDP_PAYLOAD) : result.response;
      outcomeKind = 'forwarded';
      this.stats.forwarded++;
    } else if ('rcode' in result) {
      response = this.encode(message, parsed, { kind: 'failed', rcode: result.rcode }, transport);
      outcomeKind = 'failed';
    } else {
      response = this.encode(message, parsed, result.outcome, transport);
      outcomeKind = result.outcome.kind === 'answered' ? 'answered' : 'failed';
    }

    const rcode = rcodeName(readRcode(response) ?? RCODE.SERVFAIL);
    if (outcomeKind === 'answered') this.stats.answered++;
    if (outcomeKind === 'failed') this.stats.failed[rcode] = (this.stats.failed[rcode] ?? 0) + 1;

    const responseTime = Date.now() - startTime;
    recordDNSQuery({ type: typeName(parsed.type), outcome: outcomeKind, rcode, transport, responseTime });
    logger.debug('Query complete', { name: parsed.name, type: typeName(parsed.type), outcome: outcomeKind, rcode, responseTime });
    return response;
  }

  private encode(
    message: Buffer,
    parsed: ParsedQuery,
    outcome: ResolutionOutcome | { kind: 'failed'; rcode: Rcode },
    transport: TransportProtocol,
  ): Buffer {
    const maxSize = transport === 'udp' ? MAX_UDP_PAYLOAD : undefined;
    try {
      if (outcome.kind === 'answered') {
        return buildResponse(message, parsed, {
          rcode: RCODE.NOERROR,
          answers: outcome.answers,
          ttl: outcome.ttl,
          authoritative: true,
          maxSize,
        });
      }
      if (outcome.kind === 'failed') {
        return buildResponse(message, parsed, {
          rcode: outcome.rcode,
          authoritative: outcome.rcode === RCODE.NXDOMAIN,
          maxSize,
        });
      }
    } catch (error) {
      logger.error('Could not encode response', toError(error), { name: parsed.name });
    }
    return buildResponse(message, parsed, { rcode: RCODE.SERVFAIL });
  }
}
