import { Hono } from 'hono';
import { QTYPE, rcodeName } from './dns-protocol.js';
import { ApiError } from './errors.js';
import { handleError } from './error-handler.js';
import { isRecordType, describeEndpoint, type ResolutionOutcome } from './types.js';
import type { RecordStore } from './record-store.js';
import type { Resolver } from './resolver.js';
import type { UpstreamForwarder } from './upstream-forwarder.js';

export interface ApiDependencies {
  resolver: Resolver;
  store: RecordStore;
  forwarder: UpstreamForwarder;
}

const RESOLVABLE_TYPES: Record<string, number> = {
  A: QTYPE.A,
  AAAA: QTYPE.AAAA,
  CNAME: QTYPE.CNAME,
  MX: QTYPE.MX,
  PTR: QTYPE.PTR,
};

function describeOutcome(outcome: ResolutionOutcome) {
  switch (outcome.kind) {
    case 'answered':
      return { outcome: 'answered', ttl: outcome.ttl, answers: outcome.answers };
    case 'failed':
      return { outcome: 'failed', rcode: rcodeName(outcome.rcode) };
    case 'forwarded':
      return { outcome: 'forwarded' };
  }
}

/**
 * Read-only status API: health, counters, upstream order, store contents and a
 * dry-run resolver that never forwards.
 */
export function createApi(deps: ApiDependencies): Hono {
  const app = new Hono();

  app.onError(handleError);

  app.get('/api/health', async (c) => {
    const storeOk = await deps.store.ping();
    const stats = deps.resolver.getStats();
    return c.json(
      {
        status: storeOk ? 'ok' : 'degraded',
        uptime: Math.floor((Date.now() - stats.startTime) / 1000),
        store: storeOk ? 'reachable' : 'unavailable',
      },
      storeOk ? 200 : 503,
    );
  });

  app.get('/api/stats', (c) => {
    const { startTime, ...counters } = deps.resolver.getStats();
    return c.json({ ...counters, startedAt: new Date(startTime).toISOString() });
  });

  app.get('/api/upstreams', (c) => {
    return c.json({
      upstreams: deps.forwarder.getEndpoints().map((endpoint, index) => ({
        priority: index + 1,
        protocol: endpoint.protocol,
        host: endpoint.host,
        port: endpoint.port,
        url: describeEndpoint(endpoint),
      })),
    });
  });

  app.get('/api/records', async (c) => {
    const name = c.req.query('name');
    const type = c.req.query('type')?.toUpperCase();

    if (type !== undefined && !isRecordType(type)) {
      throw new ApiError(400, `Unknown record type "${type}"`);
    }
    if (name && type) {
      const records = await deps.store.lookup({ kind: 'byNameAndType', name, type });
      return c.json({ records });
    }
    const records = await deps.store.list();
    const filtered = records.filter(
      (record) => (!name || record.name.toLowerCase() === name.toLowerCase()) && (!type || record.type === type),
    );
    return c.json({ records: filtered });
  });

  app.get('/api/resolve', async (c) => {
    const name = c.req.query('name');
    const typeParam = (c.req.query('type') ?? 'A').toUpperCase();
    if (!name) {
      throw new ApiError(400, 'Query parameter "name" is required');
    }
    const type = RESOLVABLE_TYPES[typeParam];
    if (type === undefined) {
      throw new ApiError(400, `Unsupported query type "${typeParam}"`);
    }

    const outcome = await deps.resolver.resolve({ name, type });
    return c.json({ name, type: typeParam, ...describeOutcome(outcome) });
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}
