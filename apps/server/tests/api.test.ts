import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Hono } from 'hono';
import { createApi } from '../src/api.js';
import { createRecordTable, openDatabase, type RecordDatabase } from '../src/db.js';
import { RecordStore, sqliteRecordSource, type RecordSource } from '../src/record-store.js';
import { Resolver } from '../src/resolver.js';
import { UpstreamForwarder } from '../src/upstream-forwarder.js';
import type { UpstreamEndpoint } from '../src/types.js';

const UPSTREAM: UpstreamEndpoint[] = [
  { protocol: 'udp', host: '192.0.2.1', port: 53 },
  { protocol: 'tcp', host: '192.0.2.1', port: 53 },
];

describe('Status API', () => {
  let db: RecordDatabase;
  let app: Hono;
  let forwarder: UpstreamForwarder;

  beforeAll(() => {
    db = openDatabase(':memory:');
    const table = createRecordTable(db);
    table.add({ name: 'printer', type: 'A', ipv4Address: '192.168.1.20' });
    table.add({ name: 'mail', type: 'MX', cname: 'mx.home.lan', priority: 10 });

    const store = new RecordStore(sqliteRecordSource(table), { timeoutMs: 1000 });
    forwarder = new UpstreamForwarder(UPSTREAM, { timeoutMs: 50 });
    const resolver = new Resolver({ suffix: 'home.lan', ttl: 300, store, forwarder });
    app = createApi({ resolver, store, forwarder });
  });

  afterAll(() => {
    db.close();
  });

  describe('GET /api/health', () => {
    it('should report a reachable store', async () => {
      const res = await app.request('/api/health');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', store: 'reachable', uptime: expect.any(Number) });
    });

    it('should answer 503 when the store is unreachable', async () => {
      const broken: RecordSource = {
        findByNameAndType: () => [],
        findByIPv4: () => [],
        findByIPv6: () => [],
        getAll: () => [],
        ping: () => {
          throw new Error('database is closed');
        },
      };
      const store = new RecordStore(broken, { timeoutMs: 1000 });
      const resolver = new Resolver({ suffix: 'home.lan', ttl: 300, store, forwarder });
      const res = await createApi({ resolver, store, forwarder }).request('/api/health');

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ status: 'degraded', store: 'unavailable', uptime: expect.any(Number) });
    });
  });

  it('should report resolver counters', async () => {
    const res = await app.request('/api/stats');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      totalQueries: 0,
      answered: 0,
      forwarded: 0,
      failed: {},
      formatErrors: 0,
      droppedResponses: 0,
      upstreamFailures: 0,
      startedAt: expect.any(String),
    });
  });

  it('should list upstreams in failover order', async () => {
    const res = await app.request('/api/upstreams');
    expect(await res.json()).toEqual({
      upstreams: [
        { priority: 1, protocol: 'udp', host: '192.0.2.1', port: 53, url: 'udp://192.0.2.1:53' },
        { priority: 2, protocol: 'tcp', host: '192.0.2.1', port: 53, url: 'tcp://192.0.2.1:53' },
      ],
    });
  });

  describe('GET /api/records', () => {
    it('should list every record', async () => {
      const res = await app.request('/api/records');
      expect(await res.json()).toEqual({
        records: [
          { id: 2, name: 'mail', type: 'MX', cname: 'mx.home.lan', priority: 10 },
          { id: 1, name: 'printer', type: 'A', ipv4Address: '192.168.1.20' },
        ],
      });
    });

    it('should filter by type', async () => {
      const res = await app.request('/api/records?type=a');
      expect(await res.json()).toEqual({
        records: [{ id: 1, name: 'printer', type: 'A', ipv4Address: '192.168.1.20' }],
      });
    });

    it('should look up by name and type', async () => {
      const res = await app.request('/api/records?name=MAIL&type=MX');
      expect(await res.json()).toEqual({
        records: [{ id: 2, name: 'mail', type: 'MX', cname: 'mx.home.lan', priority: 10 }],
      });
    });

    it('should reject unknown record types', async () => {
      const res = await app.request('/api/records?type=TXT');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Unknown record type "TXT"' });
    });
  });

  describe('GET /api/resolve', () => {
    it('should show the local answer', async () => {
      const res = await app.request('/api/resolve?name=printer.home.lan&type=A');
      expect(await res.json()).toEqual({
        name: 'printer.home.lan',
        type: 'A',
        outcome: 'answered',
        ttl: 300,
        answers: [{ type: 'A', address: '192.168.1.20' }],
      });
    });

    it('should default to type A and show failures by name', async () => {
      const res = await app.request('/api/resolve?name=ghost.home.lan');
      expect(await res.json()).toEqual({ name: 'ghost.home.lan', type: 'A', outcome: 'failed', rcode: 'NXDOMAIN' });
    });

    it('should show that other names would be forwarded', async () => {
      const res = await app.request('/api/resolve?name=example.com&type=aaaa');
      expect(await res.json()).toEqual({ name: 'example.com', type: 'AAAA', outcome: 'forwarded' });
    });

    it('should require a name', async () => {
      const res = await app.request('/api/resolve?type=A');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Query parameter "name" is required' });
    });

    it('should reject types it cannot resolve', async () => {
      const res = await app.request('/api/resolve?name=printer.home.lan&type=TXT');
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Unsupported query type "TXT"' });
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await app.request('/api/zones');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found' });
  });
});
