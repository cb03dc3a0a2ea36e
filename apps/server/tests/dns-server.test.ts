import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import dgram from 'dgram';
import net from 'net';
import { createRecordTable, openDatabase, type RecordDatabase } from '../src/db.js';
import { DNSServer } from '../src/dns-server.js';
import { FLAGS, QTYPE, RCODE, decodeResponse, encodeQuery } from '../src/dns-protocol.js';
import { RecordStore, sqliteRecordSource } from '../src/record-store.js';
import { Resolver } from '../src/resolver.js';
import { UpstreamForwarder, sendTcp, sendUdp } from '../src/upstream-forwarder.js';

describe('DNS Server', () => {
  let db: RecordDatabase;
  let server: DNSServer;
  let port: number;

  beforeAll(async () => {
    db = openDatabase(':memory:');
    const table = createRecordTable(db);
    table.add({ name: 'printer', type: 'A', ipv4Address: '192.168.1.20' });
    table.add({ name: 'nas', type: 'AAAA', ipv6Address: '2001:db8::10' });

    const resolver = new Resolver({
      suffix: 'home.lan',
      ttl: 60,
      store: new RecordStore(sqliteRecordSource(table), { timeoutMs: 1000 }),
      forwarder: new UpstreamForwarder([], { timeoutMs: 50 }),
    });
    server = new DNSServer({ port: 0, bindAddress: '127.0.0.1', resolver });
    port = (await server.start()).port;
  });

  afterAll(async () => {
    await server.stop();
    db.close();
  });

  it('should listen on the same port for UDP and TCP', () => {
    expect(port).toBeGreaterThan(0);
  });

  it('should answer over UDP', async () => {
    const response = await sendUdp(encodeQuery('printer.home.lan', QTYPE.A, 11), { protocol: 'udp', host: '127.0.0.1', port }, 1000);
    const decoded = decodeResponse(response);
    expect(decoded.id).toBe(11);
    expect(decoded.answers).toEqual([{ name: 'printer.home.lan', type: QTYPE.A, ttl: 60, data: '192.168.1.20' }]);
  });

  it('should answer over TCP', async () => {
    const response = await sendTcp(encodeQuery('nas.home.lan', QTYPE.AAAA, 12), { protocol: 'tcp', host: '127.0.0.1', port }, 1000);
    const decoded = decodeResponse(response);
    expect(decoded.id).toBe(12);
    expect(decoded.answers[0].data).toBe('2001:db8::10');
  });

  it('should answer SERVFAIL when there is no upstream to forward to', async () => {
    const response = await sendUdp(encodeQuery('example.com', QTYPE.A, 13), { protocol: 'udp', host: '127.0.0.1', port }, 1000);
    expect(decodeResponse(response).rcode).toBe(RCODE.SERVFAIL);
  });

  it('should answer every message sent in one TCP segment', async () => {
    const frame = (message: Buffer) => {
      const prefix = Buffer.alloc(2);
      prefix.writeUInt16BE(message.length, 0);
      return Buffer.concat([prefix, message]);
    };

    const ids = await new Promise<number[]>((resolve, reject) => {
      const socket = net.createConnection({ host: '127.0.0.1', port });
      const seen: number[] = [];
      let buffer = Buffer.alloc(0);
      socket.on('connect', () => {
        socket.write(
          Buffer.concat([
            frame(encodeQuery('printer.home.lan', QTYPE.A, 21)),
            frame(encodeQuery('ghost.home.lan', QTYPE.A, 22)),
          ]),
        );
      });
      socket.on('data', (data: Buffer) => {
        buffer = Buffer.concat([buffer, data]);
        while (buffer.length >= 2 && buffer.length >= buffer.readUInt16BE(0) + 2) {
          const length = buffer.readUInt16BE(0);
          seen.push(decodeResponse(buffer.subarray(2, length + 2)).id);
          buffer = buffer.subarray(length + 2);
        }
        if (seen.length === 2) {
          socket.destroy();
          resolve(seen);
        }
      });
      socket.on('error', reject);
    });

    expect([...ids].sort((a, b) => a - b)).toEqual([21, 22]);
  });

  it('should close TCP connections that stay idle', async () => {
    const resolver = new Resolver({
      suffix: 'home.lan',
      ttl: 60,
      store: new RecordStore(sqliteRecordSource(createRecordTable(db)), { timeoutMs: 1000 }),
      forwarder: new UpstreamForwarder([], { timeoutMs: 50 }),
    });
    const idleServer = new DNSServer({ port: 0, bindAddress: '127.0.0.1', tcpIdleTimeoutMs: 50, resolver });
    const idlePort = (await idleServer.start()).port;

    try {
      const closed = await new Promise<boolean>((resolve, reject) => {
        const socket = net.createConnection({ host: '127.0.0.1', port: idlePort });
        socket.on('close', () => resolve(true));
        socket.on('error', reject);
      });
      expect(closed).toBe(true);
    } finally {
      await idleServer.stop();
    }
  });

  it('should not answer responses sent to it', async () => {
    const client = dgram.createSocket('udp4');
    const stray = encodeQuery('printer.home.lan', QTYPE.A, 31);
    stray.writeUInt16BE(FLAGS.QR, 2);

    const reply = await new Promise<Buffer | null>((resolve, reject) => {
      const timer = setTimeout(() => resolve(null), 200);
      client.once('message', (msg: Buffer) => {
        clearTimeout(timer);
        resolve(msg);
      });
      client.once('error', reject);
      client.send(stray, port, '127.0.0.1');
    });
    client.close();

    expect(reply).toBeNull();
  });

  it('should answer FORMERR to garbage over UDP', async () => {
    const client = dgram.createSocket('udp4');
    const garbage = Buffer.alloc(16, 0xff);
    garbage.writeUInt16BE(0x0777, 0);
    garbage.writeUInt16BE(0, 2);

    const response = await new Promise<Buffer>((resolve, reject) => {
      client.once('message', (msg: Buffer) => resolve(msg));
      client.once('error', reject);
      client.send(garbage, port, '127.0.0.1');
    });
    client.close();

    const decoded = decodeResponse(response);
    expect(decoded.id).toBe(0x0777);
    expect(decoded.rcode).toBe(RCODE.FORMERR);
  });
});
