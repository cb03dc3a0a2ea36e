import dgram from 'dgram';
import net from 'net';
import { RCODE, buildErrorResponse, parseQuery } from './dns-protocol.js';
import { logger, toError } from './logger.js';
import type { Resolver } from './resolver.js';

export interface DNSServerOptions {
  port: number;
  bindAddress: string;
  /** TCP connections with no traffic for this long are closed (default 10s) */
  tcpIdleTimeoutMs?: number;
  resolver: Resolver;
}

const DEFAULT_TCP_IDLE_TIMEOUT_MS = 10000;

export interface BoundAddress {
  address: string;
  port: number;
}

/**
 * UDP and TCP listeners on one port. Each inbound message is handled as an
 * independent task; a message that fails while being handled still gets a
 * SERVFAIL reply.
 */
export class DNSServer {
  private readonly udpServer: dgram.Socket;
  private readonly tcpServer: net.Server;
  private readonly connections = new Set<net.Socket>();
  private readonly port: number;
  private readonly bindAddress: string;
  private readonly tcpIdleTimeoutMs: number;
  private readonly resolver: Resolver;
  private started = false;

  constructor(options: DNSServerOptions) {
    this.port = options.port;
    this.bindAddress = options.bindAddress;
    this.tcpIdleTimeoutMs = options.tcpIdleTimeoutMs ?? DEFAULT_TCP_IDLE_TIMEOUT_MS;
    this.resolver = options.resolver;
    // An IPv6 wildcard socket also takes IPv4 traffic unless ipv6Only is set
    this.udpServer = dgram.createSocket({ type: net.isIPv6(this.bindAddress) ? 'udp6' : 'udp4', ipv6Only: false });
    this.tcpServer = net.createServer((socket) => this.setupTCPSocket(socket));
  }

  private async answer(message: Buffer, transport: 'udp' | 'tcp', clientIp: string): Promise<Buffer | null> {
    try {
      return await this.resolver.handleMessage(message, transport, clientIp);
    } catch (error) {
      logger.error('Error handling DNS query', toError(error), { clientIp, transport });
      return buildErrorResponse(message, RCODE.SERVFAIL, parseQuery(message));
    }
  }

  private setupTCPSocket(socket: net.Socket): void {
    const clientIp = socket.remoteAddress ?? 'unknown';
    let buffer = Buffer.alloc(0);
    this.connections.add(socket);

    socket.setTimeout(this.tcpIdleTimeoutMs);
    socket.on('timeout', () => {
      logger.debug('Closing idle TCP connection', { clientIp });
      socket.destroy();
    });

    socket.on('data', (data: Buffer) => {
      buffer = Buffer.concat([buffer, data]);

      // Two-byte length prefix per message; one segment may carry several
      while (buffer.length >= 2) {
        const length = buffer.readUInt16BE(0);
        if (buffer.length < length + 2) break;

        const message = buffer.subarray(2, length + 2);
        buffer = buffer.subarray(length + 2);

        void this.answer(message, 'tcp', clientIp)
          .then((response) => {
            if (!response || socket.destroyed) return;
            const prefix = Buffer.alloc(2);
            prefix.writeUInt16BE(response.length, 0);
            socket.write(Buffer.concat([prefix, response]));
          })
          .catch((error: unknown) => logger.error('Error sending TCP response', toError(error), { clientIp }));
      }
    });

    socket.on('error', (err) => {
      logger.debug('TCP connection error', { clientIp, error: err.message });
    });

    socket.on('close', () => {
      this.connections.delete(socket);
    });
  }

  private startUDP(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.udpServer.on('message', (msg, rinfo) => {
        void this.answer(msg, 'udp', rinfo.address)
          .then((response) => {
            if (!response) return;
            this.udpServer.send(response, rinfo.port, rinfo.address, (err) => {
              if (err) {
                logger.error('Error sending UDP response', err, { clientIp: rinfo.address });
              }
            });
          })
          .catch((error: unknown) => logger.error('Error sending UDP response', toError(error), { clientIp: rinfo.address }));
      });

      const onError = (err: Error) => {
        if (this.started) {
          logger.error('UDP DNS server error', err);
        } else {
          reject(err);
        }
      };
      this.udpServer.on('error', onError);

      this.udpServer.bind(this.port, this.bindAddress, () => {
        logger.info('DNS server (UDP) running', { port: this.udpServer.address().port, address: this.bindAddress });
        resolve();
      });
    });
  }

  private startTCP(port: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onListenError = (err: Error) => reject(err);
      this.tcpServer.once('error', onListenError);

      this.tcpServer.listen(port, this.bindAddress, () => {
        this.tcpServer.off('error', onListenError);
        this.tcpServer.on('error', (err) => logger.error('TCP DNS server error', err));
        logger.info('DNS server (TCP) running', { port, address: this.bindAddress });
        resolve();
      });
    });
  }

  /**
   * Binds UDP first; TCP takes the same port (the one the OS picked when the
   * configured port is 0).
   */
  async start(): Promise<BoundAddress> {
    await this.startUDP();
    const { port } = this.udpServer.address();
    await this.startTCP(port);
    this.started = true;
    return { address: this.bindAddress, port };
  }

  async stop(): Promise<void> {
    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();

    await Promise.all([
      new Promise<void>((resolve) => {
        try {
          this.udpServer.close(() => resolve());
        } catch {
          // not running
          resolve();
        }
      }),
      new Promise<void>((resolve) => {
        if (!this.tcpServer.listening) {
          resolve();
          return;
        }
        this.tcpServer.close(() => resolve());
      }),
    ]);
    this.started = false;
    logger.info('DNS server stopped');
  }
}
