import dgram from 'dgram';
import net from 'net';
import { HEADER_LENGTH, isResponse, isTruncated, readId } from './dns-protocol.js';
import {
  InvalidUpstreamResponseError,
  TruncatedResponseError,
  UpstreamExhaustedError,
  UpstreamTimeoutError,
  type UpstreamAttemptFailure,
} from './errors.js';
import { logger, toError } from './logger.js';
import { recordUpstreamMetrics } from './otel-metrics.js';
import { describeEndpoint, type TransportProtocol, type UpstreamEndpoint } from './types.js';

export type UpstreamTransport = (message: Buffer, endpoint: UpstreamEndpoint, timeoutMs: number) => Promise<Buffer>;

export interface ForwardResult {
  response: Buffer;
  endpoint: UpstreamEndpoint;
  /** endpoints that failed before the one that answered */
  failures: UpstreamAttemptFailure[];
}

export interface UpstreamForwarderOptions {
  timeoutMs: number;
  transports?: Partial<Record<TransportProtocol, UpstreamTransport>>;
}

/**
 * Sends a query over UDP and waits for the reply carrying the same ID. Replies
 * with another ID (late answers to earlier queries) are ignored.
 */
export const sendUdp: UpstreamTransport = (message, endpoint, timeoutMs) =>
  new Promise((resolve, reject) => {
    const label = describeEndpoint(endpoint);
    const queryId = readId(message);
    const client = dgram.createSocket(net.isIPv6(endpoint.host) ? 'udp6' : 'udp4');
    let settled = false;

    const finish = (error: Error | null, response?: Buffer) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      client.close();
      if (error) reject(error);
      else if (response) resolve(response);
    };

    const timer = setTimeout(() => finish(new UpstreamTimeoutError(label, timeoutMs)), timeoutMs);

    client.on('message', (response: Buffer) => {
      if (response.length < HEADER_LENGTH || !isResponse(response) || readId(response) !== queryId) {
        logger.debug('Ignoring unrelated UDP datagram', { upstream: label, length: response.length });
        return;
      }
      finish(null, response);
    });

    client.on('error', (err) => finish(err));

    client.send(message, endpoint.port, endpoint.host, (err) => {
      if (err) finish(err);
    });
  });

/**
 * Sends a query over TCP with the two-byte length prefix and reads one framed
 * reply.
 */
export const sendTcp: UpstreamTransport = (message, endpoint, timeoutMs) =>
  new Promise((resolve, reject) => {
    const label = describeEndpoint(endpoint);
    const socket = net.createConnection({ host: endpoint.host, port: endpoint.port });
    let settled = false;
    let buffer = Buffer.alloc(0);

    const finish = (error: Error | null, response?: Buffer) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      if (error) reject(error);
      else if (response) resolve(response);
    };

    const timer = setTimeout(() => finish(new UpstreamTimeoutError(label, timeoutMs)), timeoutMs);

    socket.on('connect', () => {
      const lengthPrefix = Buffer.alloc(2);
      lengthPrefix.writeUInt16BE(message.length, 0);
      socket.write(Buffer.concat([lengthPrefix, message]));
    });

    socket.on('data', (data: Buffer) => {
      buffer = Buffer.concat([buffer, data]);
      if (buffer.length < 2) return;
      const length = buffer.readUInt16BE(0);
      if (buffer.length >= length + 2) {
        finish(null, buffer.subarray(2, length + 2));
      }
    });

    socket.on('end', () => finish(new InvalidUpstreamResponseError(label, 'connection closed before a full reply')));
    socket.on('error', (err) => finish(err));
  });

/**
 * Forwards raw queries across an ordered list of upstream endpoints. Each
 * forward walks the list from the top; nothing is remembered between queries.
 */
export class UpstreamForwarder {
  private readonly endpoints: readonly UpstreamEndpoint[];
  private readonly transports: Record<TransportProtocol, UpstreamTransport>;
  private readonly timeoutMs: number;

  constructor(endpoints: readonly UpstreamEndpoint[], options: UpstreamForwarderOptions) {
    this.endpoints = Object.freeze([...endpoints]);
    this.timeoutMs = options.timeoutMs;
    this.transports = {
      udp: options.transports?.udp ?? sendUdp,
      tcp: options.transports?.tcp ?? sendTcp,
    };
  }

  getEndpoints(): readonly UpstreamEndpoint[] {
    return this.endpoints;
  }

  async forward(message: Buffer): Promise<ForwardResult> {
    const failures: UpstreamAttemptFailure[] = [];
    const queryId = readId(message);

    for (const endpoint of this.endpoints) {
      const label = describeEndpoint(endpoint);
      const startTime = Date.now();
      try {
        const response = await this.transports[endpoint.protocol](message, endpoint, this.timeoutMs);
        this.checkResponse(response, endpoint, queryId);

        recordUpstreamMetrics({
          upstream: label,
          protocol: endpoint.protocol,
          success: true,
          responseTime: Date.now() - startTime,
        });
        if (failures.length > 0) {
          logger.info('Upstream failover succeeded', { upstream: label, failedAttempts: failures.length });
        }
        return { response, endpoint, failures };
      } catch (error) {
        const err = toError(error);
        failures.push({ endpoint: label, error: err });
        recordUpstreamMetrics({
          upstream: label,
          protocol: endpoint.protocol,
          success: false,
          responseTime: Date.now() - startTime,
        });
        logger.debug('Upstream query failed, trying next upstream', { upstream: label, error: err.message });
      }
    }

    const exhausted = new UpstreamExhaustedError(failures);
    logger.warn('All upstream DNS servers failed', { attempts: failures.length });
    throw exhausted;
  }

  private checkResponse(response: Buffer, endpoint: UpstreamEndpoint, queryId: number | null): void {
    const label = describeEndpoint(endpoint);
    if (response.length < HEADER_LENGTH || !isResponse(response)) {
      throw new InvalidUpstreamResponseError(label, 'not a DNS response');
    }
    if (readId(response) !== queryId) {
      throw new InvalidUpstreamResponseError(label, 'response ID does not match query');
    }
    // A truncated UDP answer is incomplete; the next endpoint is TCP to the same host
    if (endpoint.protocol === 'udp' && isTruncated(response)) {
      throw new TruncatedResponseError(label);
    }
  }
}
