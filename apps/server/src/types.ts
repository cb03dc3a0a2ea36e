import type { Rcode } from './dns-protocol.js';

export type RecordType = 'A' | 'AAAA' | 'CNAME' | 'MX';

export const RECORD_TYPES: readonly RecordType[] = ['A', 'AAAA', 'CNAME', 'MX'];

export function isRecordType(value: string): value is RecordType {
  return RECORD_TYPES.some((type) => type === value);
}

/** A row of the record store. Which optional fields are set depends on `type`. */
export interface DnsRecord {
  id?: number;
  name: string;
  type: RecordType;
  ipv4Address?: string;
  ipv6Address?: string;
  /** CNAME target, or the exchange host of an MX record */
  cname?: string;
  priority?: number;
}

export type TransportProtocol = 'udp' | 'tcp';

export interface TransactionContext {
  message: Buffer;
  transport: TransportProtocol;
  clientIp: string;
}

export interface Query {
  readonly name: string;
  readonly type: number;
  readonly transaction?: TransactionContext;
}

export type Answer =
  | { type: 'A'; address: string }
  | { type: 'AAAA'; address: string }
  | { type: 'CNAME'; target: string }
  | { type: 'MX'; priority: number; exchange: string }
  | { type: 'PTR'; target: string };

export type FailureRcode = Extract<Rcode, 2 | 3 | 5>;

export type ResolutionOutcome =
  | { kind: 'answered'; answers: Answer[]; ttl: number }
  | { kind: 'failed'; rcode: FailureRcode }
  | { kind: 'forwarded' };

export interface UpstreamEndpoint {
  readonly protocol: TransportProtocol;
  readonly host: string;
  readonly port: number;
}

export function describeEndpoint(endpoint: UpstreamEndpoint): string {
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host;
  return `${endpoint.protocol}://${host}:${endpoint.port}`;
}
