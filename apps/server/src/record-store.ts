import { StoreUnavailableError } from './errors.js';
import { logger, toError } from './logger.js';
import { recordStoreError } from './otel-metrics.js';
import type { RecordTable } from './db.js';
import type { DnsRecord, RecordType } from './types.js';

export type RecordFilter =
  | { kind: 'byNameAndType'; name: string; type: RecordType }
  | { kind: 'byIPv4'; address: string }
  | { kind: 'byIPv6'; candidates: readonly string[] };

type MaybePromise<T> = T | Promise<T>;

/**
 * The backing collection. Implementations may answer synchronously or not, and
 * may fail in any way they like; the adapter normalizes both.
 */
export interface RecordSource {
  findByNameAndType(name: string, type: RecordType): MaybePromise<DnsRecord[]>;
  findByIPv4(address: string): MaybePromise<DnsRecord[]>;
  findByIPv6(candidates: readonly string[]): MaybePromise<DnsRecord[]>;
  getAll(): MaybePromise<DnsRecord[]>;
  ping(): MaybePromise<void>;
}

export interface RecordStoreOptions {
  timeoutMs: number;
}

export function describeFilter(filter: RecordFilter): string {
  switch (filter.kind) {
    case 'byNameAndType':
      return `${filter.type} ${filter.name}`;
    case 'byIPv4':
      return `ipv4 ${filter.address}`;
    case 'byIPv6':
      return `ipv6 ${filter.candidates.join('|')}`;
  }
}

/**
 * Uniform, read-only query interface over a RecordSource. Every fault of the
 * source (exception, rejection, timeout) comes out as StoreUnavailableError; an
 * empty array is an ordinary answer.
 */
export class RecordStore {
  constructor(
    private readonly source: RecordSource,
    private readonly options: RecordStoreOptions,
  ) {}

  lookup(filter: RecordFilter): Promise<DnsRecord[]> {
    return this.guard(filter.kind, describeFilter(filter), () => {
      switch (filter.kind) {
        case 'byNameAndType':
          return this.source.findByNameAndType(filter.name, filter.type);
        case 'byIPv4':
          return this.source.findByIPv4(filter.address);
        case 'byIPv6':
          return this.source.findByIPv6(filter.candidates);
      }
    });
  }

  list(): Promise<DnsRecord[]> {
    return this.guard('list', 'all records', () => this.source.getAll());
  }

  async ping(): Promise<boolean> {
    try {
      await this.guard('ping', 'ping', () => this.source.ping());
      return true;
    } catch (error) {
      if (error instanceof StoreUnavailableError) return false;
      throw error;
    }
  }

  private async guard<T>(operation: string, detail: string, run: () => MaybePromise<T>): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new StoreUnavailableError(`Record store lookup timed out after ${this.options.timeoutMs}ms`)),
        this.options.timeoutMs,
      );
    });

    try {
      return await Promise.race([Promise.resolve().then(run), timeout]);
    } catch (error) {
      const unavailable =
        error instanceof StoreUnavailableError
          ? error
          : new StoreUnavailableError(`Record store query failed: ${toError(error).message}`, { cause: error });
      logger.warn('Record store unavailable', { operation: detail, reason: unavailable.message });
      recordStoreError(operation);
      throw unavailable;
    } finally {
      clearTimeout(timer);
    }
  }
}

export function sqliteRecordSource(table: RecordTable): RecordSource {
  return {
    findByNameAndType: (name, type) => table.findByNameAndType(name, type),
    findByIPv4: (address) => table.findByIPv4(address),
    findByIPv6: (candidates) => table.findByIPv6(candidates),
    getAll: () => table.getAll(),
    ping: () => table.ping(),
  };
}
