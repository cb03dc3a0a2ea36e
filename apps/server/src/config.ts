import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';
import type { UpstreamEndpoint } from './types.js';

export type MetricsExporter = 'prometheus' | 'otlp';

export interface UpstreamServer {
  host: string;
  port: number;
}

export interface ServerConfig {
  /** Local zone, lower case, no leading or trailing dot */
  suffix: string;
  ttl: number;
  dnsPort: number;
  dnsBindAddress: string;
  tcpIdleTimeoutMs: number;
  upstreams: readonly UpstreamServer[];
  upstreamTimeoutMs: number;
  databasePath: string;
  storeTimeoutMs: number;
  apiPort: number;
  apiBindAddress: string;
  otel: {
    enabled: boolean;
    exporter: MetricsExporter;
    endpoint: string;
    prometheusPort: number;
  };
  logLevel: LogLevel;
  logJson: boolean;
}

type Env = Record<string, string | undefined>;

const MAX_TTL = 2147483647;

class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Env) {}

  string(key: string, fallback?: string): string {
    const raw = this.env[key]?.trim();
    if (raw) return raw;
    if (fallback === undefined) {
      this.problems.push(`${key} is required`);
      return '';
    }
    return fallback;
  }

  optional(key: string): string | undefined {
    const raw = this.env[key]?.trim();
    return raw ? raw : undefined;
  }

  integer(key: string, fallback: number, min: number, max: number): number {
    const raw = this.env[key]?.trim();
    if (!raw) return fallback;
    if (!/^\d+$/.test(raw)) {
      this.problems.push(`${key} must be a whole number, got "${raw}"`);
      return fallback;
    }
    const value = parseInt(raw, 10);
    if (value < min || value > max) {
      this.problems.push(`${key} must be between ${min} and ${max}, got ${value}`);
      return fallback;
    }
    return value;
  }

  boolean(key: string, fallback: boolean): boolean {
    const raw = this.env[key]?.trim().toLowerCase();
    if (!raw) return fallback;
    if (['true', '1', 'yes', 'on'].includes(raw)) return true;
    if (['false', '0', 'no', 'off'].includes(raw)) return false;
    this.problems.push(`${key} must be true or false, got "${raw}"`);
    return fallback;
  }
}

export function normalizeSuffix(suffix: string): string {
  return suffix.trim().toLowerCase().replace(/^\.+/, '').replace(/\.+$/, '');
}

/**
 * Reads the process configuration from environment variables. All problems are
 * collected and thrown together as one ConfigError.
 */
export function loadConfig(env: Env = process.env): ServerConfig {
  const read = new EnvReader(env);

  const suffix = normalizeSuffix(read.string('DNS_SUFFIX'));
  if (env.DNS_SUFFIX?.trim() && suffix === '') {
    read.problems.push('DNS_SUFFIX must contain at least one label');
  }

  const upstreams: UpstreamServer[] = [
    {
      host: read.string('UPSTREAM_DNS1_IP'),
      port: read.integer('UPSTREAM_DNS1_PORT', 53, 1, 65535),
    },
  ];
  const secondary = read.optional('UPSTREAM_DNS2_IP');
  if (secondary) {
    upstreams.push({ host: secondary, port: read.integer('UPSTREAM_DNS2_PORT', 53, 1, 65535) });
  }

  const exporter = read.string('OTEL_EXPORTER', 'prometheus').toLowerCase();
  if (exporter !== 'prometheus' && exporter !== 'otlp') {
    read.problems.push(`OTEL_EXPORTER must be "prometheus" or "otlp", got "${exporter}"`);
  }

  const logLevel = read.string('LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    read.problems.push(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  const config: ServerConfig = {
    suffix,
    ttl: read.integer('DNS_TTL', 300, 0, MAX_TTL),
    dnsPort: read.integer('DNS_PORT', 53, 0, 65535),
    dnsBindAddress: read.string('DNS_BIND_ADDRESS', '::'),
    tcpIdleTimeoutMs: read.integer('TCP_IDLE_TIMEOUT_MS', 10000, 1, 600000),
    upstreams,
    upstreamTimeoutMs: read.integer('UPSTREAM_TIMEOUT_MS', 5000, 1, 60000),
    databasePath: read.string('DATABASE_PATH', './dns-records.db'),
    storeTimeoutMs: read.integer('STORE_TIMEOUT_MS', 2000, 1, 60000),
    apiPort: read.integer('API_PORT', 3001, 0, 65535),
    apiBindAddress: read.string('API_BIND_ADDRESS', '127.0.0.1'),
    otel: {
      enabled: read.boolean('OTEL_ENABLED', false),
      exporter: exporter === 'otlp' ? 'otlp' : 'prometheus',
      endpoint: read.string('OTEL_ENDPOINT', 'http://localhost:4318/v1/metrics'),
      prometheusPort: read.integer('OTEL_PROMETHEUS_PORT', 9464, 1, 65535),
    },
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    logJson: env.LOG_FORMAT === 'json' || env.NODE_ENV === 'production',
  };

  if (read.problems.length > 0) {
    throw new ConfigError(read.problems);
  }

  return deepFreeze(config);
}

/**
 * Failover order: every transport of the primary before the secondary, UDP
 * before TCP for each host.
 */
export function upstreamEndpoints(config: Pick<ServerConfig, 'upstreams'>): UpstreamEndpoint[] {
  return config.upstreams.flatMap((server) => [
    Object.freeze({ protocol: 'udp' as const, host: server.host, port: server.port }),
    Object.freeze({ protocol: 'tcp' as const, host: server.host, port: server.port }),
  ]);
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (child && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
