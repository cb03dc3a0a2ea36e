import { describe, it, expect } from 'vitest';
import { loadConfig, normalizeSuffix, upstreamEndpoints } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

const baseEnv = { DNS_SUFFIX: 'home.lan', UPSTREAM_DNS1_IP: '192.0.2.1' };

function configProblems(env: Record<string, string>): readonly string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error.problems;
    throw error;
  }
  return [];
}

describe('Configuration', () => {
  it('should apply defaults for everything optional', () => {
    const config = loadConfig(baseEnv);
    expect(config).toEqual({
      suffix: 'home.lan',
      ttl: 300,
      dnsPort: 53,
      dnsBindAddress: '::',
      tcpIdleTimeoutMs: 10000,
      upstreams: [{ host: '192.0.2.1', port: 53 }],
      upstreamTimeoutMs: 5000,
      databasePath: './dns-records.db',
      storeTimeoutMs: 2000,
      apiPort: 3001,
      apiBindAddress: '127.0.0.1',
      otel: {
        enabled: false,
        exporter: 'prometheus',
        endpoint: 'http://localhost:4318/v1/metrics',
        prometheusPort: 9464,
      },
      logLevel: 'info',
      logJson: false,
    });
  });

  it('should read a secondary upstream and explicit values', () => {
    const config = loadConfig({
      ...baseEnv,
      DNS_SUFFIX: '.Home.LAN.',
      DNS_TTL: '60',
      DNS_PORT: '5353',
      UPSTREAM_DNS1_PORT: '5300',
      UPSTREAM_DNS2_IP: '2001:db8::53',
      OTEL_ENABLED: 'yes',
      OTEL_EXPORTER: 'OTLP',
      LOG_LEVEL: 'DEBUG',
      LOG_FORMAT: 'json',
    });

    expect(config.suffix).toBe('home.lan');
    expect(config.ttl).toBe(60);
    expect(config.dnsPort).toBe(5353);
    expect(config.upstreams).toEqual([
      { host: '192.0.2.1', port: 5300 },
      { host: '2001:db8::53', port: 53 },
    ]);
    expect(config.otel.enabled).toBe(true);
    expect(config.otel.exporter).toBe('otlp');
    expect(config.logLevel).toBe('debug');
    expect(config.logJson).toBe(true);
  });

  it('should ignore the secondary port without a secondary address', () => {
    const config = loadConfig({ ...baseEnv, UPSTREAM_DNS2_PORT: '5300' });
    expect(config.upstreams).toHaveLength(1);
  });

  it('should return a frozen configuration', () => {
    const config = loadConfig(baseEnv);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.otel)).toBe(true);
    expect(Object.isFrozen(config.upstreams)).toBe(true);
  });

  it('should report every missing required variable at once', () => {
    expect(configProblems({})).toEqual(['DNS_SUFFIX is required', 'UPSTREAM_DNS1_IP is required']);
  });

  it('should reject a suffix made only of dots', () => {
    expect(configProblems({ ...baseEnv, DNS_SUFFIX: '..' })).toEqual(['DNS_SUFFIX must contain at least one label']);
  });

  it('should reject malformed and out-of-range numbers', () => {
    expect(configProblems({ ...baseEnv, DNS_PORT: 'fifty', UPSTREAM_DNS1_PORT: '70000' })).toEqual([
      'UPSTREAM_DNS1_PORT must be between 1 and 65535, got 70000',
      'DNS_PORT must be a whole number, got "fifty"',
    ]);
  });

  it('should reject unknown enumerations', () => {
    expect(configProblems({ ...baseEnv, OTEL_EXPORTER: 'statsd', LOG_LEVEL: 'loud', OTEL_ENABLED: 'maybe' })).toEqual([
      'OTEL_EXPORTER must be "prometheus" or "otlp", got "statsd"',
      'LOG_LEVEL must be one of debug, info, warn, error, got "loud"',
      'OTEL_ENABLED must be true or false, got "maybe"',
    ]);
  });

  it('should strip dots and case from suffixes', () => {
    expect(normalizeSuffix(' .Example.COM. ')).toBe('example.com');
  });

  it('should order upstream endpoints UDP then TCP per server', () => {
    const config = loadConfig({ ...baseEnv, UPSTREAM_DNS2_IP: '192.0.2.2' });
    expect(upstreamEndpoints(config)).toEqual([
      { protocol: 'udp', host: '192.0.2.1', port: 53 },
      { protocol: 'tcp', host: '192.0.2.1', port: 53 },
      { protocol: 'udp', host: '192.0.2.2', port: 53 },
      { protocol: 'tcp', host: '192.0.2.2', port: 53 },
    ]);
  });
});
