import type { Counter, Histogram, Meter } from '@opentelemetry/api';
import { MeterProvider, PeriodicExportingMetricReader, type MetricReader } from '@opentelemetry/sdk-metrics';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
// Protobuf encoding is what most OTLP backends accept
import { OTLPMetricExporter } from '@opentelemetry/exporter-metrics-otlp-proto';
import { PrometheusExporter } from '@opentelemetry/exporter-prometheus';
import { logger, toError } from './logger.js';
import type { ServerConfig } from './config.js';

const SERVICE_NAME = 'zone-forwarder';
const SERVICE_VERSION = '1.0.0';
const EXPORT_INTERVAL_MS = 10000;

export type OtelConfig = ServerConfig['otel'];

let meterProvider: MeterProvider | null = null;
let meter: Meter | null = null;
const counters = new Map<string, Counter>();
const histograms = new Map<string, Histogram>();

/**
 * Starts the meter provider with a Prometheus scrape endpoint or a periodic OTLP
 * push. `extraReaders` lets callers attach their own readers.
 */
export async function initializeOtelMetrics(config: OtelConfig, extraReaders: MetricReader[] = []): Promise<void> {
  await shutdownOtelMetrics();

  if (!config.enabled && extraReaders.length === 0) {
    logger.info('OpenTelemetry metrics disabled');
    return;
  }

  try {
    const readers: MetricReader[] = [...extraReaders];

    if (config.enabled && config.exporter === 'prometheus') {
      readers.push(
        new PrometheusExporter({ port: config.prometheusPort, endpoint: '/metrics' }, () => {
          logger.info('Prometheus metrics endpoint started', { port: config.prometheusPort });
        }),
      );
    } else if (config.enabled) {
      readers.push(
        new PeriodicExportingMetricReader({
          exporter: new OTLPMetricExporter({ url: config.endpoint }),
          exportIntervalMillis: EXPORT_INTERVAL_MS,
        }),
      );
    }

    meterProvider = new MeterProvider({
      resource: resourceFromAttributes({
        [ATTR_SERVICE_NAME]: SERVICE_NAME,
        [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
      }),
      readers,
    });
    meter = meterProvider.getMeter(SERVICE_NAME, SERVICE_VERSION);

    logger.info('OpenTelemetry metrics initialized', {
      exporter: config.enabled ? config.exporter : 'custom',
      endpoint:
        config.exporter === 'otlp' ? config.endpoint : `http://localhost:${config.prometheusPort}/metrics`,
    });
  } catch (error) {
    logger.error('Failed to initialize OpenTelemetry metrics', toError(error));
    meterProvider = null;
    meter = null;
  }
}

export async function shutdownOtelMetrics(): Promise<void> {
  const provider = meterProvider;
  meterProvider = null;
  meter = null;
  counters.clear();
  histograms.clear();

  if (provider) {
    try {
      await provider.shutdown();
    } catch (error) {
      logger.error('Error shutting down OpenTelemetry metrics', toError(error));
    }
  }
}

export function getMeterProvider(): MeterProvider | null {
  return meterProvider;
}

function counter(name: string, description: string): Counter | null {
  if (!meter) return null;
  let instrument = counters.get(name);
  if (!instrument) {
    instrument = meter.createCounter(name, { description });
    counters.set(name, instrument);
  }
  return instrument;
}

function histogram(name: string, description: string): Histogram | null {
  if (!meter) return null;
  let instrument = histograms.get(name);
  if (!instrument) {
    instrument = meter.createHistogram(name, { description, unit: 'ms' });
    histograms.set(name, instrument);
  }
  return instrument;
}

export function recordDNSQuery(attributes: {
  type: string;
  outcome: 'answered' | 'failed' | 'forwarded';
  rcode: string;
  transport: string;
  responseTime: number;
}): void {
  try {
    const labels = {
      'dns.query.type': attributes.type,
      'dns.outcome': attributes.outcome,
      'dns.response.code': attributes.rcode,
      'network.transport': attributes.transport,
    };
    counter('dns.queries.total', 'Total number of DNS queries')?.add(1, labels);
    histogram('dns.query.response_time', 'DNS query response time in milliseconds')?.record(
      attributes.responseTime,
      labels,
    );
  } catch (error) {
    logger.error('Error recording DNS query metrics', toError(error), { attributes });
  }
}

export function recordUpstreamMetrics(attributes: {
  upstream: string;
  protocol: string;
  success: boolean;
  responseTime: number;
}): void {
  try {
    const labels = {
      'dns.upstream.server': attributes.upstream,
      'network.transport': attributes.protocol,
    };
    counter('dns.upstream.queries', 'Number of upstream DNS queries')?.add(1, labels);
    if (!attributes.success) {
      counter('dns.upstream.errors', 'Number of failed upstream DNS queries')?.add(1, labels);
    }
    histogram('dns.upstream.response_time', 'Upstream DNS response time in milliseconds')?.record(
      attributes.responseTime,
      labels,
    );
  } catch (error) {
    logger.error('Error recording upstream metrics', toError(error), { attributes });
  }
}

export function recordStoreError(operation: string): void {
  try {
    counter('dns.store.errors', 'Number of failed record store lookups')?.add(1, { 'dns.store.operation': operation });
  } catch (error) {
    logger.error('Error recording store metrics', toError(error), { operation });
  }
}
