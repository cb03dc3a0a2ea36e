import { serve } from '@hono/node-server';
import { createApi } from './api.js';
import { loadConfig, upstreamEndpoints, type ServerConfig } from './config.js';
import { createRecordTable, openDatabase } from './db.js';
import { DNSServer } from './dns-server.js';
import { ConfigError } from './errors.js';
import { logger, toError } from './logger.js';
import { initializeOtelMetrics, shutdownOtelMetrics } from './otel-metrics.js';
import { RecordStore, sqliteRecordSource } from './record-store.js';
import { Resolver } from './resolver.js';
import { UpstreamForwarder } from './upstream-forwarder.js';

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration', error, { problems: error.problems });
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = readConfig();
  logger.configure({ level: config.logLevel, json: config.logJson });
  logger.info('Initializing DNS server...', { suffix: config.suffix });

  await initializeOtelMetrics(config.otel);

  const db = openDatabase(config.databasePath);
  const store = new RecordStore(sqliteRecordSource(createRecordTable(db)), { timeoutMs: config.storeTimeoutMs });
  const forwarder = new UpstreamForwarder(upstreamEndpoints(config), { timeoutMs: config.upstreamTimeoutMs });
  const resolver = new Resolver({ suffix: config.suffix, ttl: config.ttl, store, forwarder });

  const dnsServer = new DNSServer({
    port: config.dnsPort,
    bindAddress: config.dnsBindAddress,
    tcpIdleTimeoutMs: config.tcpIdleTimeoutMs,
    resolver,
  });
  await dnsServer.start();

  let httpServer: ReturnType<typeof serve> | null = null;
  if (config.apiPort !== 0) {
    const app = createApi({ resolver, store, forwarder });
    httpServer = serve({ fetch: app.fetch, port: config.apiPort, hostname: config.apiBindAddress }, (info) => {
      logger.info('API server running', { port: info.port, url: `http://${config.apiBindAddress}:${info.port}` });
    });
  } else {
    logger.info('API server disabled');
  }

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    await dnsServer.stop();
    const server = httpServer;
    if (server) {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    await shutdownOtelMetrics();
    db.close();
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Error during shutdown', toError(error));
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error in main', toError(error));
  process.exit(1);
});
