#!/usr/bin/env node
import { AddressPool } from './address-pool.js';
import { closeApiServer, startApiServer, type ApiServer } from './api.js';
import { loadConfig, USAGE } from './config.js';
import { DNSServer } from './dns-server.js';
import { ConfigError, isResponderError, toError } from './errors.js';
import { logger } from './logger.js';
import { initializeOtelMetrics, shutdownOtelMetrics } from './otel-metrics.js';

async function main() {
  logger.info('Initializing sinkhole DNS server...');

  const config = loadConfig();

  // An unusable block aborts startup before anything listens
  const pool = AddressPool.fromCIDR(config.cidr);
  logger.info('Address pool ready', {
    cidr: pool.cidr,
    firstUsable: pool.firstUsable,
    lastUsable: pool.lastUsable,
  });

  await initializeOtelMetrics(config.otel);

  const dnsServer = new DNSServer({
    pool,
    bindAddress: config.listen.address,
    port: config.listen.port,
  });
  await dnsServer.start();

  // A taken API port rejects here and ends in the fatal path below
  let apiServer: ApiServer | null = null;
  if (config.apiPort !== null) {
    apiServer = await startApiServer(dnsServer, config.apiPort);
  } else {
    logger.info('API server disabled');
  }

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down...', { signal });

    Promise.all([
      apiServer ? closeApiServer(apiServer.server) : Promise.resolve(),
      dnsServer.stop(),
      shutdownOtelMetrics(),
    ])
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error('Error during shutdown', toError(error));
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    logger.error(`${error.message}\n\n${USAGE}`);
  } else if (isResponderError(error)) {
    logger.error('Invalid address pool', error, { kind: error.kind });
  } else {
    logger.error('Fatal error in main', toError(error));
  }
  process.exit(1);
});
