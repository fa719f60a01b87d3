import type { RuntimeConfig } from '../config/loader.js';
import { resolveEnvRef } from '../config/loader.js';
import type { BrokerConnectionConfig, BrokerName } from '../config/schema.js';
import type { Logger } from '../logging/logger.js';
import type { BrokerAdapter } from './adapter.js';
import { AlerceAdapter } from './alerce-adapter.js';
import { FinkAdapter } from './fink-adapter.js';
import { LasairAdapter } from './lasair-adapter.js';
import { BrokerRegistry } from './registry.js';

function connection(cfg: BrokerConnectionConfig, env: NodeJS.ProcessEnv) {
  const token = cfg.token ? resolveEnvRef(cfg.token, env) : undefined;
  const baseUrl = cfg.baseUrl ? resolveEnvRef(cfg.baseUrl, env) : undefined;
  return {
    baseUrl: baseUrl || undefined,
    token: token || undefined,
    timeoutMs: cfg.timeoutMs,
  };
}

/**
 * Create the adapter for one broker from its connection settings.
 */
export function createBrokerAdapter(
  name: BrokerName,
  cfg: BrokerConnectionConfig,
  logger?: Logger,
  env: NodeJS.ProcessEnv = process.env,
): BrokerAdapter {
  const conn = connection(cfg, env);
  const child = logger?.child(name);

  switch (name) {
    case 'Lasair':
      if (!conn.token) {
        logger?.warn('No Lasair token configured. Set brokers.Lasair.token (e.g. "${LASAIR_TOKEN}").', {
          broker: name,
        });
      }
      return new LasairAdapter(conn, child);
    case 'ALeRCE':
      return new AlerceAdapter(conn, child);
    case 'Fink':
      return new FinkAdapter(conn, child);
  }
}

/**
 * Build a registry holding an adapter for every enabled broker in the config,
 * bounded by `fetch.maxConcurrency`.
 */
export function createBrokerRegistry(
  config: Pick<RuntimeConfig, 'brokers' | 'fetch'>,
  logger?: Logger,
  env: NodeJS.ProcessEnv = process.env,
): BrokerRegistry {
  const registry = new BrokerRegistry(logger, { maxConcurrency: config.fetch.maxConcurrency });

  const entries: Array<[BrokerName, BrokerConnectionConfig]> = [
    ['Lasair', config.brokers.Lasair],
    ['ALeRCE', config.brokers.ALeRCE],
    ['Fink', config.brokers.Fink],
  ];

  for (const [name, cfg] of entries) {
    if (!cfg.enabled) {
      logger?.debug(`Broker ${name} disabled in config`, { broker: name });
      continue;
    }
    registry.register(createBrokerAdapter(name, cfg, logger, env));
  }

  return registry;
}
