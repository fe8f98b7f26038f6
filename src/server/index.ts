import { serve } from '@hono/node-server';
import { getSafeConfig, type EnvironmentConfig } from '../lib/env-config.js';
import { logInfo, loggers } from '../lib/logger.js';
import { createRelayServices } from '../lib/services.js';
import { createApp } from './app.js';

/**
 * Start the HTTP server with services built from the given configuration
 */
export function startServer(config: EnvironmentConfig, port: number = config.port) {
  const services = createRelayServices(config);
  const app = createApp(services);

  const safe = getSafeConfig(config);
  if (!safe.hasProviderKey) {
    loggers.warn('No translation provider configured; /translate will answer provider_unavailable');
  }
  if (!safe.hasChannelSecret && config.webhookAllowUnsigned) {
    loggers.warn('WEBHOOK_ALLOW_UNSIGNED is set: webhook signatures are NOT verified');
  }

  const server = serve({ fetch: app.fetch, port });
  logInfo(`[server] listening on :${port}`);
  loggers.debug('Configuration', safe);

  return server;
}
