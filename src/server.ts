/**
 * Node.js entry point
 */

import { serve } from '@hono/node-server';
import { createApp } from './index';
import { createResolverContext } from './context';
import { loadConfig } from './config/env';
import { createLogger } from './lib/logger';

const config = loadConfig(process.env);
const logger = createLogger({ level: config.logLevel });
const ctx = createResolverContext(config, logger);
const app = createApp(ctx, {
  environment: config.environment,
  allowedOrigins: config.allowedOrigins,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port, environment: config.environment }, 'Listening');
});

function shutdown(signal: string): void {
  logger.info({ signal }, 'Shutting down');
  server.close();
  ctx.parser.close().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error({ err: error }, 'Failed to stop parse workers');
      process.exit(1);
    }
  );
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
