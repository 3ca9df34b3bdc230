/**
 * SME Hunt - Backend Server
 */

import Fastify, {
  type FastifyBaseLogger,
  type FastifyInstance,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault,
} from 'fastify';
import { registerRoutes, type AppServices } from './api/routes/index.js';
import { errorHandler, notFoundHandler } from './api/middleware/errorHandler.js';
import { createApp } from './app.js';
import { loadSettings, validateForRuntime } from './config/settings.js';
import { logger } from './lib/logger.js';

// Create Fastify instance
export function buildServer(services: AppServices): FastifyInstance {
  const server = Fastify<RawServerDefault, RawRequestDefaultExpression, RawReplyDefaultExpression, FastifyBaseLogger>({
    logger: logger.child({ module: 'http' }),
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
    disableRequestLogging: true,
  });

  server.setErrorHandler(errorHandler);
  server.setNotFoundHandler(notFoundHandler);

  server.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        duration: Math.round(reply.elapsedTime),
      },
      'Request completed'
    );
  });

  registerRoutes(server, services);

  return server;
}

// Start server
async function start(): Promise<void> {
  const settings = loadSettings();
  validateForRuntime(settings);

  const services = createApp(settings);
  const server = buildServer(services);

  try {
    await server.listen({ port: settings.api.port, host: settings.api.host });
    logger.info(`Server listening on ${settings.api.host}:${settings.api.port}`);

    const resumed = services.engine.resumeInterrupted();
    logger.info({ resumed: resumed.length, botName: settings.botName }, 'Hunt engine started');
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully`);

    try {
      await services.engine.stop();
      await server.close();
      logger.info('Server shut down successfully');
      process.exit(0);
    } catch (error) {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

// Only run if this is the main module
if (process.argv[1]?.endsWith('server.ts') || process.argv[1]?.endsWith('server.js')) {
  start().catch((error: unknown) => {
    logger.fatal({ error }, 'Startup failed');
    process.exit(1);
  });
}
