import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import { registerRoutes } from './api/index.js';
import { globalErrorHandler } from './api/middleware/error-handler.js';
import type { RunManager } from './runner/run-manager.js';
import { getLogger } from './shared/logger.js';

const logger = getLogger('server');

export interface ServerOptions {
  runManager: RunManager;
  /** Allowed CORS origin in production; every origin is allowed otherwise. */
  corsOrigin?: string;
  /** Requests per minute per client; 0 disables the limit. */
  rateLimitPerMinute?: number;
}

/**
 * Creates and configures the control API.
 *
 * - CORS (all origins outside production)
 * - Rate limiting
 * - API routes under /api/v1
 * - Global error handler with structured JSON responses
 */
export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const isProduction = process.env['NODE_ENV'] === 'production';

  const app = Fastify({
    logger: false, // We use our own pino logger
    requestTimeout: 30_000,
    bodyLimit: 65_536,
  });

  // ---------------------------------------------------------------------------
  // CORS
  // ---------------------------------------------------------------------------
  await app.register(fastifyCors, {
    origin: isProduction ? (options.corsOrigin ?? false) : true,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  // ---------------------------------------------------------------------------
  // Rate limiting
  // ---------------------------------------------------------------------------
  const rateLimitPerMinute = options.rateLimitPerMinute ?? 100;
  if (rateLimitPerMinute > 0) {
    await app.register(rateLimit, {
      max: rateLimitPerMinute,
      timeWindow: '1 minute',
    });
  }

  // ---------------------------------------------------------------------------
  // Global error handler
  // ---------------------------------------------------------------------------
  app.setErrorHandler(globalErrorHandler);

  // ---------------------------------------------------------------------------
  // Request logging
  // ---------------------------------------------------------------------------
  app.addHook('onRequest', (request, _reply, done) => {
    logger.debug(
      { method: request.method, url: request.url, id: request.id },
      'Incoming request',
    );
    done();
  });

  app.addHook('onResponse', (request, reply, done) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed',
    );
    done();
  });

  // ---------------------------------------------------------------------------
  // API routes
  // ---------------------------------------------------------------------------
  await registerRoutes(app, { runManager: options.runManager });

  app.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({
      error: { code: 'NOT_FOUND', message: 'Resource not found' },
    });
  });

  return app;
}

/**
 * Stops the active run at its next safe point, then closes the server.
 * Returns the shutdown function so the entry point can reuse it from its
 * own fatal-error handlers.
 */
export function installShutdownHandlers(
  app: FastifyInstance,
  runManager: RunManager,
): (reason: string) => Promise<void> {
  const FORCE_KILL_TIMEOUT_MS = 60_000;
  let isShuttingDown = false;

  const gracefulShutdown = async (reason: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn({ reason }, 'Shutdown already in progress, ignoring duplicate signal');
      return;
    }
    isShuttingDown = true;

    logger.info({ reason }, 'Initiating graceful shutdown');

    // Force-kill safety net: a batch in flight may take a while to finish
    const forceKillTimer = setTimeout(() => {
      logger.fatal('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, FORCE_KILL_TIMEOUT_MS);
    forceKillTimer.unref();

    // 1. Stop the active run; an in-flight batch completes first
    try {
      await runManager.shutdown();
      logger.info('Active run stopped');
    } catch (error) {
      logger.error({ err: error }, 'Error while stopping the active run');
    }

    // 2. Stop accepting HTTP requests
    try {
      await app.close();
      logger.info('Fastify server closed');
    } catch (error) {
      logger.error({ err: error }, 'Error during Fastify server close');
    }

    clearTimeout(forceKillTimer);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  };

  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

  return gracefulShutdown;
}
