/**
 * Application entry point for the wager autopilot control service.
 *
 * 1. Environment validation
 * 2. Run manager
 * 3. Server creation and startup
 *
 * Handles uncaught exceptions and unhandled rejections gracefully.
 */

import { config } from 'dotenv';
import { getLogger } from './shared/logger.js';

// Load .env before anything else
config();

const logger = getLogger('server');

// Reference to the app's graceful shutdown function, set after server creation
let appShutdown: ((reason: string) => Promise<void>) | undefined;

async function main(): Promise<void> {
  logger.info('Starting wager autopilot...');

  // ---------------------------------------------------------------------------
  // 1. Validate environment
  // ---------------------------------------------------------------------------
  let env: Awaited<typeof import('./env.js')>['env'];
  try {
    const envModule = await import('./env.js');
    env = envModule.env;
    logger.info({ nodeEnv: env.NODE_ENV }, 'Environment validated');
  } catch (error) {
    logger.fatal({ err: error }, 'Environment validation failed');
    process.exit(1);
  }

  // ---------------------------------------------------------------------------
  // 2. Run manager
  // ---------------------------------------------------------------------------
  const { RunManager, runManagerConfigFromEnv } = await import('./runner/run-manager.js');
  const runManager = new RunManager(runManagerConfigFromEnv(env));

  // ---------------------------------------------------------------------------
  // 3. Create and start the Fastify server
  // ---------------------------------------------------------------------------
  try {
    const { createServer, installShutdownHandlers } = await import('./server.js');
    const app = await createServer({ runManager });
    appShutdown = installShutdownHandlers(app, runManager);

    await app.listen({ host: env.HOST, port: env.PORT });

    logger.info(
      {
        port: env.PORT,
        environment: env.NODE_ENV,
        site: env.SITE_ROOT_URL,
        maxBetPrice: env.MAX_BET_PRICE,
        delaySeconds: [env.DELAY_MIN_SECONDS, env.DELAY_MAX_SECONDS],
        reauthOnSessionExpiry: env.REAUTH_ON_SESSION_EXPIRY,
      },
      `Wager autopilot started on http://${env.HOST}:${env.PORT}`,
    );
    logger.info(`  - API: http://${env.HOST}:${env.PORT}/api/v1/health`);
    logger.info(`  - Session file: ${env.SESSION_FILE}`);
    logger.info(`  - Audit log: ${env.AUDIT_LOG_FILE}`);
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

// ---------------------------------------------------------------------------
// Global error handlers
// ---------------------------------------------------------------------------

process.on('uncaughtException', (error: Error) => {
  logger.fatal({ err: error }, 'Uncaught exception - initiating graceful shutdown');
  if (appShutdown) {
    void appShutdown('uncaughtException');
  } else {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.fatal({ err: reason }, 'Unhandled rejection - initiating graceful shutdown');
  if (appShutdown) {
    void appShutdown('unhandledRejection');
  } else {
    process.exit(1);
  }
});

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error during startup');
  process.exit(1);
});
