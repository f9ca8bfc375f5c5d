import type { FastifyInstance } from 'fastify';
import type { RunManager } from '../runner/run-manager.js';
import { healthRoutes } from './routes/health.routes.js';
import { runRoutes } from './routes/runs.routes.js';
import { spreadsheetRoutes } from './routes/spreadsheets.routes.js';

export interface RouteDeps {
  runManager: RunManager;
}

/**
 * Registers all API route modules under the /api/v1 prefix.
 */
export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  await app.register(healthRoutes, { prefix: '/api/v1/health', ...deps });
  await app.register(spreadsheetRoutes, { prefix: '/api/v1/spreadsheets' });
  await app.register(runRoutes, { prefix: '/api/v1/runs', ...deps });
}
