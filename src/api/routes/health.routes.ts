import type { FastifyInstance } from 'fastify';
import { formatDuration } from '../../shared/utils.js';
import type { RouteDeps } from '../index.js';

const startedAt = Date.now();

/**
 * Liveness of the control API, plus whether a wager run is in progress.
 */
export async function healthRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  app.get('/', async (_request, reply) => {
    const uptimeMs = Date.now() - startedAt;
    const current = deps.runManager.current();

    return reply.send({
      status: 'healthy',
      uptime: uptimeMs,
      uptimeHuman: formatDuration(uptimeMs),
      runActive: deps.runManager.isActive,
      runState: current?.state ?? null,
      timestamp: new Date().toISOString(),
    });
  });
}
