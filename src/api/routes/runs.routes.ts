import type { FastifyInstance } from 'fastify';
import { getLogger } from '../../shared/logger.js';
import { validateBody } from '../middleware/validator.js';
import {
  delayRangeSchema,
  startRunSchema,
  type DelayRangeBody,
  type StartRunBody,
} from '../schemas/run.schema.js';
import type { RouteDeps } from '../index.js';

const logger = getLogger('server', { component: 'runs' });

/**
 * Wager run lifecycle: start, inspect and steer the single active run.
 * Control actions without an active run answer 409.
 */
export async function runRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { runManager } = deps;

  // POST / - Start a run in the background
  app.post<{ Body: StartRunBody }>(
    '/',
    { preHandler: validateBody(startRunSchema) },
    async (request, reply) => {
      const started = await runManager.start(request.body);
      logger.info({ runId: started.runId }, 'Run accepted');
      return reply.status(202).send({ data: started });
    },
  );

  // GET /current - State of the active run and the last finished one
  app.get('/current', async (_request, reply) => {
    return reply.send({
      data: {
        active: runManager.current(),
        lastResult: runManager.lastRunResult,
      },
    });
  });

  app.post('/current/pause', async (_request, reply) => {
    return reply.send({ data: runManager.pause() });
  });

  app.post('/current/resume', async (_request, reply) => {
    return reply.send({ data: runManager.resume() });
  });

  app.post('/current/stop', async (_request, reply) => {
    return reply.send({ data: runManager.stop() });
  });

  // PUT /current/delay - Retune the inter-batch delay while running
  app.put<{ Body: DelayRangeBody }>(
    '/current/delay',
    { preHandler: validateBody(delayRangeSchema) },
    async (request, reply) => {
      const delay = runManager.setDelay(request.body.minSeconds, request.body.maxSeconds);
      return reply.send({ data: delay });
    },
  );
}
