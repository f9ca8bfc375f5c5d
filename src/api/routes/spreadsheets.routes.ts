import type { FastifyInstance } from 'fastify';
import { CombinationLedger } from '../../ledger/combination-ledger.js';
import { getLogger } from '../../shared/logger.js';
import { validateBody } from '../middleware/validator.js';
import { spreadsheetPathSchema, type SpreadsheetPathBody } from '../schemas/run.schema.js';

const logger = getLogger('server', { component: 'spreadsheets' });

/**
 * Spreadsheet precheck. Read-only; safe to call while a run is writing the
 * same file, since the ledger serialises access per path.
 */
export async function spreadsheetRoutes(app: FastifyInstance): Promise<void> {
  // POST /validate - progress and column check without loading a ledger
  app.post<{ Body: SpreadsheetPathBody }>(
    '/validate',
    { preHandler: validateBody(spreadsheetPathSchema) },
    async (request, reply) => {
      const report = await CombinationLedger.validate(request.body.path);
      logger.debug({ path: request.body.path, ...report.progress }, 'Spreadsheet validated');

      return reply.send({
        data: {
          path: request.body.path,
          completed: report.progress.completed,
          total: report.progress.total,
          hasCombinationColumn: report.hasCombinationColumn,
        },
      });
    },
  );
}
