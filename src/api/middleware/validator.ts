import type { FastifyReply, FastifyRequest, preHandlerHookHandler } from 'fastify';
import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';

interface FieldError {
  field: string;
  message: string;
}

function toFieldError(issue: ZodIssue): FieldError {
  return {
    field: issue.path.join('.') || '(root)',
    message: issue.message,
  };
}

/**
 * preHandler that parses the JSON body with `schema` and swaps in the parsed
 * value, so handlers see defaults and coercions applied. A body that does
 * not parse is answered with 400 and one entry per offending field; the
 * handler never runs.
 */
export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>): preHandlerHookHandler {
  return (request: FastifyRequest, reply: FastifyReply, done: (err?: Error) => void) => {
    const result = schema.safeParse(request.body ?? {});

    if (!result.success) {
      const details = result.error.issues.map(toFieldError);
      const first = details[0];
      void reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: first
            ? `Invalid request body: ${first.field} ${first.message}`
            : 'Invalid request body',
          details,
        },
      });
      return;
    }

    request.body = result.data;
    done();
  };
}
