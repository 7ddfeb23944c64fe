import type { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';

export function validationFailed(reply: FastifyReply, error: ZodError): FastifyReply {
  return reply.status(400).send({
    error: 'Validation failed',
    details: error.format(),
  });
}
