/**
 * Support Request Routes
 * Intake of new support messages
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { AppServices } from './index.js';

// =============================================================================
// Request Schemas
// =============================================================================

const submitRequestSchema = z.object({
  requesterId: z.string().trim().min(1).max(100),
  text: z.string().trim().min(1).max(4000),
  threadRef: z.string().trim().min(1).max(200),
});

export default async function requestRoutes(
  fastify: FastifyInstance,
  { services }: { services: AppServices }
): Promise<void> {
  /**
   * POST /requests
   * Classify a message and either answer it or open a ticket and start a hunt
   */
  fastify.post('/', async (request: FastifyRequest, reply: FastifyReply) => {
    const body = submitRequestSchema.parse(request.body);
    const result = await services.intake.submit(body);

    const statusCode = result.kind === 'escalated' ? 201 : result.kind === 'failed' ? 503 : 200;
    return reply.code(statusCode).send({ data: result });
  });
}
