/**
 * Expert Directory Routes
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { ApiResponse, Expert } from '@sme-hunt/shared';
import type { AppServices } from './index.js';

const expertIdParamSchema = z.object({
  expertId: z.string().min(1),
});

const availabilityBodySchema = z.object({
  available: z.boolean(),
});

export default async function expertRoutes(
  fastify: FastifyInstance,
  { services }: { services: AppServices }
): Promise<void> {
  fastify.get('/', async (): Promise<ApiResponse<Expert[]>> => {
    const experts = services.directory.listExperts();
    return { data: experts, total: experts.length };
  });

  /**
   * PATCH /experts/:expertId/availability
   * Same expert scope as claims, so a toggle never lands mid-claim
   */
  fastify.patch('/:expertId/availability', async (request: FastifyRequest): Promise<ApiResponse<Expert>> => {
    const { expertId } = expertIdParamSchema.parse(request.params);
    const { available } = availabilityBodySchema.parse(request.body);

    const expert = await services.locks.experts.runExclusive(expertId, () =>
      services.directory.setAvailability(expertId, available)
    );
    request.log.info({ expertId, available }, 'Expert availability changed');

    return { data: expert };
  });
}
