/**
 * Ticket Routes
 * Ticket listing plus the claim / resolve / cancel commands
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { ApiResponse, CancelResult, ClaimResult, CommandResponse, ResolveResult, Ticket } from '@sme-hunt/shared';
import { NotFoundError } from '../../lib/errors.js';
import { TICKET_STATUSES } from '../../models/Ticket.js';
import type { AppServices } from './index.js';

// =============================================================================
// Request Schemas
// =============================================================================

const ticketIdParamSchema = z.object({
  ticketId: z.string().min(1),
});

const listTicketsQuerySchema = z.object({
  status: z.enum(TICKET_STATUSES).optional(),
  requesterId: z.string().min(1).optional(),
});

const claimBodySchema = z.object({
  expertId: z.string().trim().min(1),
});

const cancelBodySchema = z
  .object({
    reason: z.string().max(500).optional(),
  })
  .default({});

export default async function ticketRoutes(
  fastify: FastifyInstance,
  { services }: { services: AppServices }
): Promise<void> {
  /**
   * GET /tickets
   */
  fastify.get('/', async (request: FastifyRequest): Promise<ApiResponse<Ticket[]>> => {
    const query = listTicketsQuerySchema.parse(request.query);
    const tickets = services.tickets.listAll(query);

    return { data: tickets, total: tickets.length };
  });

  /**
   * GET /tickets/:ticketId
   */
  fastify.get('/:ticketId', async (request: FastifyRequest): Promise<ApiResponse<Ticket>> => {
    const { ticketId } = ticketIdParamSchema.parse(request.params);
    const ticket = services.tickets.get(ticketId);
    if (!ticket) {
      throw new NotFoundError('Ticket', ticketId);
    }

    return { data: ticket };
  });

  /**
   * POST /tickets/:ticketId/claim
   */
  fastify.post('/:ticketId/claim', async (request: FastifyRequest): Promise<ApiResponse<CommandResponse<ClaimResult>>> => {
    const { ticketId } = ticketIdParamSchema.parse(request.params);
    const { expertId } = claimBodySchema.parse(request.body);

    return { data: await services.commands.claim(ticketId, expertId) };
  });

  /**
   * POST /tickets/:ticketId/resolve
   */
  fastify.post('/:ticketId/resolve', async (request: FastifyRequest): Promise<ApiResponse<CommandResponse<ResolveResult>>> => {
    const { ticketId } = ticketIdParamSchema.parse(request.params);

    return { data: await services.commands.resolve(ticketId) };
  });

  /**
   * POST /tickets/:ticketId/cancel
   */
  fastify.post('/:ticketId/cancel', async (request: FastifyRequest): Promise<ApiResponse<CommandResponse<CancelResult>>> => {
    const { ticketId } = ticketIdParamSchema.parse(request.params);
    const { reason } = cancelBodySchema.parse(request.body ?? undefined);

    return { data: await services.commands.cancel(ticketId, reason) };
  });
}
