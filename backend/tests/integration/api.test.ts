// =============================================================================
// HTTP API Integration Tests
// Full app wiring over in-memory stores, driven through Fastify inject
// =============================================================================

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { Ticket } from '@sme-hunt/shared';
import { createApp } from '../../src/app.js';
import { loadSettings } from '../../src/config/settings.js';
import type { AppServices } from '../../src/api/routes/index.js';
import type { ExpertsDocument, UserPrioritiesDocument } from '../../src/models/Expert.js';
import type { TicketsDocument } from '../../src/models/Ticket.js';
import { DirectoryStore } from '../../src/services/directory/directoryStore.js';
import { TicketStore } from '../../src/services/tickets/ticketStore.js';
import { buildServer } from '../../src/server.js';
import { InMemoryStorage, RecordingNotifier, StubClassifier } from '../utils/fakes.js';
import { makeClassification, makeExpert } from '../utils/testHelpers.js';

describe('API', () => {
  let server: FastifyInstance;
  let services: AppServices;
  let notifier: RecordingNotifier;
  let classifier: StubClassifier;
  let ticketStorage: InMemoryStorage<TicketsDocument>;

  beforeEach(async () => {
    notifier = new RecordingNotifier();
    classifier = new StubClassifier(makeClassification({ expertiseTags: ['vpn'], urgencyScore: 60 }));
    ticketStorage = new InMemoryStorage<TicketsDocument>('tickets');

    services = createApp(loadSettings({}), {
      directory: new DirectoryStore(
        new InMemoryStorage<ExpertsDocument>('experts', {
          experts: [
            makeExpert({ id: 'U-erin', name: 'Erin', expertiseTags: ['vpn'], skillRating: { vpn: 5 } }),
            makeExpert({ id: 'U-eli', name: 'Eli', expertiseTags: ['vpn'], skillRating: { vpn: 3 } }),
          ],
        }),
        new InMemoryStorage<UserPrioritiesDocument>('priorities', {})
      ),
      tickets: new TicketStore(ticketStorage),
      notifier,
      classifier,
    });
    server = buildServer(services);
    await server.ready();
  });

  afterEach(async () => {
    await services.engine.stop();
    await server.close();
  });

  async function submitRequest(): Promise<string> {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/requests',
      payload: { requesterId: 'U-req', text: 'VPN drops every hour', threadRef: 'C1:1700000000.000100' },
    });
    expect(response.statusCode).toBe(201);
    const body: { data: { kind: string; ticketId: string } } = response.json();
    // first wave goes out in the background
    await vi.waitFor(() => expect(notifier.pagedUsers()).toEqual(['U-erin']));
    return body.data.ticketId;
  }

  describe('GET /v1/health', () => {
    it('should report status and active hunts', async () => {
      const response = await server.inject({ method: 'GET', url: '/v1/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toMatchObject({
        status: 'healthy',
        activeHunts: 0,
      });
    });
  });

  describe('POST /v1/requests', () => {
    it('should open a ticket and page the best expert', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/requests',
        payload: { requesterId: 'U-req', text: 'VPN drops every hour', threadRef: 'C1:1700000000.000100' },
      });

      expect(response.statusCode).toBe(201);
      const { data } = response.json();
      expect(data.kind).toBe('escalated');
      expect(data.ticketId).toMatch(/^ticket-[0-9a-f]{8}$/);

      const health = await server.inject({ method: 'GET', url: '/v1/health' });
      expect(health.json().data.activeHunts).toBe(1);
      await vi.waitFor(() => expect(notifier.pagedUsers()).toEqual(['U-erin']));
    });

    it('should answer simple questions without a ticket', async () => {
      classifier.respondWith(
        makeClassification({ category: 'general_question', responseKind: 'direct_answer', urgencyScore: 5, draftReply: 'Try the wiki.' })
      );

      const response = await server.inject({
        method: 'POST',
        url: '/v1/requests',
        payload: { requesterId: 'U-req', text: 'Where is the VPN guide?', threadRef: 'C1:1' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toMatchObject({ kind: 'answered', reply: 'Try the wiki.' });
    });

    it('should reject a request without text', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/requests',
        payload: { requesterId: 'U-req', text: '   ', threadRef: 'C1:1' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        error: 'Validation Error',
        code: 'VALIDATION_ERROR',
        validationErrors: [{ field: 'text' }],
      });
    });
  });

  describe('tickets', () => {
    it('should list and fetch tickets', async () => {
      const ticketId = await submitRequest();

      const list = await server.inject({ method: 'GET', url: '/v1/tickets?status=hunting' });
      expect(list.statusCode).toBe(200);
      const listed: { data: Ticket[]; total: number } = list.json();
      expect(listed.total).toBe(1);
      expect(listed.data[0]?.id).toBe(ticketId);

      const one = await server.inject({ method: 'GET', url: `/v1/tickets/${ticketId}` });
      expect(one.json().data).toMatchObject({ id: ticketId, status: 'hunting', notifiedExpertIds: ['U-erin'] });
    });

    it('should return 404 for an unknown ticket', async () => {
      const response = await server.inject({ method: 'GET', url: '/v1/tickets/ticket-00000000' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({
        code: 'NOT_FOUND',
        message: "Ticket with ID 'ticket-00000000' not found",
      });
    });

    it('should reject an unknown status filter', async () => {
      const response = await server.inject({ method: 'GET', url: '/v1/tickets?status=lost' });
      expect(response.statusCode).toBe(400);
    });

    it('should claim, refuse a second claim, and resolve', async () => {
      const ticketId = await submitRequest();

      const claim = await server.inject({
        method: 'POST',
        url: `/v1/tickets/${ticketId}/claim`,
        payload: { expertId: 'U-erin' },
      });
      expect(claim.statusCode).toBe(200);
      expect(claim.json()).toEqual({
        data: { outcome: 'accepted', message: `You have successfully claimed ticket ${ticketId}.` },
      });

      const second = await server.inject({
        method: 'POST',
        url: `/v1/tickets/${ticketId}/claim`,
        payload: { expertId: 'U-eli' },
      });
      expect(second.json().data).toEqual({
        outcome: 'alreadyClaimed',
        message: `Ticket ${ticketId} has already been handled by someone else.`,
      });

      const resolve = await server.inject({ method: 'POST', url: `/v1/tickets/${ticketId}/resolve` });
      expect(resolve.json().data).toEqual({
        outcome: 'resolved',
        message: `Ticket ${ticketId} is now resolved. Thanks!`,
      });
      expect(services.tickets.get(ticketId)?.status).toBe('resolved');
    });

    it('should cancel a running hunt', async () => {
      const ticketId = await submitRequest();

      const response = await server.inject({
        method: 'POST',
        url: `/v1/tickets/${ticketId}/cancel`,
        payload: { reason: 'fixed itself' },
      });

      expect(response.json().data).toEqual({
        outcome: 'cancelled',
        message: `The search for an expert on ticket ${ticketId} has been stopped.`,
      });
      expect(services.tickets.get(ticketId)).toMatchObject({ status: 'expired', closedReason: 'cancelled' });
    });

    it('should answer a claim on an unknown ticket with a sentence', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/v1/tickets/ticket-nope/claim',
        payload: { expertId: 'U-erin' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json().data).toEqual({
        outcome: 'unknownTicket',
        message: "I couldn't find a ticket called ticket-nope.",
      });
    });

    it('should ask to retry when the ticket store is unavailable', async () => {
      const ticketId = await submitRequest();
      ticketStorage.failSaves = true;

      const response = await server.inject({
        method: 'POST',
        url: `/v1/tickets/${ticketId}/claim`,
        payload: { expertId: 'U-erin' },
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toMatchObject({
        code: 'STORE_UNAVAILABLE',
        message: 'Sorry, something went wrong while handling your request. Please try again in a few minutes.',
      });
    });
  });

  describe('experts', () => {
    it('should list experts and toggle availability', async () => {
      const list = await server.inject({ method: 'GET', url: '/v1/experts' });
      expect(list.json().data.map((e: { id: string }) => e.id)).toEqual(['U-eli', 'U-erin']);

      const patch = await server.inject({
        method: 'PATCH',
        url: '/v1/experts/U-eli/availability',
        payload: { available: false },
      });
      expect(patch.statusCode).toBe(200);
      expect(patch.json().data).toMatchObject({ id: 'U-eli', available: false });
      expect(services.directory.getExpert('U-eli')?.available).toBe(false);
    });

    it('should return 404 for an unknown expert', async () => {
      const response = await server.inject({
        method: 'PATCH',
        url: '/v1/experts/U-ghost/availability',
        payload: { available: true },
      });

      expect(response.statusCode).toBe(404);
    });
  });

  it('should return 404 for unknown routes', async () => {
    const response = await server.inject({ method: 'GET', url: '/v1/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ error: 'Not Found', message: 'Route GET /v1/nope not found' });
  });
});
