/**
 * API Routes Registry
 * Registers all API routes with versioning (v1)
 */

import type { FastifyInstance } from 'fastify';
import type { ClaimLocks } from '../../services/hunt/claimResolver.js';
import type { DirectoryStore } from '../../services/directory/directoryStore.js';
import type { HuntEngine } from '../../services/hunt/huntEngine.js';
import type { SupportIntake } from '../../services/intake/supportIntake.js';
import type { TicketCommands } from '../../services/hunt/ticketCommands.js';
import type { TicketStore } from '../../services/tickets/ticketStore.js';
import expertRoutes from './experts.js';
import healthRoutes from './health.js';
import requestRoutes from './requests.js';
import ticketRoutes from './tickets.js';

/**
 * Everything the routes need, built once by the app wiring
 */
export interface AppServices {
  tickets: TicketStore;
  directory: DirectoryStore;
  engine: HuntEngine;
  intake: SupportIntake;
  commands: TicketCommands;
  locks: ClaimLocks;
}

export function registerRoutes(server: FastifyInstance, services: AppServices): void {
  server.register(
    async (v1) => {
      await v1.register(healthRoutes, { services });
      await v1.register(requestRoutes, { prefix: '/requests', services });
      await v1.register(ticketRoutes, { prefix: '/tickets', services });
      await v1.register(expertRoutes, { prefix: '/experts', services });
    },
    { prefix: '/v1' }
  );
}
