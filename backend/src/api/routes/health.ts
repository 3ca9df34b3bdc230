/**
 * Health Check Endpoint
 * Liveness plus the number of hunts currently running
 */

import type { FastifyInstance } from 'fastify';
import type { HealthCheck, HealthStatus } from '@sme-hunt/shared';
import type { AppServices } from './index.js';

// Application start time for uptime calculation
const startTime = Date.now();

const APP_VERSION = process.env.APP_VERSION || process.env.npm_package_version || '0.1.0';

export default async function healthRoutes(
  fastify: FastifyInstance,
  { services }: { services: AppServices }
): Promise<void> {
  /**
   * GET /health
   */
  fastify.get('/health', async () => {
    const checks: HealthCheck[] = [
      {
        name: 'directory',
        status: services.directory.listExperts().length > 0 ? 'pass' : 'warn',
        message: `${services.directory.listExperts().length} experts loaded`,
      },
      {
        name: 'tickets',
        status: 'pass',
        message: `${services.tickets.listAll().length} tickets stored`,
      },
    ];

    const health: HealthStatus = {
      status: checks.some((c) => c.status === 'fail')
        ? 'unhealthy'
        : checks.some((c) => c.status === 'warn')
          ? 'degraded'
          : 'healthy',
      version: APP_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      activeHunts: services.engine.activeHunts().length,
      checks,
    };

    return { data: health };
  });
}
