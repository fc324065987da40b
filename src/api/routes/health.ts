import type { FastifyInstance } from 'fastify';
import type { HealthResponse } from '../types.js';

export const SERVICE_VERSION = '0.1.0';

/** GET /health: liveness only. */
export function healthRoutes(fastify: FastifyInstance): void {
  fastify.get('/health', () => {
    const body: HealthResponse = {
      status: 'ok',
      version: SERVICE_VERSION,
      message: 'Agent gateway is running',
    };
    return body;
  });
}
