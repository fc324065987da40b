import type { FastifyInstance } from 'fastify';
import type { InfoResponse, RouteDependencies } from '../types.js';

/** GET /info: the agents this gateway serves. */
export function infoRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  fastify.get('/info', () => {
    const body: InfoResponse = {
      agents: deps.agentRegistry.list(),
      default_agent: deps.agentRegistry.defaultAgentId,
    };
    return body;
  });
}
