/**
 * Route registration: attaches every API route to the Fastify instance.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { healthRoutes } from './health.js';
import { infoRoutes } from './info.js';
import { invokeRoutes } from './invoke.js';
import { streamRoutes } from './stream.js';

export function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  healthRoutes(fastify);
  infoRoutes(fastify, deps);
  invokeRoutes(fastify, deps);
  streamRoutes(fastify, deps);
}
