/**
 * Builds the Fastify application: security plugins, error handling and routes.
 * Listening is left to the caller so tests can drive the app with `inject()`.
 */
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import { registerErrorHandler } from './error-handler.js';
import { registerRoutes } from './routes/index.js';
import type { RouteDependencies } from './types.js';

export interface ServerOptions extends RouteDependencies {
  /** Comma-separated allowed origins; every origin when absent. */
  corsOrigin?: string;
}

export async function createServer(options: ServerOptions): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });

  await server.register(cors, {
    origin: options.corsOrigin ? options.corsOrigin.split(',').map((origin) => origin.trim()) : true,
  });
  await server.register(helmet);

  registerErrorHandler(server);
  registerRoutes(server, {
    agentRegistry: options.agentRegistry,
    logger: options.logger,
    settings: options.settings,
  });

  return server;
}
