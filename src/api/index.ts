// HTTP surface (Fastify)
export type {
  ErrorResponse,
  HealthResponse,
  InfoResponse,
  InvokeResponse,
  RouteDependencies,
} from './types.js';

export { INTERNAL_ERROR_MESSAGE, registerErrorHandler, sendError } from './error-handler.js';
export { registerRoutes } from './routes/index.js';
export { createServer } from './server.js';
export type { ServerOptions } from './server.js';
