/**
 * POST /:agentId/stream: run the agent and stream its output as server-sent events.
 *
 * Validation and agent lookup fail as ordinary JSON errors. Once headers are
 * sent, every failure is reported in-band by the stream driver.
 */
import { Readable } from 'node:stream';
import type { FastifyInstance } from 'fastify';
import { createStreamDriver, serializeFrame } from '@/streaming/index.js';
import type { SseFrame } from '@/streaming/index.js';
import type { RouteDependencies } from '../types.js';
import { agentParamsSchema, createRunAbort, prepareRun, userInputSchema } from './run-setup.js';

async function* encodeFrames(frames: AsyncIterable<SseFrame>): AsyncGenerator<string> {
  for await (const frame of frames) {
    yield serializeFrame(frame);
  }
}

export function streamRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { agentRegistry, logger, settings } = deps;

  fastify.post('/:agentId/stream', async (request, reply) => {
    const { agentId } = agentParamsSchema.parse(request.params);
    const body = userInputSchema.parse(request.body);

    const abort = createRunAbort(reply.raw, settings.requestTimeoutMs);
    const prepared = prepareRun(agentId, body, agentRegistry, { abortSignal: abort.signal });
    if (!prepared.ok) {
      abort.dispose();
      throw prepared.error;
    }

    const { agent, input, config } = prepared.value;
    const runLogger = logger.child({ runId: config.runId, threadId: config.threadId, agentId });
    runLogger.info('Stream run started', { component: 'stream-route' });

    const driver = createStreamDriver({
      runtime: agent.runtime,
      input,
      config,
      requestMessage: body.message,
      logger: runLogger,
      onFinish: () => abort.dispose(),
    });

    return reply
      .header('Content-Type', 'text/event-stream; charset=utf-8')
      .header('Cache-Control', 'no-cache')
      .header('Connection', 'keep-alive')
      .header('X-Accel-Buffering', 'no')
      .send(Readable.from(encodeFrames(driver.frames())));
  });
}
