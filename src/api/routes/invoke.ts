/**
 * POST /:agentId/invoke: run the agent to completion and return its reply.
 */
import type { FastifyInstance } from 'fastify';
import { AgentExecutionError, RunCancelledError } from '@/core/index.js';
import { contentToText } from '@/agents/messages.js';
import type { FinalEvent } from '@/agents/types.js';
import type { InvokeResponse, RouteDependencies } from '../types.js';
import { INTERNAL_ERROR_MESSAGE, sendError } from '../error-handler.js';
import { agentParamsSchema, createRunAbort, prepareRun, userInputSchema } from './run-setup.js';

export const GENERATION_STOPPED_TEXT = 'Generation was stopped.';

/** The reply text carried by a final event. */
export function extractFinalContent(final: FinalEvent): string {
  if (final.kind === 'interrupt') {
    const [first] = final.interrupts;
    if (!first) throw new AgentExecutionError('Run was interrupted without a value');
    return first.value;
  }

  const last = final.messages.at(-1);
  if (!last) throw new AgentExecutionError('Run finished without any messages');
  return contentToText(last.content);
}

// ─── Route Plugin ───────────────────────────────────────────────

export function invokeRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { agentRegistry, logger, settings } = deps;

  fastify.post('/:agentId/invoke', async (request, reply) => {
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
    runLogger.info('Invoke run started', { component: 'invoke-route' });

    let content: string;
    try {
      const final = await agent.runtime.invoke(input, config);
      content = extractFinalContent(final);
    } catch (error) {
      if (error instanceof RunCancelledError || abort.signal.aborted) {
        runLogger.info('Invoke run cancelled', { component: 'invoke-route', reason: abort.reason });
        content = GENERATION_STOPPED_TEXT;
      } else if (error instanceof AgentExecutionError) {
        throw error;
      } else {
        runLogger.error('Invoke run failed', {
          component: 'invoke-route',
          error: error instanceof Error ? error.message : String(error),
          errorName: error instanceof Error ? error.name : undefined,
        });
        return sendError(request, reply, 'InternalServerError', INTERNAL_ERROR_MESSAGE, 500);
      }
    } finally {
      abort.dispose();
    }

    runLogger.info('Invoke run finished', { component: 'invoke-route', contentLength: content.length });
    const response: InvokeResponse = { content, thread_id: config.threadId, run_id: config.runId };
    return reply.send(response);
  });
}
