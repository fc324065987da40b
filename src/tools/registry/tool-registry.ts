/**
 * ToolRegistry: central registry for the agent's tool definitions.
 * Resolves tools by ID, validates model-supplied input and tool output
 * with Zod, and formats definitions for the chat model.
 */
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { z } from 'zod';

import { ToolExecutionError, ToolNotFoundError } from '@/core/errors.js';
import type { AgentError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err } from '@/core/result.js';
import { createLogger } from '@/observability/logger.js';
import type { ToolDefinitionForProvider } from '@/providers/types.js';
import type { ExecutableTool, ToolContext, ToolResult } from '../types.js';

const logger = createLogger({ name: 'tool-registry' });

export interface ToolRegistry {
  /** Register a tool. Replaces existing registration for same ID. */
  register(tool: ExecutableTool): void;

  /** Format every registered tool for an LLM provider. */
  formatForProvider(): ToolDefinitionForProvider[];

  /**
   * Resolve and execute a tool call.
   * Unknown tools, invalid input and output that fails the tool's
   * `outputSchema` come back as errors, never as throws.
   */
  resolve(
    toolId: string,
    input: Record<string, unknown>,
    context: ToolContext,
  ): Promise<Result<ToolResult, AgentError>>;
}

/**
 * Create a new ToolRegistry instance, optionally pre-populated.
 */
export function createToolRegistry(initialTools: ExecutableTool[] = []): ToolRegistry {
  const tools = new Map<string, ExecutableTool>();

  function register(tool: ExecutableTool): void {
    logger.debug('Registering tool', { component: 'tool-registry', toolId: tool.id });
    tools.set(tool.id, tool);
  }

  for (const tool of initialTools) register(tool);

  return {
    register,

    formatForProvider(): ToolDefinitionForProvider[] {
      return [...tools.values()].map((tool) => ({
        name: tool.id,
        description: tool.description,
        inputSchema: toOpenAICompatibleSchema(tool.inputSchema),
      }));
    },

    async resolve(
      toolId: string,
      input: Record<string, unknown>,
      context: ToolContext,
    ): Promise<Result<ToolResult, AgentError>> {
      const tool = tools.get(toolId);
      if (!tool) {
        const available = [...tools.keys()];
        logger.warn('Model requested an unknown tool', {
          component: 'tool-registry',
          toolId,
          availableTools: available,
          runId: context.runId,
        });
        return err(new ToolNotFoundError(toolId, available));
      }

      const parsed = tool.inputSchema.safeParse(input);
      if (!parsed.success) {
        const details = formatIssues(parsed.error, 'input');
        logger.warn('Tool input validation failed', {
          component: 'tool-registry',
          toolId,
          errors: parsed.error.issues,
          runId: context.runId,
        });
        return err(new ToolExecutionError(toolId, `Invalid input (${details})`));
      }

      logger.info('Executing tool', {
        component: 'tool-registry',
        toolId,
        runId: context.runId,
        threadId: context.threadId,
      });

      const result = await tool.execute(parsed.data, context);
      if (!result.ok) return result;

      if (tool.outputSchema) {
        const checked = tool.outputSchema.safeParse(result.value.output);
        if (!checked.success) {
          logger.warn('Tool output validation failed', {
            component: 'tool-registry',
            toolId,
            errors: checked.error.issues,
            runId: context.runId,
          });
          return err(new ToolExecutionError(toolId, `Invalid output (${formatIssues(checked.error, 'output')})`));
        }
      }

      logger.debug('Tool executed', {
        component: 'tool-registry',
        toolId,
        runId: context.runId,
        durationMs: result.value.durationMs,
      });
      return result;
    },
  };
}

function formatIssues(error: z.ZodError, root: string): string {
  return error.issues.map((issue) => `${issue.path.join('.') || root}: ${issue.message}`).join('; ');
}

/**
 * Convert a Zod schema to an OpenAI-compatible JSON Schema.
 * Uses the `jsonSchema7` target because OpenAI rejects the boolean
 * `exclusiveMinimum` that older drafts produce.
 */
function toOpenAICompatibleSchema(zodSchema: z.ZodType): Record<string, unknown> {
  const raw: Record<string, unknown> = { ...zodToJsonSchema(zodSchema, { target: 'jsonSchema7' }) };

  // OpenAI rejects $schema in function parameters
  delete raw['$schema'];

  return raw;
}
