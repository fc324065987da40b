/**
 * Integer arithmetic tools: add, subtract, multiply, divide.
 * Each takes `first` and `second` and returns `{ result }`.
 */
import { z } from 'zod';
import type { Result } from '@/core/result.js';
import { ok, err } from '@/core/result.js';
import { ToolExecutionError } from '@/core/errors.js';
import type { AgentError } from '@/core/errors.js';
import type { ExecutableTool, ToolContext, ToolResult } from '@/tools/types.js';
import { createLogger } from '@/observability/logger.js';

const logger = createLogger({ name: 'arithmetic' });

const inputSchema = z.object({
  first: z.number().int().describe('First integer'),
  second: z.number().int().describe('Second integer'),
});

const outputSchema = z.object({
  result: z.number(),
});

type Operands = z.infer<typeof inputSchema>;

function createArithmeticTool(params: {
  id: string;
  description: string;
  apply: (operands: Operands) => number;
  validate?: (operands: Operands) => string | undefined;
}): ExecutableTool {
  return {
    id: params.id,
    description: params.description,
    inputSchema,
    outputSchema,

    execute(input: unknown, context: ToolContext): Promise<Result<ToolResult, AgentError>> {
      const startTime = Date.now();
      const operands = inputSchema.parse(input);

      const problem = params.validate?.(operands);
      if (problem) {
        return Promise.resolve(err(new ToolExecutionError(params.id, problem)));
      }

      const result = params.apply(operands);
      logger.debug('Arithmetic tool evaluated', {
        component: 'arithmetic',
        toolId: params.id,
        runId: context.runId,
        first: operands.first,
        second: operands.second,
        result,
      });

      return Promise.resolve(ok({
        output: { result },
        durationMs: Date.now() - startTime,
      }));
    },
  };
}

export function createAddTool(): ExecutableTool {
  return createArithmeticTool({
    id: 'add',
    description: 'Adds two integers and returns their sum.',
    apply: ({ first, second }) => first + second,
  });
}

export function createSubtractTool(): ExecutableTool {
  return createArithmeticTool({
    id: 'subtract',
    description: 'Subtracts the second integer from the first and returns the difference.',
    apply: ({ first, second }) => first - second,
  });
}

export function createMultiplyTool(): ExecutableTool {
  return createArithmeticTool({
    id: 'multiply',
    description: 'Multiplies two integers and returns their product.',
    apply: ({ first, second }) => first * second,
  });
}

/** Division is not integral: `divide(7, 2)` returns 3.5. */
export function createDivideTool(): ExecutableTool {
  return createArithmeticTool({
    id: 'divide',
    description: 'Divides the first integer by the second and returns the quotient.',
    apply: ({ first, second }) => first / second,
    validate: ({ second }) => (second === 0 ? 'Division by zero' : undefined),
  });
}
