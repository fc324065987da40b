/**
 * Weather tool. A stand-in lookup that always reports sunny weather at 25°C.
 */
import { z } from 'zod';
import type { Result } from '@/core/result.js';
import { ok } from '@/core/result.js';
import type { AgentError } from '@/core/errors.js';
import type { ExecutableTool, ToolContext, ToolResult } from '@/tools/types.js';

const inputSchema = z.object({
  city: z.string().min(1).max(200).describe('Name of the city to get the weather for'),
});

const outputSchema = z.object({
  city: z.string(),
  conditions: z.string(),
  temperature: z.string(),
  description: z.string(),
});

export type WeatherReport = z.infer<typeof outputSchema>;

export function createWeatherTool(): ExecutableTool {
  return {
    id: 'get_weather',
    description: 'Returns the current weather for a city.',
    inputSchema,
    outputSchema,

    execute(input: unknown, context: ToolContext): Promise<Result<ToolResult, AgentError>> {
      void context;
      const { city } = inputSchema.parse(input);

      const report: WeatherReport = {
        city,
        conditions: 'Sunny',
        temperature: '25°C',
        description: `The weather in ${city} is beautiful! The sun is shining and it is a perfect 25°C.`,
      };

      return Promise.resolve(ok({ output: report, durationMs: 0 }));
    },
  };
}
