import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ok } from '@/core/result.js';
import { createToolRegistry } from './tool-registry.js';
import { createAddTool } from '@/tools/definitions/arithmetic.js';
import { createWeatherTool } from '@/tools/definitions/weather.js';
import { createAskUserTool, createEchoTool, createFailingTool, createProgressTool } from '@/testing/fixtures/tools.js';
import { createTestToolContext } from '@/testing/fixtures/context.js';
import { InterruptSignal } from '@/tools/interrupt.js';
import type { ExecutableTool } from '@/tools/types.js';

describe('ToolRegistry', () => {
  describe('registration', () => {
    it('offers registered tools to the model in registration order', () => {
      const registry = createToolRegistry([createAddTool(), createWeatherTool()]);
      registry.register(createEchoTool());

      expect(registry.formatForProvider().map((tool) => tool.name)).toEqual(['add', 'get_weather', 'echo']);
    });

    it('replaces a tool registered under the same id', async () => {
      const registry = createToolRegistry([createEchoTool()]);
      registry.register({ ...createEchoTool(), description: 'Replacement echo.' });

      const definitions = registry.formatForProvider();
      expect(definitions.map((tool) => tool.description)).toEqual(['Replacement echo.']);

      const result = await registry.resolve('echo', { message: 'hi' }, createTestToolContext());
      expect(result.ok).toBe(true);
    });
  });

  describe('formatForProvider', () => {
    it('converts Zod input schemas to JSON Schema without $schema', () => {
      const registry = createToolRegistry([createWeatherTool()]);
      const [definition] = registry.formatForProvider();

      expect(definition?.name).toBe('get_weather');
      expect(definition?.description).toBe('Returns the current weather for a city.');
      expect(definition?.inputSchema['$schema']).toBeUndefined();
      expect(definition?.inputSchema['type']).toBe('object');
      expect(definition?.inputSchema['required']).toEqual(['city']);
    });
  });

  describe('resolve', () => {
    it('executes a registered tool with validated input', async () => {
      const registry = createToolRegistry([createAddTool()]);
      const result = await registry.resolve('add', { first: 2, second: 2 }, createTestToolContext());

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.output).toEqual({ result: 4 });
    });

    it('returns ToolNotFoundError for an unknown tool', async () => {
      const registry = createToolRegistry([createAddTool()]);
      const result = await registry.resolve('sqrt', {}, createTestToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.name).toBe('ToolNotFoundError');
        expect(result.error.context).toEqual({ toolId: 'sqrt', availableTools: ['add'] });
      }
    });

    it('returns ToolExecutionError for invalid input', async () => {
      const registry = createToolRegistry([createAddTool()]);
      const result = await registry.resolve('add', { first: 'two', second: 2 }, createTestToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.name).toBe('ToolExecutionError');
        expect(result.error.message).toContain('Invalid input (first:');
      }
    });

    it('accepts output that matches the tool output schema', async () => {
      const registry = createToolRegistry([createWeatherTool()]);
      const result = await registry.resolve('get_weather', { city: 'Lima' }, createTestToolContext());

      expect(result.ok).toBe(true);
      if (result.ok) expect(result.value.output).toMatchObject({ city: 'Lima', conditions: 'Sunny' });
    });

    it('returns ToolExecutionError for output that breaks the tool output schema', async () => {
      const counter: ExecutableTool = {
        id: 'counter',
        description: 'Counts things.',
        inputSchema: z.object({}),
        outputSchema: z.object({ count: z.number() }),
        execute: () => Promise.resolve(ok({ output: { count: 'three' }, durationMs: 0 })),
      };
      const registry = createToolRegistry([counter]);

      const result = await registry.resolve('counter', {}, createTestToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.name).toBe('ToolExecutionError');
        expect(result.error.message).toBe(
          'Tool "counter" execution failed: Invalid output (count: Expected number, received string)',
        );
      }
    });

    it('passes tool errors through without checking output', async () => {
      const registry = createToolRegistry([createFailingTool()]);
      const result = await registry.resolve('failing', {}, createTestToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Tool "failing" execution failed: boom');
    });

    it('lets tools publish custom events through the context', async () => {
      const registry = createToolRegistry([createProgressTool()]);
      const context = createTestToolContext();
      await registry.resolve('progress', { message: 'halfway' }, context);

      expect(context.emitted).toEqual([{ eventType: 'progress', data: { step: 1, message: 'halfway' } }]);
    });

    it('propagates interrupts raised by a tool', async () => {
      const registry = createToolRegistry([createAskUserTool()]);

      await expect(
        registry.resolve('ask_user', { message: 'Which city?' }, createTestToolContext()),
      ).rejects.toBeInstanceOf(InterruptSignal);
    });
  });
});
