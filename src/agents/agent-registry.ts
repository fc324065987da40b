/**
 * Agent Registry: the fixed set of agents the gateway serves, built once at
 * startup and injected into the routes.
 */
import { ConfigError } from '@/core/errors.js';
import type { AgentDefinition, AgentInfo, AgentRegistry } from './types.js';

// ─── Factory Function ────────────────────────────────────────────

/**
 * Create an agent registry. Duplicate ids and an unknown default are
 * configuration errors.
 */
export function createAgentRegistry(
  definitions: readonly AgentDefinition[],
  options: { defaultAgentId: string },
): AgentRegistry {
  const agents = new Map<string, AgentDefinition>();

  for (const definition of definitions) {
    if (agents.has(definition.id)) {
      throw new ConfigError(`Agent "${definition.id}" is registered twice`, { agentId: definition.id });
    }
    agents.set(definition.id, definition);
  }

  if (!agents.has(options.defaultAgentId)) {
    throw new ConfigError(`Default agent "${options.defaultAgentId}" is not registered`, {
      defaultAgentId: options.defaultAgentId,
      availableAgents: [...agents.keys()],
    });
  }

  return {
    defaultAgentId: options.defaultAgentId,

    get(agentId: string): AgentDefinition | undefined {
      return agents.get(agentId);
    },

    list(): AgentInfo[] {
      return [...agents.values()].map((agent) => ({ key: agent.id, description: agent.description }));
    },
  };
}
