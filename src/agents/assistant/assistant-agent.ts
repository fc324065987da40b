/**
 * The Agent-AI assistant: a ReAct agent over the arithmetic and weather tools.
 */
import type { Logger } from '@/observability/logger.js';
import type { LLMProvider } from '@/providers/types.js';
import {
  createAddTool,
  createDivideTool,
  createMultiplyTool,
  createSubtractTool,
  createToolRegistry,
  createWeatherTool,
} from '@/tools/index.js';
import { createReactAgent } from '../react-agent.js';
import type { AgentDefinition } from '../types.js';
import {
  extractConversationHistory,
  formatConversationHistory,
  loadPromptTemplate,
  renderPrompt,
} from './prompt.js';

export const ASSISTANT_AGENT_ID = 'Agent-AI';

export interface AssistantAgentOptions {
  provider: LLMProvider;
  maxSteps: number;
  temperature: number;
  maxOutputTokens: number;
  logger: Logger;
  /** Override the bundled prompt template (tests). */
  promptTemplate?: string;
}

export async function createAssistantAgent(options: AssistantAgentOptions): Promise<AgentDefinition> {
  const template = options.promptTemplate ?? (await loadPromptTemplate());

  const toolRegistry = createToolRegistry([
    createWeatherTool(),
    createAddTool(),
    createSubtractTool(),
    createMultiplyTool(),
    createDivideTool(),
  ]);

  const runtime = createReactAgent({
    provider: options.provider,
    toolRegistry,
    maxSteps: options.maxSteps,
    temperature: options.temperature,
    maxOutputTokens: options.maxOutputTokens,
    logger: options.logger.child({ agentId: ASSISTANT_AGENT_ID }),
    renderSystemPrompt: (input, messages) =>
      renderPrompt(template, {
        user_info: input.userInfo,
        today_date: input.todayDate,
        conversation_history: formatConversationHistory(extractConversationHistory(messages)),
      }),
  });

  return {
    id: ASSISTANT_AGENT_ID,
    description: 'An AI agent that can help users',
    runtime,
  };
}
