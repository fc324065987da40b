// Agent runtime, registry and the bundled assistant
export type {
  AgentDefinition,
  AgentInfo,
  AgentRegistry,
  AgentRuntime,
  FinalEvent,
  InterruptInfo,
  RunConfig,
  RunInput,
  RuntimeEvent,
  StreamMode,
} from './types.js';
export { ALL_STREAM_MODES } from './types.js';
export type { AgentMessage, AIMessage, HumanMessage, ToolMessage } from './messages.js';
export { createAgentRegistry } from './agent-registry.js';
export { createReactAgent } from './react-agent.js';
export type { ReactAgentOptions } from './react-agent.js';
export { ASSISTANT_AGENT_ID, createAssistantAgent } from './assistant/assistant-agent.js';
