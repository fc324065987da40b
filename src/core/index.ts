// Core module: errors, Result and shared types
export type { LLMProviderConfig, LLMProviderKind, RunId, ThreadId } from './types.js';
export { runId, threadId } from './types.js';

export type { Result } from './result.js';
export { ok, err } from './result.js';

export {
  AgentError,
  AgentExecutionError,
  AgentNotFoundError,
  ConfigError,
  ProviderError,
  RunCancelledError,
  ToolExecutionError,
  ToolNotFoundError,
  ValidationError,
} from './errors.js';
