/**
 * Base error class for all gateway errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class AgentError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'AgentError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 400;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown when an agent run finishes in a state the caller cannot turn into a reply. */
export class AgentExecutionError extends AgentError {
  constructor(message: string, context?: Record<string, unknown>, cause?: Error) {
    super({
      message,
      code: 'AGENT_EXECUTION_ERROR',
      statusCode: 400,
      cause,
      context,
    });
    this.name = 'AgentExecutionError';
  }
}

/** Thrown when a request names an agent that is not registered. */
export class AgentNotFoundError extends AgentError {
  constructor(agentId: string, availableAgents: string[]) {
    super({
      message: `Agent "${agentId}" not found`,
      code: 'AGENT_NOT_FOUND',
      statusCode: 404,
      context: { agentId, availableAgents },
    });
    this.name = 'AgentNotFoundError';
  }
}

/** Thrown when input validation (Zod) fails. */
export class ValidationError extends AgentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when an LLM provider call fails. */
export class ProviderError extends AgentError {
  constructor(provider: string, message: string, cause?: Error) {
    super({
      message: `LLM provider "${provider}" error: ${message}`,
      code: 'PROVIDER_ERROR',
      statusCode: 502,
      cause,
      context: { provider },
    });
    this.name = 'ProviderError';
  }
}

/** Thrown when a tool's execute() fails at runtime. */
export class ToolExecutionError extends AgentError {
  constructor(toolId: string, message: string, cause?: Error) {
    super({
      message: `Tool "${toolId}" execution failed: ${message}`,
      code: 'TOOL_EXECUTION_ERROR',
      statusCode: 500,
      cause,
      context: { toolId },
    });
    this.name = 'ToolExecutionError';
  }
}

/** Thrown when the model requests a tool that does not exist in the registry. */
export class ToolNotFoundError extends AgentError {
  constructor(toolId: string, availableTools: string[]) {
    super({
      message: `Model requested non-existent tool "${toolId}"`,
      code: 'TOOL_NOT_FOUND',
      statusCode: 400,
      context: { toolId, availableTools },
    });
    this.name = 'ToolNotFoundError';
  }
}

/** Thrown when settings or agent definitions are invalid. */
export class ConfigError extends AgentError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 500,
      context,
      isOperational: false,
    });
    this.name = 'ConfigError';
  }
}

/** Thrown inside a run once its abort signal fires. Never surfaced to clients as an error. */
export class RunCancelledError extends AgentError {
  constructor(runId: string, reason?: string) {
    super({
      message: `Run ${runId} was cancelled${reason ? `: ${reason}` : ''}`,
      code: 'RUN_CANCELLED',
      statusCode: 499,
      context: { runId },
    });
    this.name = 'RunCancelledError';
  }
}
