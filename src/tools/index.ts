// Tool system: registry + definitions
export type { ExecutableTool, ToolContext, ToolDefinition, ToolResult } from './types.js';
export { InterruptSignal } from './interrupt.js';

export { createToolRegistry } from './registry/index.js';
export type { ToolRegistry } from './registry/index.js';
export * from './definitions/index.js';
