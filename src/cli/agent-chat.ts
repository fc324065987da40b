/**
 * Interactive CLI chat client for the agent gateway.
 *
 * Pure HTTP client with zero imports from server code.
 * Uses Node.js built-ins (fetch, readline) plus zod for its config file.
 *
 * Usage: npm run chat -- [--agent <id>] [--server <url>] [--invoke] [--debug] [--check]
 */
import { createInterface } from 'node:readline';
import type { Interface } from 'node:readline';
import { fileURLToPath } from 'node:url';
import { DEFAULT_DOTENV_PATH, getConfig } from './config.js';
import type { CliConfig } from './config.js';
import { SseReader } from './sse-reader.js';
import type { ServerEvent } from './sse-reader.js';

// ─── ANSI Colors ────────────────────────────────────────────────

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';
const CYAN = '\x1b[36m';
const GREEN = '\x1b[32m';
const YELLOW = '\x1b[33m';
const RED = '\x1b[31m';
const MAGENTA = '\x1b[35m';

// ─── CLI Arg Parsing ────────────────────────────────────────────

export interface CliArgs {
  agentId?: string;
  serverUrl?: string;
  /** Use the non-streaming endpoint. */
  invoke: boolean;
  /** Print every raw server event. */
  debug: boolean;
  /** Only check that the server is reachable. */
  check: boolean;
}

export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = { invoke: false, debug: false, check: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    if ((arg === '--agent' || arg === '-a') && next) {
      args.agentId = next;
      i++;
    } else if ((arg === '--server' || arg === '-s') && next) {
      args.serverUrl = next;
      i++;
    } else if (arg === '--invoke') {
      args.invoke = true;
    } else if (arg === '--debug' || arg === '-d') {
      args.debug = true;
    } else if (arg === '--check') {
      args.check = true;
    }
  }

  return args;
}

// ─── Command Parsing ────────────────────────────────────────────

export type Command = { type: 'quit' } | { type: 'new' } | { type: 'help' } | { type: 'message'; text: string };

export function parseCommand(input: string): Command {
  const trimmed = input.trim();
  if (!trimmed) return { type: 'message', text: '' };

  if (trimmed === '/quit' || trimmed === '/exit' || trimmed === '/q') {
    return { type: 'quit' };
  }
  if (trimmed === '/new') {
    return { type: 'new' };
  }
  if (trimmed === '/help' || trimmed === '/h') {
    return { type: 'help' };
  }
  return { type: 'message', text: trimmed };
}

// ─── Event Formatting ───────────────────────────────────────────

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + '...' : text;
}

function field(data: unknown, key: string): unknown {
  if (data === null || typeof data !== 'object') return undefined;
  return Object.entries(data).find(([name]) => name === key)?.[1];
}

function stringField(data: unknown, key: string): string | undefined {
  const value = field(data, key);
  return typeof value === 'string' ? value : undefined;
}

export function formatToolStart(name: string, params: unknown): string {
  return `${DIM}  [tool] ${name} ${truncate(JSON.stringify(params ?? {}), 120)}${RESET}`;
}

export function formatToolComplete(name: string): string {
  return `${DIM}  [done] ${name}${RESET}`;
}

export function formatToolError(name: string, error: string): string {
  return `${RED}  [tool error] ${name}: ${truncate(error, 200)}${RESET}`;
}

/** Per-conversation state the stream updates. */
export interface ChatSession {
  threadId?: string;
  /** True while the cursor sits after streamed text. */
  midLine: boolean;
}

/**
 * Render one server event as terminal output and update the session.
 * Returns the text to write (possibly empty).
 */
export function renderEvent(event: ServerEvent, session: ChatSession): string {
  const breakLine = (): string => {
    if (!session.midLine) return '';
    session.midLine = false;
    return '\n';
  };

  switch (event.event) {
    case 'stream_start':
      return `${MAGENTA}Agent:${RESET} `;

    case 'stream_token': {
      const token = stringField(event.data, 'token') ?? '';
      if (token) session.midLine = true;
      return token;
    }

    case 'tool_execution_start':
      return `${breakLine()}${formatToolStart(stringField(event.data, 'name') ?? 'unknown', field(event.data, 'params'))}\n`;

    case 'tool_execution_complete':
      return `${formatToolComplete(stringField(event.data, 'name') ?? 'unknown')}\n`;

    case 'tool_execution_error':
      return `${breakLine()}${formatToolError(
        stringField(event.data, 'name') ?? 'unknown',
        stringField(event.data, 'error') ?? 'Tool failed',
      )}\n`;

    case 'error': {
      const message = typeof event.data === 'string' ? event.data : 'Unknown error';
      return `${breakLine()}${RED}Error: ${message}${RESET}\n`;
    }

    case 'stream_end': {
      const threadId = stringField(event.data, 'thread_id');
      if (threadId) session.threadId = threadId;
      return `${breakLine()}\n`;
    }

    default:
      return `${breakLine()}${DIM}  [${event.event}] ${truncate(JSON.stringify(event.data), 200)}${RESET}\n`;
  }
}

// ─── API Helpers ────────────────────────────────────────────────

interface ChatClient {
  baseUrl: string;
  headers: Record<string, string>;
  debug: boolean;
}

export function buildHeaders(config: Pick<CliConfig, 'bearerToken'>): Record<string, string> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (config.bearerToken) headers['Authorization'] = `Bearer ${config.bearerToken}`;
  return headers;
}

async function checkServer(client: ChatClient): Promise<boolean> {
  try {
    const res = await fetch(`${client.baseUrl}/health`, { headers: client.headers });
    return res.ok;
  } catch {
    return false;
  }
}

async function fetchDefaultAgent(client: ChatClient): Promise<string | undefined> {
  const res = await fetch(`${client.baseUrl}/info`, { headers: client.headers });
  if (!res.ok) return undefined;
  const body: unknown = await res.json();
  return stringField(body, 'default_agent');
}

async function readErrorMessage(res: Response): Promise<string> {
  const text = await res.text();
  try {
    const body: unknown = JSON.parse(text);
    return stringField(body, 'message') ?? text;
  } catch {
    return text || res.statusText;
  }
}

async function streamMessage(client: ChatClient, agentId: string, text: string, session: ChatSession): Promise<void> {
  const res = await fetch(`${client.baseUrl}/${encodeURIComponent(agentId)}/stream`, {
    method: 'POST',
    headers: client.headers,
    body: JSON.stringify({ message: text, ...(session.threadId && { thread_id: session.threadId }) }),
  });
  if (!res.ok || !res.body) {
    throw new Error(`Server returned ${String(res.status)}: ${await readErrorMessage(res)}`);
  }

  const reader = new SseReader();
  const decoder = new TextDecoder();
  const body = res.body.getReader();
  for (;;) {
    const { done, value } = await body.read();
    if (done) break;
    for (const event of reader.push(decoder.decode(value, { stream: true }))) {
      if (client.debug) console.log(`${DIM}  << ${event.event} ${JSON.stringify(event.data)}${RESET}`);
      process.stdout.write(renderEvent(event, session));
    }
  }
  if (session.midLine) {
    process.stdout.write('\n');
    session.midLine = false;
  }
}

async function invokeMessage(client: ChatClient, agentId: string, text: string, session: ChatSession): Promise<void> {
  const res = await fetch(`${client.baseUrl}/${encodeURIComponent(agentId)}/invoke`, {
    method: 'POST',
    headers: client.headers,
    body: JSON.stringify({ message: text, ...(session.threadId && { thread_id: session.threadId }) }),
  });
  if (!res.ok) {
    throw new Error(`Server returned ${String(res.status)}: ${await readErrorMessage(res)}`);
  }

  const body: unknown = await res.json();
  if (client.debug) console.log(`${DIM}  << ${JSON.stringify(body)}${RESET}`);
  const threadId = stringField(body, 'thread_id');
  if (threadId) session.threadId = threadId;
  console.log(`${MAGENTA}Agent:${RESET} ${stringField(body, 'content') ?? ''}\n`);
}

// ─── Help ───────────────────────────────────────────────────────

function printHelp(): void {
  console.log(`
${BOLD}Commands:${RESET}
  ${CYAN}/help${RESET}    Show this help
  ${CYAN}/new${RESET}     Start a new conversation thread
  ${CYAN}/quit${RESET}    Exit the chat
  ${CYAN}Ctrl+C${RESET}   Exit the chat
`);
}

// ─── Main Chat Loop ─────────────────────────────────────────────

function ask(rl: Interface, query: string): Promise<string> {
  return new Promise((resolve) => {
    rl.question(query, resolve);
  });
}

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  const config = getConfig({ dotenvPath: DEFAULT_DOTENV_PATH });
  const client: ChatClient = {
    baseUrl: (args.serverUrl ?? config.apiUrl).replace(/\/+$/, ''),
    headers: buildHeaders(config),
    debug: args.debug,
  };

  if (!(await checkServer(client))) {
    console.log(`${RED}Cannot reach the gateway at ${client.baseUrl}.${RESET}`);
    console.log(`${DIM}Is the server running? Try: npm run dev${RESET}`);
    process.exit(1);
  }
  if (args.check) {
    console.log(`${GREEN}Gateway at ${client.baseUrl} is up.${RESET}`);
    return;
  }

  const agentId = args.agentId ?? (await fetchDefaultAgent(client)) ?? config.agents[0]?.id ?? 'Agent-AI';

  console.log(`\n${BOLD}${CYAN}  Agent Gateway · Interactive Chat${RESET}`);
  console.log(`${DIM}  Agent: ${agentId} | ${args.invoke ? 'invoke' : 'stream'} mode${RESET}`);
  console.log(`${DIM}  Type /help for commands, /quit to exit${RESET}\n`);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  rl.on('close', () => {
    console.log(`\n${DIM}Goodbye!${RESET}\n`);
    process.exit(0);
  });

  const session: ChatSession = { midLine: false };
  const send = args.invoke ? invokeMessage : streamMessage;

  for (;;) {
    const cmd = parseCommand(await ask(rl, `${GREEN}You:${RESET} `));

    switch (cmd.type) {
      case 'quit':
        rl.close();
        return;

      case 'new':
        session.threadId = undefined;
        console.log(`${YELLOW}Thread cleared. Starting fresh.${RESET}\n`);
        break;

      case 'help':
        printHelp();
        break;

      case 'message':
        if (!cmd.text) break;
        try {
          await send(client, agentId, cmd.text, session);
        } catch (error) {
          console.log(`${RED}Error: ${error instanceof Error ? error.message : String(error)}${RESET}\n`);
        }
        break;
    }
  }
}

// ─── Entry Point ────────────────────────────────────────────────

// Only run when invoked directly (not when imported for testing)
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((e: unknown) => {
    console.error('Fatal error:', e);
    process.exit(1);
  });
}
