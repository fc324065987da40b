import 'dotenv/config';
import { createLogger } from '@/observability/index.js';
import { isDev, loadSettings } from '@/config/index.js';
import { createProvider } from '@/providers/index.js';
import { ASSISTANT_AGENT_ID, createAgentRegistry, createAssistantAgent } from '@/agents/index.js';
import { createServer } from '@/api/index.js';

async function start(): Promise<void> {
  const settingsResult = loadSettings();
  if (!settingsResult.ok) {
    createLogger().fatal('Invalid settings', {
      component: 'main',
      error: settingsResult.error.message,
    });
    process.exit(1);
  }
  const settings = settingsResult.value;
  const logger = createLogger({ level: settings.logLevel, pretty: isDev(settings) });

  try {
    const provider = createProvider(settings.provider);
    const assistant = await createAssistantAgent({
      provider,
      maxSteps: settings.agentMaxSteps,
      temperature: settings.provider.temperature ?? 0.5,
      maxOutputTokens: settings.provider.maxOutputTokens ?? 1024,
      logger,
    });
    const agentRegistry = createAgentRegistry([assistant], { defaultAgentId: ASSISTANT_AGENT_ID });

    const server = await createServer({
      agentRegistry,
      logger,
      settings,
      corsOrigin: settings.corsOrigin,
    });

    // Graceful shutdown
    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...', { component: 'main' });
      await server.close();
    };

    process.on('SIGTERM', () => void shutdown());
    process.on('SIGINT', () => void shutdown());

    await server.listen({ port: settings.port, host: settings.host });
    logger.info(`Server listening on ${settings.host}:${String(settings.port)}`, {
      component: 'main',
      mode: settings.mode,
      provider: settings.provider.provider,
      model: settings.provider.model,
    });
  } catch (err: unknown) {
    logger.fatal('Failed to start server', {
      component: 'main',
      error: err instanceof Error ? err.message : String(err),
    });
    process.exit(1);
  }
}

void start();
