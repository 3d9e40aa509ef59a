// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { loadPrompt } from './utils/resources.js';
import { ClaudeAdapter } from './adapters/llm/ClaudeAdapter.js';
import { DisabledLLMAdapter } from './adapters/llm/DisabledLLMAdapter.js';
import { LoggingAnalyticsAdapter } from './adapters/analytics/LoggingAnalyticsAdapter.js';
import { closeDatabase, getDatabase } from './persistence/database.js';
import { RoundRepository } from './persistence/repositories/RoundRepository.js';
import { ShotRepository } from './persistence/repositories/ShotRepository.js';
import { MissPatternRepository } from './persistence/repositories/MissPatternRepository.js';
import { IntentRegistry } from './core/registry/IntentRegistry.js';
import { createAssistantFactory } from './core/assistant/createAssistant.js';
import { SessionRegistry } from './core/assistant/SessionRegistry.js';
import { scheduleSessionSweep } from './scheduler/index.js';
import { startServer } from './server.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  logger.info('Starting caddie intent engine');

  try {
    const config = loadConfig();

    const llmAdapter = config.anthropicApiKey ? new ClaudeAdapter(config) : new DisabledLLMAdapter();
    if (!config.anthropicApiKey) {
      logger.warn('ANTHROPIC_API_KEY is not set; classification requests will fail');
    }

    const db = getDatabase(config.databasePath);
    const registry = IntentRegistry.load();

    // Load prompts
    const personaPrompt = await loadPrompt('caddie_persona.md');
    const responseTemplate = await loadPrompt('route_response.md');

    const factory = createAssistantFactory({
      llmPort: llmAdapter,
      analytics: new LoggingAnalyticsAdapter(),
      registry,
      rounds: new RoundRepository(db),
      shots: new ShotRepository(db),
      patterns: new MissPatternRepository(db),
      personaPrompt,
      responseTemplate,
      classifierTimeoutMs: config.classifierTimeoutMs,
      responseTimeoutMs: config.responseTimeoutMs,
    });
    const sessions = new SessionRegistry(factory);

    const sweep = scheduleSessionSweep(sessions, config.sessionSweepCron, config.sessionIdleMinutes, config.timezone);

    const server = await startServer(sessions, config.port, config.host);

    logger.info({ host: config.host, port: config.port }, 'Server started successfully');

    const shutdown = (signal: string) => {
      logger.info({ signal }, 'Shutting down');
      sweep.stop();
      server.close((error) => {
        if (error) {
          logger.error({ error }, 'HTTP server did not close cleanly');
        }
        closeDatabase();
        process.exit(error ? 1 : 0);
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    logger.error({ error }, 'Failed to start application');
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('Unhandled error:', error);
  process.exit(1);
});
