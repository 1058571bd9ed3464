import { AppConfig, loadConfig } from './config/environment';
import { createApp } from './app';
import { CommandRouter } from './bot/command-router';
import { TelegramGateway } from './bot/telegram-gateway';
import { GoogleSheetsClient } from './clients/sheets';
import { MaintenanceScheduler } from './services/maintenance-scheduler';
import { QuizEngine } from './services/quiz-engine';
import { SessionRegistry } from './services/session-registry';
import { SheetsVocabularyStore } from './services/vocabulary-store';
import { InvalidConfigError, MissingConfigError, errorMessage } from './utils/errors';
import { logger } from './utils/logger';

async function startBot(config: AppConfig): Promise<void> {
  logger.info('Starting quiz bot...');

  const sheetsClient = new GoogleSheetsClient(config.spreadsheetId, config.credentialsPath);
  const store = new SheetsVocabularyStore(sheetsClient, config.sheets);
  const engine = new QuizEngine(store, new SessionRegistry(), {
    roundSize: config.quiz.roundSize,
    inactivityWindowMs: config.quiz.inactivityWindowMs,
    retry: config.storeRetry
  });

  // No words means nothing to quiz on: fatal
  const count = await engine.loadVocabulary();
  logger.info(`Vocabulary ready (${count} items)`);

  const gateway = new TelegramGateway(config.telegramToken, new CommandRouter(engine));
  const maintenance = new MaintenanceScheduler(engine, reply => gateway.send(reply), config);

  const app = createApp(engine);
  const server = app.listen(config.port, () => {
    logger.info(`Health endpoint listening on port ${config.port}`);
  });

  gateway.start();
  maintenance.start();

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    maintenance.stop();
    try {
      gateway.stop(signal);
    } catch (error) {
      logger.warn('Telegram gateway was not running', { error: errorMessage(error) });
    }
    engine.reconcile()
      .catch(error => logger.error('Final reconciliation failed', { error: errorMessage(error) }))
      .finally(() => server.close(() => process.exit(0)));
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

function main(): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof MissingConfigError || error instanceof InvalidConfigError) {
      logger.error(error.message);
      process.exit(1);
    }
    throw error;
  }

  startBot(config).catch(error => {
    logger.error('Failed to start quiz bot:', { error: errorMessage(error) });
    process.exit(1);
  });
}

if (require.main === module) {
  main();
}
