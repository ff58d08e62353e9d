import { config } from './config';
import { loadScoringConfig } from './config/llm';
import createApp from './app';
import { createLmScore } from './services/lmScore';
import { logger } from './lib/logger';

async function main() {
  const scoringConfig = loadScoringConfig();
  const lmScore = createLmScore(scoringConfig);
  const app = createApp({ lmScore, config: scoringConfig });
  const server = app.listen(config.port, () => {
    logger.info(
      {
        port: config.port,
        baseUrl: scoringConfig.endpoint.baseUrl,
        model: scoringConfig.endpoint.model,
        ensemble: scoringConfig.ensemble,
        aggregation: scoringConfig.aggregation,
        thinking: scoringConfig.thinkingEnabled
      },
      'server listening'
    );
  });

  const shutdown = async (signal?: string) => {
    logger.info({ signal }, 'shutting down');
    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err?: Error) => {
          if (err) return reject(err);
          resolve();
        });
      });
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'unhandledRejection');
  });
}

main().catch((err) => {
  logger.error({ err }, 'failed to start');
  process.exit(1);
});
