import { create_app } from './app.js';
import { config } from './config.js';
import { logger, error_meta } from './lib/logger.js';
import { close_pool } from './db/index.js';
import { run_migrations } from './db/migrate.js';
import { is_gmail_configured } from './services/gmail/client.js';
import { is_ai_available } from './services/ai/openai.js';
import { is_apify_available } from './services/apify.js';

async function main(): Promise<void> {
  await run_migrations();

  const app = create_app();

  const server = app.listen(config.port, () => {
    logger.info('server started', {
      port: config.port,
      node_env: config.node_env,
      gmail: is_gmail_configured(),
      openai: is_ai_available(),
      apify: is_apify_available(),
    });
  });

  function shutdown(): void {
    logger.info('shutting down');
    server.close(() => {
      close_pool()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error('pool close failed', error_meta(err));
          process.exit(1);
        });
    });
  }

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  logger.error('startup failed', error_meta(err));
  process.exit(1);
});
