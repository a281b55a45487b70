import { buildApp } from './app.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { createServices } from './services.js';

const SESSION_PRUNE_INTERVAL_MS = 60_000;

async function main() {
  const logger = createLogger();
  logger.info('prompt-shield starting...');

  const config = loadConfig();
  const services = createServices(config, logger);
  const app = await buildApp(services, logger);

  process.on('SIGHUP', () => {
    try {
      services.policies.reload(services.policySource);
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Policy reload failed; keeping the active policy');
    }
  });

  const pruner = setInterval(() => {
    const removed = services.sessions.prune();
    if (removed > 0) logger.debug({ removed }, 'Expired sessions pruned');
  }, SESSION_PRUNE_INTERVAL_MS);
  pruner.unref();

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutting down');
    clearInterval(pruner);
    await app.close();
    process.exit(0);
  };
  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ error: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info(`prompt-shield listening on ${config.server.host}:${config.server.port}`);
  } catch (err) {
    logger.error(err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(errorMessage(err));
  process.exit(1);
});
