// Standalone HTTP entry point

import { createHTTPServer } from '@trpc/server/adapters/standalone';
import { consoleLogger } from '@colonia/runtime';
import { loadConfig, loadRules } from './config.js';
import { SessionManager } from './sessions/manager.js';
import { createGameStorage } from './storage.js';
import { createContext } from './trpc/context.js';
import { appRouter } from './trpc/routers/index.js';

async function main(): Promise<void> {
  const logger = consoleLogger;
  const config = loadConfig();
  const rules = await loadRules(config);
  const storage = createGameStorage(config, logger);
  const manager = new SessionManager({ repository: storage.repository, rules, logger });

  const server = createHTTPServer({
    router: appRouter,
    createContext: ({ req }) =>
      createContext({ headers: req.headers, manager, logger, nodeEnv: config.nodeEnv }),
    onError: ({ error, path }) => {
      if (error.code === 'INTERNAL_SERVER_ERROR') {
        logger.error('Request failed', { path, error: error.message });
      }
    },
  });

  server.listen(config.port);
  logger.info('Server listening', { port: config.port, storage: storage.kind });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    manager.close();
    server.server.close();
    storage.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Storage close failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  consoleLogger.error('Startup failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
