// Game storage selection
//
// DATABASE_URL -> Postgres, COLONIA_SAVE_DIR -> save bundles, otherwise
// in-memory (lost on restart).

import {
  bundle,
  createInMemoryGameRepository,
  postgres,
  type GameRepository,
} from '@colonia/repositories';
import type { Logger } from '@colonia/runtime';
import type { ServerConfig } from './config.js';

export type GameStorage = {
  repository: GameRepository;
  kind: 'postgres' | 'bundle' | 'memory';
  close(): Promise<void>;
};

export function createGameStorage(config: ServerConfig, logger: Logger): GameStorage {
  if (config.databaseUrl) {
    const { db, close } = postgres.createDatabase({ connectionString: config.databaseUrl });
    logger.info('Using Postgres game storage');
    return {
      repository: new postgres.PgGameRepository(db),
      kind: 'postgres',
      close,
    };
  }

  if (config.saveDir) {
    logger.info('Using save bundle storage', { saveDir: config.saveDir });
    return {
      repository: bundle.createBundleGameRepository(config.saveDir),
      kind: 'bundle',
      close: async () => {},
    };
  }

  logger.warn('No DATABASE_URL or COLONIA_SAVE_DIR set; saved games are kept in memory');
  return {
    repository: createInMemoryGameRepository(),
    kind: 'memory',
    close: async () => {},
  };
}
