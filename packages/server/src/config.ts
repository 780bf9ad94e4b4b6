// Server configuration
//
// Read once from the environment at startup. Rules come from an optional
// JSON file merged onto the defaults.

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { parseGameRules, DEFAULT_GAME_RULES, type GameRules } from '@colonia/protocol';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DATABASE_URL: z.string().url().optional(),
  COLONIA_SAVE_DIR: z.string().min(1).optional(),
  COLONIA_RULES: z.string().min(1).optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ServerConfig = {
  port: number;

  /** Postgres connection string; takes precedence over saveDir */
  databaseUrl?: string;

  /** Directory of save bundles */
  saveDir?: string;

  /** Path to a rules JSON file */
  rulesPath?: string;

  nodeEnv: 'development' | 'production' | 'test';
};

/**
 * Parse the environment. Throws a ZodError naming every bad variable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    saveDir: parsed.COLONIA_SAVE_DIR,
    rulesPath: parsed.COLONIA_RULES,
    nodeEnv: parsed.NODE_ENV,
  };
}

/**
 * Default rules for new games on this server.
 */
export async function loadRules(config: ServerConfig): Promise<GameRules> {
  if (!config.rulesPath) return DEFAULT_GAME_RULES;
  const content = await readFile(config.rulesPath, 'utf-8');
  return parseGameRules(JSON.parse(content));
}
