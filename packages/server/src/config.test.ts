import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';
import { DEFAULT_GAME_RULES } from '@colonia/protocol';
import { loadConfig, loadRules } from './config.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      databaseUrl: undefined,
      saveDir: undefined,
      rulesPath: undefined,
      nodeEnv: 'development',
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      PORT: '8080',
      DATABASE_URL: 'postgres://localhost:5432/colonia',
      COLONIA_SAVE_DIR: './saves',
      COLONIA_RULES: './rules.json',
      NODE_ENV: 'production',
    });

    expect(config).toEqual({
      port: 8080,
      databaseUrl: 'postgres://localhost:5432/colonia',
      saveDir: './saves',
      rulesPath: './rules.json',
      nodeEnv: 'production',
    });
  });

  it('rejects a bad port', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow();
    expect(() => loadConfig({ PORT: '70000' })).toThrow();
  });
});

describe('loadRules', () => {
  it('uses the defaults without a rules file', async () => {
    expect(await loadRules(loadConfig({}))).toEqual(DEFAULT_GAME_RULES);
  });

  it('merges a rules file onto the defaults', async () => {
    const rulesPath = fileURLToPath(new URL('./fixtures/test-rules.json', import.meta.url));
    const rules = await loadRules({ ...loadConfig({}), rulesPath });

    expect(rules.unitUpkeep).toBe(2);
    expect(rules.turnTimeoutMs).toBe(60000);
    expect(rules.succession).toEqual({ ...DEFAULT_GAME_RULES.succession, minimumTurn: 40 });
    expect(rules.market).toEqual(DEFAULT_GAME_RULES.market);
  });
});
