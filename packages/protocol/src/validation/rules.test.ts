// Tests for game rules parsing

import { describe, it, expect } from 'vitest';
import { DEFAULT_GAME_RULES, parseGameRules, resolveGameRules } from './rules.js';

describe('resolveGameRules', () => {
  it('returns the defaults without overrides', () => {
    expect(resolveGameRules()).toEqual(DEFAULT_GAME_RULES);
  });

  it('merges nested groups field by field', () => {
    const rules = resolveGameRules({ succession: { minimumTurn: 5 }, lineOfSight: { unit: 2 } });

    expect(rules.succession).toEqual({ ...DEFAULT_GAME_RULES.succession, minimumTurn: 5 });
    expect(rules.lineOfSight).toEqual({ unit: 2, settlement: 2 });
  });

  it('replaces the market when given', () => {
    const rules = resolveGameRules({ market: { tools: 4 } });
    expect(rules.market).toEqual({ tools: 4 });
  });

  it('lets turnTimeoutMs be set back to null', () => {
    const base = resolveGameRules({ turnTimeoutMs: 5000 });
    expect(base.turnTimeoutMs).toBe(5000);
    expect(resolveGameRules({ turnTimeoutMs: null }, base).turnTimeoutMs).toBeNull();
    expect(resolveGameRules({}, base).turnTimeoutMs).toBe(5000);
  });
});

describe('parseGameRules', () => {
  it('rejects unknown keys', () => {
    expect(() => parseGameRules({ fogOfWar: false })).toThrow();
  });

  it('rejects negative upkeep', () => {
    expect(() => parseGameRules({ unitUpkeep: -1 })).toThrow();
  });

  it('parses a rules file', () => {
    const rules = parseGameRules({ aiTimeoutMs: 250, victory: { lastHumanStanding: true } });
    expect(rules.aiTimeoutMs).toBe(250);
    expect(rules.victory).toEqual({ lastPlayerStanding: true, lastHumanStanding: true });
  });
});
