// Game rules validation and defaults

import { z } from 'zod';
import type { GameRules } from '../types/rules.js';

/**
 * Default rules for a new game.
 */
export const DEFAULT_GAME_RULES: GameRules = {
  lineOfSight: { unit: 1, settlement: 2 },
  market: {
    food: 1,
    sugar: 3,
    tobacco: 3,
    cloth: 10,
    tools: 2,
    muskets: 3,
    horses: 2,
  },
  unitUpkeep: 0,
  startingGold: 1000,
  succession: {
    enabled: true,
    minimumTurn: 100,
    strongThreshold: 50,
    weakThreshold: 10,
  },
  victory: {
    lastPlayerStanding: true,
    lastHumanStanding: false,
  },
  aiTimeoutMs: 2000,
  turnTimeoutMs: null,
  integrityCheckInterval: 25,
};

const rulesOverrideSchema = z
  .object({
    lineOfSight: z
      .object({
        unit: z.number().int().min(0).max(10),
        settlement: z.number().int().min(0).max(10),
      })
      .partial(),
    market: z.record(z.number().int().positive()),
    unitUpkeep: z.number().int().min(0),
    startingGold: z.number().int().min(0),
    succession: z
      .object({
        enabled: z.boolean(),
        minimumTurn: z.number().int().min(1),
        strongThreshold: z.number(),
        weakThreshold: z.number(),
      })
      .partial(),
    victory: z
      .object({
        lastPlayerStanding: z.boolean(),
        lastHumanStanding: z.boolean(),
      })
      .partial(),
    aiTimeoutMs: z.number().int().positive(),
    turnTimeoutMs: z.number().int().positive().nullable(),
    integrityCheckInterval: z.number().int().min(0),
  })
  .partial()
  .strict();

/**
 * Partial rules as found in a rules file or a create-game request.
 */
export type GameRulesOverride = z.infer<typeof rulesOverrideSchema>;

export { rulesOverrideSchema };

/**
 * Merge overrides onto the defaults. Nested groups merge field by field;
 * `market` replaces the default price list when given.
 */
export function resolveGameRules(
  overrides: GameRulesOverride = {},
  base: GameRules = DEFAULT_GAME_RULES
): GameRules {
  return {
    lineOfSight: { ...base.lineOfSight, ...overrides.lineOfSight },
    market: overrides.market ?? base.market,
    unitUpkeep: overrides.unitUpkeep ?? base.unitUpkeep,
    startingGold: overrides.startingGold ?? base.startingGold,
    succession: { ...base.succession, ...overrides.succession },
    victory: { ...base.victory, ...overrides.victory },
    aiTimeoutMs: overrides.aiTimeoutMs ?? base.aiTimeoutMs,
    turnTimeoutMs:
      overrides.turnTimeoutMs === undefined ? base.turnTimeoutMs : overrides.turnTimeoutMs,
    integrityCheckInterval: overrides.integrityCheckInterval ?? base.integrityCheckInterval,
  };
}

/**
 * Parse an untrusted rules object (e.g. a JSON rules file) and merge it onto
 * the defaults. Throws a ZodError when the input is malformed.
 */
export function parseGameRules(input: unknown): GameRules {
  return resolveGameRules(rulesOverrideSchema.parse(input));
}
