// Victory conditions

import type { GameEntity, Id, VictoryRules } from '@colonia/protocol';
import type { GameContext } from '../context.js';
import { isAi, isRef, livePlayers } from './players.js';

export type VictoryResult = {
  winnerId: Id | null;
  condition: string;
};

export type VictoryCondition = {
  name: string;

  /**
   * Returns the result when the condition holds, null otherwise.
   */
  check(ctx: GameContext, players: GameEntity[]): VictoryResult | null;
};

/**
 * A single live non-REF player remains among several.
 */
export const lastPlayerStanding: VictoryCondition = {
  name: 'lastPlayerStanding',
  check(ctx, players) {
    const contenders = players.filter((player) => !isRef(player));
    if (contenders.length < 2) return null;
    const alive = livePlayers(ctx).filter((player) => !isRef(player));
    if (alive.length > 1) return null;
    return { winnerId: alive[0]?.id ?? null, condition: 'lastPlayerStanding' };
  },
};

/**
 * A single live human remains among several humans.
 */
export const lastHumanStanding: VictoryCondition = {
  name: 'lastHumanStanding',
  check(ctx, players) {
    const humans = players.filter((player) => !isAi(player) && !isRef(player));
    if (humans.length < 2) return null;
    const alive = livePlayers(ctx).filter((player) => !isAi(player) && !isRef(player));
    if (alive.length !== 1) return null;
    return { winnerId: alive[0].id, condition: 'lastHumanStanding' };
  },
};

export function createVictoryConditions(rules: VictoryRules): VictoryCondition[] {
  const conditions: VictoryCondition[] = [];
  if (rules.lastPlayerStanding) conditions.push(lastPlayerStanding);
  if (rules.lastHumanStanding) conditions.push(lastHumanStanding);
  return conditions;
}
