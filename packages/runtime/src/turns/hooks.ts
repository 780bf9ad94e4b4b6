// Per-player new-turn bookkeeping

import { See, type GameEntity } from '@colonia/protocol';
import type { GameContext } from '../context.js';
import { numberAttr } from '../registry/registry.js';

/**
 * Runs once per live player whenever a new turn starts.
 */
export type TurnHook = (ctx: GameContext, player: GameEntity) => void;

/**
 * Restore every unit's movement points.
 */
export const resetMovesHook: TurnHook = (ctx, player) => {
  for (const unit of ctx.registry.ownedBy(player.id, 'unit')) {
    ctx.mutate.set(unit, { movesLeft: numberAttr(unit, 'moves', 1) }, See.owner());
  }
};

/**
 * Charge unit upkeep against the player's gold. Gold never goes below zero.
 */
export const upkeepHook: TurnHook = (ctx, player) => {
  const cost = ctx.rules.unitUpkeep * ctx.registry.ownedBy(player.id, 'unit').length;
  if (cost === 0) return;
  const gold = Math.max(0, numberAttr(player, 'gold') - cost);
  ctx.mutate.set(player, { gold }, See.owner());
};

export const DEFAULT_TURN_HOOKS: readonly TurnHook[] = [resetMovesHook, upkeepHook];
