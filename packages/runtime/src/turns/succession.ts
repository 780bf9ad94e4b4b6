// Succession - the one-off power transfer between AI players
//
// Once some player has grown strong enough, the weakest AI player cedes its
// missions, settlements, tiles and units to the strongest AI player and is
// removed from the game. Fires at most once per game.

import { See, type GameEntity, type Id } from '@colonia/protocol';
import type { GameContext } from '../context.js';
import { numberAttr, type EntityRegistry } from '../registry/registry.js';
import type { GlobalRule } from './engine.js';
import { europeOf, isAi, isRef, killPlayer, livePlayers, playerName } from './players.js';

export const SUCCESSION_MESSAGE = 'model.diplomacy.succession';

/**
 * Strength of a player. Higher is stronger.
 */
export type ScoringPolicy = (registry: EntityRegistry, player: GameEntity) => number;

/**
 * Settlement population plus number of units.
 */
export const defaultScoring: ScoringPolicy = (registry, player) => {
  const population = registry
    .ownedBy(player.id, 'settlement')
    .reduce((sum, settlement) => sum + numberAttr(settlement, 'population'), 0);
  return population + registry.ownedBy(player.id, 'unit').length;
};

export type SuccessionPair = {
  weaker: GameEntity;
  stronger: GameEntity;
  scores: Record<Id, number>;
};

/**
 * Pick the ceding and receiving players, or null when the rule does not
 * apply this turn. Ties go to the player earlier in join order.
 */
export function selectSuccession(
  ctx: GameContext,
  turn: number,
  scoring: ScoringPolicy = defaultScoring
): SuccessionPair | null {
  const rules = ctx.rules.succession;
  if (!rules.enabled) return null;
  if (ctx.game.attributes.successionFired === true) return null;
  if (turn < rules.minimumTurn) return null;

  const contenders = livePlayers(ctx).filter((player) => !isRef(player));
  const scores: Record<Id, number> = {};
  for (const player of contenders) {
    scores[player.id] = scoring(ctx.registry, player);
  }
  if (!contenders.some((player) => scores[player.id] >= rules.strongThreshold)) {
    return null;
  }

  let weaker: GameEntity | null = null;
  let stronger: GameEntity | null = null;
  for (const player of contenders.filter(isAi)) {
    const score = scores[player.id];
    if (score <= rules.weakThreshold && (weaker === null || score < scores[weaker.id])) {
      weaker = player;
    }
    if (stronger === null || score > scores[stronger.id]) {
      stronger = player;
    }
  }

  if (!weaker || !stronger || weaker.id === stronger.id) return null;
  return { weaker, stronger, scores };
}

/**
 * Move everything the weaker player holds to the stronger one, then kill
 * the weaker player.
 */
export function applySuccession(ctx: GameContext, pair: SuccessionPair): void {
  const { weaker, stronger } = pair;
  const { registry, mutate } = ctx;
  const towardsStronger = See.anyOf(See.perceived(), See.only(stronger.id));

  for (const mission of registry.ownedBy(weaker.id, 'mission')) {
    mutate.transfer(mission, stronger.id, towardsStronger);
  }

  for (const settlement of registry.ownedBy(weaker.id, 'settlement')) {
    mutate.transfer(settlement, stronger.id, See.perceived());
    for (const building of registry.children(settlement.id, 'building')) {
      if (building.ownerId === weaker.id) {
        mutate.transfer(building, stronger.id, See.perceived());
      }
    }
  }
  for (const tile of registry.ownedBy(weaker.id, 'tile')) {
    mutate.transfer(tile, stronger.id, See.perceived());
  }

  const fromEurope = europeOf(ctx, weaker.id);
  const toEurope = europeOf(ctx, stronger.id);
  for (const unit of registry.ownedBy(weaker.id, 'unit')) {
    mutate.transfer(unit, stronger.id, towardsStronger);
    if (fromEurope && toEurope && unit.parentId === fromEurope.id) {
      mutate.move(unit, toEurope.id, See.owner());
    }
  }

  mutate.message(See.all(), {
    template: SUCCESSION_MESSAGE,
    args: { loserNation: playerName(weaker), nation: playerName(stronger) },
    category: 'diplomacy',
  });
  mutate.set(ctx.game, { successionFired: true }, See.all());
  killPlayer(ctx, weaker);

  ctx.logger.info('Succession', {
    weakerId: weaker.id,
    strongerId: stronger.id,
    scores: pair.scores,
  });
}

/**
 * Global rule running the succession check at the start of each new turn.
 */
export function createSuccessionRule(scoring: ScoringPolicy = defaultScoring): GlobalRule {
  return {
    name: 'succession',
    run(ctx, event) {
      if (!event.newTurn) return;
      const pair = selectSuccession(ctx, ctx.turns.turnNumber, scoring);
      if (pair) applySuccession(ctx, pair);
    },
  };
}
