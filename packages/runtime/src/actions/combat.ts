// Combat: attack
//
// Resolution is deterministic: the attacker wins when its offence exceeds
// the defender's defence (plus one inside a settlement). The loser is
// disposed. An attack on a tile left without defenders captures the
// settlement standing there.

import { See, type AttackParams, type GameEntity, type Id } from '@colonia/protocol';
import type { GameContext } from '../context.js';
import { ValidationError } from '../errors.js';
import { numberAttr, stringAttr } from '../registry/registry.js';
import { distance, recountPopulation, revealNewTiles, settlementOn, unitsOn } from './map.js';
import { fail, ok, type ActionHandler } from './types.js';

export const SETTLEMENT_DEFENCE_BONUS = 1;

export type AttackPlan = {
  attacker: GameEntity;
  tile: GameEntity;
  defender: GameEntity | null;
  settlement: GameEntity | null;
  defenderOwnerId: Id | null;
};

/**
 * Strongest defender on the tile. Ties keep the first unit in containment
 * order: depth first, children in the order they arrived.
 */
function chooseDefender(ctx: GameContext, tile: GameEntity, attackerOwner: Id): GameEntity | null {
  let best: GameEntity | null = null;
  for (const unit of unitsOn(ctx, tile)) {
    if (ctx.registry.ownerOf(unit) === attackerOwner) continue;
    if (best === null || defenceOf(ctx, unit) > defenceOf(ctx, best)) best = unit;
  }
  return best;
}

function defenceOf(ctx: GameContext, unit: GameEntity): number {
  const parent = unit.parentId === null ? null : ctx.registry.lookup(unit.parentId);
  const bonus = parent?.kind === 'settlement' ? SETTLEMENT_DEFENCE_BONUS : 0;
  return numberAttr(unit, 'defence', 1) + bonus;
}

export const attackHandler: ActionHandler<AttackParams, AttackPlan> = {
  verb: 'attack',
  suspicious: true,

  validate(ctx, actor, params) {
    const attacker = ctx.registry.requireOwned(params.unitId, actor.id, 'unit');
    const tile = ctx.registry.require(params.targetTileId, 'tile');
    const from = ctx.registry.locationOf(attacker);

    if (numberAttr(attacker, 'offence') <= 0) {
      return fail(new ValidationError('Unit cannot attack', { field: 'unitId' }));
    }
    if (!from || attacker.parentId !== from.id) {
      return fail(new ValidationError('Unit is not on the map', { field: 'unitId' }));
    }
    if (numberAttr(attacker, 'movesLeft') <= 0) {
      return fail(new ValidationError('Unit has no moves left', { field: 'unitId' }));
    }
    if (distance(from, tile) !== 1) {
      return fail(new ValidationError('Target is not adjacent', { field: 'targetTileId' }));
    }

    const defender = chooseDefender(ctx, tile, actor.id);
    const found = settlementOn(ctx, tile);
    const settlement = found && ctx.registry.ownerOf(found) !== actor.id ? found : null;
    if (!defender && !settlement) {
      return fail(new ValidationError('Nothing to attack', { field: 'targetTileId' }));
    }

    const target = defender ?? settlement;
    return ok({
      attacker,
      tile,
      defender,
      settlement,
      defenderOwnerId: target ? ctx.registry.ownerOf(target) : null,
    });
  },

  execute(ctx, actor, plan) {
    const { attacker, tile, defender, settlement, defenderOwnerId } = plan;
    const parties = defenderOwnerId ? [actor.id, defenderOwnerId] : [actor.id];
    ctx.mutate.set(attacker, { movesLeft: 0 }, See.owner());

    if (defender) {
      const offence = numberAttr(attacker, 'offence');
      const defence = defenceOf(ctx, defender);
      const defenderParent = defender.parentId === null ? null : ctx.registry.lookup(defender.parentId);

      if (offence <= defence) {
        ctx.mutate.message(
          See.only(...parties),
          {
            template: 'model.combat.attackerLoses',
            args: { attacker: attacker.id, defender: defender.id },
            category: 'combat',
          },
          defender.id
        );
        ctx.mutate.dispose(attacker);
        ctx.logger.debug('Attack repelled', { attackerId: attacker.id, defenderId: defender.id });
        return;
      }

      ctx.mutate.message(
        See.only(...parties),
        {
          template: 'model.combat.defenderLoses',
          args: { attacker: attacker.id, defender: defender.id },
          category: 'combat',
        },
        attacker.id
      );
      ctx.mutate.dispose(defender);
      if (defenderParent?.kind === 'settlement') recountPopulation(ctx, defenderParent);
      ctx.logger.debug('Attack won', { attackerId: attacker.id, defenderId: defender.id });
    }

    if (settlement && chooseDefender(ctx, tile, actor.id) === null) {
      captureSettlement(ctx, actor, attacker, settlement, tile);
    }
  },
};

/**
 * Hand an undefended settlement to the attacking player. Units working
 * inside it change sides with it.
 */
function captureSettlement(
  ctx: GameContext,
  actor: GameEntity,
  attacker: GameEntity,
  settlement: GameEntity,
  tile: GameEntity
): void {
  const previousOwner = ctx.registry.ownerOf(settlement);
  const before = ctx.knowledge.visibleTiles(actor.id);
  const see = previousOwner
    ? See.anyOf(See.perceived(), See.only(actor.id, previousOwner))
    : See.anyOf(See.perceived(), See.only(actor.id));

  ctx.mutate.transfer(settlement, actor.id, see);
  for (const entity of ctx.registry.descendants(settlement.id)) {
    if (entity.ownerId !== null) ctx.mutate.transfer(entity, actor.id, see);
  }
  if (previousOwner !== null && tile.ownerId === previousOwner) {
    ctx.mutate.transfer(tile, actor.id, See.perceived());
  }
  ctx.mutate.move(attacker, tile.id, See.perceived());
  ctx.mutate.message(
    previousOwner ? See.only(actor.id, previousOwner) : See.only(actor.id),
    {
      template: 'model.combat.settlementCaptured',
      args: { settlement: stringAttr(settlement, 'name', settlement.id) },
      category: 'combat',
    },
    settlement.id
  );
  revealNewTiles(ctx, actor.id, before);
  ctx.logger.info('Settlement captured', {
    settlementId: settlement.id,
    from: previousOwner,
    to: actor.id,
  });
}
