// Settlements: found_settlement and join_settlement

import {
  See,
  type FoundSettlementParams,
  type GameEntity,
  type JoinSettlementParams,
} from '@colonia/protocol';
import { ValidationError } from '../errors.js';
import { numberAttr } from '../registry/registry.js';
import { distance, isWater, recountPopulation, revealNewTiles } from './map.js';
import { fail, ok, type ActionHandler } from './types.js';

export const DEFAULT_BUILDINGS = ['townHall', 'carpenterHouse'] as const;

// --- Found Settlement ---

export type FoundPlan = {
  unit: GameEntity;
  tile: GameEntity;
  name: string;
};

export const foundSettlementHandler: ActionHandler<FoundSettlementParams, FoundPlan> = {
  verb: 'found_settlement',

  validate(ctx, actor, params) {
    const unit = ctx.registry.requireOwned(params.unitId, actor.id, 'unit');
    const tile = unit.parentId === null ? null : ctx.registry.lookup(unit.parentId);

    if (!tile || tile.kind !== 'tile') {
      return fail(new ValidationError('Unit must stand on a land tile', { field: 'unitId' }));
    }
    if (unit.attributes.naval === true || isWater(tile)) {
      return fail(new ValidationError('Cannot found a settlement here', { field: 'unitId' }));
    }
    if (numberAttr(unit, 'movesLeft') <= 0) {
      return fail(new ValidationError('Unit has no moves left', { field: 'unitId' }));
    }
    if (tile.ownerId !== null && tile.ownerId !== actor.id) {
      return fail(new ValidationError('Land is claimed by another player', { field: 'unitId' }));
    }

    const settlements = ctx.registry.all('settlement');
    for (const other of settlements) {
      const location = ctx.registry.locationOf(other);
      if (location && distance(location, tile) <= 1) {
        return fail(
          new ValidationError('Too close to another settlement', {
            field: 'unitId',
            details: { settlementId: other.id },
          })
        );
      }
    }
    if (settlements.some((other) => other.attributes.name === params.name)) {
      return fail(new ValidationError('Settlement name already taken', { field: 'name' }));
    }

    return ok({ unit, tile, name: params.name });
  },

  execute(ctx, actor, { unit, tile, name }) {
    const before = ctx.knowledge.visibleTiles(actor.id);
    const settlement = ctx.mutate.create(
      {
        kind: 'settlement',
        parentId: tile.id,
        ownerId: actor.id,
        attributes: { name, population: 0 },
      },
      See.perceived()
    );
    for (const buildingType of DEFAULT_BUILDINGS) {
      ctx.mutate.create(
        { kind: 'building', parentId: settlement.id, attributes: { buildingType, level: 1 } },
        See.perceived()
      );
    }
    if (tile.ownerId !== actor.id) {
      ctx.mutate.transfer(tile, actor.id, See.perceived());
    }

    ctx.mutate.move(unit, settlement.id, See.perceived());
    ctx.mutate.set(unit, { movesLeft: 0 }, See.owner());
    recountPopulation(ctx, settlement);
    revealNewTiles(ctx, actor.id, before);
    ctx.logger.info('Settlement founded', { settlementId: settlement.id, playerId: actor.id });
  },
};

// --- Join Settlement ---

export type JoinPlan = {
  unit: GameEntity;
  settlement: GameEntity;
};

export const joinSettlementHandler: ActionHandler<JoinSettlementParams, JoinPlan> = {
  verb: 'join_settlement',

  validate(ctx, actor, params) {
    const unit = ctx.registry.requireOwned(params.unitId, actor.id, 'unit');
    const settlement = ctx.registry.requireOwned(params.settlementId, actor.id, 'settlement');

    if (unit.attributes.naval === true) {
      return fail(new ValidationError('Ships cannot join a settlement', { field: 'unitId' }));
    }
    if (unit.parentId !== settlement.parentId) {
      return fail(
        new ValidationError('Unit must stand on the settlement tile', { field: 'unitId' })
      );
    }
    return ok({ unit, settlement });
  },

  execute(ctx, _actor, { unit, settlement }) {
    ctx.mutate.move(unit, settlement.id, See.perceived());
    recountPopulation(ctx, settlement);
  },
};
