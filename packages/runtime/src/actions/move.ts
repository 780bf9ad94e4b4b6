// Movement: move_unit and move_to_america

import {
  See,
  type GameEntity,
  type MoveToAmericaParams,
  type MoveUnitParams,
} from '@colonia/protocol';
import { ValidationError } from '../errors.js';
import { numberAttr } from '../registry/registry.js';
import { distance, isForeignOccupied, isWater, recountPopulation, revealNewTiles } from './map.js';
import { fail, ok, type ActionHandler } from './types.js';

// --- Move Unit ---

export type MovePlan = {
  unit: GameEntity;
  from: GameEntity;
  to: GameEntity;

  /**
   * Set when the unit leaves a settlement it was working in
   */
  leaving: GameEntity | null;
};

export const moveUnitHandler: ActionHandler<MoveUnitParams, MovePlan> = {
  verb: 'move_unit',

  validate(ctx, actor, params) {
    const unit = ctx.registry.requireOwned(params.unitId, actor.id, 'unit');
    const to = ctx.registry.require(params.toTileId, 'tile');
    const from = ctx.registry.locationOf(unit);
    const parent = unit.parentId === null ? null : ctx.registry.lookup(unit.parentId);

    if (!from || !parent || (parent.kind !== 'tile' && parent.kind !== 'settlement')) {
      return fail(new ValidationError('Unit is not on the map', { field: 'unitId' }));
    }
    if (numberAttr(unit, 'movesLeft') <= 0) {
      return fail(new ValidationError('Unit has no moves left', { field: 'unitId' }));
    }
    if (distance(from, to) !== 1) {
      return fail(
        new ValidationError('Destination is not adjacent', {
          field: 'toTileId',
          details: { from: from.id, to: to.id },
        })
      );
    }
    if (isWater(to) !== (unit.attributes.naval === true)) {
      return fail(new ValidationError('Unit cannot enter that terrain', { field: 'toTileId' }));
    }
    if (isForeignOccupied(ctx, to, actor.id)) {
      return fail(new ValidationError('Destination is occupied', { field: 'toTileId' }));
    }
    return ok({ unit, from, to, leaving: parent.kind === 'settlement' ? parent : null });
  },

  execute(ctx, actor, { unit, from, to, leaving }) {
    const before = ctx.knowledge.visibleTiles(actor.id);
    ctx.mutate.move(unit, to.id, See.perceived());
    ctx.mutate.set(unit, { movesLeft: numberAttr(unit, 'movesLeft') - 1 }, See.owner());
    if (leaving) recountPopulation(ctx, leaving);
    ctx.mutate.touch(from, See.perceived());
    ctx.mutate.touch(to, See.perceived());
    revealNewTiles(ctx, actor.id, before);
  },
};

// --- Move To America ---

export type SailPlan = {
  unit: GameEntity;
  entry: GameEntity;
};

export const moveToAmericaHandler: ActionHandler<MoveToAmericaParams, SailPlan> = {
  verb: 'move_to_america',

  validate(ctx, actor, params) {
    const unit = ctx.registry.requireOwned(params.unitId, actor.id, 'unit');
    const parent = unit.parentId === null ? null : ctx.registry.lookup(unit.parentId);
    if (!parent || parent.kind !== 'europe') {
      return fail(new ValidationError('Unit is not in Europe', { field: 'unitId' }));
    }
    if (unit.attributes.naval !== true) {
      return fail(new ValidationError('Only ships can sail to America', { field: 'unitId' }));
    }
    const entry = ctx.registry.resolveRef(actor, 'entryLocation');
    if (!entry || entry.kind !== 'tile') {
      return fail(new ValidationError('Player has no entry location'));
    }
    if (isForeignOccupied(ctx, entry, actor.id)) {
      return fail(new ValidationError('Entry location is occupied'));
    }
    return ok({ unit, entry });
  },

  execute(ctx, actor, { unit, entry }) {
    const before = ctx.knowledge.visibleTiles(actor.id);
    ctx.mutate.move(unit, entry.id, See.perceived());
    ctx.mutate.set(unit, { movesLeft: 0 }, See.owner());
    ctx.mutate.touch(entry, See.perceived());
    revealNewTiles(ctx, actor.id, before);
  },
};
