// disband_unit

import type { DisbandUnitParams, GameEntity } from '@colonia/protocol';
import { recountPopulation } from './map.js';
import { ok, type ActionHandler } from './types.js';

export type DisbandPlan = {
  unit: GameEntity;
  settlement: GameEntity | null;
};

export const disbandUnitHandler: ActionHandler<DisbandUnitParams, DisbandPlan> = {
  verb: 'disband_unit',

  validate(ctx, actor, params) {
    const unit = ctx.registry.requireOwned(params.unitId, actor.id, 'unit');
    const parent = unit.parentId === null ? null : ctx.registry.lookup(unit.parentId);
    return ok({ unit, settlement: parent?.kind === 'settlement' ? parent : null });
  },

  execute(ctx, actor, { unit, settlement }) {
    ctx.mutate.dispose(unit);
    if (settlement) recountPopulation(ctx, settlement);
    ctx.logger.debug('Unit disbanded', { unitId: unit.id, playerId: actor.id });
  },
};
