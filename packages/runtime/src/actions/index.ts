// Action handlers by verb

import type { ActionIntent, EndTurnParams, GameEntity } from '@colonia/protocol';
import type { GameContext } from '../context.js';
import { attackHandler } from './combat.js';
import { disbandUnitHandler } from './disband.js';
import { buyGoodsHandler } from './europe.js';
import { moveToAmericaHandler, moveUnitHandler } from './move.js';
import { foundSettlementHandler, joinSettlementHandler } from './settlement.js';
import { ok, prepare, type ActionHandler, type ActionResult, type PreparedAction } from './types.js';

export const endTurnHandler: ActionHandler<EndTurnParams, null> = {
  verb: 'end_turn',
  validate: () => ok(null),
  execute(ctx) {
    ctx.turns.endTurn(ctx);
  },
};

/**
 * Validate an intent for the acting player and bind it for execution.
 */
export function prepareAction(
  ctx: GameContext,
  actor: GameEntity,
  intent: ActionIntent
): ActionResult<PreparedAction> {
  switch (intent.verb) {
    case 'move_unit':
      return prepare(moveUnitHandler, ctx, actor, intent.params);
    case 'attack':
      return prepare(attackHandler, ctx, actor, intent.params);
    case 'found_settlement':
      return prepare(foundSettlementHandler, ctx, actor, intent.params);
    case 'join_settlement':
      return prepare(joinSettlementHandler, ctx, actor, intent.params);
    case 'buy_goods':
      return prepare(buyGoodsHandler, ctx, actor, intent.params);
    case 'move_to_america':
      return prepare(moveToAmericaHandler, ctx, actor, intent.params);
    case 'disband_unit':
      return prepare(disbandUnitHandler, ctx, actor, intent.params);
    case 'end_turn':
      return prepare(endTurnHandler, ctx, actor, intent.params);
  }
}

export {
  attackHandler,
  buyGoodsHandler,
  disbandUnitHandler,
  foundSettlementHandler,
  joinSettlementHandler,
  moveToAmericaHandler,
  moveUnitHandler,
};
export { ok, fail, prepare, type ActionHandler, type ActionResult, type PreparedAction } from './types.js';
