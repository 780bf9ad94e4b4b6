// Trade in Europe: buy_goods

import { See, type BuyGoodsParams, type GameEntity } from '@colonia/protocol';
import { ValidationError } from '../errors.js';
import { numberAttr, stringAttr } from '../registry/registry.js';
import { fail, ok, type ActionHandler } from './types.js';

/**
 * Goods one cargo slot holds.
 */
export const SLOT_CAPACITY = 100;

export type BuyPlan = {
  carrier: GameEntity;
  goodsType: string;
  amount: number;
  price: number;
};

export const buyGoodsHandler: ActionHandler<BuyGoodsParams, BuyPlan> = {
  verb: 'buy_goods',

  validate(ctx, actor, params) {
    const carrier = ctx.registry.requireOwned(params.carrierId, actor.id, 'unit');
    const slots = numberAttr(carrier, 'cargoSlots');
    if (slots <= 0) {
      return fail(new ValidationError('Unit cannot carry goods', { field: 'carrierId' }));
    }

    const parent = carrier.parentId === null ? null : ctx.registry.lookup(carrier.parentId);
    if (!parent || parent.kind !== 'europe') {
      return fail(new ValidationError('Carrier is not in Europe', { field: 'carrierId' }));
    }

    const unitPrice = Object.hasOwn(ctx.rules.market, params.goodsType)
      ? ctx.rules.market[params.goodsType]
      : undefined;
    if (typeof unitPrice !== 'number') {
      return fail(
        new ValidationError(`Unknown goods type: ${params.goodsType}`, { field: 'goodsType' })
      );
    }
    if (params.amount <= 0 || params.amount > SLOT_CAPACITY) {
      return fail(
        new ValidationError(`Amount must be between 1 and ${SLOT_CAPACITY}`, { field: 'amount' })
      );
    }

    const cargo = ctx.registry.children(carrier.id);
    const load = cargo.reduce(
      (sum, entity) => sum + (entity.kind === 'goods' ? numberAttr(entity, 'amount') : SLOT_CAPACITY),
      0
    );
    if (load + params.amount > slots * SLOT_CAPACITY) {
      return fail(new ValidationError('Not enough cargo space', { field: 'amount' }));
    }

    const price = unitPrice * params.amount;
    if (numberAttr(actor, 'gold') < price) {
      return fail(
        new ValidationError('Not enough gold', {
          field: 'amount',
          details: { price, gold: numberAttr(actor, 'gold') },
        })
      );
    }

    return ok({ carrier, goodsType: params.goodsType, amount: params.amount, price });
  },

  execute(ctx, actor, { carrier, goodsType, amount, price }) {
    const existing = ctx.registry
      .children(carrier.id, 'goods')
      .find((goods) => stringAttr(goods, 'goodsType') === goodsType);

    if (existing) {
      ctx.mutate.set(existing, { amount: numberAttr(existing, 'amount') + amount }, See.owner());
    } else {
      ctx.mutate.create(
        { kind: 'goods', parentId: carrier.id, attributes: { goodsType, amount } },
        See.owner()
      );
    }
    ctx.mutate.set(actor, { gold: numberAttr(actor, 'gold') - price }, See.owner());
  },
};
