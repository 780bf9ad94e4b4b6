// Action request validation
//
// Everything a client sends is parsed here before it reaches a session.
// A request that does not parse is a protocol error, not a rule violation.

import { z } from 'zod';
import type {
  ActionRequest,
  AttackParams,
  BuyGoodsParams,
  DisbandUnitParams,
  EndTurnParams,
  FoundSettlementParams,
  JoinSettlementParams,
  MoveToAmericaParams,
  MoveUnitParams,
} from '../types/actions.js';

const id = z.string().min(1).max(128);

const moveUnitParams = z.object({ unitId: id, toTileId: id });
const attackParams = z.object({ unitId: id, targetTileId: id });
const foundSettlementParams = z.object({ unitId: id, name: z.string().trim().min(1).max(64) });
const joinSettlementParams = z.object({ unitId: id, settlementId: id });
const buyGoodsParams = z.object({
  carrierId: id,
  goodsType: z.string().min(1).max(64),
  amount: z.number().int(),
});
const unitOnlyParams = z.object({ unitId: id });
const endTurnParams = z.object({}).strict();

export const moveUnitParamsSchema: z.ZodType<MoveUnitParams> = moveUnitParams;
export const attackParamsSchema: z.ZodType<AttackParams> = attackParams;
export const foundSettlementParamsSchema: z.ZodType<FoundSettlementParams> = foundSettlementParams;
export const joinSettlementParamsSchema: z.ZodType<JoinSettlementParams> = joinSettlementParams;
export const buyGoodsParamsSchema: z.ZodType<BuyGoodsParams> = buyGoodsParams;
export const moveToAmericaParamsSchema: z.ZodType<MoveToAmericaParams> = unitOnlyParams;
export const disbandUnitParamsSchema: z.ZodType<DisbandUnitParams> = unitOnlyParams;
export const endTurnParamsSchema: z.ZodType<EndTurnParams> = endTurnParams;

const envelope = {
  gameId: id,
  playerId: id,
  seq: z.number().int().positive(),
};

/**
 * Schema for a full action request. Discriminated on `verb`.
 */
export const actionRequestSchema: z.ZodType<ActionRequest> = z.discriminatedUnion('verb', [
  z.object({ ...envelope, verb: z.literal('move_unit'), params: moveUnitParams }),
  z.object({ ...envelope, verb: z.literal('attack'), params: attackParams }),
  z.object({ ...envelope, verb: z.literal('found_settlement'), params: foundSettlementParams }),
  z.object({ ...envelope, verb: z.literal('join_settlement'), params: joinSettlementParams }),
  z.object({ ...envelope, verb: z.literal('buy_goods'), params: buyGoodsParams }),
  z.object({ ...envelope, verb: z.literal('move_to_america'), params: unitOnlyParams }),
  z.object({ ...envelope, verb: z.literal('disband_unit'), params: unitOnlyParams }),
  z.object({ ...envelope, verb: z.literal('end_turn'), params: endTurnParams }),
]);

/**
 * Result of parsing a request
 */
export type ParseActionRequestResult =
  | { success: true; request: ActionRequest }
  | { success: false; issues: { path: string; message: string }[] };

/**
 * Parse an untrusted value into an ActionRequest.
 */
export function parseActionRequest(input: unknown): ParseActionRequestResult {
  const result = actionRequestSchema.safeParse(input);
  if (result.success) {
    return { success: true, request: result.data };
  }
  return {
    success: false,
    issues: result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    })),
  };
}
