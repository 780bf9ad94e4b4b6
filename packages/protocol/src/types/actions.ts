// Action types - requests from clients and AI players, and their replies

import type { Id } from './common.js';
import type { ChangeBatch } from './wire.js';

/**
 * Verbs a player can submit.
 */
export type ActionVerb =
  | 'move_unit'
  | 'attack'
  | 'found_settlement'
  | 'join_settlement'
  | 'buy_goods'
  | 'move_to_america'
  | 'disband_unit'
  | 'end_turn';

export type MoveUnitParams = {
  unitId: Id;
  toTileId: Id;
};

export type AttackParams = {
  unitId: Id;
  targetTileId: Id;
};

export type FoundSettlementParams = {
  unitId: Id;
  name: string;
};

export type JoinSettlementParams = {
  unitId: Id;
  settlementId: Id;
};

export type BuyGoodsParams = {
  carrierId: Id;
  goodsType: string;
  amount: number;
};

export type MoveToAmericaParams = {
  unitId: Id;
};

export type DisbandUnitParams = {
  unitId: Id;
};

export type EndTurnParams = Record<string, never>;

/**
 * Maps each verb to its parameter shape.
 */
export type ActionParamsMap = {
  move_unit: MoveUnitParams;
  attack: AttackParams;
  found_settlement: FoundSettlementParams;
  join_settlement: JoinSettlementParams;
  buy_goods: BuyGoodsParams;
  move_to_america: MoveToAmericaParams;
  disband_unit: DisbandUnitParams;
  end_turn: EndTurnParams;
};

/**
 * A verb with its parameters, as produced by an AI planner or a client.
 */
export type ActionIntent = {
  [V in ActionVerb]: { verb: V; params: ActionParamsMap[V] };
}[ActionVerb];

/**
 * An action as submitted over the wire.
 */
export type ActionRequest = ActionIntent & {
  gameId: Id;
  playerId: Id;

  /**
   * Per-player request counter; must increase by exactly one.
   */
  seq: number;
};

/**
 * Error codes a rejection can carry.
 */
export type RejectionCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'OWNERSHIP_ERROR'
  | 'NOT_YOUR_TURN'
  | 'PROTOCOL_ERROR'
  | 'GAME_TERMINATED'
  | 'REENTRANT_ADVANCE'
  | 'INTERNAL_ERROR';

/**
 * Structured rejection, delivered only to the submitter.
 * Receiving one never alters the client's local state.
 */
export type Rejection = {
  code: RejectionCode;
  message: string;
  field?: string;
  details?: Record<string, unknown>;
};

export type ActionResponse =
  | { ok: true; batch: ChangeBatch }
  | { ok: false; rejection: Rejection };
