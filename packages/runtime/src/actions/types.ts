// Action handler contract
//
// validate() inspects state and returns a plan or an error; it never
// mutates. execute() applies a validated plan through ctx.mutate.

import type { ActionVerb, GameEntity } from '@colonia/protocol';
import type { GameContext } from '../context.js';
import { GameError } from '../errors.js';

export type ActionResult<T> = { ok: true; value: T } | { ok: false; error: GameError };

export function ok<T>(value: T): ActionResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: GameError): ActionResult<T> {
  return { ok: false, error };
}

export type ActionHandler<P, Plan> = {
  verb: ActionVerb;

  /**
   * Operations that can leave the graph inconsistent (captures, mass
   * transfers) trigger an integrity check after they run.
   */
  suspicious?: boolean;

  validate(ctx: GameContext, actor: GameEntity, params: P): ActionResult<Plan>;
  execute(ctx: GameContext, actor: GameEntity, plan: Plan): void;
};

/**
 * A validated action, ready to run.
 */
export type PreparedAction = {
  verb: ActionVerb;
  suspicious: boolean;
  execute(): void;
};

/**
 * Run validation and bind the resulting plan. Lookup failures thrown by
 * registry helpers during validation are returned as errors.
 */
export function prepare<P, Plan>(
  handler: ActionHandler<P, Plan>,
  ctx: GameContext,
  actor: GameEntity,
  params: P
): ActionResult<PreparedAction> {
  let result: ActionResult<Plan>;
  try {
    result = handler.validate(ctx, actor, params);
  } catch (error) {
    if (error instanceof GameError) return fail(error);
    throw error;
  }
  if (!result.ok) return result;

  const plan = result.value;
  return ok({
    verb: handler.verb,
    suspicious: handler.suspicious ?? false,
    execute: () => handler.execute(ctx, actor, plan),
  });
}
