// Turn types

import type { Id } from './common.js';

/**
 * Turn engine phase.
 */
export type TurnPhase =
  | { kind: 'awaiting_actions'; playerId: Id }
  | { kind: 'advancing_turn' }
  | { kind: 'global_events' }
  | { kind: 'terminated'; winnerId: Id | null };

/**
 * Serializable turn state.
 */
export type TurnState = {
  /**
   * Turn number, starting at 1
   */
  turn: number;

  /**
   * Players in fixed join order
   */
  order: Id[];

  phase: TurnPhase;
};
