// Turn Engine
//
// awaiting_actions(P) --end_turn--> advancing_turn --> global_events
//   --> awaiting_actions(next live player) | terminated
//
// The current-player pointer only ever lands on live players. Passing the
// end of the join order starts a new turn.

import { See, type Id, type TurnPhase, type TurnState } from '@colonia/protocol';
import type { GameContext } from '../context.js';
import { ReentrancyError } from '../errors.js';
import { isLivePlayer } from '../registry/registry.js';
import type { TurnHook } from './hooks.js';
import type { VictoryCondition, VictoryResult } from './victory.js';

export const VICTORY_MESSAGE = 'model.history.victory';

/**
 * A rule not owned by a single player, evaluated during global events.
 */
export type GlobalRule = {
  name: string;
  run(ctx: GameContext, event: { newTurn: boolean }): void;
};

export type TurnEngineOptions = {
  hooks?: readonly TurnHook[];
  globalRules?: readonly GlobalRule[];
  victory?: readonly VictoryCondition[];
};

export class TurnEngine {
  private turn: number;
  private readonly playerOrder: Id[];
  private phaseState: TurnPhase;
  private advancing = false;
  private readonly hooks: readonly TurnHook[];
  private readonly globalRules: readonly GlobalRule[];
  private readonly victory: readonly VictoryCondition[];

  constructor(state: TurnState, options: TurnEngineOptions = {}) {
    this.turn = state.turn;
    this.playerOrder = [...state.order];
    this.phaseState = state.phase;
    this.hooks = options.hooks ?? [];
    this.globalRules = options.globalRules ?? [];
    this.victory = options.victory ?? [];
  }

  /**
   * Turn state for a new game: turn 1, first player to act.
   */
  static initialState(order: Id[]): TurnState {
    const first = order[0];
    return {
      turn: 1,
      order: [...order],
      phase:
        first === undefined
          ? { kind: 'terminated', winnerId: null }
          : { kind: 'awaiting_actions', playerId: first },
    };
  }

  get turnNumber(): number {
    return this.turn;
  }

  get order(): readonly Id[] {
    return this.playerOrder;
  }

  get phase(): TurnPhase {
    return this.phaseState;
  }

  currentPlayerId(): Id | null {
    return this.phaseState.kind === 'awaiting_actions' ? this.phaseState.playerId : null;
  }

  isTerminated(): boolean {
    return this.phaseState.kind === 'terminated';
  }

  state(): TurnState {
    return { turn: this.turn, order: [...this.playerOrder], phase: { ...this.phaseState } };
  }

  /**
   * End the current player's turn and hand control to the next live player,
   * running new-turn bookkeeping and global rules on the way. A throw part
   * way through still leaves a current player (or a terminated game) behind.
   */
  endTurn(ctx: GameContext): void {
    if (this.advancing) {
      throw new ReentrancyError(ctx.gameId);
    }
    if (this.phaseState.kind === 'terminated') return;

    this.advancing = true;
    const current = this.currentPlayerId();
    let index = current === null ? -1 : this.playerOrder.indexOf(current);
    try {
      let newTurn = false;
      this.phaseState = { kind: 'advancing_turn' };

      for (;;) {
        if (!this.hasLivePlayer(ctx)) {
          this.terminate(ctx, { winnerId: null, condition: 'noPlayersLeft' });
          return;
        }
        index++;
        if (index >= this.playerOrder.length) {
          index = 0;
          newTurn = true;
          this.beginTurn(ctx);
        }
        if (isLivePlayer(ctx.registry.lookup(this.playerOrder[index]))) break;
      }

      this.phaseState = { kind: 'global_events' };
      for (const rule of this.globalRules) {
        try {
          rule.run(ctx, { newTurn });
        } catch (error) {
          ctx.logger.error(`Global rule failed: ${rule.name}`, {
            turn: this.turn,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      }

      const result = this.checkVictory(ctx);
      if (result) {
        this.terminate(ctx, result);
        return;
      }

      // Global rules may have killed the player chosen above.
      this.handOver(ctx, index);
    } catch (error) {
      if (this.phaseState.kind !== 'awaiting_actions' && this.phaseState.kind !== 'terminated') {
        this.handOver(ctx, Math.max(index, 0));
      }
      throw error;
    } finally {
      this.advancing = false;
    }
  }

  checkVictory(ctx: GameContext): VictoryResult | null {
    const players = this.playerOrder.flatMap((id) => {
      const player = ctx.registry.peek(id);
      return player && player.kind === 'player' ? [player] : [];
    });
    for (const condition of this.victory) {
      const result = condition.check(ctx, players);
      if (result) return result;
    }
    return null;
  }

  private beginTurn(ctx: GameContext): void {
    this.turn++;
    ctx.mutate.attribute('turn', this.turn, See.all(), 'trivial');
    for (const id of this.playerOrder) {
      const player = ctx.registry.lookup(id);
      if (!isLivePlayer(player)) continue;
      for (const hook of this.hooks) {
        hook(ctx, player);
      }
    }
    ctx.logger.info('New turn', { turn: this.turn });
  }

  private hasLivePlayer(ctx: GameContext): boolean {
    return this.playerOrder.some((id) => isLivePlayer(ctx.registry.lookup(id)));
  }

  /**
   * Give control to the first live player at or after `from` in join order,
   * or end the game when nobody is left.
   */
  private handOver(ctx: GameContext, from: number): void {
    const count = this.playerOrder.length;
    for (let step = 0; step < count; step++) {
      const playerId = this.playerOrder[(from + step) % count];
      if (isLivePlayer(ctx.registry.lookup(playerId))) {
        this.phaseState = { kind: 'awaiting_actions', playerId };
        ctx.mutate.attribute('currentPlayer', playerId, See.all(), 'state');
        ctx.logger.debug('Turn passed', { turn: this.turn, playerId });
        return;
      }
    }
    this.terminate(ctx, { winnerId: null, condition: 'noPlayersLeft' });
  }

  private terminate(ctx: GameContext, result: VictoryResult): void {
    this.phaseState = { kind: 'terminated', winnerId: result.winnerId };
    ctx.mutate.attribute('winner', result.winnerId, See.all(), 'state');
    ctx.mutate.message(
      See.all(),
      {
        template: VICTORY_MESSAGE,
        args: { condition: result.condition, winner: result.winnerId ?? '' },
        category: 'history',
      },
      result.winnerId
    );
    ctx.logger.info('Game over', { winnerId: result.winnerId, condition: result.condition });
  }
}
