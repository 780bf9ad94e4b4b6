// Player helpers shared by turn rules and actions

import { See, type GameEntity, type Id } from '@colonia/protocol';
import type { GameContext } from '../context.js';
import { isLivePlayer, stringAttr } from '../registry/registry.js';

/**
 * Players in join order, live ones only.
 */
export function livePlayers(ctx: GameContext): GameEntity[] {
  return ctx.turns.order
    .map((id) => ctx.registry.lookup(id))
    .filter((player): player is GameEntity => isLivePlayer(player));
}

export function isAi(player: GameEntity): boolean {
  return player.attributes.isAI === true;
}

/**
 * Royal expeditionary force players take no part in scoring or victory.
 */
export function isRef(player: GameEntity): boolean {
  return player.attributes.isREF === true;
}

export function playerName(player: GameEntity): string {
  return stringAttr(player, 'name', player.id);
}

/**
 * The player's europe entity, if it still has one.
 */
export function europeOf(ctx: GameContext, playerId: Id): GameEntity | null {
  return ctx.registry.children(playerId, 'europe')[0] ?? null;
}

/**
 * Kill a player: claimed tiles are released, everything else it still owns
 * is disposed, and it is marked dead. The player entity itself stays so
 * that old references keep resolving.
 */
export function killPlayer(ctx: GameContext, player: GameEntity): void {
  for (const entity of ctx.registry.ownedBy(player.id)) {
    if (entity.kind === 'tile') {
      ctx.mutate.transfer(entity, null, See.perceived());
    } else {
      ctx.mutate.dispose(entity);
    }
  }
  for (const child of ctx.registry.children(player.id)) {
    ctx.mutate.dispose(child);
  }
  ctx.mutate.set(player, { dead: true }, See.all());
  ctx.logger.info('Player killed', { playerId: player.id });
}
