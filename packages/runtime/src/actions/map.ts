// Map helpers shared by action handlers

import { See, type GameEntity, type Id } from '@colonia/protocol';
import type { GameContext } from '../context.js';
import { numberAttr } from '../registry/registry.js';

/**
 * Chebyshev distance between two tiles.
 */
export function distance(a: GameEntity, b: GameEntity): number {
  return Math.max(
    Math.abs(numberAttr(a, 'x') - numberAttr(b, 'x')),
    Math.abs(numberAttr(a, 'y') - numberAttr(b, 'y'))
  );
}

export function isWater(tile: GameEntity): boolean {
  return tile.attributes.terrain === 'ocean';
}

export function settlementOn(ctx: GameContext, tile: GameEntity): GameEntity | null {
  return ctx.registry.children(tile.id, 'settlement')[0] ?? null;
}

/**
 * Units on a tile, including those inside a settlement or carrier there.
 */
export function unitsOn(ctx: GameContext, tile: GameEntity): GameEntity[] {
  return ctx.registry.descendants(tile.id).filter((entity) => entity.kind === 'unit');
}

/**
 * Whether a player other than `playerId` has units or a settlement on the tile.
 */
export function isForeignOccupied(ctx: GameContext, tile: GameEntity, playerId: Id): boolean {
  const settlement = settlementOn(ctx, tile);
  if (settlement && ctx.registry.ownerOf(settlement) !== playerId) return true;
  return unitsOn(ctx, tile).some((unit) => ctx.registry.ownerOf(unit) !== playerId);
}

/**
 * Send tiles that have just come into the player's line of sight, together
 * with whatever stands on them.
 */
export function revealNewTiles(ctx: GameContext, playerId: Id, before: ReadonlySet<Id>): Id[] {
  const revealed: Id[] = [];
  for (const tileId of ctx.knowledge.visibleTiles(playerId)) {
    if (before.has(tileId)) continue;
    const tile = ctx.registry.lookup(tileId);
    if (!tile) continue;
    revealed.push(tileId);
    ctx.mutate.touch(tile, See.only(playerId));
    for (const entity of ctx.registry.descendants(tile.id)) {
      ctx.mutate.touch(entity, See.perceived());
    }
  }
  return revealed;
}

/**
 * Keep a settlement's population equal to the number of units inside it.
 */
export function recountPopulation(ctx: GameContext, settlement: GameEntity): void {
  const population = ctx.registry.children(settlement.id, 'unit').length;
  ctx.mutate.set(settlement, { population }, See.perceived());
}
