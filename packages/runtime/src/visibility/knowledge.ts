// Knowledge - what each player has seen
//
// `explored` is persisted; `visible` (current line of sight) is derived from
// the registry whenever it is asked for.

import type { GameRules, Id } from '@colonia/protocol';
import { numberAttr, type EntityRegistry } from '../registry/registry.js';

export class KnowledgeTracker {
  private readonly explored = new Map<Id, Set<Id>>();

  constructor(
    private readonly registry: EntityRegistry,
    private readonly lineOfSight: GameRules['lineOfSight']
  ) {}

  /**
   * Tiles within line of sight of any tile-located unit or settlement the
   * player owns. Distance is Chebyshev (diagonals count as one step).
   */
  visibleTiles(playerId: Id): Set<Id> {
    const visible = new Set<Id>();
    const observers = [
      ...this.registry.all('unit').map((entity) => ({ entity, radius: this.lineOfSight.unit })),
      ...this.registry
        .all('settlement')
        .map((entity) => ({ entity, radius: this.lineOfSight.settlement })),
    ];

    for (const { entity, radius } of observers) {
      if (this.registry.ownerOf(entity) !== playerId) continue;
      const tile = this.registry.locationOf(entity);
      if (!tile) continue;

      const range = numberAttr(entity, 'lineOfSight', radius);
      const x = numberAttr(tile, 'x');
      const y = numberAttr(tile, 'y');
      for (let dy = -range; dy <= range; dy++) {
        for (let dx = -range; dx <= range; dx++) {
          const seen = this.registry.tileAt(x + dx, y + dy);
          if (seen) visible.add(seen.id);
        }
      }
    }
    return visible;
  }

  isExplored(playerId: Id, tileId: Id): boolean {
    return this.explored.get(playerId)?.has(tileId) ?? false;
  }

  exploredTiles(playerId: Id): ReadonlySet<Id> {
    return this.explored.get(playerId) ?? new Set();
  }

  explore(playerId: Id, tileIds: Iterable<Id>): void {
    let set = this.explored.get(playerId);
    if (!set) {
      set = new Set();
      this.explored.set(playerId, set);
    }
    for (const id of tileIds) set.add(id);
  }

  /**
   * Merge every player's current line of sight into what they have explored.
   */
  refresh(playerIds: Iterable<Id>): void {
    for (const playerId of playerIds) {
      this.explore(playerId, this.visibleTiles(playerId));
    }
  }

  toJSON(): Record<Id, Id[]> {
    const result: Record<Id, Id[]> = {};
    for (const [playerId, tiles] of this.explored) {
      result[playerId] = [...tiles];
    }
    return result;
  }

  load(explored: Record<Id, Id[]>): void {
    this.explored.clear();
    for (const [playerId, tiles] of Object.entries(explored)) {
      this.explore(playerId, tiles);
    }
  }
}
