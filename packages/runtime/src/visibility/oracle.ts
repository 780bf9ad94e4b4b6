// Visibility Oracle
//
// Answers how much of a subject an observer may see under a See rule.
// One oracle is built per flush; line of sight is cached for its lifetime.

import {
  mostPermissive,
  type GameEntity,
  type Id,
  type See,
  type VisibilityLevel,
} from '@colonia/protocol';
import type { EntityRegistry } from '../registry/registry.js';
import type { KnowledgeTracker } from './knowledge.js';

export class VisibilityOracle {
  private readonly visibleCache = new Map<Id, Set<Id>>();

  constructor(
    private readonly registry: EntityRegistry,
    private readonly knowledge: KnowledgeTracker
  ) {}

  /**
   * Visibility of `subject` for `observerId`. A null subject stands for a
   * broadcast with nothing attached.
   */
  visible(observerId: Id, subject: GameEntity | null, see: See): VisibilityLevel {
    switch (see.kind) {
      case 'all': {
        const owner = subject ? this.registry.ownerOf(subject) : null;
        if (owner === null || owner === observerId) return 'full';
        return 'summary';
      }

      case 'owner':
        return subject && this.registry.ownerOf(subject) === observerId ? 'full' : 'none';

      case 'perceived':
        return subject ? this.perceived(observerId, subject) : 'none';

      case 'only':
        return see.players.includes(observerId) ? 'full' : 'none';

      case 'any': {
        let level: VisibilityLevel = 'none';
        for (const rule of see.rules) {
          level = mostPermissive(level, this.visible(observerId, subject, rule));
          if (level === 'full') break;
        }
        return level;
      }
    }
  }

  private perceived(observerId: Id, subject: GameEntity): VisibilityLevel {
    const isOwner = this.registry.ownerOf(subject) === observerId;
    const tile = subject.kind === 'player' ? null : this.registry.locationOf(subject);
    if (!tile) {
      return isOwner ? 'full' : 'none';
    }

    let level: VisibilityLevel = 'none';
    if (this.lineOfSight(observerId).has(tile.id)) {
      level = 'full';
    } else if (this.knowledge.isExplored(observerId, tile.id)) {
      level = 'summary';
    }
    return isOwner ? mostPermissive(level, 'summary') : level;
  }

  private lineOfSight(observerId: Id): Set<Id> {
    let tiles = this.visibleCache.get(observerId);
    if (!tiles) {
      tiles = this.knowledge.visibleTiles(observerId);
      this.visibleCache.set(observerId, tiles);
    }
    return tiles;
  }
}
