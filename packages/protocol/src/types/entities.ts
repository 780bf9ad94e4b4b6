// Entity types - the objects the authoritative registry holds

import type { Attributes, Id } from './common.js';

/**
 * Every kind of game object the registry knows about.
 */
export type EntityKind =
  | 'game'
  | 'player'
  | 'europe'
  | 'tile'
  | 'unit'
  | 'settlement'
  | 'building'
  | 'goods'
  | 'mission'
  | 'wish';

export const ENTITY_KINDS: readonly EntityKind[] = [
  'game',
  'player',
  'europe',
  'tile',
  'unit',
  'settlement',
  'building',
  'goods',
  'mission',
  'wish',
];

/**
 * A GameEntity is any object with server-authoritative state.
 *
 * Two kinds of edges leave an entity:
 * - `parentId` is the containment edge. Containment forms a tree rooted at
 *   the game entity and drives disposal cascades.
 * - `refs` are weak references (a wish's destination, a mission's
 *   transportable). They are ids resolved through the registry and are
 *   never followed for ownership or lifecycle decisions.
 *
 * `ownerId` is political ownership: the player the entity belongs to.
 * When absent it is inherited from the containment chain.
 */
export type GameEntity = {
  id: Id;
  kind: EntityKind;
  parentId: Id | null;
  ownerId: Id | null;
  attributes: Attributes;
  refs: Record<string, Id | null>;

  /**
   * Set once by dispose. A disposed entity is no longer referencable.
   */
  disposed: boolean;
};

/**
 * How much of an entity an observer is shown.
 */
export type DetailLevel = 'summary' | 'full';

/**
 * Observer-specific representation of an entity as it travels on the wire.
 */
export type EntityView = {
  id: Id;
  kind: EntityKind;
  parentId: Id | null;
  ownerId: Id | null;
  detail: DetailLevel;
  attributes: Attributes;
  refs: Record<string, Id | null>;
};
