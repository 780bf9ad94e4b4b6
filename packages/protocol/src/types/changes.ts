// Change types - one atomic mutation recorded during an operation
//
// A Change describes what happened, not the resulting values. Payloads are
// read from the registry when the change set is projected for an observer,
// so a recorded change never has to be revised after it is appended.

import type { AttributeValue, Id } from './common.js';
import type { See } from './visibility.js';

/**
 * All change kinds.
 */
export type ChangeKind =
  | 'add'
  | 'remove'
  | 'update_full'
  | 'update_partial'
  | 'owner_change'
  | 'message'
  | 'attribute';

/**
 * Priority classes, flushed first to last.
 *
 * Structural changes (removals, then ownership transfers and additions)
 * reach a client before the attribute changes that depend on them;
 * trivial notifications such as the turn number come last.
 */
export type ChangePriority = 'remove' | 'ownership' | 'state' | 'trivial';

export const PRIORITY_RANK: Record<ChangePriority, number> = {
  remove: 0,
  ownership: 1,
  state: 2,
  trivial: 3,
};

/**
 * Default priority per change kind.
 */
export const DEFAULT_PRIORITY: Record<ChangeKind, ChangePriority> = {
  add: 'ownership',
  remove: 'remove',
  update_full: 'state',
  update_partial: 'state',
  owner_change: 'ownership',
  message: 'state',
  attribute: 'trivial',
};

/**
 * A templated, localisable message. `args` fill `%name%` placeholders.
 */
export type GameMessage = {
  /**
   * Message template key, e.g. "model.diplomacy.succession"
   */
  template: string;

  args: Record<string, string>;

  /**
   * Message category (combat, diplomacy, ...)
   */
  category: string;
};

type ChangeBase = {
  /**
   * Insertion index within the change set
   */
  readonly seq: number;
  readonly priority: ChangePriority;
  readonly see: See;
};

export type AddChange = ChangeBase & {
  readonly kind: 'add';
  readonly subjectId: Id;
};

export type RemoveChange = ChangeBase & {
  readonly kind: 'remove';
  readonly subjectId: Id;
};

export type UpdateFullChange = ChangeBase & {
  readonly kind: 'update_full';
  readonly subjectId: Id;
};

export type UpdatePartialChange = ChangeBase & {
  readonly kind: 'update_partial';
  readonly subjectId: Id;
  readonly fields: readonly string[];
};

export type OwnerChange = ChangeBase & {
  readonly kind: 'owner_change';
  readonly subjectId: Id;
  readonly from: Id | null;
  readonly to: Id | null;
};

export type MessageChange = ChangeBase & {
  readonly kind: 'message';
  readonly subjectId: Id | null;
  readonly message: GameMessage;
};

/**
 * Session-level notification not tied to an entity (turn number, current player).
 */
export type AttributeChange = ChangeBase & {
  readonly kind: 'attribute';
  readonly subjectId: null;
  readonly name: string;
  readonly value: AttributeValue;
};

export type Change =
  | AddChange
  | RemoveChange
  | UpdateFullChange
  | UpdatePartialChange
  | OwnerChange
  | MessageChange
  | AttributeChange;

/**
 * Changes that target a specific entity.
 */
export type EntityChange = Exclude<Change, MessageChange | AttributeChange>;

/**
 * Total order of a change set: priority class first, then insertion order.
 */
export function compareChanges(a: Change, b: Change): number {
  const byPriority = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  return byPriority !== 0 ? byPriority : a.seq - b.seq;
}

export function isEntityChange(change: Change): change is EntityChange {
  return change.kind !== 'message' && change.kind !== 'attribute';
}
