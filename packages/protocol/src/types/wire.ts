// Wire types - what an observer actually receives

import type { Attributes, AttributeValue, Id } from './common.js';
import type { EntityKind, EntityView } from './entities.js';
import type { GameMessage } from './changes.js';

/**
 * One projected change, carrying everything the receiver needs to apply it
 * to its local mirror without a further round trip.
 */
export type WireChange =
  | { type: 'add'; entity: EntityView }
  | { type: 'update'; entity: EntityView }
  | { type: 'partial'; id: Id; kind: EntityKind; fields: Attributes }
  | { type: 'remove'; id: Id }
  | { type: 'owner'; id: Id; from: Id | null; to: Id | null }
  | { type: 'message'; subjectId: Id | null; message: GameMessage }
  | { type: 'attribute'; name: string; value: AttributeValue };

export type WireChangeType = WireChange['type'];

/**
 * The atomic unit of delivery: every change one operation produced for one
 * observer. Sequence numbers are per observer and strictly increasing.
 */
export type ChangeBatch = {
  gameId: Id;
  observerId: Id;
  sequence: number;
  turn: number;

  /**
   * True when this batch replaces the observer's whole mirror (join, reconnect)
   */
  resync: boolean;

  changes: WireChange[];
};

/**
 * Ids a wire change points at. Used to check that an observer never
 * receives a reference to an entity it was not told about.
 */
export function referencedIds(change: WireChange): Id[] {
  switch (change.type) {
    case 'add':
    case 'update': {
      const ids = [change.entity.id];
      if (change.entity.parentId) ids.push(change.entity.parentId);
      if (change.entity.ownerId) ids.push(change.entity.ownerId);
      for (const ref of Object.values(change.entity.refs)) {
        if (ref) ids.push(ref);
      }
      return ids;
    }
    case 'partial':
    case 'remove':
      return [change.id];
    case 'owner': {
      const ids = [change.id];
      if (change.from) ids.push(change.from);
      if (change.to) ids.push(change.to);
      return ids;
    }
    case 'message':
      return change.subjectId ? [change.subjectId] : [];
    case 'attribute':
      return [];
  }
}
