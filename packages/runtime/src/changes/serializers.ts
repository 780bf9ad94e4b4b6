// Per-kind entity serialization
//
// Each kind decides what an observer with only summary visibility learns
// about it, and under which rule it is revealed when something else
// refers to it.

import { See, type Attributes, type EntityKind, type GameEntity } from '@colonia/protocol';

export interface EntitySerializer {
  /**
   * Attribute names included in the summary representation, or 'all' for
   * entities that have nothing to hide
   */
  readonly summaryFields: readonly string[] | 'all';

  /**
   * Rule used when the entity must be introduced because another entity
   * refers to it (as parent, owner or weak reference)
   */
  readonly reveal: See;

  full(entity: GameEntity): Attributes;
  summary(entity: GameEntity): Attributes;
}

export type SerializerRegistry = Record<EntityKind, EntitySerializer>;

/**
 * Serializer that exposes `summaryFields` in summary and everything in full.
 */
export function fieldSerializer(summaryFields: readonly string[], reveal: See = See.perceived()): EntitySerializer {
  return {
    summaryFields,
    reveal,
    full: (entity) => ({ ...entity.attributes }),
    summary: (entity) => {
      const result: Attributes = {};
      for (const field of summaryFields) {
        if (field in entity.attributes) result[field] = entity.attributes[field];
      }
      return result;
    },
  };
}

/**
 * Serializer for public entities: summary and full are the same.
 */
function publicSerializer(reveal: See): EntitySerializer {
  return {
    summaryFields: 'all',
    reveal,
    full: (entity) => ({ ...entity.attributes }),
    summary: (entity) => ({ ...entity.attributes }),
  };
}

export function createSerializerRegistry(
  overrides: Partial<SerializerRegistry> = {}
): SerializerRegistry {
  return {
    game: publicSerializer(See.all()),
    player: fieldSerializer(['name', 'nation', 'isAI', 'isREF', 'dead'], See.all()),
    europe: fieldSerializer([], See.owner()),
    tile: fieldSerializer(['x', 'y', 'terrain']),
    unit: fieldSerializer(['unitType', 'naval']),
    settlement: fieldSerializer(['name', 'population']),
    building: fieldSerializer(['buildingType']),
    goods: fieldSerializer(['goodsType']),
    mission: fieldSerializer([]),
    wish: fieldSerializer([], See.owner()),
    ...overrides,
  };
}

/**
 * Whether a summary view carries the field.
 */
export function isSummaryField(serializer: EntitySerializer, field: string): boolean {
  return serializer.summaryFields === 'all' || serializer.summaryFields.includes(field);
}
