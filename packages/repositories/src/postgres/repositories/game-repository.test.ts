import { describe, it, expect } from 'vitest';
import type { GameEntity } from '@colonia/protocol';
import { entityToRow, rowToEntity } from './game-repository.js';

// --- Test Fixtures ---

function createMockEntity(overrides: Partial<GameEntity> = {}): GameEntity {
  return {
    id: 'unit:7',
    kind: 'unit',
    parentId: 'tile:3',
    ownerId: 'player:2',
    attributes: { unitType: 'soldier', movesLeft: 1 },
    refs: { destination: null },
    disposed: false,
    ...overrides,
  };
}

describe('game entity rows', () => {
  it('maps an entity to a row at its registry position', () => {
    expect(entityToRow('game-1', createMockEntity(), 12)).toEqual({
      gameId: 'game-1',
      id: 'unit:7',
      position: 12,
      kind: 'unit',
      parentId: 'tile:3',
      ownerId: 'player:2',
      attributes: { unitType: 'soldier', movesLeft: 1 },
      refs: { destination: null },
    });
  });

  it('maps a row back to a live entity', () => {
    const entity = createMockEntity({ ownerId: null });
    const row = { ...entityToRow('game-1', entity, 0), parentId: 'tile:3', ownerId: null };

    expect(rowToEntity(row)).toEqual(entity);
  });
});
