import { describe, it, expect } from 'vitest';
import type { SaveGame } from '../types/save.js';
import { DEFAULT_GAME_RULES } from './rules.js';
import { parseSaveGame, toSaveHeader } from './save.js';

// --- Test Fixtures ---

function createMockSave(): SaveGame {
  return {
    format: 'colonia.save',
    gameId: 'game-1',
    savedAt: '2024-03-01T12:00:00.000Z',
    rules: DEFAULT_GAME_RULES,
    turn: { turn: 4, order: ['player:2'], phase: { kind: 'awaiting_actions', playerId: 'player:2' } },
    registry: {
      nextId: 5,
      disposedIds: ['unit:4'],
      entities: [
        {
          id: 'game:1',
          kind: 'game',
          parentId: null,
          ownerId: null,
          attributes: { name: 'game', successionFired: false },
          refs: {},
          disposed: false,
        },
        {
          id: 'player:2',
          kind: 'player',
          parentId: 'game:1',
          ownerId: null,
          attributes: { name: 'Ann', dead: false },
          refs: { entryLocation: null },
          disposed: false,
        },
      ],
    },
    explored: { 'player:2': ['tile:3'] },
    requestSeq: { 'player:2': 7 },
  };
}

describe('save format', () => {
  it('rebuilds a save from its header and entities', () => {
    const save = createMockSave();
    const header = JSON.parse(JSON.stringify(toSaveHeader(save)));

    expect(parseSaveGame(header, save.registry.entities)).toEqual(save);
  });

  it('keeps the id counter and disposed ids in the header', () => {
    const header = toSaveHeader(createMockSave());

    expect(header.nextId).toBe(5);
    expect(header.disposedIds).toEqual(['unit:4']);
  });

  it('rejects an unknown format', () => {
    const header = { ...toSaveHeader(createMockSave()), format: 'other' };
    expect(() => parseSaveGame(header, [])).toThrow();
  });

  it('rejects an entity of unknown kind', () => {
    const save = createMockSave();
    const entities = [{ ...save.registry.entities[0], kind: 'dragon' }];
    expect(() => parseSaveGame(toSaveHeader(save), entities)).toThrow();
  });
});
