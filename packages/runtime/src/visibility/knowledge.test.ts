import { describe, it, expect, beforeEach } from 'vitest';
import { EntityRegistry } from '../registry/registry.js';
import { KnowledgeTracker } from './knowledge.js';

const LINE_OF_SIGHT = { unit: 1, settlement: 2 };

describe('KnowledgeTracker', () => {
  let registry: EntityRegistry;
  let knowledge: KnowledgeTracker;

  beforeEach(() => {
    registry = new EntityRegistry();
    const game = registry.register({ kind: 'game' });
    for (let x = 0; x < 6; x++) {
      registry.register({ kind: 'tile', parentId: game.id, attributes: { x, y: 0 } });
    }
    // player:8
    registry.register({ kind: 'player', parentId: game.id });
    knowledge = new KnowledgeTracker(registry, LINE_OF_SIGHT);
  });

  it('derives line of sight from owned units', () => {
    registry.register({ kind: 'unit', parentId: 'tile:3', ownerId: 'player:8' });

    expect([...knowledge.visibleTiles('player:8')].sort()).toEqual(['tile:2', 'tile:3', 'tile:4']);
  });

  it('uses the settlement radius and a per-entity override', () => {
    registry.register({ kind: 'settlement', parentId: 'tile:2', ownerId: 'player:8' });
    registry.register({
      kind: 'unit',
      parentId: 'tile:7',
      ownerId: 'player:8',
      attributes: { lineOfSight: 0 },
    });

    expect([...knowledge.visibleTiles('player:8')].sort()).toEqual([
      'tile:2',
      'tile:3',
      'tile:4',
      'tile:7',
    ]);
  });

  it('ignores entities away from the map', () => {
    const europe = registry.register({ kind: 'europe', parentId: 'player:8', ownerId: 'player:8' });
    registry.register({ kind: 'unit', parentId: europe.id, ownerId: 'player:8' });

    expect(knowledge.visibleTiles('player:8').size).toBe(0);
  });

  it('remembers explored tiles after sight is lost', () => {
    const unit = registry.register({ kind: 'unit', parentId: 'tile:2', ownerId: 'player:8' });
    knowledge.refresh(['player:8']);

    registry.dispose(unit.id);
    knowledge.refresh(['player:8']);

    expect(knowledge.isExplored('player:8', 'tile:3')).toBe(true);
    expect(knowledge.isExplored('player:8', 'tile:4')).toBe(false);
    expect(knowledge.visibleTiles('player:8').size).toBe(0);
  });

  it('round-trips explored tiles', () => {
    knowledge.explore('player:8', ['tile:5', 'tile:6']);

    const restored = new KnowledgeTracker(registry, LINE_OF_SIGHT);
    restored.load(knowledge.toJSON());

    expect([...restored.exploredTiles('player:8')]).toEqual(['tile:5', 'tile:6']);
  });
});
