import { describe, it, expect, beforeEach } from 'vitest';
import { See, type GameEntity, type WireChange } from '@colonia/protocol';
import { EntityRegistry } from '../registry/registry.js';
import { KnowledgeTracker } from '../visibility/knowledge.js';
import { VisibilityOracle } from '../visibility/oracle.js';
import { ChangeSet } from './change-set.js';
import { Projector } from './projector.js';
import { createSerializerRegistry } from './serializers.js';

// --- Test Fixtures ---
//
// A 5x1 strip: game:1, tile:2 .. tile:6 (x = 0..4), Alice player:7,
// Bob player:8, Alice's scout unit:9 at x=0, Bob's soldier unit:10 at x=4.

function summarize(changes: WireChange[]): string[] {
  return changes.map((change) => {
    switch (change.type) {
      case 'add':
      case 'update':
        return `${change.type}:${change.entity.id}`;
      case 'partial':
      case 'remove':
      case 'owner':
        return `${change.type}:${change.id}`;
      case 'message':
        return `message:${change.subjectId ?? '-'}`;
      case 'attribute':
        return `attribute:${change.name}`;
    }
  });
}

describe('Projector', () => {
  let registry: EntityRegistry;
  let knowledge: KnowledgeTracker;
  let scout: GameEntity;
  let changes: ChangeSet;

  const projector = () =>
    new Projector(registry, new VisibilityOracle(registry, knowledge), createSerializerRegistry());

  beforeEach(() => {
    registry = new EntityRegistry();
    const game = registry.register({ kind: 'game', attributes: { name: 'test' } });
    const tiles: GameEntity[] = [];
    for (let x = 0; x < 5; x++) {
      tiles.push(
        registry.register({
          kind: 'tile',
          parentId: game.id,
          attributes: { x, y: 0, terrain: 'plains' },
        })
      );
    }
    registry.register({ kind: 'player', parentId: game.id, attributes: { name: 'Alice', gold: 100 } });
    registry.register({ kind: 'player', parentId: game.id, attributes: { name: 'Bob', gold: 100 } });
    scout = registry.register({
      kind: 'unit',
      parentId: tiles[0].id,
      ownerId: 'player:7',
      attributes: { unitType: 'scout', movesLeft: 4 },
    });
    registry.register({
      kind: 'unit',
      parentId: tiles[4].id,
      ownerId: 'player:8',
      attributes: { unitType: 'soldier', movesLeft: 1 },
    });
    knowledge = new KnowledgeTracker(registry, { unit: 1, settlement: 2 });
    changes = new ChangeSet();
  });

  describe('promotion', () => {
    it('turns a partial update of an unknown entity into an add, introducing its chain', () => {
      changes.partial(See.perceived(), scout, ['movesLeft']);

      const projection = projector().project(changes, 'player:7', new Set());

      expect(summarize(projection.changes)).toEqual([
        'add:game:1',
        'add:tile:2',
        'add:player:7',
        'add:unit:9',
      ]);
      expect([...projection.known].sort()).toEqual(['game:1', 'player:7', 'tile:2', 'unit:9']);
      expect(projection.introduced).toEqual(['game:1', 'tile:2', 'player:7', 'unit:9']);
    });

    it('sends a full update for a known entity', () => {
      changes.update(See.perceived(), scout);

      const projection = projector().project(
        changes,
        'player:7',
        new Set(['game:1', 'tile:2', 'player:7', 'unit:9'])
      );

      expect(projection.changes).toEqual([
        {
          type: 'update',
          entity: {
            id: 'unit:9',
            kind: 'unit',
            parentId: 'tile:2',
            ownerId: 'player:7',
            detail: 'full',
            attributes: { unitType: 'scout', movesLeft: 4 },
            refs: {},
          },
        },
      ]);
    });
  });

  describe('summary visibility', () => {
    beforeEach(() => {
      knowledge.explore('player:8', ['tile:2']);
    });

    it('filters partial updates to summary fields', () => {
      changes.partial(See.perceived(), scout, ['movesLeft', 'unitType']);

      const projection = projector().project(changes, 'player:8', new Set(['unit:9']));

      expect(projection.changes).toEqual([
        { type: 'partial', id: 'unit:9', kind: 'unit', fields: { unitType: 'scout' } },
      ]);
    });

    it('drops a partial update that touches no summary field', () => {
      changes.partial(See.perceived(), scout, ['movesLeft']);

      expect(projector().project(changes, 'player:8', new Set(['unit:9'])).changes).toEqual([]);
    });
  });

  describe('remove', () => {
    it('is dropped for observers that never knew the entity', () => {
      registry.bind(changes);
      registry.dispose(scout.id);

      expect(projector().project(changes, 'player:8', new Set()).changes).toEqual([]);
    });

    it('reaches the owner and forgets the id', () => {
      registry.bind(changes);
      registry.dispose(scout.id);

      const projection = projector().project(changes, 'player:7', new Set(['unit:9']));

      expect(projection.changes).toEqual([{ type: 'remove', id: 'unit:9' }]);
      expect(projection.forgotten).toEqual(['unit:9']);
      expect(projection.known.has('unit:9')).toBe(false);
    });
  });

  describe('references', () => {
    it('introduces the new owner before an ownership change', () => {
      knowledge.explore('player:7', ['tile:2']);
      registry.setOwner(scout, 'player:8');
      changes.ownerChange(See.perceived(), scout, 'player:7', 'player:8');

      const projection = projector().project(
        changes,
        'player:7',
        new Set(['game:1', 'unit:9', 'player:7'])
      );

      expect(projection.changes).toEqual([
        {
          type: 'add',
          entity: {
            id: 'player:8',
            kind: 'player',
            parentId: 'game:1',
            ownerId: null,
            detail: 'summary',
            attributes: { name: 'Bob' },
            refs: {},
          },
        },
        { type: 'owner', id: 'unit:9', from: 'player:7', to: 'player:8' },
      ]);
    });

    it('withholds weak references the observer may not see', () => {
      const settlement = registry.register({
        kind: 'settlement',
        parentId: 'tile:6',
        ownerId: 'player:8',
        attributes: { name: 'Fort Bob', population: 1 },
      });
      const wish = registry.register({
        kind: 'wish',
        parentId: 'player:7',
        ownerId: 'player:7',
        refs: { destination: settlement.id },
      });
      changes.add(See.owner(), wish);

      const projection = projector().project(changes, 'player:7', new Set(['game:1', 'player:7']));

      expect(projection.changes).toEqual([
        {
          type: 'add',
          entity: {
            id: wish.id,
            kind: 'wish',
            parentId: 'player:7',
            ownerId: 'player:7',
            detail: 'full',
            attributes: {},
            refs: { destination: null },
          },
        },
      ]);
    });

    it('withholds the subject of a message when it cannot be introduced', () => {
      const message = { template: 'model.combat.attackerLoses', args: {}, category: 'combat' };
      changes.message(See.all(), message, scout.id);

      expect(projector().project(changes, 'player:8', new Set()).changes).toEqual([
        { type: 'message', subjectId: null, message },
      ]);
    });
  });

  describe('attributes', () => {
    it('delivers session attributes by their rule', () => {
      changes.attribute(See.all(), 'turn', 2);
      changes.attribute(See.only('player:7'), 'secret', true);

      expect(projector().project(changes, 'player:8', new Set()).changes).toEqual([
        { type: 'attribute', name: 'turn', value: 2 },
      ]);
    });
  });

  describe('snapshotFor', () => {
    it('lists what the observer may see, parents before children', () => {
      const projection = projector().snapshotFor('player:8');

      expect(summarize(projection.changes)).toEqual([
        'add:game:1',
        'add:tile:5',
        'add:tile:6',
        'add:player:8',
        'add:unit:10',
        'add:player:7',
      ]);
    });

    it('never refers to an id that was not introduced first', () => {
      knowledge.explore('player:8', ['tile:2', 'tile:3']);
      const seen = new Set<string>();

      for (const change of projector().snapshotFor('player:8').changes) {
        if (change.type !== 'add') continue;
        for (const ref of [change.entity.parentId, change.entity.ownerId]) {
          if (ref !== null) expect(seen.has(ref)).toBe(true);
        }
        seen.add(change.entity.id);
      }
      expect(seen.has('unit:9')).toBe(true);
    });
  });
});
