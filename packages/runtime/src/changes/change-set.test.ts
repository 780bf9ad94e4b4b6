import { describe, it, expect } from 'vitest';
import { See } from '@colonia/protocol';
import { ChangeSet } from './change-set.js';

const unit = { id: 'unit:1' };
const settlement = { id: 'settlement:2' };

describe('ChangeSet', () => {
  describe('ordering', () => {
    it('sorts by priority class, then insertion order', () => {
      const changes = new ChangeSet();
      changes.attribute(See.all(), 'turn', 2);
      changes.update(See.perceived(), unit);
      changes.remove(See.perceived(), { id: 'unit:9' });
      changes.add(See.all(), settlement);
      changes.update(See.owner(), { id: 'goods:3' });

      expect(changes.sorted().map((c) => `${c.kind}:${c.subjectId ?? '-'}`)).toEqual([
        'remove:unit:9',
        'add:settlement:2',
        'update_full:unit:1',
        'update_full:goods:3',
        'attribute:-',
      ]);
    });

    it('honours an explicit priority', () => {
      const changes = new ChangeSet();
      changes.update(See.all(), unit);
      changes.attribute(See.all(), 'currentPlayer', 'player:1', 'state');

      expect(changes.sorted().map((c) => c.kind)).toEqual(['update_full', 'attribute']);
      expect(changes.sorted()[1].priority).toBe('state');
    });
  });

  describe('remove', () => {
    it('drops earlier changes to the subject', () => {
      const changes = new ChangeSet();
      changes.update(See.perceived(), unit);
      changes.partial(See.owner(), unit, ['movesLeft']);
      changes.ownerChange(See.perceived(), unit, 'player:1', 'player:2');
      changes.remove(See.perceived(), unit);

      expect(changes.size).toBe(1);
      expect(changes.sorted()[0].kind).toBe('remove');
      expect(changes.wasRemoved(unit.id)).toBe(true);
    });

    it('ignores later changes to a removed subject', () => {
      const changes = new ChangeSet();
      changes.remove(See.perceived(), unit);
      changes.update(See.all(), unit);
      changes.add(See.all(), unit);

      expect(changes.forSubject(unit.id).map((c) => c.kind)).toEqual(['remove']);
    });

    it('keeps messages about a removed subject', () => {
      const changes = new ChangeSet();
      changes.remove(See.perceived(), unit);
      changes.message(
        See.all(),
        { template: 'model.combat.attackerLoses', args: {}, category: 'combat' },
        unit.id
      );

      expect(changes.size).toBe(2);
    });
  });

  describe('add', () => {
    it('absorbs a later full update and widens visibility', () => {
      const changes = new ChangeSet();
      changes.add(See.owner(), unit);
      changes.update(See.perceived(), unit);

      const [change] = changes.sorted();
      expect(changes.size).toBe(1);
      expect(change.kind).toBe('add');
      expect(change.priority).toBe('ownership');
      expect(change.see).toEqual({ kind: 'any', rules: [{ kind: 'owner' }, { kind: 'perceived' }] });
    });

    it('absorbs a later partial update', () => {
      const changes = new ChangeSet();
      changes.add(See.all(), unit);
      changes.partial(See.owner(), unit, ['movesLeft']);

      expect(changes.size).toBe(1);
      expect(changes.sorted()[0].see).toEqual({
        kind: 'any',
        rules: [{ kind: 'all' }, { kind: 'owner' }],
      });
    });

    it('collapses a repeated add', () => {
      const changes = new ChangeSet();
      changes.add(See.perceived(), unit);
      changes.add(See.perceived(), unit);

      expect(changes.size).toBe(1);
      expect(changes.sorted()[0].see).toEqual({ kind: 'perceived' });
    });
  });

  describe('updates', () => {
    it('replaces pending partials with a full update', () => {
      const changes = new ChangeSet();
      changes.partial(See.owner(), unit, ['movesLeft']);
      changes.update(See.perceived(), unit);

      const subjectChanges = changes.forSubject(unit.id);
      expect(subjectChanges).toHaveLength(1);
      expect(subjectChanges[0].kind).toBe('update_full');
      expect(subjectChanges[0].see).toEqual({
        kind: 'any',
        rules: [{ kind: 'perceived' }, { kind: 'owner' }],
      });
    });

    it('merges repeated full updates', () => {
      const changes = new ChangeSet();
      changes.update(See.owner(), unit);
      changes.update(See.only('player:2'), unit);

      expect(changes.size).toBe(1);
      expect(changes.sorted()[0].see).toEqual({
        kind: 'any',
        rules: [{ kind: 'owner' }, { kind: 'only', players: ['player:2'] }],
      });
    });

    it('absorbs a partial into a pending full update', () => {
      const changes = new ChangeSet();
      changes.update(See.perceived(), unit);
      changes.partial(See.perceived(), unit, ['movesLeft']);

      expect(changes.forSubject(unit.id).map((c) => c.kind)).toEqual(['update_full']);
    });

    it('unions the fields of partial updates', () => {
      const changes = new ChangeSet();
      changes.partial(See.owner(), unit, ['gold']);
      changes.partial(See.perceived(), unit, ['gold', 'movesLeft']);

      const [change] = changes.sorted();
      expect(changes.size).toBe(1);
      expect(change.kind === 'update_partial' ? change.fields : []).toEqual(['gold', 'movesLeft']);
    });

    it('skips a partial update without fields', () => {
      const changes = new ChangeSet();
      changes.partial(See.owner(), unit, []);

      expect(changes.isEmpty()).toBe(true);
    });
  });

  describe('owner_change', () => {
    it('keeps the first origin and the last destination', () => {
      const changes = new ChangeSet();
      changes.ownerChange(See.perceived(), settlement, 'player:1', 'player:2');
      changes.ownerChange(See.only('player:3'), settlement, 'player:2', 'player:3');

      const [change] = changes.sorted();
      expect(changes.size).toBe(1);
      expect(change.kind === 'owner_change' ? [change.from, change.to] : []).toEqual([
        'player:1',
        'player:3',
      ]);
      expect(change.see).toEqual({
        kind: 'any',
        rules: [{ kind: 'perceived' }, { kind: 'only', players: ['player:3'] }],
      });
    });
  });

  it('never merges messages', () => {
    const changes = new ChangeSet();
    const message = { template: 'model.history.victory', args: {}, category: 'history' };
    changes.message(See.all(), message);
    changes.message(See.all(), message);

    expect(changes.size).toBe(2);
  });

  it('assigns increasing sequence numbers in insertion order', () => {
    const changes = new ChangeSet();
    changes.update(See.all(), unit);
    changes.update(See.all(), settlement);
    changes.attribute(See.all(), 'turn', 3);

    expect(changes.sorted().map((c) => c.seq)).toEqual([0, 1, 2]);
  });
});
