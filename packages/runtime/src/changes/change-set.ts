// ChangeSet - the pending mutations of one logical operation
//
// Records are immutable. Compaction happens on append: a merged record
// replaces the older record at the older record's position, keeping its seq.

import {
  DEFAULT_PRIORITY,
  See,
  compareChanges,
  isEntityChange,
  type AttributeValue,
  type Change,
  type ChangePriority,
  type EntityChange,
  type GameMessage,
  type Id,
} from '@colonia/protocol';

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * A change as handed to append; seq is assigned by the set and priority
 * defaults per kind.
 */
export type ChangeInput = DistributiveOmit<Change, 'seq' | 'priority'> & {
  priority?: ChangePriority;
};

type Subject = { id: Id };

export class ChangeSet {
  private entries: Change[] = [];
  private nextSeq = 0;
  private readonly removed = new Set<Id>();

  /**
   * Append a change, applying the compaction rules for its subject.
   */
  append(input: ChangeInput): void {
    const priority = input.priority ?? DEFAULT_PRIORITY[input.kind];
    const change: Change = { ...input, priority, seq: this.nextSeq };

    if (!isEntityChange(change)) {
      this.push(change);
      return;
    }

    const subjectId = change.subjectId;
    if (this.removed.has(subjectId)) {
      return;
    }

    switch (change.kind) {
      case 'remove':
        this.entries = this.entries.filter(
          (existing) => !isEntityChange(existing) || existing.subjectId !== subjectId
        );
        this.removed.add(subjectId);
        this.push(change);
        return;

      case 'add': {
        const index = this.findIndex(subjectId, 'add');
        if (index >= 0) {
          this.widen(index, change.see, priority);
          return;
        }
        this.push(change);
        return;
      }

      case 'update_full': {
        const addIndex = this.findIndex(subjectId, 'add');
        if (addIndex >= 0) {
          this.widen(addIndex, change.see, this.entries[addIndex].priority);
          return;
        }

        let see = change.see;
        for (const partial of this.pending(subjectId, 'update_partial')) {
          see = See.anyOf(see, partial.see);
        }
        this.entries = this.entries.filter(
          (existing) => !(existing.kind === 'update_partial' && existing.subjectId === subjectId)
        );

        const fullIndex = this.findIndex(subjectId, 'update_full');
        if (fullIndex >= 0) {
          this.widen(fullIndex, see, priority);
          return;
        }
        this.push({ ...change, see });
        return;
      }

      case 'update_partial': {
        const fullIndex = this.findIndex(subjectId, 'add', 'update_full');
        if (fullIndex >= 0) {
          this.widen(fullIndex, change.see, this.entries[fullIndex].priority);
          return;
        }

        const partialIndex = this.findIndex(subjectId, 'update_partial');
        if (partialIndex >= 0) {
          const existing = this.entries[partialIndex];
          if (existing.kind === 'update_partial') {
            const fields = [...existing.fields];
            for (const field of change.fields) {
              if (!fields.includes(field)) fields.push(field);
            }
            this.entries[partialIndex] = {
              ...existing,
              fields,
              priority,
              see: See.anyOf(existing.see, change.see),
            };
          }
          return;
        }
        this.push(change);
        return;
      }

      case 'owner_change': {
        const index = this.findIndex(subjectId, 'owner_change');
        if (index >= 0) {
          const existing = this.entries[index];
          if (existing.kind === 'owner_change') {
            this.entries[index] = {
              ...existing,
              to: change.to,
              priority,
              see: See.anyOf(existing.see, change.see),
            };
          }
          return;
        }
        this.push(change);
        return;
      }
    }
  }

  add(see: See, entity: Subject, priority?: ChangePriority): void {
    this.append({ kind: 'add', subjectId: entity.id, see, priority });
  }

  remove(see: See, entity: Subject): void {
    this.append({ kind: 'remove', subjectId: entity.id, see });
  }

  update(see: See, entity: Subject, priority?: ChangePriority): void {
    this.append({ kind: 'update_full', subjectId: entity.id, see, priority });
  }

  partial(see: See, entity: Subject, fields: readonly string[], priority?: ChangePriority): void {
    if (fields.length === 0) return;
    this.append({ kind: 'update_partial', subjectId: entity.id, fields: [...fields], see, priority });
  }

  ownerChange(see: See, entity: Subject, from: Id | null, to: Id | null): void {
    this.append({ kind: 'owner_change', subjectId: entity.id, from, to, see });
  }

  message(see: See, message: GameMessage, subjectId: Id | null = null): void {
    this.append({ kind: 'message', subjectId, message, see });
  }

  attribute(see: See, name: string, value: AttributeValue, priority?: ChangePriority): void {
    this.append({ kind: 'attribute', subjectId: null, name, value, see, priority });
  }

  /**
   * Changes in delivery order: priority class, then insertion order.
   */
  sorted(): Change[] {
    return [...this.entries].sort(compareChanges);
  }

  /**
   * Pending changes of one subject, in insertion order.
   */
  forSubject(subjectId: Id): Change[] {
    return this.entries.filter((change) => change.subjectId === subjectId);
  }

  wasRemoved(subjectId: Id): boolean {
    return this.removed.has(subjectId);
  }

  get size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  private push(change: Change): void {
    this.entries.push(change);
    this.nextSeq++;
  }

  private findIndex(subjectId: Id, ...kinds: EntityChange['kind'][]): number {
    return this.entries.findIndex(
      (change) =>
        isEntityChange(change) && change.subjectId === subjectId && kinds.includes(change.kind)
    );
  }

  private pending<K extends EntityChange['kind']>(
    subjectId: Id,
    kind: K
  ): Extract<EntityChange, { kind: K }>[] {
    return this.entries.filter(
      (change): change is Extract<EntityChange, { kind: K }> =>
        change.kind === kind && change.subjectId === subjectId
    );
  }

  private widen(index: number, see: See, priority: ChangePriority): void {
    const existing = this.entries[index];
    this.entries[index] = { ...existing, see: See.anyOf(existing.see, see), priority };
  }
}
