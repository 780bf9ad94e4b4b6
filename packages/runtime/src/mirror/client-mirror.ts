// Client Mirror - an observer's partial copy of the game
//
// Batches are applied strictly in sequence order. Early arrivals are held
// back until the gap is filled; duplicates are ignored. A resync batch
// replaces the whole mirror.

import type {
  AttributeValue,
  ChangeBatch,
  EntityKind,
  EntityView,
  GameMessage,
  Id,
  WireChange,
} from '@colonia/protocol';

/**
 * Read-only view handed to AI planners.
 */
export interface MirrorView {
  readonly observerId: Id;
  readonly turn: number;
  get(id: Id): EntityView | null;
  all(kind?: EntityKind): EntityView[];
  ownedBy(playerId: Id, kind?: EntityKind): EntityView[];
  children(id: Id, kind?: EntityKind): EntityView[];
  attribute(name: string): AttributeValue | undefined;
  readonly messages: readonly GameMessage[];
}

export class ClientMirror implements MirrorView {
  private readonly entities = new Map<Id, EntityView>();
  private readonly attributes = new Map<string, AttributeValue>();
  private readonly pending = new Map<number, ChangeBatch>();
  private readonly received: GameMessage[] = [];
  private sequence = 0;
  private turnNumber = 0;

  constructor(readonly observerId: Id) {}

  get lastSequence(): number {
    return this.sequence;
  }

  get turn(): number {
    return this.turnNumber;
  }

  get messages(): readonly GameMessage[] {
    return this.received;
  }

  /**
   * Number of batches held back waiting for an earlier sequence.
   */
  get buffered(): number {
    return this.pending.size;
  }

  /**
   * Accept a batch. Returns how many batches were applied as a result.
   */
  receive(batch: ChangeBatch): number {
    if (batch.observerId !== this.observerId || batch.sequence <= this.sequence) {
      return 0;
    }
    if (!batch.resync && batch.sequence > this.sequence + 1) {
      this.pending.set(batch.sequence, batch);
      return 0;
    }

    this.apply(batch);
    let applied = 1;
    for (;;) {
      const next = this.pending.get(this.sequence + 1);
      if (!next) break;
      this.pending.delete(next.sequence);
      this.apply(next);
      applied++;
    }
    for (const sequence of this.pending.keys()) {
      if (sequence <= this.sequence) this.pending.delete(sequence);
    }
    return applied;
  }

  get(id: Id): EntityView | null {
    return this.entities.get(id) ?? null;
  }

  all(kind?: EntityKind): EntityView[] {
    const views = [...this.entities.values()];
    return kind === undefined ? views : views.filter((view) => view.kind === kind);
  }

  ownedBy(playerId: Id, kind?: EntityKind): EntityView[] {
    return this.all(kind).filter((view) => view.ownerId === playerId);
  }

  children(id: Id, kind?: EntityKind): EntityView[] {
    return this.all(kind).filter((view) => view.parentId === id);
  }

  attribute(name: string): AttributeValue | undefined {
    return this.attributes.get(name);
  }

  knownIds(): Set<Id> {
    return new Set(this.entities.keys());
  }

  private apply(batch: ChangeBatch): void {
    if (batch.resync) {
      this.entities.clear();
      this.attributes.clear();
    }
    for (const change of batch.changes) {
      this.applyChange(change);
    }
    this.sequence = batch.sequence;
    this.turnNumber = batch.turn;
  }

  private applyChange(change: WireChange): void {
    switch (change.type) {
      case 'add':
      case 'update':
        this.entities.set(change.entity.id, structuredClone(change.entity));
        return;
      case 'partial': {
        const view = this.entities.get(change.id);
        if (view) Object.assign(view.attributes, change.fields);
        return;
      }
      case 'remove':
        this.entities.delete(change.id);
        return;
      case 'owner': {
        const view = this.entities.get(change.id);
        if (view) view.ownerId = change.to;
        return;
      }
      case 'message':
        this.received.push(change.message);
        return;
      case 'attribute':
        this.attributes.set(change.name, change.value);
        return;
    }
  }
}
