// Projector - turns one change set into one observer's ordered change list
//
// Guarantees that every id a projected change refers to is either already
// known to the observer or introduced by an earlier add in the same list.
// Ids that cannot be introduced are withheld (replaced by null).

import type {
  Attributes,
  Change,
  EntityView,
  GameEntity,
  Id,
  VisibilityLevel,
  WireChange,
} from '@colonia/protocol';
import type { EntityRegistry } from '../registry/registry.js';
import type { VisibilityOracle } from '../visibility/oracle.js';
import type { ChangeSet } from './change-set.js';
import { isSummaryField, type SerializerRegistry } from './serializers.js';

/**
 * One observer's projected list plus what the observer will know once the
 * list has been delivered.
 */
export type Projection = {
  changes: WireChange[];

  /**
   * Known ids after applying `changes`; becomes the observer's known set
   * when the batch is committed
   */
  known: Set<Id>;

  introduced: Id[];
  forgotten: Id[];
};

export class Projector {
  constructor(
    private readonly registry: EntityRegistry,
    private readonly oracle: VisibilityOracle,
    private readonly serializers: SerializerRegistry
  ) {}

  project(changeSet: ChangeSet, observerId: Id, known: ReadonlySet<Id>): Projection {
    const pass = new ProjectionPass(this.registry, this.oracle, this.serializers, observerId, known);
    for (const change of changeSet.sorted()) {
      pass.apply(change);
    }
    return pass.result();
  }

  /**
   * Full resynchronisation: every entity the observer may see, parents first.
   */
  snapshotFor(observerId: Id): Projection {
    const pass = new ProjectionPass(
      this.registry,
      this.oracle,
      this.serializers,
      observerId,
      new Set()
    );
    for (const entity of this.registry.toSnapshot().entities) {
      pass.introduce(entity.id);
    }
    return pass.result();
  }
}

class ProjectionPass {
  private readonly out: WireChange[] = [];
  private readonly known: Set<Id>;
  private readonly introduced: Id[] = [];
  private readonly forgotten: Id[] = [];
  private readonly inProgress = new Set<Id>();

  constructor(
    private readonly registry: EntityRegistry,
    private readonly oracle: VisibilityOracle,
    private readonly serializers: SerializerRegistry,
    private readonly observerId: Id,
    known: ReadonlySet<Id>
  ) {
    this.known = new Set(known);
  }

  apply(change: Change): void {
    switch (change.kind) {
      case 'attribute': {
        if (this.oracle.visible(this.observerId, null, change.see) === 'none') return;
        this.out.push({ type: 'attribute', name: change.name, value: change.value });
        return;
      }

      case 'message': {
        const subject = change.subjectId === null ? null : this.registry.peek(change.subjectId);
        if (this.oracle.visible(this.observerId, subject, change.see) === 'none') return;
        const subjectId =
          change.subjectId !== null && this.introduce(change.subjectId) ? change.subjectId : null;
        this.out.push({ type: 'message', subjectId, message: change.message });
        return;
      }

      case 'remove': {
        if (!this.known.has(change.subjectId)) return;
        const subject = this.registry.peek(change.subjectId);
        if (this.oracle.visible(this.observerId, subject, change.see) === 'none') return;
        this.out.push({ type: 'remove', id: change.subjectId });
        this.known.delete(change.subjectId);
        this.forgotten.push(change.subjectId);
        return;
      }

      case 'add':
      case 'update_full': {
        const entity = this.registry.lookup(change.subjectId);
        if (!entity) return;
        const level = this.oracle.visible(this.observerId, entity, change.see);
        if (level === 'none') return;
        if (this.known.has(entity.id)) {
          this.out.push({ type: 'update', entity: this.view(entity, level) });
        } else {
          this.emitAdd(entity, level);
        }
        return;
      }

      case 'update_partial': {
        const entity = this.registry.lookup(change.subjectId);
        if (!entity) return;
        const level = this.oracle.visible(this.observerId, entity, change.see);
        if (level === 'none') return;
        if (!this.known.has(entity.id)) {
          this.emitAdd(entity, level);
          return;
        }
        const serializer = this.serializers[entity.kind];
        const fields = change.fields.filter(
          (field) => level === 'full' || isSummaryField(serializer, field)
        );
        if (fields.length === 0) return;
        const values: Attributes = {};
        for (const field of fields) {
          values[field] = entity.attributes[field] ?? null;
        }
        this.out.push({ type: 'partial', id: entity.id, kind: entity.kind, fields: values });
        return;
      }

      case 'owner_change': {
        const entity = this.registry.lookup(change.subjectId);
        if (!entity) return;
        const level = this.oracle.visible(this.observerId, entity, change.see);
        if (level === 'none') return;
        if (!this.known.has(entity.id)) {
          this.emitAdd(entity, level);
          return;
        }
        this.out.push({
          type: 'owner',
          id: entity.id,
          from: change.from !== null && this.introduce(change.from) ? change.from : null,
          to: change.to !== null && this.introduce(change.to) ? change.to : null,
        });
        return;
      }
    }
  }

  /**
   * Make sure the observer knows the entity, adding it (and its unknown
   * parents) when its reveal rule allows. Returns whether it is known.
   */
  introduce(id: Id): boolean {
    if (this.known.has(id)) return true;
    if (this.inProgress.has(id)) return false;
    const entity = this.registry.lookup(id);
    if (!entity) return false;
    const level = this.oracle.visible(this.observerId, entity, this.serializers[entity.kind].reveal);
    if (level === 'none') return false;
    this.emitAdd(entity, level);
    return true;
  }

  result(): Projection {
    return {
      changes: this.out,
      known: this.known,
      introduced: this.introduced,
      forgotten: this.forgotten,
    };
  }

  private emitAdd(entity: GameEntity, level: Exclude<VisibilityLevel, 'none'>): void {
    this.inProgress.add(entity.id);
    const view = this.view(entity, level);
    this.inProgress.delete(entity.id);
    this.out.push({ type: 'add', entity: view });
    this.known.add(entity.id);
    this.introduced.push(entity.id);
  }

  private view(entity: GameEntity, level: Exclude<VisibilityLevel, 'none'>): EntityView {
    const serializer = this.serializers[entity.kind];
    const parentId =
      entity.parentId !== null && this.introduce(entity.parentId) ? entity.parentId : null;
    const ownerId =
      entity.ownerId !== null && this.introduce(entity.ownerId) ? entity.ownerId : null;

    const refs: Record<string, Id | null> = {};
    if (level === 'full') {
      for (const [name, target] of Object.entries(entity.refs)) {
        refs[name] = target !== null && this.introduce(target) ? target : null;
      }
    }

    return {
      id: entity.id,
      kind: entity.kind,
      parentId,
      ownerId,
      detail: level,
      attributes: level === 'full' ? serializer.full(entity) : serializer.summary(entity),
      refs,
    };
  }
}
