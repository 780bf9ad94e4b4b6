// Mutator - the only path by which game logic changes the registry
//
// Every helper mutates the registry and records the matching change in the
// operation's change set, so nothing can change without being propagated.

import {
  See,
  type AttributeValue,
  type Attributes,
  type ChangePriority,
  type GameEntity,
  type GameMessage,
  type Id,
} from '@colonia/protocol';
import type { EntityRegistry, RegisterInput } from '../registry/registry.js';
import type { ChangeSet } from './change-set.js';

export class Mutator {
  constructor(
    private readonly registry: EntityRegistry,
    readonly changes: ChangeSet
  ) {}

  /**
   * Register a new entity and record its addition.
   */
  create(input: RegisterInput, see: See): GameEntity {
    const entity = this.registry.register(input);
    this.changes.add(see, entity);
    return entity;
  }

  /**
   * Set attributes, recording a partial update of the fields that changed.
   */
  set(entity: GameEntity, fields: Attributes, see: See, priority?: ChangePriority): void {
    const changed = Object.keys(fields).filter((name) => entity.attributes[name] !== fields[name]);
    if (changed.length === 0) return;
    this.registry.setAttributes(entity, fields);
    this.changes.partial(see, entity, changed, priority);
  }

  setRef(entity: GameEntity, name: string, target: Id | null, see: See): void {
    if (entity.refs[name] === target) return;
    this.registry.setRef(entity, name, target);
    this.changes.update(see, entity);
  }

  /**
   * Move an entity to a new container. Recorded as a full update.
   */
  move(entity: GameEntity, parentId: Id, see: See): void {
    if (entity.parentId === parentId) return;
    this.registry.setParent(entity, parentId);
    this.changes.update(see, entity);
  }

  /**
   * Hand an entity to another player.
   */
  transfer(entity: GameEntity, toPlayerId: Id | null, see: See): void {
    const from = entity.ownerId;
    if (from === toPlayerId) return;
    this.registry.setOwner(entity, toPlayerId);
    this.changes.ownerChange(see, entity, from, toPlayerId);
  }

  /**
   * Dispose an entity and its contents; the registry records the removals.
   */
  dispose(entity: GameEntity, see: See = See.perceived()): GameEntity[] {
    return this.registry.dispose(entity.id, see);
  }

  message(see: See, message: GameMessage, subjectId: Id | null = null): void {
    this.changes.message(see, message, subjectId);
  }

  attribute(name: string, value: AttributeValue, see: See = See.all(), priority?: ChangePriority): void {
    this.changes.attribute(see, name, value, priority);
  }

  /**
   * Record that an entity should be resent in full without changing it
   * (e.g. tiles that have just come into view).
   */
  touch(entity: GameEntity, see: See): void {
    this.changes.update(see, entity);
  }
}
