// Entity Registry - the authoritative store of every live entity
//
// Containment (parentId) is a strict tree rooted at the game entity and is
// the only edge disposal follows. Weak references (refs) are plain ids,
// resolved on demand, so a disposed target resolves to null.

import {
  See,
  type Attributes,
  type EntityKind,
  type GameEntity,
  type Id,
  type RegistrySnapshot,
} from '@colonia/protocol';
import type { ChangeSet } from '../changes/change-set.js';
import { EntityNotFoundError, OwnershipError, ValidationError } from '../errors.js';

/**
 * Input for registering a new entity.
 */
export type RegisterInput = {
  kind: EntityKind;
  parentId?: Id | null;
  ownerId?: Id | null;
  attributes?: Attributes;
  refs?: Record<string, Id | null>;

  /**
   * Explicit id, used when restoring a snapshot. Must never have been used.
   */
  id?: Id;
};

const ID_PATTERN = /^([a-z]+):(\d+)$/;

export class EntityRegistry {
  private readonly entities = new Map<Id, GameEntity>();
  private readonly childIndex = new Map<Id, Set<Id>>();
  private readonly tileIndex = new Map<string, Id>();
  private readonly disposedIds = new Set<Id>();
  private nextId = 1;
  private active: ChangeSet | null = null;

  /**
   * Bind the change set of the operation in progress. Disposal records into it.
   */
  bind(changes: ChangeSet | null): void {
    this.active = changes;
  }

  register(input: RegisterInput): GameEntity {
    const id = input.id ?? `${input.kind}:${this.nextId++}`;

    if (input.id !== undefined) {
      if (this.entities.has(id) || this.disposedIds.has(id)) {
        throw new ValidationError(`Entity id already used: ${id}`, { field: 'id' });
      }
      const match = ID_PATTERN.exec(id);
      if (match && Number(match[2]) >= this.nextId) {
        this.nextId = Number(match[2]) + 1;
      }
    }

    const parentId = input.parentId ?? null;
    if (parentId !== null && !this.lookup(parentId)) {
      throw new EntityNotFoundError(parentId);
    }

    const entity: GameEntity = {
      id,
      kind: input.kind,
      parentId,
      ownerId: input.ownerId ?? null,
      attributes: { ...input.attributes },
      refs: { ...input.refs },
      disposed: false,
    };

    this.entities.set(id, entity);
    if (parentId !== null) this.link(parentId, id);
    if (entity.kind === 'tile') {
      this.tileIndex.set(tileKey(entity.attributes.x, entity.attributes.y), id);
    }
    return entity;
  }

  /**
   * Live entity by id; null for unknown or disposed ids.
   */
  lookup(id: Id): GameEntity | null {
    const entity = this.entities.get(id);
    return entity && !entity.disposed ? entity : null;
  }

  /**
   * Entity by id including tombstones of entities disposed during the
   * current operation.
   */
  peek(id: Id): GameEntity | null {
    return this.entities.get(id) ?? null;
  }

  require(id: Id, kind?: EntityKind): GameEntity {
    const entity = this.lookup(id);
    if (!entity || (kind !== undefined && entity.kind !== kind)) {
      throw new EntityNotFoundError(id, kind);
    }
    return entity;
  }

  /**
   * Resolve an id the given player must own.
   */
  requireOwned(id: Id, playerId: Id, kind?: EntityKind): GameEntity {
    const entity = this.require(id, kind);
    if (this.ownerOf(entity) !== playerId) {
      throw new OwnershipError(id, playerId);
    }
    return entity;
  }

  /**
   * Dispose an entity and everything it contains, contained entities first.
   * Idempotent. Records one remove per disposed entity in the bound change set.
   */
  dispose(id: Id, see: See = See.perceived()): GameEntity[] {
    const entity = this.lookup(id);
    if (!entity) {
      return [];
    }

    const disposed: GameEntity[] = [];
    for (const childId of [...(this.childIndex.get(id) ?? [])]) {
      disposed.push(...this.dispose(childId, see));
    }

    entity.disposed = true;
    this.disposedIds.add(id);
    this.childIndex.delete(id);
    if (entity.parentId !== null) {
      this.childIndex.get(entity.parentId)?.delete(id);
    }
    if (entity.kind === 'tile') {
      this.tileIndex.delete(tileKey(entity.attributes.x, entity.attributes.y));
    }
    this.active?.remove(see, entity);
    disposed.push(entity);
    return disposed;
  }

  /**
   * Forget tombstones once the operation that disposed them has been flushed.
   */
  purgeTombstones(): number {
    let purged = 0;
    for (const [id, entity] of this.entities) {
      if (entity.disposed) {
        this.entities.delete(id);
        purged++;
      }
    }
    return purged;
  }

  isDisposed(id: Id): boolean {
    return this.disposedIds.has(id);
  }

  children(id: Id, kind?: EntityKind): GameEntity[] {
    const result: GameEntity[] = [];
    for (const childId of this.childIndex.get(id) ?? []) {
      const child = this.lookup(childId);
      if (child && (kind === undefined || child.kind === kind)) result.push(child);
    }
    return result;
  }

  /**
   * Every live entity below the given one, depth first, parents before children.
   */
  descendants(id: Id): GameEntity[] {
    return this.children(id).flatMap((child) => [child, ...this.descendants(child.id)]);
  }

  all(kind?: EntityKind): GameEntity[] {
    const result: GameEntity[] = [];
    for (const entity of this.entities.values()) {
      if (!entity.disposed && (kind === undefined || entity.kind === kind)) result.push(entity);
    }
    return result;
  }

  /**
   * Live entities whose ownerId is the given player.
   */
  ownedBy(playerId: Id, kind?: EntityKind): GameEntity[] {
    return this.all(kind).filter((entity) => entity.ownerId === playerId);
  }

  tileAt(x: number, y: number): GameEntity | null {
    const id = this.tileIndex.get(tileKey(x, y));
    return id === undefined ? null : this.lookup(id);
  }

  /**
   * Nearest tile in the containment chain (the entity itself for a tile).
   * Walks tombstones, so a just-disposed entity still has a location.
   */
  locationOf(entity: GameEntity): GameEntity | null {
    let current: GameEntity | null = entity;
    while (current) {
      if (current.kind === 'tile') return current;
      current = current.parentId === null ? null : this.peek(current.parentId);
    }
    return null;
  }

  /**
   * Owning player: the entity itself for a player, otherwise the first
   * explicit owner up the containment chain.
   */
  ownerOf(entity: GameEntity): Id | null {
    let current: GameEntity | null = entity;
    while (current) {
      if (current.kind === 'player') return current.id;
      if (current.ownerId !== null) return current.ownerId;
      current = current.parentId === null ? null : this.peek(current.parentId);
    }
    return null;
  }

  resolveRef(entity: GameEntity, name: string): GameEntity | null {
    const target = entity.refs[name];
    return target ? this.lookup(target) : null;
  }

  /**
   * True when `ancestorId` is the entity itself or contains it.
   */
  isWithin(entity: GameEntity, ancestorId: Id): boolean {
    let current: GameEntity | null = entity;
    while (current) {
      if (current.id === ancestorId) return true;
      current = current.parentId === null ? null : this.peek(current.parentId);
    }
    return false;
  }

  setAttributes(entity: GameEntity, fields: Attributes): void {
    Object.assign(entity.attributes, fields);
  }

  setRef(entity: GameEntity, name: string, target: Id | null): void {
    entity.refs[name] = target;
  }

  setOwner(entity: GameEntity, ownerId: Id | null): void {
    entity.ownerId = ownerId;
  }

  /**
   * Move an entity under a new parent. Containment must stay acyclic.
   */
  setParent(entity: GameEntity, parentId: Id): void {
    const parent = this.require(parentId);
    if (this.isWithin(parent, entity.id)) {
      throw new ValidationError(`Cannot move ${entity.id} inside itself`, { field: 'parentId' });
    }
    if (entity.parentId !== null) {
      this.childIndex.get(entity.parentId)?.delete(entity.id);
    }
    entity.parentId = parentId;
    this.link(parentId, entity.id);
  }

  /**
   * Serialize live entities parents first, plus the id counter and every
   * disposed id.
   */
  toSnapshot(): RegistrySnapshot {
    const ordered: GameEntity[] = [];
    for (const root of this.all().filter((entity) => entity.parentId === null)) {
      ordered.push(root, ...this.descendants(root.id));
    }
    return {
      nextId: this.nextId,
      disposedIds: [...this.disposedIds],
      entities: ordered.map(cloneEntity),
    };
  }

  static fromSnapshot(snapshot: RegistrySnapshot): EntityRegistry {
    const registry = new EntityRegistry();
    for (const id of snapshot.disposedIds) {
      registry.disposedIds.add(id);
    }
    for (const entity of snapshot.entities) {
      registry.register({
        id: entity.id,
        kind: entity.kind,
        parentId: entity.parentId,
        ownerId: entity.ownerId,
        attributes: entity.attributes,
        refs: entity.refs,
      });
    }
    registry.nextId = Math.max(registry.nextId, snapshot.nextId);
    return registry;
  }

  private link(parentId: Id, childId: Id): void {
    let children = this.childIndex.get(parentId);
    if (!children) {
      children = new Set();
      this.childIndex.set(parentId, children);
    }
    children.add(childId);
  }
}

function tileKey(x: unknown, y: unknown): string {
  return `${String(x)},${String(y)}`;
}

export function cloneEntity(entity: GameEntity): GameEntity {
  return {
    ...entity,
    attributes: { ...entity.attributes },
    refs: { ...entity.refs },
  };
}

/**
 * Numeric attribute with a fallback.
 */
export function numberAttr(entity: GameEntity, name: string, fallback = 0): number {
  const value = entity.attributes[name];
  return typeof value === 'number' ? value : fallback;
}

/**
 * String attribute with a fallback.
 */
export function stringAttr(entity: GameEntity, name: string, fallback = ''): string {
  const value = entity.attributes[name];
  return typeof value === 'string' ? value : fallback;
}

export function isLivePlayer(entity: GameEntity | null): entity is GameEntity {
  return entity !== null && entity.kind === 'player' && entity.attributes.dead !== true;
}
