// Integrity Checker
//
// Walks containment and weak references looking for edges into disposed or
// unknown entities. Repairs what can be repaired deterministically and
// reports the rest. Never throws.

import { See, type EntityKind, type GameEntity, type Id } from '@colonia/protocol';
import type { Mutator } from '../changes/mutator.js';
import type { Logger } from '../logging.js';
import type { EntityRegistry } from '../registry/registry.js';

export type IntegrityStatus = 'ok' | 'repaired' | 'broken';

/**
 * One finding. Logged, never thrown.
 */
export type IntegrityWarning = {
  entityId: Id;
  issue: 'dead_parent' | 'dead_owner' | 'dangling_ref' | 'stale_derived';
  field: string;
  target?: Id;
  repaired: boolean;
};

export type IntegrityReport = {
  status: IntegrityStatus;
  issues: IntegrityWarning[];
};

export type IntegritySummary = {
  checked: number;
  repaired: number;
  broken: number;
  issues: IntegrityWarning[];
};

/**
 * Weak references that must resolve; a dangling one cannot be cleared.
 */
export const REQUIRED_REFS: Partial<Record<EntityKind, readonly string[]>> = {
  wish: ['destination'],
};

export type IntegrityCheckerOptions = {
  logger: Logger;

  /**
   * Records repairs; required when checking with fix=true
   */
  mutate?: Mutator;
};

export class IntegrityChecker {
  constructor(
    private readonly registry: EntityRegistry,
    private readonly options: IntegrityCheckerOptions
  ) {}

  check(entity: GameEntity, fix: boolean): IntegrityReport {
    const issues: IntegrityWarning[] = [];
    const mutate = fix ? this.options.mutate : undefined;

    if (entity.parentId !== null && !this.registry.lookup(entity.parentId)) {
      issues.push({
        entityId: entity.id,
        issue: 'dead_parent',
        field: 'parentId',
        target: entity.parentId,
        repaired: false,
      });
    }

    if (entity.ownerId !== null) {
      const owner = this.registry.lookup(entity.ownerId);
      if (!owner || owner.kind !== 'player' || owner.attributes.dead === true) {
        issues.push({
          entityId: entity.id,
          issue: 'dead_owner',
          field: 'ownerId',
          target: entity.ownerId,
          repaired: false,
        });
      }
    }

    const required = REQUIRED_REFS[entity.kind] ?? [];
    for (const [name, target] of Object.entries(entity.refs)) {
      if (target === null || this.registry.lookup(target)) continue;
      const clearable = !required.includes(name);
      if (clearable && mutate) {
        mutate.setRef(entity, name, null, See.owner());
      }
      issues.push({
        entityId: entity.id,
        issue: 'dangling_ref',
        field: name,
        target,
        repaired: clearable && mutate !== undefined,
      });
    }

    if (entity.kind === 'settlement') {
      const population = this.registry.children(entity.id, 'unit').length;
      if (entity.attributes.population !== population) {
        if (mutate) {
          mutate.set(entity, { population }, See.owner());
        }
        issues.push({
          entityId: entity.id,
          issue: 'stale_derived',
          field: 'population',
          repaired: mutate !== undefined,
        });
      }
    }

    const status: IntegrityStatus =
      issues.length === 0 ? 'ok' : issues.every((issue) => issue.repaired) ? 'repaired' : 'broken';

    if (status === 'broken') {
      this.options.logger.warn('Integrity check found broken entity', {
        entityId: entity.id,
        issues: issues.filter((issue) => !issue.repaired),
      });
    } else if (status === 'repaired') {
      this.options.logger.info('Integrity check repaired entity', { entityId: entity.id, issues });
    }
    return { status, issues };
  }

  checkAll(fix: boolean): IntegritySummary {
    const summary: IntegritySummary = { checked: 0, repaired: 0, broken: 0, issues: [] };
    for (const entity of this.registry.all()) {
      const report = this.check(entity, fix);
      summary.checked++;
      if (report.status === 'repaired') summary.repaired++;
      if (report.status === 'broken') summary.broken++;
      summary.issues.push(...report.issues);
    }
    return summary;
  }
}
