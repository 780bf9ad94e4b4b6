// Visibility - who may receive a change

import type { Id } from './common.js';

/**
 * Result of asking the visibility oracle about one observer and one subject.
 */
export type VisibilityLevel = 'none' | 'summary' | 'full';

/**
 * A See value describes which observers may receive a change.
 *
 * - all: every observer (owner in full, others in summary)
 * - owner: only the player owning the subject's containment chain
 * - perceived: observers with current or past sight of the subject's tile
 * - only: an explicit set of players
 * - any: the most permissive of several rules
 *
 * A See is evaluated when a change set is projected, not when the change
 * is recorded, because knowledge may change within the same operation.
 */
export type See =
  | { kind: 'all' }
  | { kind: 'owner' }
  | { kind: 'perceived' }
  | { kind: 'only'; players: Id[] }
  | { kind: 'any'; rules: See[] };

const VISIBILITY_RANK: Record<VisibilityLevel, number> = {
  none: 0,
  summary: 1,
  full: 2,
};

/**
 * Pick the more permissive of two visibility levels.
 */
export function mostPermissive(a: VisibilityLevel, b: VisibilityLevel): VisibilityLevel {
  return VISIBILITY_RANK[a] >= VISIBILITY_RANK[b] ? a : b;
}

/**
 * Compare visibility levels (negative when a is less permissive than b).
 */
export function compareVisibility(a: VisibilityLevel, b: VisibilityLevel): number {
  return VISIBILITY_RANK[a] - VISIBILITY_RANK[b];
}

function flatten(see: See): See[] {
  return see.kind === 'any' ? see.rules.flatMap(flatten) : [see];
}

function seeKey(see: See): string {
  return see.kind === 'only' ? `only:${[...see.players].sort().join(',')}` : see.kind;
}

/**
 * Combine visibility rules. Duplicates are removed, `only` sets are merged,
 * and a single remaining rule is returned unwrapped.
 */
function anyOf(...sees: See[]): See {
  const rules: See[] = [];
  const seen = new Set<string>();
  const players = new Set<Id>();

  for (const rule of sees.flatMap(flatten)) {
    if (rule.kind === 'only') {
      rule.players.forEach((p) => players.add(p));
      continue;
    }
    const key = seeKey(rule);
    if (!seen.has(key)) {
      seen.add(key);
      rules.push(rule);
    }
  }
  if (players.size > 0) {
    rules.push({ kind: 'only', players: [...players].sort() });
  }

  return rules.length === 1 ? rules[0] : { kind: 'any', rules };
}

/**
 * Builders for See values.
 *
 * @example
 * ```ts
 * changes.update(See.anyOf(See.perceived(), See.only(newOwnerId)), settlement);
 * ```
 */
export const See = {
  all: (): See => ({ kind: 'all' }),
  owner: (): See => ({ kind: 'owner' }),
  perceived: (): See => ({ kind: 'perceived' }),
  only: (...players: Id[]): See => ({ kind: 'only', players: [...new Set(players)].sort() }),
  anyOf,
};

/**
 * Flatten a See into its leaf rules.
 */
export function seeRules(see: See): See[] {
  return flatten(see);
}
