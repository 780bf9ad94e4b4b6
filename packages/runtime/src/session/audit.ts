// Operation Audit Store
//
// Every operation on a session, accepted or rejected, leaves an entry.
// An in-memory store is provided; persistent stores implement the same
// interface.

import type { Id, OperationAuditEntry } from '@colonia/protocol';

export interface AuditStore {
  append(entry: OperationAuditEntry): Promise<void>;
  get(id: Id): Promise<OperationAuditEntry | null>;
  query(filter?: AuditQueryFilter): Promise<OperationAuditEntry[]>;
}

export type AuditQueryOptions = {
  /** Maximum entries to return */
  limit?: number;

  /** Offset for pagination */
  offset?: number;

  /** Start time filter */
  since?: string;

  /** End time filter */
  until?: string;
};

export type AuditQueryFilter = AuditQueryOptions & {
  gameId?: Id;
  playerId?: Id;

  /** Action verb or system operation name */
  operation?: string;

  success?: boolean;
};

export function createInMemoryAuditStore(): AuditStore {
  const entries: OperationAuditEntry[] = [];

  return {
    async append(entry) {
      entries.push(entry);
    },

    async get(id) {
      return entries.find((e) => e.id === id) ?? null;
    },

    async query(filter) {
      let result = [...entries];

      if (filter?.gameId) {
        result = result.filter((e) => e.gameId === filter.gameId);
      }

      if (filter?.playerId) {
        result = result.filter((e) => e.actor.playerId === filter.playerId);
      }

      if (filter?.operation) {
        result = result.filter((e) => e.operation === filter.operation);
      }

      if (filter?.success !== undefined) {
        result = result.filter((e) => e.success === filter.success);
      }

      return filterAndPaginate(result, filter);
    },
  };
}

/**
 * Apply time filtering and pagination. Most recent entries come first.
 */
function filterAndPaginate(
  entries: OperationAuditEntry[],
  options?: AuditQueryOptions
): OperationAuditEntry[] {
  let result = entries;

  if (options?.since) {
    const since = new Date(options.since);
    result = result.filter((e) => new Date(e.timestamp) >= since);
  }

  if (options?.until) {
    const until = new Date(options.until);
    result = result.filter((e) => new Date(e.timestamp) <= until);
  }

  // Stable for equal timestamps: later appends first
  result = result
    .map((entry, index) => ({ entry, index }))
    .sort(
      (a, b) =>
        new Date(b.entry.timestamp).getTime() - new Date(a.entry.timestamp).getTime() ||
        b.index - a.index
    )
    .map(({ entry }) => entry);

  if (options?.offset) {
    result = result.slice(options.offset);
  }

  if (options?.limit) {
    result = result.slice(0, options.limit);
  }

  return result;
}
