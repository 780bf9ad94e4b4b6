// In-memory game repository for development and testing
//
// Snapshots are deep-copied on the way in and out, so callers can keep
// mutating their own objects. Data does not persist between restarts.

import type { Id, SaveGame, SavedGameSummary } from '@colonia/protocol';
import {
  summarizeSave,
  type GameRepository,
  type SavedGameFilter,
} from '../interfaces/index.js';

export function createInMemoryGameRepository(): GameRepository & { clear(): void } {
  const saves = new Map<Id, SaveGame>();

  return {
    async save(save: SaveGame): Promise<void> {
      saves.set(save.gameId, structuredClone(save));
    },

    async load(gameId: Id): Promise<SaveGame | null> {
      const save = saves.get(gameId);
      return save ? structuredClone(save) : null;
    },

    async list(filter: SavedGameFilter = {}): Promise<SavedGameSummary[]> {
      let result = [...saves.values()]
        .map(summarizeSave)
        .sort((a, b) => b.savedAt.localeCompare(a.savedAt));

      if (filter.offset) {
        result = result.slice(filter.offset);
      }
      if (filter.limit) {
        result = result.slice(0, filter.limit);
      }
      return result;
    },

    async delete(gameId: Id): Promise<boolean> {
      return saves.delete(gameId);
    },

    clear(): void {
      saves.clear();
    },
  };
}
