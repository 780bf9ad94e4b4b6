// GameRepository over a directory of save bundles
//
// Each game lives in <root>/<gameId>/. Used when the server is given a
// save directory instead of a database.

import {
  gameJsonPath,
  saveBundlePath,
  saveHeaderSchema,
  type Id,
  type SaveGame,
  type SavedGameSummary,
} from '@colonia/protocol';
import type { GameRepository, SavedGameFilter } from '../interfaces/index.js';
import { exportSaveBundle, joinPath } from './export.js';
import { createFilesystemIO } from './fs.js';
import { importSaveBundle } from './import.js';
import type { BundleIO } from './types.js';

export function createBundleGameRepository(
  root: string,
  io: BundleIO = createFilesystemIO()
): GameRepository {
  const { reader, writer } = io;
  const pathOf = (gameId: Id) => joinPath(root, saveBundlePath(gameId));

  return {
    async save(save: SaveGame): Promise<void> {
      await exportSaveBundle(save, writer, pathOf(save.gameId), { overwrite: true });
    },

    async load(gameId: Id): Promise<SaveGame | null> {
      const bundlePath = pathOf(gameId);
      if (!(await reader.exists(joinPath(bundlePath, gameJsonPath())))) return null;
      const { save } = await importSaveBundle(reader, bundlePath);
      return save;
    },

    async list(filter: SavedGameFilter = {}): Promise<SavedGameSummary[]> {
      if (!(await reader.isDirectory(root))) return [];

      const summaries: SavedGameSummary[] = [];
      for (const name of await reader.listDirectory(root)) {
        const gamePath = joinPath(root, name, gameJsonPath());
        if (!(await reader.exists(gamePath))) continue;
        const header = saveHeaderSchema.parse(JSON.parse(await reader.readFile(gamePath)));
        summaries.push({
          gameId: header.gameId,
          turn: header.turn.turn,
          playerCount: header.turn.order.length,
          savedAt: header.savedAt,
        });
      }

      let result = summaries.sort((a, b) => b.savedAt.localeCompare(a.savedAt));
      if (filter.offset) {
        result = result.slice(filter.offset);
      }
      if (filter.limit) {
        result = result.slice(0, filter.limit);
      }
      return result;
    },

    async delete(gameId: Id): Promise<boolean> {
      const bundlePath = pathOf(gameId);
      if (!(await writer.exists(bundlePath))) return false;
      await writer.remove(bundlePath);
      return true;
    },
  };
}
