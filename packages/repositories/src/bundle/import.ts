// Save bundle import.
// Reads and validates a bundle directory back into a SaveGame.

import {
  entitiesNdjsonPath,
  gameJsonPath,
  parseEntityLines,
  parseSaveGame,
  type SaveGame,
} from '@colonia/protocol';
import { joinPath } from './export.js';
import type { BundleReader, ImportSummary } from './types.js';

/**
 * Import a save bundle.
 *
 * @throws When game.json is missing, or when either file fails validation
 */
export async function importSaveBundle(
  reader: BundleReader,
  bundlePath: string
): Promise<{ save: SaveGame; summary: ImportSummary }> {
  const gamePath = joinPath(bundlePath, gameJsonPath());
  if (!(await reader.exists(gamePath))) {
    throw new Error(`Not a save bundle: ${bundlePath}`);
  }

  const header: unknown = JSON.parse(await reader.readFile(gamePath));
  const entitiesPath = joinPath(bundlePath, entitiesNdjsonPath());
  const entities = (await reader.exists(entitiesPath))
    ? parseEntityLines(await reader.readFile(entitiesPath))
    : [];

  const save = parseSaveGame(header, entities);
  return {
    save,
    summary: {
      bundlePath,
      gameId: save.gameId,
      entityCount: save.registry.entities.length,
      importedAt: new Date().toISOString(),
    },
  };
}
