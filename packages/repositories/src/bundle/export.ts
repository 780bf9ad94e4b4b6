// Save bundle export.
// Writes a SaveGame as a bundle directory: game.json + entities.ndjson.

import {
  entitiesNdjsonPath,
  gameJsonPath,
  stringifyEntityLines,
  toSaveHeader,
  type SaveGame,
} from '@colonia/protocol';
import type { BundleWriter, ExportOptions, ExportSummary } from './types.js';

export const joinPath = (...parts: string[]) => parts.join('/');

/**
 * Export a save to a bundle directory.
 *
 * Entities are written one per line in registry order, parents before
 * children, so a reader can rebuild the containment tree in one pass.
 */
export async function exportSaveBundle(
  save: SaveGame,
  writer: BundleWriter,
  bundlePath: string,
  options: ExportOptions = {}
): Promise<ExportSummary> {
  const gamePath = joinPath(bundlePath, gameJsonPath());
  if (!options.overwrite && (await writer.exists(gamePath))) {
    throw new Error(`Save bundle already exists: ${bundlePath}`);
  }

  await writer.mkdir(bundlePath);
  await writer.writeFile(
    joinPath(bundlePath, entitiesNdjsonPath()),
    stringifyEntityLines(save.registry.entities)
  );
  // Header last: a bundle without game.json is not a save
  await writer.writeFile(gamePath, JSON.stringify(toSaveHeader(save), null, 2) + '\n');

  return {
    bundlePath,
    gameId: save.gameId,
    entityCount: save.registry.entities.length,
    exportedAt: new Date().toISOString(),
  };
}
