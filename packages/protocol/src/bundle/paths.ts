// Save bundle path constants
//
// A save bundle is a directory:
//   game.json         header (rules, turn state, explored sets, id counter)
//   entities.ndjson   one live entity per line, parents before children

export const SAVE_FILES = {
  GAME_JSON: 'game.json',
  ENTITIES_NDJSON: 'entities.ndjson',
} as const;

/**
 * Game ids double as bundle directory names: letters, digits, '_' and '-',
 * starting with a letter or digit.
 */
export const GAME_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

export function isValidGameId(gameId: string): boolean {
  return GAME_ID_PATTERN.test(gameId);
}

/**
 * Path of a game's bundle directory below a save root
 */
export function saveBundlePath(gameId: string): string {
  if (!isValidGameId(gameId)) {
    throw new Error(`Invalid game id: ${JSON.stringify(gameId)}`);
  }
  return gameId;
}

export function gameJsonPath(): string {
  return SAVE_FILES.GAME_JSON;
}

export function entitiesNdjsonPath(): string {
  return SAVE_FILES.ENTITIES_NDJSON;
}
