// Save format validation
//
// A save bundle splits a SaveGame into a header (game.json) and one entity
// per line (entities.ndjson). Both halves are validated on load.

import { z } from 'zod';
import { ENTITY_KINDS, type EntityKind, type GameEntity } from '../types/entities.js';
import type { SaveGame } from '../types/save.js';
import type { TurnPhase } from '../types/turns.js';
import { parseGameRules } from './rules.js';

const id = z.string().min(1);
const attributeValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const entityKind = z.custom<EntityKind>(
  (value) => typeof value === 'string' && (ENTITY_KINDS as readonly string[]).includes(value),
  { message: 'Unknown entity kind' }
);

export const gameEntitySchema: z.ZodType<GameEntity> = z.object({
  id,
  kind: entityKind,
  parentId: id.nullable(),
  ownerId: id.nullable(),
  attributes: z.record(attributeValue),
  refs: z.record(id.nullable()),
  disposed: z.boolean(),
});

const turnPhase: z.ZodType<TurnPhase> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('awaiting_actions'), playerId: id }),
  z.object({ kind: z.literal('advancing_turn') }),
  z.object({ kind: z.literal('global_events') }),
  z.object({ kind: z.literal('terminated'), winnerId: id.nullable() }),
]);

export const saveHeaderSchema = z.object({
  format: z.literal('colonia.save'),
  gameId: id,
  savedAt: z.string().datetime(),
  rules: z.unknown().transform((value) => parseGameRules(value)),
  turn: z.object({
    turn: z.number().int().positive(),
    order: z.array(id),
    phase: turnPhase,
  }),
  nextId: z.number().int().positive(),
  disposedIds: z.array(id),
  explored: z.record(z.array(id)),
  requestSeq: z.record(z.number().int().nonnegative()),
});

/**
 * Contents of game.json.
 */
export type SaveHeader = z.infer<typeof saveHeaderSchema>;

/**
 * Split a save into its header and entity list.
 */
export function toSaveHeader(save: SaveGame): SaveHeader {
  return {
    format: save.format,
    gameId: save.gameId,
    savedAt: save.savedAt,
    rules: save.rules,
    turn: save.turn,
    nextId: save.registry.nextId,
    disposedIds: save.registry.disposedIds,
    explored: save.explored,
    requestSeq: save.requestSeq,
  };
}

/**
 * Validate a header and entity list and join them into a SaveGame.
 * Throws a ZodError when either half is malformed.
 */
export function parseSaveGame(header: unknown, entities: unknown[]): SaveGame {
  const parsed = saveHeaderSchema.parse(header);
  return {
    format: parsed.format,
    gameId: parsed.gameId,
    savedAt: parsed.savedAt,
    rules: parsed.rules,
    turn: parsed.turn,
    registry: {
      nextId: parsed.nextId,
      disposedIds: parsed.disposedIds,
      entities: z.array(gameEntitySchema).parse(entities),
    },
    explored: parsed.explored,
    requestSeq: parsed.requestSeq,
  };
}
