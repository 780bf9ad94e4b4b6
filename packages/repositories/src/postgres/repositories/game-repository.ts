import { asc, desc, eq } from 'drizzle-orm';
import {
  parseSaveGame,
  toSaveHeader,
  type GameEntity,
  type Id,
  type SaveGame,
  type SavedGameSummary,
} from '@colonia/protocol';
import type { Database } from '../db.js';
import { gameEntities, games } from '../schema/index.js';
import {
  summarizeSave,
  type GameRepository,
  type SavedGameFilter,
} from '../../interfaces/index.js';

/** Rows per insert statement; keeps bind parameters well under the protocol limit */
const INSERT_CHUNK = 500;

const DEFAULT_LIST_LIMIT = 100;

export type GameEntityRow = typeof gameEntities.$inferInsert;

export function entityToRow(gameId: Id, entity: GameEntity, position: number): GameEntityRow {
  return {
    gameId,
    id: entity.id,
    position,
    kind: entity.kind,
    parentId: entity.parentId,
    ownerId: entity.ownerId,
    attributes: entity.attributes,
    refs: entity.refs,
  };
}

export function rowToEntity(row: typeof gameEntities.$inferSelect): GameEntity {
  return {
    id: row.id,
    kind: row.kind,
    parentId: row.parentId,
    ownerId: row.ownerId,
    attributes: row.attributes,
    refs: row.refs,
    disposed: false,
  };
}

export class PgGameRepository implements GameRepository {
  constructor(private db: Database) {}

  async save(save: SaveGame): Promise<void> {
    const summary = summarizeSave(save);
    const header = toSaveHeader(save);
    const savedAt = new Date(save.savedAt);
    const rows = save.registry.entities.map((entity, index) =>
      entityToRow(save.gameId, entity, index)
    );

    await this.db.transaction(async (tx) => {
      await tx
        .insert(games)
        .values({
          id: save.gameId,
          turn: summary.turn,
          playerCount: summary.playerCount,
          header,
          savedAt,
        })
        .onConflictDoUpdate({
          target: games.id,
          set: {
            turn: summary.turn,
            playerCount: summary.playerCount,
            header,
            savedAt,
            updatedAt: new Date(),
          },
        });

      await tx.delete(gameEntities).where(eq(gameEntities.gameId, save.gameId));

      for (let i = 0; i < rows.length; i += INSERT_CHUNK) {
        await tx.insert(gameEntities).values(rows.slice(i, i + INSERT_CHUNK));
      }
    });
  }

  async load(gameId: Id): Promise<SaveGame | null> {
    const [row] = await this.db.select().from(games).where(eq(games.id, gameId));
    if (!row) return null;

    const entityRows = await this.db
      .select()
      .from(gameEntities)
      .where(eq(gameEntities.gameId, gameId))
      .orderBy(asc(gameEntities.position));

    return parseSaveGame(row.header, entityRows.map(rowToEntity));
  }

  async list(filter: SavedGameFilter = {}): Promise<SavedGameSummary[]> {
    const rows = await this.db
      .select({
        gameId: games.id,
        turn: games.turn,
        playerCount: games.playerCount,
        savedAt: games.savedAt,
      })
      .from(games)
      .orderBy(desc(games.savedAt))
      .limit(filter.limit ?? DEFAULT_LIST_LIMIT)
      .offset(filter.offset ?? 0);

    return rows.map((r) => ({ ...r, savedAt: r.savedAt.toISOString() }));
  }

  async delete(gameId: Id): Promise<boolean> {
    const deleted = await this.db
      .delete(games)
      .where(eq(games.id, gameId))
      .returning({ id: games.id });
    return deleted.length > 0;
  }
}
