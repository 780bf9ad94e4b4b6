import {
  pgTable,
  text,
  timestamp,
  jsonb,
  integer,
  index,
  primaryKey,
} from 'drizzle-orm/pg-core';
import type { Attributes, EntityKind, SaveHeader } from '@colonia/protocol';

/**
 * Games table - one row per saved game, holding the save header.
 */
export const games = pgTable(
  'games',
  {
    id: text('id').primaryKey(),
    turn: integer('turn').notNull(),
    playerCount: integer('player_count').notNull(),
    header: jsonb('header').$type<SaveHeader>().notNull(),
    savedAt: timestamp('saved_at', { withTimezone: true }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('games_saved_at_idx').on(table.savedAt)]
);

/**
 * Game entities table - the registry snapshot of a saved game.
 * `position` keeps parents ahead of their children.
 */
export const gameEntities = pgTable(
  'game_entities',
  {
    gameId: text('game_id')
      .notNull()
      .references(() => games.id, { onDelete: 'cascade' }),
    id: text('id').notNull(),
    position: integer('position').notNull(),
    kind: text('kind').notNull().$type<EntityKind>(),
    parentId: text('parent_id'),
    ownerId: text('owner_id'),
    attributes: jsonb('attributes').$type<Attributes>().notNull(),
    refs: jsonb('refs').$type<Record<string, string | null>>().notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.gameId, table.id] }),
    index('game_entities_game_position_idx').on(table.gameId, table.position),
  ]
);
