// World setup for a new game
//
// Map generation lives elsewhere; a setup only describes a rectangle of
// tiles, the players and their starting units.

import type { Attributes, GameEntity, GameRules, Id } from '@colonia/protocol';
import type { EntityRegistry } from '../registry/registry.js';

/**
 * Starting attributes per unit type.
 */
export const UNIT_TYPES: Record<string, Attributes> = {
  colonist: { unitType: 'colonist', moves: 1, offence: 0, defence: 1 },
  soldier: { unitType: 'soldier', moves: 1, offence: 2, defence: 2 },
  dragoon: { unitType: 'dragoon', moves: 4, offence: 3, defence: 3 },
  scout: { unitType: 'scout', moves: 4, offence: 0, defence: 1, lineOfSight: 2 },
  caravel: { unitType: 'caravel', moves: 4, offence: 0, defence: 2, naval: true, cargoSlots: 2 },
};

export type UnitSetup = {
  unitType: string;

  /**
   * Where the unit starts; defaults to the player's start tile
   */
  at?: 'start' | 'europe';

  /**
   * Attribute overrides
   */
  attributes?: Attributes;
};

export type PlayerSetup = {
  name: string;
  nation?: string;
  isAI?: boolean;
  isREF?: boolean;
  gold?: number;
  start: { x: number; y: number };

  /**
   * Where ships arriving from Europe appear; defaults to the start tile
   */
  entry?: { x: number; y: number };

  units?: UnitSetup[];
};

export type GameSetup = {
  width: number;
  height: number;

  /**
   * Terrain overrides by "x,y"; every other tile is plains
   */
  terrain?: Record<string, string>;

  players: PlayerSetup[];
};

export const DEFAULT_UNITS: readonly UnitSetup[] = [
  { unitType: 'colonist' },
  { unitType: 'soldier' },
  { unitType: 'caravel', at: 'europe' },
];

/**
 * Populate an empty registry. Returns the game entity and players in join order.
 */
export function createWorld(
  registry: EntityRegistry,
  setup: GameSetup,
  rules: GameRules,
  name = 'game'
): { game: GameEntity; players: Id[] } {
  const game = registry.register({ kind: 'game', attributes: { name, successionFired: false } });

  for (let y = 0; y < setup.height; y++) {
    for (let x = 0; x < setup.width; x++) {
      registry.register({
        kind: 'tile',
        parentId: game.id,
        attributes: { x, y, terrain: setup.terrain?.[`${x},${y}`] ?? 'plains' },
      });
    }
  }

  const players: Id[] = [];
  for (const playerSetup of setup.players) {
    players.push(addPlayer(registry, game, playerSetup, rules).id);
  }
  return { game, players };
}

export function addPlayer(
  registry: EntityRegistry,
  game: GameEntity,
  setup: PlayerSetup,
  rules: GameRules
): GameEntity {
  const start = registry.tileAt(setup.start.x, setup.start.y);
  if (!start) {
    throw new Error(`Start tile ${setup.start.x},${setup.start.y} is off the map`);
  }
  const entry = setup.entry ? registry.tileAt(setup.entry.x, setup.entry.y) : start;

  const player = registry.register({
    kind: 'player',
    parentId: game.id,
    attributes: {
      name: setup.name,
      nation: setup.nation ?? setup.name,
      gold: setup.gold ?? rules.startingGold,
      isAI: setup.isAI ?? false,
      isREF: setup.isREF ?? false,
      dead: false,
    },
    refs: { entryLocation: entry?.id ?? start.id },
  });
  const europe = registry.register({ kind: 'europe', parentId: player.id, ownerId: player.id });

  for (const unit of setup.units ?? DEFAULT_UNITS) {
    const base = UNIT_TYPES[unit.unitType];
    if (!base) throw new Error(`Unknown unit type: ${unit.unitType}`);
    const moves = unit.attributes?.moves ?? base.moves;
    registry.register({
      kind: 'unit',
      parentId: unit.at === 'europe' ? europe.id : start.id,
      ownerId: player.id,
      attributes: { ...base, movesLeft: moves, ...unit.attributes },
    });
  }
  return player;
}
