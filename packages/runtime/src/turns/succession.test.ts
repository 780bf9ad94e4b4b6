import { describe, it, expect, beforeEach } from 'vitest';
import { resolveGameRules, type GameRules } from '@colonia/protocol';
import { ChangeSet } from '../changes/change-set.js';
import { Mutator } from '../changes/mutator.js';
import type { GameContext } from '../context.js';
import { silentLogger } from '../logging.js';
import { EntityRegistry } from '../registry/registry.js';
import { createWorld, type PlayerSetup } from '../session/setup.js';
import { KnowledgeTracker } from '../visibility/knowledge.js';
import { TurnEngine } from './engine.js';
import {
  SUCCESSION_MESSAGE,
  applySuccession,
  createSuccessionRule,
  selectSuccession,
} from './succession.js';

// --- Test Fixtures ---
//
// 6x1 map: game:1, tile:2 .. tile:7.
// Hal (human) player:8, europe:9, no units.
// Strong (AI) player:10, europe:11, three colonists unit:12..14 at x=2.
// Weak (AI) player:15, europe:16, colonist unit:17 at x=5, caravel unit:18
// in europe. Weak also holds settlement:19 (building:20 owned, building:21
// inherited), claims tile:7 and runs mission:22 on its colonist.

const HAL = 'player:8';
const STRONG = 'player:10';
const WEAK = 'player:15';

const RULES = resolveGameRules({
  succession: { minimumTurn: 5, strongThreshold: 3, weakThreshold: 2 },
});

function createGame(rules: GameRules = RULES, weakIsAi = true, turn = 5) {
  const players: PlayerSetup[] = [
    { name: 'Hal', start: { x: 0, y: 0 }, units: [] },
    {
      name: 'Strong',
      isAI: true,
      start: { x: 2, y: 0 },
      units: [{ unitType: 'colonist' }, { unitType: 'colonist' }, { unitType: 'colonist' }],
    },
    {
      name: 'Weak',
      isAI: weakIsAi,
      start: { x: 5, y: 0 },
      units: [{ unitType: 'colonist' }, { unitType: 'caravel', at: 'europe' }],
    },
  ];
  const registry = new EntityRegistry();
  const world = createWorld(registry, { width: 6, height: 1, players }, rules);
  const settlement = registry.register({
    kind: 'settlement',
    parentId: 'tile:7',
    ownerId: WEAK,
    attributes: { name: 'Weakton', population: 0 },
  });
  registry.register({ kind: 'building', parentId: settlement.id, ownerId: WEAK });
  registry.register({ kind: 'building', parentId: settlement.id });
  registry.setOwner(registry.require('tile:7'), WEAK);
  registry.register({ kind: 'mission', parentId: 'unit:17', ownerId: WEAK });

  const changes = new ChangeSet();
  registry.bind(changes);
  const turns = new TurnEngine({
    turn,
    order: world.players,
    phase: { kind: 'awaiting_actions', playerId: HAL },
  });
  const ctx: GameContext = {
    gameId: 'game-1',
    rules,
    registry,
    knowledge: new KnowledgeTracker(registry, rules.lineOfSight),
    mutate: new Mutator(registry, changes),
    turns,
    logger: silentLogger,
    game: world.game,
  };
  return { ctx, registry, changes };
}

describe('selectSuccession', () => {
  it('pairs the weakest AI with the strongest AI', () => {
    const { ctx } = createGame();

    const pair = selectSuccession(ctx, 5);

    expect(pair?.weaker.id).toBe(WEAK);
    expect(pair?.stronger.id).toBe(STRONG);
    expect(pair?.scores).toEqual({ [HAL]: 0, [STRONG]: 3, [WEAK]: 2 });
  });

  it('waits for the minimum turn', () => {
    const { ctx } = createGame();

    expect(selectSuccession(ctx, 4)).toBeNull();
  });

  it('needs someone above the strong threshold', () => {
    const { ctx } = createGame(
      resolveGameRules({ succession: { minimumTurn: 5, strongThreshold: 4, weakThreshold: 2 } })
    );

    expect(selectSuccession(ctx, 5)).toBeNull();
  });

  it('only lets AI players cede', () => {
    const { ctx } = createGame(RULES, false);

    expect(selectSuccession(ctx, 5)).toBeNull();
  });

  it('does nothing when disabled', () => {
    const { ctx } = createGame(resolveGameRules({ succession: { enabled: false, minimumTurn: 5 } }));

    expect(selectSuccession(ctx, 5)).toBeNull();
  });

  it('accepts a custom scoring policy', () => {
    const { ctx } = createGame();
    const byUnitsInEurope = (registry: EntityRegistry, player: { id: string }) =>
      registry.ownedBy(player.id, 'unit').filter((u) => u.parentId?.startsWith('europe') === true)
        .length * 10;

    const pair = selectSuccession(ctx, 5, byUnitsInEurope);

    expect(pair?.weaker.id).toBe(STRONG);
    expect(pair?.stronger.id).toBe(WEAK);
  });
});

describe('applySuccession', () => {
  let game: ReturnType<typeof createGame>;

  beforeEach(() => {
    game = createGame();
    const pair = selectSuccession(game.ctx, 5);
    if (!pair) throw new Error('expected a succession pair');
    applySuccession(game.ctx, pair);
  });

  it('hands settlements, owned buildings, tiles and missions to the stronger player', () => {
    const { registry } = game;

    expect(registry.require('settlement:19').ownerId).toBe(STRONG);
    expect(registry.require('building:20').ownerId).toBe(STRONG);
    expect(registry.require('building:21').ownerId).toBeNull();
    expect(registry.ownerOf(registry.require('building:21'))).toBe(STRONG);
    expect(registry.require('tile:7').ownerId).toBe(STRONG);
    expect(registry.require('mission:22').ownerId).toBe(STRONG);
  });

  it('moves units, bringing those in Europe over to the stronger Europe', () => {
    const { registry } = game;

    expect(registry.require('unit:17').ownerId).toBe(STRONG);
    expect(registry.require('unit:17').parentId).toBe('tile:7');
    expect(registry.require('unit:18').ownerId).toBe(STRONG);
    expect(registry.require('unit:18').parentId).toBe('europe:11');
  });

  it('kills the weaker player', () => {
    const { registry } = game;

    expect(registry.require(WEAK).attributes.dead).toBe(true);
    expect(registry.lookup('europe:16')).toBeNull();
    expect(registry.ownedBy(WEAK)).toEqual([]);
  });

  it('announces the succession to everyone and fires only once', () => {
    const { ctx, changes } = game;

    const messages = changes.sorted().filter((c) => c.kind === 'message');
    expect(messages.map((c) => (c.kind === 'message' ? c.message : null))).toEqual([
      {
        template: SUCCESSION_MESSAGE,
        args: { loserNation: 'Weak', nation: 'Strong' },
        category: 'diplomacy',
      },
    ]);
    expect(messages[0].see).toEqual({ kind: 'all' });
    expect(ctx.game.attributes.successionFired).toBe(true);
    expect(selectSuccession(ctx, 6)).toBeNull();
  });
});

describe('createSuccessionRule', () => {
  it('only runs at the start of a new turn', () => {
    const { ctx, registry } = createGame();
    const rule = createSuccessionRule();

    rule.run(ctx, { newTurn: false });
    expect(registry.require(WEAK).attributes.dead).toBe(false);

    rule.run(ctx, { newTurn: true });
    expect(registry.require(WEAK).attributes.dead).toBe(true);
  });
});
