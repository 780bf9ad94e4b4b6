// Operation context handed to action handlers, turn hooks and global rules

import type { GameEntity, GameRules, Id } from '@colonia/protocol';
import type { Mutator } from './changes/mutator.js';
import type { Logger } from './logging.js';
import type { EntityRegistry } from './registry/registry.js';
import type { TurnEngine } from './turns/engine.js';
import type { KnowledgeTracker } from './visibility/knowledge.js';

export type GameContext = {
  gameId: Id;
  rules: GameRules;
  registry: EntityRegistry;
  knowledge: KnowledgeTracker;

  /**
   * Mutation helpers bound to the operation's change set
   */
  mutate: Mutator;

  turns: TurnEngine;
  logger: Logger;

  /**
   * Root of the containment tree
   */
  game: GameEntity;
};
