// Session Manager - every running game on this server
//
// Games are independent: each has its own GameSession and nothing is
// shared between them. The manager owns the player mailboxes and moves
// snapshots between sessions and the game repository.

import {
  isValidGameId,
  resolveGameRules,
  type ActionRequest,
  type ActionResponse,
  type ChangeBatch,
  type GameRules,
  type GameRulesOverride,
  type Id,
  type SavedGameSummary,
} from '@colonia/protocol';
import { summarizeSave, type GameRepository, type SavedGameFilter } from '@colonia/repositories';
import {
  GameSession,
  ProtocolError,
  type ConnectionState,
  type GameSessionOptions,
  type GameSetup,
  type Logger,
} from '@colonia/runtime';
import { EventBus } from '../events/bus.js';
import { DEFAULT_MAILBOX_CAPACITY, Mailbox } from './mailbox.js';

/**
 * No running or stored game has this id.
 */
export class GameNotFoundError extends Error {
  constructor(readonly gameId: Id) {
    super(`Game not found: ${gameId}`);
    this.name = 'GameNotFoundError';
  }
}

export type SessionManagerOptions = {
  repository: GameRepository;
  logger: Logger;

  /**
   * Rules for new games before per-game overrides
   */
  rules: GameRules;

  mailboxCapacity?: number;

  /**
   * Passed to every session (planners, AI autorun, hooks)
   */
  sessionOptions?: Omit<GameSessionOptions, 'gameId' | 'rules' | 'logger'>;
};

export type PullResult = {
  batches: ChangeBatch[];

  /**
   * The mailbox overflowed or a send failed; rejoin to resync
   */
  resyncRequired: boolean;
};

export class SessionManager {
  readonly bus: EventBus;

  private readonly sessions = new Map<Id, GameSession>();
  private readonly mailboxes = new Map<string, Mailbox>();
  private readonly repository: GameRepository;
  private readonly logger: Logger;
  private readonly rules: GameRules;
  private readonly mailboxCapacity: number;
  private readonly sessionOptions: SessionManagerOptions['sessionOptions'];

  constructor(options: SessionManagerOptions) {
    this.repository = options.repository;
    this.logger = options.logger;
    this.rules = options.rules;
    this.mailboxCapacity = options.mailboxCapacity ?? DEFAULT_MAILBOX_CAPACITY;
    this.sessionOptions = options.sessionOptions;
    this.bus = new EventBus(options.logger);
  }

  // --- Games ---

  create(setup: GameSetup, overrides?: GameRulesOverride, gameId?: Id): GameSession {
    if (gameId !== undefined && !isValidGameId(gameId)) {
      throw new ProtocolError('Invalid game id', { gameId });
    }
    if (gameId !== undefined && this.sessions.has(gameId)) {
      throw new ProtocolError('Game already running', { gameId });
    }
    const session = GameSession.create(setup, {
      ...this.sessionOptions,
      gameId,
      rules: resolveGameRules(overrides, this.rules),
      logger: this.logger,
    });
    this.sessions.set(session.gameId, session);
    this.logger.info('Game created', {
      gameId: session.gameId,
      players: session.turns.order.length,
    });
    return session;
  }

  get(gameId: Id): GameSession {
    const session = this.sessions.get(gameId);
    if (!session) throw new GameNotFoundError(gameId);
    return session;
  }

  running(): Id[] {
    return [...this.sessions.keys()];
  }

  // --- Players ---

  /**
   * (Re)connect a player with a fresh mailbox. The returned batch is a
   * full resync; later batches are pulled from the mailbox.
   */
  async join(gameId: Id, playerId: Id): Promise<ChangeBatch> {
    const session = this.get(gameId);
    const mailbox = new Mailbox(gameId, playerId, this.bus, this.mailboxCapacity);
    const batch = await session.join(playerId, mailbox);
    this.mailboxes.set(mailboxKey(gameId, playerId), mailbox);
    return batch;
  }

  submit(gameId: Id, request: ActionRequest): Promise<ActionResponse> {
    return this.get(gameId).submit(request);
  }

  /**
   * Batches after `afterSequence`. When there are none, waits up to
   * `waitMs` for the next one to arrive.
   */
  async pull(gameId: Id, playerId: Id, afterSequence: number, waitMs = 0): Promise<PullResult> {
    const session = this.get(gameId);
    const mailbox = this.mailbox(gameId, playerId);

    if (mailbox.after(afterSequence).length === 0 && waitMs > 0) {
      await new Promise<void>((resolve) => {
        const done = () => {
          clearTimeout(timer);
          unsubscribe();
          resolve();
        };
        const timer = setTimeout(done, waitMs);
        const unsubscribe = this.bus.subscribe(gameId, playerId, done);
      });
    }

    return {
      batches: mailbox.after(afterSequence),
      resyncRequired: session.dispatcher.connectionState(playerId) === 'failed',
    };
  }

  ack(gameId: Id, playerId: Id, sequence: number): number {
    this.get(gameId);
    return this.mailbox(gameId, playerId).ack(sequence);
  }

  connectionState(gameId: Id, playerId: Id): ConnectionState {
    return this.get(gameId).dispatcher.connectionState(playerId);
  }

  // --- Persistence ---

  async save(gameId: Id): Promise<SavedGameSummary> {
    const save = await this.get(gameId).save();
    await this.repository.save(save);
    this.logger.info('Game saved', { gameId, turn: save.turn.turn });
    return summarizeSave(save);
  }

  /**
   * Resume a stored game, replacing a running session of the same id.
   * Connected players have to rejoin.
   */
  async load(gameId: Id): Promise<GameSession> {
    const save = await this.repository.load(gameId);
    if (!save) throw new GameNotFoundError(gameId);

    this.unload(gameId);
    const session = GameSession.fromSave(save, {
      ...this.sessionOptions,
      logger: this.logger,
    });
    this.sessions.set(gameId, session);
    this.logger.info('Game loaded', { gameId, turn: save.turn.turn });
    return session;
  }

  list(filter?: SavedGameFilter): Promise<SavedGameSummary[]> {
    return this.repository.list(filter);
  }

  close(): void {
    for (const gameId of [...this.sessions.keys()]) {
      this.unload(gameId);
    }
  }

  private unload(gameId: Id): void {
    const session = this.sessions.get(gameId);
    if (!session) return;
    session.close();
    this.sessions.delete(gameId);
    for (const playerId of session.turns.order) {
      this.mailboxes.delete(mailboxKey(gameId, playerId));
    }
  }

  private mailbox(gameId: Id, playerId: Id): Mailbox {
    const mailbox = this.mailboxes.get(mailboxKey(gameId, playerId));
    if (!mailbox) throw new ProtocolError('Player has not joined', { gameId, playerId });
    return mailbox;
  }
}

function mailboxKey(gameId: Id, playerId: Id): string {
  return `${gameId}/${playerId}`;
}
