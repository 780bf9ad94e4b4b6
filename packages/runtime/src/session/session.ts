// GameSession - one game, one writer
//
// Every request, AI turn and forced end of turn runs on a single promise
// lane, to completion and including its flush, before the next one starts.
// The session owns the registry, knowledge, turn engine and dispatcher of
// its game; nothing is shared between sessions.

import {
  DEFAULT_GAME_RULES,
  type ActionRequest,
  type ActionResponse,
  type ChangeBatch,
  type GameEntity,
  type GameRules,
  type Id,
  type OperationActor,
  type RejectionCode,
  type SaveGame,
  type TurnPhase,
  type TurnState,
} from '@colonia/protocol';
import { prepareAction } from '../actions/index.js';
import { passivePlanner, planWithTimeout, type AiPlanner } from '../ai/driver.js';
import { ChangeSet } from '../changes/change-set.js';
import { Mutator } from '../changes/mutator.js';
import { Projector } from '../changes/projector.js';
import { createSerializerRegistry, type SerializerRegistry } from '../changes/serializers.js';
import type { GameContext } from '../context.js';
import { Dispatcher, type Connection } from '../dispatch/dispatcher.js';
import {
  EntityNotFoundError,
  GameTerminatedError,
  ProtocolError,
  TurnOrderError,
  toRejection,
  type GameError,
} from '../errors.js';
import { IntegrityChecker, type IntegritySummary } from '../integrity/checker.js';
import { consoleLogger, withLogContext, type Logger } from '../logging.js';
import { ClientMirror } from '../mirror/client-mirror.js';
import { EntityRegistry } from '../registry/registry.js';
import { TurnEngine, type GlobalRule } from '../turns/engine.js';
import { DEFAULT_TURN_HOOKS, type TurnHook } from '../turns/hooks.js';
import { createSuccessionRule, type ScoringPolicy } from '../turns/succession.js';
import { createVictoryConditions, type VictoryCondition } from '../turns/victory.js';
import { KnowledgeTracker } from '../visibility/knowledge.js';
import { VisibilityOracle } from '../visibility/oracle.js';
import { createInMemoryAuditStore, type AuditStore } from './audit.js';
import { createWorld, type GameSetup } from './setup.js';

export type GameSessionOptions = {
  gameId?: Id;
  rules?: GameRules;
  logger?: Logger;
  auditStore?: AuditStore;

  /**
   * Planner for every AI player without an entry in `planners`
   */
  planner?: AiPlanner;
  planners?: Record<Id, AiPlanner>;

  /**
   * Run AI turns automatically when control passes to an AI player (default true)
   */
  autoRunAi?: boolean;

  scoring?: ScoringPolicy;
  hooks?: readonly TurnHook[];

  /**
   * Replaces the default global rules (succession)
   */
  globalRules?: readonly GlobalRule[];

  /**
   * Replaces the victory conditions derived from the rules
   */
  victory?: readonly VictoryCondition[];

  serializers?: Partial<SerializerRegistry>;
};

export type PlayerSummary = {
  id: Id;
  name: string;
  isAI: boolean;
  dead: boolean;
};

export type SessionState = {
  gameId: Id;
  turn: number;
  phase: TurnPhase;
  players: PlayerSummary[];
};

type SessionParts = {
  gameId: Id;
  rules: GameRules;
  registry: EntityRegistry;
  turnState: TurnState;
  explored: Record<Id, Id[]>;
  requestSeq: Record<Id, number>;
};

type OperationResult = {
  batch: ChangeBatch | null;
  failure: unknown;
  changeCount: number;
};

export class GameSession {
  readonly gameId: Id;
  readonly rules: GameRules;
  readonly registry: EntityRegistry;
  readonly knowledge: KnowledgeTracker;
  readonly turns: TurnEngine;
  readonly dispatcher: Dispatcher;
  readonly audit: AuditStore;

  private readonly logger: Logger;
  private readonly serializers: SerializerRegistry;
  private readonly planners: Record<Id, AiPlanner>;
  private readonly defaultPlanner: AiPlanner;
  private readonly autoRunAi: boolean;
  private readonly requestSeq: Map<Id, number>;
  private readonly gameEntityId: Id;
  private lane: Promise<void> = Promise.resolve();
  private operationCount = 0;
  private aiRunning = false;
  private turnTimer: NodeJS.Timeout | null = null;
  private timerKey: string | null = null;
  private closed = false;

  private constructor(parts: SessionParts, options: GameSessionOptions) {
    this.gameId = parts.gameId;
    this.rules = parts.rules;
    this.registry = parts.registry;
    this.logger = withLogContext(options.logger ?? consoleLogger, { gameId: parts.gameId });
    this.audit = options.auditStore ?? createInMemoryAuditStore();
    this.serializers = createSerializerRegistry(options.serializers);
    this.planners = options.planners ?? {};
    this.defaultPlanner = options.planner ?? passivePlanner;
    this.autoRunAi = options.autoRunAi ?? true;
    this.requestSeq = new Map(Object.entries(parts.requestSeq));

    const game = this.registry.all('game')[0];
    if (!game) throw new Error('Registry has no game entity');
    this.gameEntityId = game.id;

    this.knowledge = new KnowledgeTracker(this.registry, this.rules.lineOfSight);
    this.knowledge.load(parts.explored);

    this.turns = new TurnEngine(parts.turnState, {
      hooks: options.hooks ?? DEFAULT_TURN_HOOKS,
      globalRules: options.globalRules ?? [createSuccessionRule(options.scoring)],
      victory: options.victory ?? createVictoryConditions(this.rules.victory),
    });

    this.dispatcher = new Dispatcher(this.gameId, this.logger);
    for (const playerId of this.turns.order) {
      this.dispatcher.addObserver(playerId);
      const player = this.registry.lookup(playerId);
      if (player?.attributes.isAI === true) {
        this.dispatcher.attachLocal(playerId, new ClientMirror(playerId));
      }
    }
  }

  /**
   * Start a new game from a setup description.
   */
  static create(setup: GameSetup, options: GameSessionOptions = {}): GameSession {
    const rules = options.rules ?? DEFAULT_GAME_RULES;
    const registry = new EntityRegistry();
    const { players } = createWorld(registry, setup, rules);
    const session = new GameSession(
      {
        gameId: options.gameId ?? crypto.randomUUID(),
        rules,
        registry,
        turnState: TurnEngine.initialState(players),
        explored: {},
        requestSeq: {},
      },
      options
    );
    session.start();
    return session;
  }

  /**
   * Resume a saved game. Ids, the id counter and explored tiles are restored
   * exactly; observers start over with a resync.
   */
  static fromSave(save: SaveGame, options: GameSessionOptions = {}): GameSession {
    const session = new GameSession(
      {
        gameId: save.gameId,
        rules: options.rules ?? save.rules,
        registry: EntityRegistry.fromSnapshot(save.registry),
        turnState: save.turn,
        explored: save.explored,
        requestSeq: save.requestSeq,
      },
      options
    );
    session.start();
    return session;
  }

  get game(): GameEntity {
    return this.registry.require(this.gameEntityId, 'game');
  }

  /**
   * Queue an action request. Resolves once the action, its cascades and the
   * flush to every observer have completed.
   */
  submit(request: ActionRequest): Promise<ActionResponse> {
    return this.enqueue(async () => {
      const response = await this.handleRequest(request, 'client');
      await this.dispatcher.flush();
      return response;
    });
  }

  /**
   * (Re)connect a player. The returned batch replaces the player's mirror;
   * later batches go to `connection` when one is given.
   */
  join(playerId: Id, connection?: Connection): Promise<ChangeBatch> {
    return this.enqueue(async () => {
      const started = performance.now();
      this.registry.require(playerId, 'player');
      if (connection) this.dispatcher.attach(playerId, connection);
      const batch = this.dispatcher.resync(playerId, this.projector(), this.turns.turnNumber);
      await this.record({ playerId, method: 'client' }, 'join', started, 0);
      this.logger.info('Player joined', { playerId, entities: batch.changes.length });
      return batch;
    });
  }

  detach(playerId: Id): void {
    this.dispatcher.detach(playerId);
  }

  /**
   * Last accepted request seq of a player (0 before the first request).
   */
  lastRequestSeq(playerId: Id): number {
    return this.requestSeq.get(playerId) ?? 0;
  }

  state(): SessionState {
    return {
      gameId: this.gameId,
      turn: this.turns.turnNumber,
      phase: this.turns.phase,
      players: this.turns.order.flatMap((id) => {
        const player = this.registry.peek(id);
        if (!player) return [];
        return [
          {
            id,
            name: typeof player.attributes.name === 'string' ? player.attributes.name : id,
            isAI: player.attributes.isAI === true,
            dead: player.attributes.dead === true,
          },
        ];
      }),
    };
  }

  /**
   * Snapshot the game on the lane, between operations.
   */
  save(): Promise<SaveGame> {
    return this.enqueue(() => this.toSave());
  }

  /**
   * Run the integrity checker as its own operation.
   */
  checkIntegrity(fix = true): Promise<IntegritySummary> {
    return this.enqueue(async () => {
      const started = performance.now();
      let summary: IntegritySummary = { checked: 0, repaired: 0, broken: 0, issues: [] };
      const result = this.operate(null, false, (ctx) => {
        summary = this.runIntegrity(ctx.mutate, fix);
      });
      await this.record({ playerId: null, method: 'system' }, 'integrity_check', started, result.changeCount);
      return summary;
    });
  }

  /**
   * Resolves when the lane is empty and every queued batch has been sent.
   */
  async idle(): Promise<void> {
    for (;;) {
      const lane = this.lane;
      await lane;
      if (lane === this.lane) break;
    }
    await this.dispatcher.flush();
  }

  close(): void {
    this.closed = true;
    this.clearTurnTimer();
  }

  // --- Lane ---

  private enqueue<T>(task: () => Promise<T> | T): Promise<T> {
    const run = this.lane.then(task);
    // Failures reach the caller through `run`; the lane itself keeps going.
    this.lane = run.then(
      () => undefined,
      (error: unknown) => {
        this.logger.debug('Lane task rejected', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    );
    return run;
  }

  /**
   * Queue work nobody waits for (AI turns, timeouts).
   */
  private schedule(task: () => Promise<void>): void {
    this.lane = this.lane.then(task).catch((error: unknown) => {
      this.logger.error('Scheduled task failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }

  private start(): void {
    this.knowledge.refresh(this.turns.order);
    for (const playerId of this.turns.order) {
      if (this.dispatcher.localMirror(playerId)) {
        this.dispatcher.resync(playerId, this.projector(), this.turns.turnNumber);
      }
    }
    this.afterOperation();
  }

  // --- Operations ---

  private async handleRequest(
    request: ActionRequest,
    method: OperationActor['method']
  ): Promise<ActionResponse> {
    const started = performance.now();
    const actor: OperationActor = { playerId: request.playerId, method };

    const reject = async (error: GameError): Promise<ActionResponse> => {
      const rejection = error.toRejection();
      await this.record(actor, request.verb, started, 0, rejection.code, rejection.message);
      this.logger.info('Action rejected', {
        playerId: request.playerId,
        verb: request.verb,
        code: rejection.code,
        message: rejection.message,
      });
      return { ok: false, rejection };
    };

    if (request.gameId !== this.gameId) {
      return reject(
        new ProtocolError('Request addressed to another game', {
          expected: this.gameId,
          received: request.gameId,
        })
      );
    }

    const expected = this.lastRequestSeq(request.playerId) + 1;
    if (request.seq !== expected) {
      return reject(
        new ProtocolError('Out-of-sequence request', { expected, received: request.seq })
      );
    }

    const player = this.registry.lookup(request.playerId);
    if (!player || player.kind !== 'player') {
      return reject(new EntityNotFoundError(request.playerId, 'player'));
    }
    this.requestSeq.set(player.id, request.seq);

    if (this.turns.isTerminated()) {
      return reject(new GameTerminatedError(this.gameId));
    }
    const current = this.turns.currentPlayerId();
    if (current !== player.id) {
      return reject(new TurnOrderError(player.id, current));
    }

    const changes = new ChangeSet();
    const prepared = prepareAction(this.context(changes), player, request);
    if (!prepared.ok) {
      return reject(prepared.error);
    }

    const result = this.operate(player.id, prepared.value.suspicious, () => prepared.value.execute(), changes);

    if (result.failure !== null || !result.batch) {
      const rejection = toRejection(result.failure);
      await this.record(actor, request.verb, started, result.changeCount, rejection.code, rejection.message);
      this.afterOperation();
      return { ok: false, rejection };
    }

    await this.record(actor, request.verb, started, result.changeCount);
    this.logger.debug('Action applied', {
      playerId: player.id,
      verb: request.verb,
      changes: result.changeCount,
      durationMs: Math.round(performance.now() - started),
    });
    this.afterOperation();
    return { ok: true, batch: result.batch };
  }

  /**
   * Run a mutation body against a fresh (or given) change set, then check
   * integrity when due and flush to every observer. Once the body has
   * started the operation is committed: a throw is logged and whatever
   * was recorded is still flushed.
   */
  private operate(
    submitterId: Id | null,
    suspicious: boolean,
    body: (ctx: GameContext) => void,
    changes: ChangeSet = new ChangeSet()
  ): OperationResult {
    const ctx = this.context(changes);
    let failure: unknown = null;

    this.registry.bind(changes);
    try {
      try {
        body(ctx);
      } catch (error) {
        failure = error;
        this.logger.error('Operation failed after validation; flushing recorded changes', {
          playerId: submitterId,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      this.operationCount++;
      const interval = this.rules.integrityCheckInterval;
      if (suspicious || failure !== null || (interval > 0 && this.operationCount % interval === 0)) {
        this.runIntegrity(ctx.mutate, true);
      }
    } finally {
      this.registry.bind(null);
    }

    const batch = this.flush(changes, failure === null ? submitterId : null);
    return { batch, failure, changeCount: changes.size };
  }

  private flush(changes: ChangeSet, submitterId: Id | null): ChangeBatch | null {
    const batch = this.dispatcher.dispatch(changes, this.projector(), {
      turn: this.turns.turnNumber,
      submitterId,
    });
    this.knowledge.refresh(this.turns.order);
    this.registry.purgeTombstones();
    return batch;
  }

  private runIntegrity(mutate: Mutator, fix: boolean): IntegritySummary {
    const checker = new IntegrityChecker(this.registry, { logger: this.logger, mutate });
    const summary = checker.checkAll(fix);
    if (summary.issues.length > 0) {
      this.logger.warn('Integrity issues found', {
        checked: summary.checked,
        repaired: summary.repaired,
        broken: summary.broken,
      });
    }
    return summary;
  }

  private context(changes: ChangeSet): GameContext {
    return {
      gameId: this.gameId,
      rules: this.rules,
      registry: this.registry,
      knowledge: this.knowledge,
      mutate: new Mutator(this.registry, changes),
      turns: this.turns,
      logger: this.logger,
      game: this.game,
    };
  }

  private projector(): Projector {
    return new Projector(
      this.registry,
      new VisibilityOracle(this.registry, this.knowledge),
      this.serializers
    );
  }

  private async record(
    actor: OperationActor,
    operation: string,
    started: number,
    changeCount: number,
    errorCode?: RejectionCode,
    error?: string
  ): Promise<void> {
    await this.audit.append({
      id: crypto.randomUUID(),
      gameId: this.gameId,
      timestamp: new Date().toISOString(),
      actor,
      operation,
      turn: this.turns.turnNumber,
      success: errorCode === undefined,
      errorCode,
      error,
      changeCount,
      durationMs: Math.round(performance.now() - started),
    });
  }

  private toSave(): SaveGame {
    return {
      format: 'colonia.save',
      gameId: this.gameId,
      savedAt: new Date().toISOString(),
      rules: this.rules,
      turn: this.turns.state(),
      registry: this.registry.toSnapshot(),
      explored: this.knowledge.toJSON(),
      requestSeq: Object.fromEntries(this.requestSeq),
    };
  }

  // --- Turn control ---

  private afterOperation(): void {
    this.armTurnTimer();
    if (!this.aiRunning) this.scheduleAiTurn();
  }

  private scheduleAiTurn(): void {
    if (this.closed || !this.autoRunAi) return;
    const playerId = this.turns.currentPlayerId();
    if (!playerId || !this.dispatcher.localMirror(playerId)) return;
    const turn = this.turns.turnNumber;
    this.aiRunning = true;
    this.schedule(async () => {
      try {
        await this.runAiTurn(playerId, turn);
      } finally {
        this.aiRunning = false;
      }
      this.scheduleAiTurn();
    });
  }

  private async runAiTurn(playerId: Id, turn: number): Promise<void> {
    const mirror = this.dispatcher.localMirror(playerId);
    if (!mirror || this.closed) return;
    if (this.turns.currentPlayerId() !== playerId || this.turns.turnNumber !== turn) return;

    const started = performance.now();
    const planner = this.planners[playerId] ?? this.defaultPlanner;
    const outcome = await planWithTimeout(planner, mirror, this.rules.aiTimeoutMs, this.logger);
    await this.record(
      { playerId, method: 'ai' },
      'ai_plan',
      started,
      0,
      outcome.status === 'planned' ? undefined : 'INTERNAL_ERROR',
      outcome.status === 'timeout' ? 'planning timed out' : outcome.status === 'failed' ? outcome.error : undefined
    );

    const intents = outcome.status === 'planned' ? outcome.intents : [];
    for (const intent of intents) {
      if (this.turns.currentPlayerId() !== playerId || this.turns.turnNumber !== turn) return;
      await this.handleRequest(
        { ...intent, gameId: this.gameId, playerId, seq: this.lastRequestSeq(playerId) + 1 },
        'ai'
      );
    }

    if (this.turns.currentPlayerId() === playerId && this.turns.turnNumber === turn) {
      await this.handleRequest(
        {
          verb: 'end_turn',
          params: {},
          gameId: this.gameId,
          playerId,
          seq: this.lastRequestSeq(playerId) + 1,
        },
        'ai'
      );
    }
  }

  private armTurnTimer(): void {
    const timeoutMs = this.rules.turnTimeoutMs;
    const playerId = this.turns.currentPlayerId();
    const key = playerId ? `${this.turns.turnNumber}:${playerId}` : null;
    if (key === this.timerKey) return;

    this.clearTurnTimer();
    this.timerKey = key;
    if (timeoutMs === null || !playerId || this.closed) return;

    const turn = this.turns.turnNumber;
    this.turnTimer = setTimeout(() => {
      this.turnTimer = null;
      this.schedule(() => this.forceEndTurn(playerId, turn));
    }, timeoutMs);
    this.turnTimer.unref();
  }

  private clearTurnTimer(): void {
    if (this.turnTimer) {
      clearTimeout(this.turnTimer);
      this.turnTimer = null;
    }
  }

  private async forceEndTurn(playerId: Id, turn: number): Promise<void> {
    if (this.closed || this.turns.currentPlayerId() !== playerId || this.turns.turnNumber !== turn) {
      return;
    }
    const started = performance.now();
    this.logger.info('Turn timed out', { playerId, turn });
    const result = this.operate(null, false, (ctx) => this.turns.endTurn(ctx));
    const rejection = result.failure === null ? null : toRejection(result.failure);
    await this.record(
      { playerId, method: 'timer' },
      'end_turn',
      started,
      result.changeCount,
      rejection?.code,
      rejection?.message
    );
    this.afterOperation();
  }
}
