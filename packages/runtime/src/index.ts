// @colonia/runtime
// Authoritative game state, change propagation and turn control

// Session (the single-writer lane per game)
export {
  GameSession,
  type GameSessionOptions,
  type PlayerSummary,
  type SessionState,
} from './session/session.js';
export {
  createWorld,
  addPlayer,
  UNIT_TYPES,
  DEFAULT_UNITS,
  type GameSetup,
  type PlayerSetup,
  type UnitSetup,
} from './session/setup.js';
export {
  createInMemoryAuditStore,
  type AuditStore,
  type AuditQueryFilter,
  type AuditQueryOptions,
} from './session/audit.js';

// Error types
export {
  GameError,
  ValidationError,
  EntityNotFoundError,
  OwnershipError,
  TurnOrderError,
  ProtocolError,
  ReentrancyError,
  GameTerminatedError,
  toRejection,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  withLogContext,
  type Logger,
  type LogEntry,
} from './logging.js';

// Entity registry
export {
  EntityRegistry,
  cloneEntity,
  numberAttr,
  stringAttr,
  isLivePlayer,
  type RegisterInput,
} from './registry/registry.js';

// Visibility
export { KnowledgeTracker } from './visibility/knowledge.js';
export { VisibilityOracle } from './visibility/oracle.js';

// Changes and projection
export { ChangeSet, type ChangeInput } from './changes/change-set.js';
export { Mutator } from './changes/mutator.js';
export { Projector, type Projection } from './changes/projector.js';
export {
  createSerializerRegistry,
  fieldSerializer,
  isSummaryField,
  type EntitySerializer,
  type SerializerRegistry,
} from './changes/serializers.js';

// Dispatch and client mirror
export {
  Dispatcher,
  type Connection,
  type ConnectionState,
  type DispatchOptions,
} from './dispatch/dispatcher.js';
export { ClientMirror, type MirrorView } from './mirror/client-mirror.js';

// Turns
export {
  TurnEngine,
  VICTORY_MESSAGE,
  type GlobalRule,
  type TurnEngineOptions,
} from './turns/engine.js';
export { DEFAULT_TURN_HOOKS, resetMovesHook, upkeepHook, type TurnHook } from './turns/hooks.js';
export { livePlayers, killPlayer, europeOf } from './turns/players.js';
export {
  SUCCESSION_MESSAGE,
  createSuccessionRule,
  defaultScoring,
  selectSuccession,
  applySuccession,
  type ScoringPolicy,
  type SuccessionPair,
} from './turns/succession.js';
export {
  createVictoryConditions,
  lastPlayerStanding,
  lastHumanStanding,
  type VictoryCondition,
  type VictoryResult,
} from './turns/victory.js';

// Actions
export {
  prepareAction,
  endTurnHandler,
  attackHandler,
  buyGoodsHandler,
  disbandUnitHandler,
  foundSettlementHandler,
  joinSettlementHandler,
  moveToAmericaHandler,
  moveUnitHandler,
  ok,
  fail,
  prepare,
  type ActionHandler,
  type ActionResult,
  type PreparedAction,
} from './actions/index.js';

// Integrity
export {
  IntegrityChecker,
  REQUIRED_REFS,
  type IntegrityReport,
  type IntegrityStatus,
  type IntegritySummary,
  type IntegrityWarning,
} from './integrity/checker.js';

// AI
export { passivePlanner, planWithTimeout, type AiPlanner, type PlanOutcome } from './ai/driver.js';

export type { GameContext } from './context.js';
