// @colonia/protocol
// Shared types, wire schemas and save format

export * from './types/index.js';

export {
  actionRequestSchema,
  moveUnitParamsSchema,
  attackParamsSchema,
  foundSettlementParamsSchema,
  joinSettlementParamsSchema,
  buyGoodsParamsSchema,
  moveToAmericaParamsSchema,
  disbandUnitParamsSchema,
  endTurnParamsSchema,
  parseActionRequest,
  type ParseActionRequestResult,
} from './validation/actions.js';

export { changeBatchSchema, parseChangeBatch } from './validation/batches.js';

export {
  DEFAULT_GAME_RULES,
  rulesOverrideSchema,
  resolveGameRules,
  parseGameRules,
  type GameRulesOverride,
} from './validation/rules.js';

export {
  gameEntitySchema,
  saveHeaderSchema,
  toSaveHeader,
  parseSaveGame,
  type SaveHeader,
} from './validation/save.js';

export { parseEntityLines, stringifyEntityLines } from './bundle/ndjson.js';

export {
  SAVE_FILES,
  GAME_ID_PATTERN,
  isValidGameId,
  saveBundlePath,
  gameJsonPath,
  entitiesNdjsonPath,
} from './bundle/paths.js';
