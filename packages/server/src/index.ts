// @colonia/server
// tRPC surface over the game sessions running in this process

export { appRouter, type AppRouter } from './trpc/routers/index.js';
export { createContext, type Context, type CreateContextOptions } from './trpc/context.js';
export { createCallerFactory } from './trpc/index.js';
export { toTRPCError } from './trpc/errors.js';
export {
  SessionManager,
  GameNotFoundError,
  type SessionManagerOptions,
  type PullResult,
} from './sessions/manager.js';
export { Mailbox, DEFAULT_MAILBOX_CAPACITY } from './sessions/mailbox.js';
export { EventBus } from './events/bus.js';
export type { ServerEvent, EventHandler } from './events/types.js';
export { loadConfig, loadRules, type ServerConfig } from './config.js';
export { createGameStorage, type GameStorage } from './storage.js';
export { getAuthFromHeaders, PLAYER_HEADER } from './auth/dev-auth.js';
export type { AuthContext, AuthResult } from './auth/types.js';
