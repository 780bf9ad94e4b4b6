// tRPC request context

import type { Logger } from '@colonia/runtime';
import { getAuthFromHeaders, type RequestHeaders } from '../auth/dev-auth.js';
import type { AuthContext } from '../auth/types.js';
import type { SessionManager } from '../sessions/manager.js';

export type Context = {
  manager: SessionManager;

  /** Authenticated player seat (null if not authenticated) */
  auth: AuthContext | null;

  logger: Logger;
};

export type CreateContextOptions = {
  headers: RequestHeaders;
  manager: SessionManager;
  logger: Logger;
  nodeEnv: string;
};

export function createContext(opts: CreateContextOptions): Context {
  const authResult = getAuthFromHeaders(opts.headers, opts.nodeEnv);
  return {
    manager: opts.manager,
    auth: authResult.success ? authResult.auth : null,
    logger: opts.logger,
  };
}
