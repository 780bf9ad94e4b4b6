// Authentication context types for the API layer

import type { Id } from '@colonia/protocol';

/**
 * The authenticated caller: a player seat in some game.
 */
export type AuthContext = {
  playerId: Id;
};

/**
 * Result of an authentication check.
 */
export type AuthResult =
  | { success: true; auth: AuthContext }
  | { success: false; error: string };
