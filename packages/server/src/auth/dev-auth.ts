// Development mode authentication
//
// Outside production the caller names its player seat in the
// `x-player-id` header and is trusted. Production has no token
// verification yet and rejects every caller.

import type { AuthResult } from './types.js';

export const PLAYER_HEADER = 'x-player-id';

/**
 * Header bag as found on a Node request.
 */
export type RequestHeaders = Record<string, string | string[] | undefined>;

export function getAuthFromHeaders(
  headers: RequestHeaders,
  nodeEnv: string = process.env.NODE_ENV ?? 'development'
): AuthResult {
  if (nodeEnv === 'production') {
    return {
      success: false,
      error: 'Authentication required. Production auth not yet implemented.',
    };
  }

  const value = headers[PLAYER_HEADER];
  const playerId = Array.isArray(value) ? value[0] : value;
  if (!playerId) {
    return { success: false, error: `Missing ${PLAYER_HEADER} header` };
  }
  return { success: true, auth: { playerId } };
}
