// tRPC middleware for authentication

import { middleware, publicProcedure, TRPCError } from './index.js';

const isAuthenticated = middleware(async ({ ctx, next }) => {
  if (!ctx.auth) {
    throw new TRPCError({
      code: 'UNAUTHORIZED',
      message: 'Authentication required',
    });
  }

  return next({
    ctx: {
      ...ctx,
      auth: ctx.auth,
    },
  });
});

/**
 * Protected procedure - the caller must name a player seat.
 */
export const protectedProcedure = publicProcedure.use(isAuthenticated);
