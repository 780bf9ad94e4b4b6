// tRPC initialization
//
// superjson transformer; the error formatter exposes the game rejection
// code (PROTOCOL_ERROR, NOT_FOUND, ...) next to the tRPC code.

import { initTRPC, TRPCError } from '@trpc/server';
import superjson from 'superjson';
import { GameError } from '@colonia/runtime';
import type { Context } from './context.js';

const t = initTRPC.context<Context>().create({
  transformer: superjson,
  errorFormatter({ shape, error }) {
    return {
      ...shape,
      data: {
        ...shape.data,
        code: error.code,
        rejectionCode: error.cause instanceof GameError ? error.cause.code : null,
      },
    };
  },
});

export const router = t.router;

/**
 * No auth required (listing, loading, creating games)
 */
export const publicProcedure = t.procedure;

export const middleware = t.middleware;

export const createCallerFactory = t.createCallerFactory;

export { TRPCError };
