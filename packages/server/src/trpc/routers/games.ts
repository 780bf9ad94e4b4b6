// Games router - game lifecycle, action submission and change delivery

import { z } from 'zod';
import { GAME_ID_PATTERN, parseActionRequest, rulesOverrideSchema } from '@colonia/protocol';
import { GameError, ProtocolError } from '@colonia/runtime';
import { router, publicProcedure } from '../index.js';
import { protectedProcedure } from '../middleware.js';
import { guard, protocolRejectionError, toTRPCError } from '../errors.js';

const gameId = z.string().regex(GAME_ID_PATTERN, 'Invalid game id');

const coords = z.object({
  x: z.number().int().min(0),
  y: z.number().int().min(0),
});

const setupSchema = z.object({
  width: z.number().int().min(1).max(256),
  height: z.number().int().min(1).max(256),
  terrain: z.record(z.string()).optional(),
  players: z
    .array(
      z.object({
        name: z.string().min(1).max(64),
        nation: z.string().min(1).max(64).optional(),
        isAI: z.boolean().optional(),
        isREF: z.boolean().optional(),
        gold: z.number().int().min(0).optional(),
        start: coords,
        entry: coords.optional(),
        units: z
          .array(
            z.object({
              unitType: z.string().min(1),
              at: z.enum(['start', 'europe']).optional(),
            })
          )
          .optional(),
      })
    )
    .min(1)
    .max(16),
});

export const gamesRouter = router({
  /**
   * Start a new game. Player ids are assigned in setup order.
   */
  create: publicProcedure
    .input(
      z.object({
        gameId: gameId.optional(),
        setup: setupSchema,
        rules: rulesOverrideSchema.optional(),
      })
    )
    .mutation(({ ctx, input }) =>
      guard(() => {
        try {
          return ctx.manager.create(input.setup, input.rules, input.gameId).state();
        } catch (error) {
          if (error instanceof GameError) throw error;
          throw new ProtocolError(
            `Invalid setup: ${error instanceof Error ? error.message : String(error)}`
          );
        }
      })
    ),

  /**
   * (Re)connect as the authenticated player. Returns a full resync batch;
   * everything after it is pulled from the player's mailbox.
   */
  join: protectedProcedure
    .input(z.object({ gameId }))
    .mutation(({ ctx, input }) => guard(() => ctx.manager.join(input.gameId, ctx.auth.playerId))),

  /**
   * Submit an action. Game rejections come back as data; malformed or
   * out-of-sequence requests fail with BAD_REQUEST.
   */
  submit: protectedProcedure
    .input(z.object({ gameId }).passthrough())
    .mutation(async ({ ctx, input }) => {
      const parsed = parseActionRequest({ ...input, playerId: ctx.auth.playerId });
      if (!parsed.success) {
        throw toTRPCError(new ProtocolError('Malformed request', { issues: parsed.issues }));
      }

      const response = await guard(() => ctx.manager.submit(input.gameId, parsed.request));
      if (!response.ok && response.rejection.code === 'PROTOCOL_ERROR') {
        throw protocolRejectionError(response.rejection);
      }
      return response;
    }),

  /**
   * Batches after `afterSequence`, waiting up to `waitMs` when there are none.
   */
  pull: protectedProcedure
    .input(
      z.object({
        gameId,
        afterSequence: z.number().int().min(0),
        waitMs: z.number().int().min(0).max(30_000).default(0),
      })
    )
    .query(({ ctx, input }) =>
      guard(() =>
        ctx.manager.pull(input.gameId, ctx.auth.playerId, input.afterSequence, input.waitMs)
      )
    ),

  /**
   * Drop delivered batches up to and including `sequence`.
   */
  ack: protectedProcedure
    .input(z.object({ gameId, sequence: z.number().int().min(0) }))
    .mutation(({ ctx, input }) =>
      guard(() => ({
        dropped: ctx.manager.ack(input.gameId, ctx.auth.playerId, input.sequence),
      }))
    ),

  state: publicProcedure
    .input(z.object({ gameId }))
    .query(({ ctx, input }) => guard(() => ctx.manager.get(input.gameId).state())),

  save: publicProcedure
    .input(z.object({ gameId }))
    .mutation(({ ctx, input }) => guard(() => ctx.manager.save(input.gameId))),

  /**
   * Resume a stored game. Connected players must rejoin.
   */
  load: publicProcedure
    .input(z.object({ gameId }))
    .mutation(({ ctx, input }) =>
      guard(async () => (await ctx.manager.load(input.gameId)).state())
    ),

  list: publicProcedure
    .input(
      z
        .object({
          limit: z.number().int().min(1).max(100).default(50),
          offset: z.number().int().min(0).default(0),
        })
        .default({})
    )
    .query(({ ctx, input }) => guard(() => ctx.manager.list(input))),
});
