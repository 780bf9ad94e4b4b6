// Mapping of server and game errors onto tRPC errors

import type { Rejection } from '@colonia/protocol';
import { EntityNotFoundError, GameError, ProtocolError } from '@colonia/runtime';
import { ZodError } from 'zod';
import { GameNotFoundError } from '../sessions/manager.js';
import { TRPCError } from './index.js';

/**
 * Convert anything thrown below a procedure into a TRPCError. The original
 * error is kept as the cause.
 */
export function toTRPCError(error: unknown): TRPCError {
  if (error instanceof TRPCError) return error;
  if (error instanceof GameNotFoundError) {
    return new TRPCError({ code: 'NOT_FOUND', message: error.message, cause: error });
  }
  if (error instanceof ProtocolError) {
    return new TRPCError({ code: 'BAD_REQUEST', message: error.message, cause: error });
  }
  if (error instanceof EntityNotFoundError) {
    return new TRPCError({ code: 'NOT_FOUND', message: error.message, cause: error });
  }
  if (error instanceof GameError) {
    return new TRPCError({ code: 'BAD_REQUEST', message: error.message, cause: error });
  }
  if (error instanceof ZodError) {
    return new TRPCError({ code: 'BAD_REQUEST', message: 'Invalid input', cause: error });
  }
  return new TRPCError({
    code: 'INTERNAL_SERVER_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
    cause: error,
  });
}

/**
 * Protocol-level rejections are connection errors, not game outcomes.
 */
export function protocolRejectionError(rejection: Rejection): TRPCError {
  return toTRPCError(new ProtocolError(rejection.message, rejection.details));
}

/**
 * Run a procedure body, mapping failures with toTRPCError.
 */
export async function guard<T>(body: () => Promise<T> | T): Promise<T> {
  try {
    return await body();
  } catch (error) {
    throw toTRPCError(error);
  }
}
