// Game error types
//
// Every rejection a client can receive originates from one of these.
// Handlers return them from validation; the session converts anything
// thrown during an operation into a Rejection.

import type { EntityKind, Id, Rejection, RejectionCode } from '@colonia/protocol';

/**
 * Base class for all game errors.
 */
export class GameError extends Error {
  readonly code: RejectionCode;

  constructor(code: RejectionCode, message: string) {
    super(message);
    this.name = 'GameError';
    this.code = code;
  }

  toRejection(): Rejection {
    return { code: this.code, message: this.message };
  }
}

/**
 * The action violates a rule precondition (illegal location, no moves left,
 * insufficient gold).
 */
export class ValidationError extends GameError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }

  override toRejection(): Rejection {
    const rejection: Rejection = { code: this.code, message: this.message };
    if (this.field !== undefined) rejection.field = this.field;
    if (this.details !== undefined) rejection.details = this.details;
    return rejection;
  }
}

/**
 * An id in a request does not resolve to a live entity of the expected kind.
 */
export class EntityNotFoundError extends GameError {
  readonly entityId: Id;
  readonly expectedKind?: EntityKind;

  constructor(entityId: Id, expectedKind?: EntityKind) {
    super(
      'NOT_FOUND',
      expectedKind ? `${expectedKind} not found: ${entityId}` : `Entity not found: ${entityId}`
    );
    this.name = 'EntityNotFoundError';
    this.entityId = entityId;
    this.expectedKind = expectedKind;
  }
}

/**
 * The entity exists but belongs to someone else.
 */
export class OwnershipError extends GameError {
  readonly entityId: Id;
  readonly playerId: Id;

  constructor(entityId: Id, playerId: Id) {
    super('OWNERSHIP_ERROR', `${entityId} is not owned by ${playerId}`);
    this.name = 'OwnershipError';
    this.entityId = entityId;
    this.playerId = playerId;
  }
}

/**
 * An action arrived from a player whose turn it is not.
 */
export class TurnOrderError extends GameError {
  readonly playerId: Id;
  readonly currentPlayerId: Id | null;

  constructor(playerId: Id, currentPlayerId: Id | null) {
    super('NOT_YOUR_TURN', `It is not ${playerId}'s turn`);
    this.name = 'TurnOrderError';
    this.playerId = playerId;
    this.currentPlayerId = currentPlayerId;
  }
}

/**
 * Malformed or out-of-sequence message. Never changes game state.
 */
export class ProtocolError extends GameError {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super('PROTOCOL_ERROR', message);
    this.name = 'ProtocolError';
    this.details = details;
  }

  override toRejection(): Rejection {
    return this.details
      ? { code: this.code, message: this.message, details: this.details }
      : { code: this.code, message: this.message };
  }
}

/**
 * A turn advance was requested while another one is running.
 */
export class ReentrancyError extends GameError {
  constructor(gameId: Id) {
    super('REENTRANT_ADVANCE', `Turn advance already in progress for game ${gameId}`);
    this.name = 'ReentrancyError';
  }
}

/**
 * The game has ended; no further actions are accepted.
 */
export class GameTerminatedError extends GameError {
  constructor(gameId: Id) {
    super('GAME_TERMINATED', `Game ${gameId} has ended`);
    this.name = 'GameTerminatedError';
  }
}

/**
 * Convert anything thrown during an operation into a rejection.
 * Unknown errors become INTERNAL_ERROR.
 */
export function toRejection(error: unknown): Rejection {
  if (error instanceof GameError) {
    return error.toRejection();
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}
