// Audit types - one entry per operation on a session

import type { Id, Timestamp } from './common.js';
import type { RejectionCode } from './actions.js';

/**
 * Who started an operation.
 */
export type OperationActor = {
  playerId: Id | null;
  method: 'client' | 'ai' | 'timer' | 'system';
};

/**
 * Audit entry recorded for every operation, accepted or rejected.
 */
export type OperationAuditEntry = {
  id: Id;
  gameId: Id;
  timestamp: Timestamp;
  actor: OperationActor;

  /**
   * Action verb, or a system operation name such as "ai_turn"
   */
  operation: string;

  turn: number;
  success: boolean;
  errorCode?: RejectionCode;
  error?: string;

  /**
   * Number of changes recorded in the operation's change set
   */
  changeCount: number;

  durationMs: number;
};
