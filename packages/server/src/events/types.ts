// Server event types

import type { Id, Timestamp } from '@colonia/protocol';

type BaseEvent = {
  id: string;
  timestamp: Timestamp;
  gameId: Id;
  playerId: Id;
};

/**
 * A batch landed in a player's mailbox.
 */
export type BatchReadyEvent = BaseEvent & {
  type: 'batch_ready';
  payload: { sequence: number };
};

/**
 * A player's mailbox overflowed; the player must rejoin.
 */
export type MailboxOverflowEvent = BaseEvent & {
  type: 'mailbox_overflow';
  payload: { capacity: number };
};

export type ServerEvent = BatchReadyEvent | MailboxOverflowEvent;

export type EventHandler = (event: ServerEvent) => void | Promise<void>;
