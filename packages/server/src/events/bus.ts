// In-memory event pub/sub
//
// Wakes long-polling `pull` calls when a batch lands in a mailbox.
// Subscriptions are per player seat: "<gameId>/<playerId>".

import type { Id } from '@colonia/protocol';
import type { Logger } from '@colonia/runtime';
import type { EventHandler, ServerEvent } from './types.js';

export function channelOf(gameId: Id, playerId: Id): string {
  return `${gameId}/${playerId}`;
}

export class EventBus {
  private subscriptions: Map<string, Set<EventHandler>> = new Map();
  private nextId = 0;

  constructor(private readonly logger: Logger) {}

  /**
   * Subscribe to one player's events in one game.
   *
   * @returns Unsubscribe function
   */
  subscribe(gameId: Id, playerId: Id, handler: EventHandler): () => void {
    const channel = channelOf(gameId, playerId);
    let handlers = this.subscriptions.get(channel);
    if (!handlers) {
      handlers = new Set();
      this.subscriptions.set(channel, handlers);
    }
    handlers.add(handler);

    return () => {
      const subs = this.subscriptions.get(channel);
      if (subs) {
        subs.delete(handler);
        if (subs.size === 0) {
          this.subscriptions.delete(channel);
        }
      }
    };
  }

  /**
   * Publish an event to every subscriber of its channel. A failing
   * handler is logged and does not stop the others.
   */
  async publish(event: ServerEvent): Promise<void> {
    const subs = this.subscriptions.get(channelOf(event.gameId, event.playerId));
    if (!subs || subs.size === 0) {
      return;
    }

    const results = await Promise.allSettled(
      [...subs].map(async (handler) => handler(event))
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error('Event handler failed', {
          type: event.type,
          gameId: event.gameId,
          playerId: event.playerId,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    }
  }

  generateEventId(): string {
    return `evt_${Date.now()}_${++this.nextId}`;
  }

  subscriberCount(gameId: Id, playerId: Id): number {
    return this.subscriptions.get(channelOf(gameId, playerId))?.size ?? 0;
  }
}
