// Mailbox - a player's dispatcher connection over request/response
//
// Batches wait here until the client pulls and acknowledges them. A full
// mailbox refuses the next batch; the dispatcher then marks the connection
// failed and the player has to rejoin for a resync.

import type { ChangeBatch, Id } from '@colonia/protocol';
import type { Connection } from '@colonia/runtime';
import type { EventBus } from '../events/bus.js';

export const DEFAULT_MAILBOX_CAPACITY = 256;

export class Mailbox implements Connection {
  private batches: ChangeBatch[] = [];

  constructor(
    readonly gameId: Id,
    readonly playerId: Id,
    private readonly bus: EventBus,
    readonly capacity: number = DEFAULT_MAILBOX_CAPACITY
  ) {}

  get size(): number {
    return this.batches.length;
  }

  async send(batch: ChangeBatch): Promise<void> {
    if (this.batches.length >= this.capacity) {
      await this.bus.publish({
        id: this.bus.generateEventId(),
        type: 'mailbox_overflow',
        timestamp: new Date().toISOString(),
        gameId: this.gameId,
        playerId: this.playerId,
        payload: { capacity: this.capacity },
      });
      throw new Error(`Mailbox full for ${this.playerId} (${this.capacity} batches)`);
    }

    this.batches.push(batch);
    await this.bus.publish({
      id: this.bus.generateEventId(),
      type: 'batch_ready',
      timestamp: new Date().toISOString(),
      gameId: this.gameId,
      playerId: this.playerId,
      payload: { sequence: batch.sequence },
    });
  }

  /**
   * Batches with a sequence above `sequence`, oldest first.
   */
  after(sequence: number): ChangeBatch[] {
    return this.batches.filter((batch) => batch.sequence > sequence);
  }

  /**
   * Drop every batch up to and including `sequence`.
   * @returns How many batches were dropped
   */
  ack(sequence: number): number {
    const before = this.batches.length;
    this.batches = this.batches.filter((batch) => batch.sequence > sequence);
    return before - this.batches.length;
  }
}
