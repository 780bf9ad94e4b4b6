// Dispatcher - fans a committed change set out to every observer
//
// Each observer has a strictly increasing batch sequence, a known-id set
// and an output queue drained independently of the game lane. A failing
// connection is marked failed and skipped until the observer resyncs.

import type { ChangeBatch, Id } from '@colonia/protocol';
import type { ChangeSet } from '../changes/change-set.js';
import type { Projector } from '../changes/projector.js';
import type { Logger } from '../logging.js';
import type { ClientMirror } from '../mirror/client-mirror.js';

/**
 * Transport to one observer. `send` may be slow or fail; neither blocks the game.
 */
export interface Connection {
  send(batch: ChangeBatch): Promise<void> | void;
}

export type ConnectionState = 'open' | 'failed' | 'detached';

type ObserverChannel = {
  observerId: Id;
  sequence: number;
  known: Set<Id>;
  connection: Connection | null;
  state: ConnectionState;
  tail: Promise<void>;

  /**
   * In-process mirror (AI players); receives every batch synchronously
   */
  local: ClientMirror | null;
};

export type DispatchOptions = {
  turn: number;

  /**
   * Observer whose batch is returned instead of queued
   */
  submitterId: Id | null;
};

export class Dispatcher {
  private readonly channels = new Map<Id, ObserverChannel>();

  constructor(
    private readonly gameId: Id,
    private readonly logger: Logger
  ) {}

  addObserver(observerId: Id): void {
    if (this.channels.has(observerId)) return;
    this.channels.set(observerId, {
      observerId,
      sequence: 0,
      known: new Set(),
      connection: null,
      state: 'detached',
      tail: Promise.resolve(),
      local: null,
    });
  }

  observers(): Id[] {
    return [...this.channels.keys()];
  }

  /**
   * Route an observer's batches to a connection, replacing any previous one.
   */
  attach(observerId: Id, connection: Connection): void {
    const channel = this.channel(observerId);
    channel.connection = connection;
    channel.state = 'open';
    channel.tail = Promise.resolve();
  }

  attachLocal(observerId: Id, mirror: ClientMirror): void {
    this.channel(observerId).local = mirror;
  }

  detach(observerId: Id): void {
    const channel = this.channels.get(observerId);
    if (!channel) return;
    channel.connection = null;
    channel.state = 'detached';
  }

  connectionState(observerId: Id): ConnectionState {
    return this.channels.get(observerId)?.state ?? 'detached';
  }

  sequenceOf(observerId: Id): number {
    return this.channels.get(observerId)?.sequence ?? 0;
  }

  knownBy(observerId: Id): ReadonlySet<Id> {
    return this.channels.get(observerId)?.known ?? new Set();
  }

  localMirror(observerId: Id): ClientMirror | null {
    return this.channels.get(observerId)?.local ?? null;
  }

  /**
   * Project the change set for every observer and deliver the non-empty
   * results. The submitter always gets a batch (possibly empty), returned
   * rather than queued.
   */
  dispatch(changes: ChangeSet, projector: Projector, options: DispatchOptions): ChangeBatch | null {
    let reply: ChangeBatch | null = null;

    for (const channel of this.channels.values()) {
      const isSubmitter = channel.observerId === options.submitterId;
      const projection = projector.project(changes, channel.observerId, channel.known);
      if (projection.changes.length === 0 && !isSubmitter) continue;

      channel.known = projection.known;
      const batch: ChangeBatch = {
        gameId: this.gameId,
        observerId: channel.observerId,
        sequence: ++channel.sequence,
        turn: options.turn,
        resync: false,
        changes: projection.changes,
      };

      if (isSubmitter) {
        reply = batch;
        channel.local?.receive(batch);
      } else {
        this.deliver(channel, batch);
      }
    }
    return reply;
  }

  /**
   * Build a full resynchronisation batch and reset the observer's known set.
   * Delivered to a local mirror; returned for the caller to hand over.
   */
  resync(observerId: Id, projector: Projector, turn: number): ChangeBatch {
    const channel = this.channel(observerId);
    const projection = projector.snapshotFor(observerId);
    channel.known = projection.known;
    const batch: ChangeBatch = {
      gameId: this.gameId,
      observerId,
      sequence: ++channel.sequence,
      turn,
      resync: true,
      changes: projection.changes,
    };
    channel.local?.receive(batch);
    return batch;
  }

  /**
   * Wait until every queued batch has been handed to its connection.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.channels.values()].map((channel) => channel.tail));
  }

  private deliver(channel: ObserverChannel, batch: ChangeBatch): void {
    channel.local?.receive(batch);

    const connection = channel.connection;
    if (!connection || channel.state !== 'open') return;
    channel.tail = channel.tail.then(() => this.send(channel, connection, batch));
  }

  private async send(channel: ObserverChannel, connection: Connection, batch: ChangeBatch): Promise<void> {
    if (channel.connection !== connection || channel.state !== 'open') return;
    try {
      await connection.send(batch);
    } catch (error) {
      channel.state = 'failed';
      this.logger.warn('Connection failed, observer must resync', {
        gameId: this.gameId,
        observerId: channel.observerId,
        sequence: batch.sequence,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private channel(observerId: Id): ObserverChannel {
    this.addObserver(observerId);
    const channel = this.channels.get(observerId);
    if (!channel) throw new Error(`Unknown observer: ${observerId}`);
    return channel;
  }
}
