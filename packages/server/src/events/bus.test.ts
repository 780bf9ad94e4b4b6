import { describe, it, expect, vi } from 'vitest';
import { createCapturingLogger } from '@colonia/runtime';
import { EventBus } from './bus.js';
import type { ServerEvent } from './types.js';

// --- Test Fixtures ---

function createMockEvent(playerId = 'player:7'): ServerEvent {
  return {
    id: 'evt_1',
    type: 'batch_ready',
    timestamp: '2024-03-01T12:00:00.000Z',
    gameId: 'game-1',
    playerId,
    payload: { sequence: 3 },
  };
}

describe('EventBus', () => {
  it('delivers events to subscribers of the same seat only', async () => {
    const bus = new EventBus(createCapturingLogger());
    const seven = vi.fn();
    const eight = vi.fn();
    bus.subscribe('game-1', 'player:7', seven);
    bus.subscribe('game-1', 'player:8', eight);

    await bus.publish(createMockEvent());

    expect(seven).toHaveBeenCalledWith(createMockEvent());
    expect(eight).not.toHaveBeenCalled();
  });

  it('stops delivering after unsubscribe', async () => {
    const bus = new EventBus(createCapturingLogger());
    const handler = vi.fn();
    const unsubscribe = bus.subscribe('game-1', 'player:7', handler);

    unsubscribe();
    await bus.publish(createMockEvent());

    expect(handler).not.toHaveBeenCalled();
    expect(bus.subscriberCount('game-1', 'player:7')).toBe(0);
  });

  it('logs a failing handler and still runs the others', async () => {
    const logger = createCapturingLogger();
    const bus = new EventBus(logger);
    const healthy = vi.fn();
    bus.subscribe('game-1', 'player:7', () => {
      throw new Error('boom');
    });
    bus.subscribe('game-1', 'player:7', healthy);

    await bus.publish(createMockEvent());

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]).toMatchObject({
      level: 'error',
      message: 'Event handler failed',
      data: { type: 'batch_ready', error: 'boom' },
    });
  });
});
