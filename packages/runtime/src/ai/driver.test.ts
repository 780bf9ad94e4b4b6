import { describe, it, expect } from 'vitest';
import { createCapturingLogger } from '../logging.js';
import { ClientMirror } from '../mirror/client-mirror.js';
import { passivePlanner, planWithTimeout, type AiPlanner } from './driver.js';

describe('planWithTimeout', () => {
  const view = new ClientMirror('player:2');

  it('returns the planned intents', async () => {
    const planner: AiPlanner = {
      async plan() {
        return [{ verb: 'disband_unit', params: { unitId: 'unit:4' } }];
      },
    };

    const outcome = await planWithTimeout(planner, view, 1000, createCapturingLogger());

    expect(outcome).toEqual({
      status: 'planned',
      intents: [{ verb: 'disband_unit', params: { unitId: 'unit:4' } }],
    });
  });

  it('passes when the passive planner runs', async () => {
    expect(await planWithTimeout(passivePlanner, view, 1000, createCapturingLogger())).toEqual({
      status: 'planned',
      intents: [],
    });
  });

  it('gives up and aborts the planner after the time budget', async () => {
    const seen: { signal?: AbortSignal } = {};
    const planner: AiPlanner = {
      plan(_view, signal) {
        seen.signal = signal;
        return new Promise(() => {});
      },
    };
    const logger = createCapturingLogger();

    const outcome = await planWithTimeout(planner, view, 5, logger);

    expect(outcome).toEqual({ status: 'timeout' });
    expect(seen.signal?.aborted).toBe(true);
    expect(logger.entries.find((e) => e.level === 'warn')?.message).toBe(
      'AI planning timed out, passing'
    );
  });

  it('reports a failing planner', async () => {
    const planner: AiPlanner = {
      async plan() {
        throw new Error('planner crashed');
      },
    };
    const logger = createCapturingLogger();

    const outcome = await planWithTimeout(planner, view, 1000, logger);

    expect(outcome).toEqual({ status: 'failed', error: 'planner crashed' });
    expect(logger.entries.find((e) => e.level === 'error')?.data).toEqual({
      playerId: 'player:2',
      error: 'planner crashed',
    });
  });
});
