// AI driver
//
// Planners see only the AI player's own mirror, built from the batches that
// player received, and return intents that go through the same validation
// as a human's requests. Planning is bounded by a timeout.

import type { ActionIntent } from '@colonia/protocol';
import type { Logger } from '../logging.js';
import type { MirrorView } from '../mirror/client-mirror.js';

export interface AiPlanner {
  /**
   * Decide this turn's actions. `signal` aborts when the time budget runs out.
   * An empty list is a pass.
   */
  plan(view: MirrorView, signal: AbortSignal): Promise<ActionIntent[]>;
}

/**
 * Planner that always passes.
 */
export const passivePlanner: AiPlanner = {
  async plan() {
    return [];
  },
};

export type PlanOutcome =
  | { status: 'planned'; intents: ActionIntent[] }
  | { status: 'timeout' }
  | { status: 'failed'; error: string };

/**
 * Run a planner with a time budget. A timeout or a planner failure is
 * reported, not thrown; callers treat both as a pass.
 */
export async function planWithTimeout(
  planner: AiPlanner,
  view: MirrorView,
  timeoutMs: number,
  logger: Logger
): Promise<PlanOutcome> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<PlanOutcome>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ status: 'timeout' });
    }, timeoutMs);
  });

  const started = Date.now();
  try {
    const outcome = await Promise.race([
      planner
        .plan(view, controller.signal)
        .then((intents): PlanOutcome => ({ status: 'planned', intents })),
      timeout,
    ]);
    if (outcome.status === 'timeout') {
      logger.warn('AI planning timed out, passing', {
        playerId: view.observerId,
        timeoutMs,
      });
    }
    return outcome;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('AI planner failed, passing', { playerId: view.observerId, error: message });
    return { status: 'failed', error: message };
  } finally {
    clearTimeout(timer);
    logger.debug('AI planning finished', {
      playerId: view.observerId,
      durationMs: Date.now() - started,
    });
  }
}
