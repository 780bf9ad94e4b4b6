// Tests for action request validation

import { describe, it, expect } from 'vitest';
import { parseActionRequest } from './actions.js';

const envelope = { gameId: 'game-1', playerId: 'player:1', seq: 1 };

describe('parseActionRequest', () => {
  it('accepts a move_unit request', () => {
    const result = parseActionRequest({
      ...envelope,
      verb: 'move_unit',
      params: { unitId: 'unit:7', toTileId: 'tile:12' },
    });

    expect(result).toEqual({
      success: true,
      request: { ...envelope, verb: 'move_unit', params: { unitId: 'unit:7', toTileId: 'tile:12' } },
    });
  });

  it('trims settlement names', () => {
    const result = parseActionRequest({
      ...envelope,
      verb: 'found_settlement',
      params: { unitId: 'unit:7', name: '  Jamestown ' },
    });

    expect(result.success).toBe(true);
    if (result.success && result.request.verb === 'found_settlement') {
      expect(result.request.params.name).toBe('Jamestown');
    }
  });

  it('accepts end_turn with empty params', () => {
    const result = parseActionRequest({ ...envelope, verb: 'end_turn', params: {} });
    expect(result.success).toBe(true);
  });

  it('rejects extra params on end_turn', () => {
    const result = parseActionRequest({ ...envelope, verb: 'end_turn', params: { now: true } });
    expect(result.success).toBe(false);
  });

  it('rejects unknown verbs', () => {
    const result = parseActionRequest({ ...envelope, verb: 'teleport', params: {} });
    expect(result.success).toBe(false);
  });

  it('reports the path of a missing parameter', () => {
    const result = parseActionRequest({
      ...envelope,
      verb: 'attack',
      params: { unitId: 'unit:1' },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.issues.map((i) => i.path)).toContain('params.targetTileId');
    }
  });

  it('rejects a non-positive seq', () => {
    const result = parseActionRequest({
      ...envelope,
      seq: 0,
      verb: 'disband_unit',
      params: { unitId: 'unit:1' },
    });

    expect(result.success).toBe(false);
  });

  it('rejects fractional amounts', () => {
    const result = parseActionRequest({
      ...envelope,
      verb: 'buy_goods',
      params: { carrierId: 'unit:2', goodsType: 'tools', amount: 1.5 },
    });

    expect(result.success).toBe(false);
  });
});
