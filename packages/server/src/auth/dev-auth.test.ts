import { describe, it, expect } from 'vitest';
import { getAuthFromHeaders } from './dev-auth.js';

describe('getAuthFromHeaders', () => {
  it('trusts the player header in development', () => {
    expect(getAuthFromHeaders({ 'x-player-id': 'player:7' }, 'development')).toEqual({
      success: true,
      auth: { playerId: 'player:7' },
    });
  });

  it('takes the first of repeated headers', () => {
    expect(getAuthFromHeaders({ 'x-player-id': ['player:7', 'player:8'] }, 'test')).toEqual({
      success: true,
      auth: { playerId: 'player:7' },
    });
  });

  it('fails without the header', () => {
    expect(getAuthFromHeaders({}, 'development')).toEqual({
      success: false,
      error: 'Missing x-player-id header',
    });
  });

  it('rejects every caller in production', () => {
    const result = getAuthFromHeaders({ 'x-player-id': 'player:7' }, 'production');
    expect(result.success).toBe(false);
  });
});
