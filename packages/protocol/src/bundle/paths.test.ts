import { describe, it, expect } from 'vitest';
import { isValidGameId, saveBundlePath } from './paths.js';

describe('saveBundlePath', () => {
  it('uses the game id as the directory name', () => {
    expect(saveBundlePath('game-1')).toBe('game-1');
    expect(saveBundlePath('3f2b9c1e-7a4d-4e1b-9c2a-5d6e7f8a9b0c')).toBe(
      '3f2b9c1e-7a4d-4e1b-9c2a-5d6e7f8a9b0c'
    );
  });

  it('keeps ids that differ only in separators apart', () => {
    expect(saveBundlePath('a_b')).toBe('a_b');
    expect(() => saveBundlePath('a/b')).toThrow('Invalid game id: "a/b"');
  });

  it.each(['..', '.', '../saves', 'a/../b', '/etc', 'a\\b', '', '-flag', '_x', 'a.b'])(
    'rejects %j',
    (gameId) => {
      expect(isValidGameId(gameId)).toBe(false);
      expect(() => saveBundlePath(gameId)).toThrow('Invalid game id');
    }
  );

  it('rejects ids longer than 128 characters', () => {
    expect(isValidGameId('a'.repeat(128))).toBe(true);
    expect(isValidGameId('a'.repeat(129))).toBe(false);
  });
});
