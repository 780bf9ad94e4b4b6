import { describe, it, expect } from 'vitest';
import { See, mostPermissive, seeRules } from './visibility.js';

describe('See builders', () => {
  it('dedupes and sorts explicit players', () => {
    expect(See.only('player:3', 'player:1', 'player:3')).toEqual({
      kind: 'only',
      players: ['player:1', 'player:3'],
    });
  });

  it('unwraps a single rule', () => {
    expect(See.anyOf(See.perceived(), See.perceived())).toEqual({ kind: 'perceived' });
  });

  it('merges explicit player sets', () => {
    expect(See.anyOf(See.only('player:2'), See.perceived(), See.only('player:1'))).toEqual({
      kind: 'any',
      rules: [{ kind: 'perceived' }, { kind: 'only', players: ['player:1', 'player:2'] }],
    });
  });

  it('flattens nested rules', () => {
    const nested = See.anyOf(See.owner(), See.anyOf(See.all(), See.owner()));
    expect(seeRules(nested)).toEqual([{ kind: 'owner' }, { kind: 'all' }]);
  });
});

describe('mostPermissive', () => {
  it('picks the higher level', () => {
    expect(mostPermissive('none', 'summary')).toBe('summary');
    expect(mostPermissive('full', 'summary')).toBe('full');
    expect(mostPermissive('none', 'none')).toBe('none');
  });
});
