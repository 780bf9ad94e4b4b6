import { describe, it, expect } from 'vitest';
import type { GameEntity } from '../types/entities.js';
import { parseEntityLines, stringifyEntityLines } from './ndjson.js';

const tile: GameEntity = {
  id: 'tile:2',
  kind: 'tile',
  parentId: 'game:1',
  ownerId: null,
  attributes: { x: 0, y: 0, terrain: 'plains' },
  refs: {},
  disposed: false,
};

const unit: GameEntity = {
  id: 'unit:9',
  kind: 'unit',
  parentId: 'tile:2',
  ownerId: 'player:7',
  attributes: { unitType: 'soldier', movesLeft: 1 },
  refs: { destination: null },
  disposed: false,
};

describe('stringifyEntityLines', () => {
  it('writes one entity per line with a trailing newline', () => {
    const content = stringifyEntityLines([tile, unit]);

    const lines = content.split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(JSON.parse(lines[0])).toEqual(tile);
    expect(JSON.parse(lines[1])).toEqual(unit);
  });

  it('writes nothing for an empty registry', () => {
    expect(stringifyEntityLines([])).toBe('');
  });
});

describe('parseEntityLines', () => {
  it('reads entities back in order', () => {
    expect(parseEntityLines(stringifyEntityLines([tile, unit]))).toEqual([tile, unit]);
  });

  it('ignores blank lines', () => {
    expect(parseEntityLines('')).toEqual([]);
    expect(parseEntityLines(`\n${JSON.stringify(tile)}\n  \n`)).toEqual([tile]);
  });

  it('names the line that is not JSON', () => {
    expect(() => parseEntityLines(`${JSON.stringify(tile)}\n{oops}\n`)).toThrow(/^Bad entity line 2: /);
  });

  it('names the line and field of an invalid entity', () => {
    const bad = JSON.stringify({ ...unit, kind: 'dragon' });

    expect(() => parseEntityLines(`${JSON.stringify(tile)}\n\n${bad}\n`)).toThrow(
      'Bad entity line 3: kind: Unknown entity kind'
    );
  });
});
