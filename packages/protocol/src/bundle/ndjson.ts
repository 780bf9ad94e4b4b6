// entities.ndjson codec
//
// One GameEntity per line, in registry order. Blank lines are ignored on
// read; every other line must be a valid entity.

import type { GameEntity } from '../types/entities.js';
import { gameEntitySchema } from '../validation/save.js';

/**
 * Read entity lines. Errors name the 1-based line that failed.
 */
export function parseEntityLines(content: string): GameEntity[] {
  const entities: GameEntity[] = [];
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (error) {
      throw new Error(
        `Bad entity line ${i + 1}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    const parsed = gameEntitySchema.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue.path.join('.');
      throw new Error(`Bad entity line ${i + 1}: ${field ? `${field}: ` : ''}${issue.message}`);
    }
    entities.push(parsed.data);
  }

  return entities;
}

export function stringifyEntityLines(entities: readonly GameEntity[]): string {
  return entities.map((entity) => JSON.stringify(entity) + '\n').join('');
}
