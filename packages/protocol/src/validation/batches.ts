// Change batch validation
//
// Clients validate every delivered batch before applying it to their mirror.

import { z } from 'zod';
import type { ChangeBatch } from '../types/wire.js';
import { ENTITY_KINDS, type EntityKind } from '../types/entities.js';

const id = z.string().min(1);
const attributeValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const entityKind = z.custom<EntityKind>(
  (value) => typeof value === 'string' && (ENTITY_KINDS as readonly string[]).includes(value),
  { message: 'Unknown entity kind' }
);

const entityView = z.object({
  id,
  kind: entityKind,
  parentId: id.nullable(),
  ownerId: id.nullable(),
  detail: z.enum(['summary', 'full']),
  attributes: z.record(attributeValue),
  refs: z.record(id.nullable()),
});

const gameMessage = z.object({
  template: z.string(),
  args: z.record(z.string()),
  category: z.string(),
});

const wireChange = z.discriminatedUnion('type', [
  z.object({ type: z.literal('add'), entity: entityView }),
  z.object({ type: z.literal('update'), entity: entityView }),
  z.object({ type: z.literal('partial'), id, kind: entityKind, fields: z.record(attributeValue) }),
  z.object({ type: z.literal('remove'), id }),
  z.object({ type: z.literal('owner'), id, from: id.nullable(), to: id.nullable() }),
  z.object({ type: z.literal('message'), subjectId: id.nullable(), message: gameMessage }),
  z.object({ type: z.literal('attribute'), name: z.string(), value: attributeValue }),
]);

export const changeBatchSchema: z.ZodType<ChangeBatch> = z.object({
  gameId: id,
  observerId: id,
  sequence: z.number().int().nonnegative(),
  turn: z.number().int().positive(),
  resync: z.boolean(),
  changes: z.array(wireChange),
});

/**
 * Parse an untrusted value into a ChangeBatch. Throws a ZodError on failure.
 */
export function parseChangeBatch(input: unknown): ChangeBatch {
  return changeBatchSchema.parse(input);
}
