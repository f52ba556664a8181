// ============================================
// DEADZONE - Command Schemas
// ============================================

import { z } from 'zod';
import { entityIdSchema, floorIndexSchema, offlineModeSchema, structureTypeSchema } from './common.schema.js';

export const COMMAND_VERBS = [
  'status',
  'move',
  'enter',
  'sneak',
  'attack',
  'setmode',
  'loot',
  'equip',
  'build',
  'drive',
  'repair',
  'refuel',
  'setfreq',
  'radio',
  'use',
] as const;

export type CommandVerb = (typeof COMMAND_VERBS)[number];

export const commandVerbSchema = z.enum(COMMAND_VERBS);

// POST /api/commands
export const commandBodySchema = z.object({
  verb: z.string().min(1).max(32).transform(v => v.toLowerCase()),
  args: z.array(z.union([z.string(), z.number()])).max(64).default([]),
});

const noArgs = z.tuple([]);
const itemNameSchema = z.string().min(1).max(32);

// `off` clears the frequency
export const frequencySchema = z.string().regex(/^(off|[0-9]{2,3}(\.[0-9]{1,2})?)$/, 'Frequency looks like 145.50');

export const commandArgSchemas = {
  status: noArgs,
  move: z.tuple([entityIdSchema]),
  enter: z.tuple([entityIdSchema, floorIndexSchema]),
  sneak: noArgs,
  attack: noArgs,
  setmode: z.tuple([offlineModeSchema]),
  loot: noArgs,
  equip: z.tuple([itemNameSchema]),
  build: z.tuple([structureTypeSchema]),
  drive: z.tuple([entityIdSchema, entityIdSchema]),
  repair: z.tuple([entityIdSchema]),
  refuel: z.tuple([entityIdSchema, z.coerce.number().int().positive().max(1000)]),
  setfreq: z.tuple([frequencySchema]),
  radio: z
    .array(z.union([z.string(), z.number()]))
    .min(1)
    .transform(words => words.join(' ').trim())
    .pipe(z.string().min(1).max(280)),
  use: z.tuple([itemNameSchema]),
} satisfies Record<CommandVerb, z.ZodTypeAny>;

export type CommandBody = z.infer<typeof commandBodySchema>;
