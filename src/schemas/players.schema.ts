// ============================================
// DEADZONE - Players Schemas
// ============================================

import { z } from 'zod';
import { playerClassSchema } from './common.schema.js';

// Create character schema
export const createPlayerSchema = z.object({
  name: z
    .string()
    .min(3)
    .max(24)
    .regex(/^[A-Za-z0-9_-]+$/, 'Name may only contain letters, digits, _ and -'),
  playerClass: playerClassSchema,
});

export type CreatePlayerBody = z.infer<typeof createPlayerSchema>;
