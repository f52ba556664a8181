// ============================================
// DEADZONE - Common Schemas
// ============================================

import { z } from 'zod';

// Region, building and vehicle ids
export const entityIdSchema = z.string().min(1).max(64);

// ID param schema
export const idParamSchema = z.object({
  id: entityIdSchema,
});

// Pagination schema
export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const playerClassSchema = z.enum(['Scavenger', 'Mechanic', 'Soldier']);

export const offlineModeSchema = z.enum(['none', 'ambush', 'scavenge']);

export const structureTypeSchema = z.enum(['radio_tower', 'barricade', 'advanced_workshop', 'tank', 'helicopter']);

// Floors are addressed by 0-based index
export const floorIndexSchema = z.coerce.number().int().min(0).max(50);

// Type exports
export type IdParam = z.infer<typeof idParamSchema>;
export type Pagination = z.infer<typeof paginationSchema>;
