// ============================================
// DEADZONE - Encounters Schema
// ============================================

import { sql } from 'drizzle-orm';
import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import type { ZombieStats } from '../../models/types.js';

export const encounters = sqliteTable('encounters', {
  id: text('id').primaryKey(),
  playerId: text('player_id').notNull(),
  buildingId: text('building_id').notNull(),
  floorIndex: integer('floor_index').notNull(),
  enteredAt: integer('entered_at').notNull(),
  difficulty: integer('difficulty').notNull(),
  zombie: text('zombie', { mode: 'json' }).$type<ZombieStats>().notNull(),
  deadline: integer('deadline').notNull(),
  pendingActionId: integer('pending_action_id'),
  state: text('state', {
    enum: ['Presented', 'SneakResolved', 'AttackResolved', 'Expired', 'Cleared', 'Fled', 'PlayerDown'],
  }).notNull(),
  decision: text('decision', { enum: ['sneak', 'attack', 'timeout'] }),
  alerted: integer('alerted', { mode: 'boolean' }).notNull().default(false),
  resolvedAt: integer('resolved_at'),
  summary: text('summary'),
}, (table) => [
  // One live encounter per player
  uniqueIndex('uq_encounters_live_player').on(table.playerId).where(sql`state = 'Presented'`),
  index('idx_encounters_player').on(table.playerId),
]);

export type EncounterRow = typeof encounters.$inferSelect;
export type EncounterInsert = typeof encounters.$inferInsert;
