// ============================================
// DEADZONE - World Meta Schema
// ============================================

import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const worldMeta = sqliteTable('world_meta', {
  id: integer('id').primaryKey(), // single row, id = 1
  epoch: integer('epoch').notNull(),
  tick: integer('tick').notNull().default(0),
  phase: text('phase', { enum: ['day', 'night'] }).notNull().default('day'),
  paused: integer('paused', { mode: 'boolean' }).notNull().default(false),
});

export type WorldMetaRow = typeof worldMeta.$inferSelect;
