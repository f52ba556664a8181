// ============================================
// DEADZONE - Construction Schema
// ============================================

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const constructionProjects = sqliteTable('construction_projects', {
  id: text('id').primaryKey(),
  ownerId: text('owner_id').notNull(),
  regionId: text('region_id').notNull(),
  structureType: text('structure_type', {
    enum: ['radio_tower', 'barricade', 'advanced_workshop', 'tank', 'helicopter'],
  }).notNull(),
  workSeconds: integer('work_seconds').notNull(),
  startedAt: integer('started_at').notNull(),
  dueAt: integer('due_at').notNull(),
  status: text('status', { enum: ['in_progress', 'completed', 'cancelled'] }).notNull().default('in_progress'),
  pendingActionId: integer('pending_action_id'),
}, (table) => [
  index('idx_construction_owner').on(table.ownerId),
]);

export type ConstructionRow = typeof constructionProjects.$inferSelect;
export type ConstructionInsert = typeof constructionProjects.$inferInsert;
