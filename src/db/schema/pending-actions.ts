// ============================================
// DEADZONE - Pending Actions Schema
// ============================================

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const pendingActions = sqliteTable('pending_actions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  kind: text('kind', {
    enum: ['DecisionExpiry', 'OfflineResolution', 'ConstructionComplete', 'VehicleArrival'],
  }).notNull(),
  ownerType: text('owner_type', { enum: ['player', 'region'] }).notNull(),
  ownerId: text('owner_id').notNull(),
  dueAt: integer('due_at').notNull(),
  createdAt: integer('created_at').notNull(),
  payload: text('payload').notNull(), // JSON, validated per kind on load
}, (table) => [
  index('idx_pending_actions_due').on(table.dueAt, table.id),
  index('idx_pending_actions_owner').on(table.ownerType, table.ownerId),
]);

export type PendingActionRow = typeof pendingActions.$inferSelect;
export type PendingActionInsert = typeof pendingActions.$inferInsert;
