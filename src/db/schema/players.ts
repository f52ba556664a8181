// ============================================
// DEADZONE - Players Schema
// ============================================

import { sqliteTable, text, integer, index, primaryKey } from 'drizzle-orm/sqlite-core';

export const players = sqliteTable('players', {
  id: text('id').primaryKey(),
  name: text('name').notNull().unique(),
  playerClass: text('player_class', { enum: ['Scavenger', 'Mechanic', 'Soldier'] }).notNull(),
  regionId: text('region_id').notNull(),
  buildingId: text('building_id'),
  floorIndex: integer('floor_index'),
  health: integer('health').notNull(),
  maxHealth: integer('max_health').notNull(),
  speed: integer('speed').notNull(),
  stealth: integer('stealth').notNull(),
  intelligence: integer('intelligence').notNull(),
  armor: integer('armor').notNull(),
  equippedWeapon: text('equipped_weapon'),
  offlineMode: text('offline_mode', { enum: ['none', 'ambush', 'scavenge'] }).notNull().default('none'),
  offlineModeSetAt: integer('offline_mode_set_at'),
  offlineActionId: integer('offline_action_id'),
  radioFrequency: text('radio_frequency'),
  status: text('status', { enum: ['active', 'dead'] }).notNull().default('active'),
  downCount: integer('down_count').notNull().default(0),
  travelingVehicleId: text('traveling_vehicle_id'),
  lastLootAt: integer('last_loot_at'),
  createdAt: integer('created_at').notNull(),
  lastActiveAt: integer('last_active_at').notNull(),
}, (table) => [
  index('idx_players_region').on(table.regionId),
  index('idx_players_frequency').on(table.radioFrequency),
]);

export const inventory = sqliteTable('inventory', {
  playerId: text('player_id').notNull().references(() => players.id, { onDelete: 'cascade' }),
  item: text('item').notNull(),
  quantity: integer('quantity').notNull(),
}, (table) => [
  primaryKey({ columns: [table.playerId, table.item] }),
]);

export type PlayerRow = typeof players.$inferSelect;
export type PlayerInsert = typeof players.$inferInsert;
export type InventoryRow = typeof inventory.$inferSelect;
