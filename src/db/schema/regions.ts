// ============================================
// DEADZONE - Regions Schema
// ============================================

import { sqliteTable, text, integer, real, index, primaryKey } from 'drizzle-orm/sqlite-core';

export const regions = sqliteTable('regions', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  kind: text('kind', { enum: ['forest', 'urban', 'military', 'coast'] }).notNull(),
  dangerLevel: integer('danger_level').notNull(),
  noise: real('noise').notNull().default(0),
  zombieCount: integer('zombie_count').notNull().default(0),
  maxZombies: integer('max_zombies').notNull(),
  connectedTo: text('connected_to', { mode: 'json' }).$type<string[]>().notNull(),
  structures: text('structures', { mode: 'json' }).$type<string[]>().notNull(),
  pressureDirty: integer('pressure_dirty', { mode: 'boolean' }).notNull().default(false),
  lastPressureTick: integer('last_pressure_tick').notNull().default(0),
});

export const buildings = sqliteTable('buildings', {
  id: text('id').primaryKey(),
  regionId: text('region_id').notNull().references(() => regions.id),
  name: text('name').notNull(),
}, (table) => [
  index('idx_buildings_region').on(table.regionId),
]);

export const floors = sqliteTable('floors', {
  buildingId: text('building_id').notNull().references(() => buildings.id),
  floorIndex: integer('floor_index').notNull(),
  cleared: integer('cleared', { mode: 'boolean' }).notNull().default(false),
  clearedBy: text('cleared_by'),
  clearedAt: integer('cleared_at'),
  lootTable: text('loot_table').notNull(),
}, (table) => [
  primaryKey({ columns: [table.buildingId, table.floorIndex] }),
]);

export type RegionRow = typeof regions.$inferSelect;
export type RegionInsert = typeof regions.$inferInsert;
export type BuildingRow = typeof buildings.$inferSelect;
export type FloorRow = typeof floors.$inferSelect;
