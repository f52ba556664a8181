// ============================================
// DEADZONE - Vehicles Schema
// ============================================

import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';
import { players } from './players.js';

export const vehicles = sqliteTable('vehicles', {
  id: text('id').primaryKey(),
  ownerId: text('owner_id').notNull().references(() => players.id, { onDelete: 'cascade' }),
  type: text('type', { enum: ['bike', 'jeep', 'truck', 'tank', 'helicopter'] }).notNull(),
  regionId: text('region_id').notNull(),
  condition: integer('condition').notNull().default(100),
  fuel: real('fuel').notNull().default(0),
  fuelCapacity: real('fuel_capacity').notNull(),
  cargoCapacity: integer('cargo_capacity').notNull(),
  speed: real('speed').notNull(),
  fuelConsumption: real('fuel_consumption').notNull(),
  destinationRegionId: text('destination_region_id'),
}, (table) => [
  index('idx_vehicles_owner').on(table.ownerId),
]);

export type VehicleRow = typeof vehicles.$inferSelect;
export type VehicleInsert = typeof vehicles.$inferInsert;
