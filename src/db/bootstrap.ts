// ============================================
// DEADZONE - Database Bootstrap & World Seeding
// ============================================

import type Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { DrizzleDb } from '../config/database.js';
import { eq } from 'drizzle-orm';
import { regions, buildings, floors, worldMeta } from './schema/index.js';
import { LOOT_TABLES } from '../config/game.js';

export function createTables(sqlite: Database.Database): void {
  sqlite.exec(`
    -- Players
    CREATE TABLE IF NOT EXISTS players (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      player_class TEXT NOT NULL,
      region_id TEXT NOT NULL,
      building_id TEXT,
      floor_index INTEGER,
      health INTEGER NOT NULL,
      max_health INTEGER NOT NULL,
      speed INTEGER NOT NULL,
      stealth INTEGER NOT NULL,
      intelligence INTEGER NOT NULL,
      armor INTEGER NOT NULL,
      equipped_weapon TEXT,
      offline_mode TEXT NOT NULL DEFAULT 'none',
      offline_mode_set_at INTEGER,
      offline_action_id INTEGER,
      radio_frequency TEXT,
      status TEXT NOT NULL DEFAULT 'active',
      down_count INTEGER NOT NULL DEFAULT 0,
      traveling_vehicle_id TEXT,
      last_loot_at INTEGER,
      created_at INTEGER NOT NULL,
      last_active_at INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_players_region ON players(region_id);
    CREATE INDEX IF NOT EXISTS idx_players_frequency ON players(radio_frequency);

    -- Inventory rows (item -> quantity)
    CREATE TABLE IF NOT EXISTS inventory (
      player_id TEXT NOT NULL REFERENCES players(id) ON DELETE CASCADE,
      item TEXT NOT NULL,
      quantity INTEGER NOT NULL,
      PRIMARY KEY (player_id, item)
    );

    -- Regions
    CREATE TABLE IF NOT EXISTS regions (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      kind TEXT NOT NULL,
      danger_level INTEGER NOT NULL,
      noise REAL NOT NULL DEFAULT 0,
      zombie_count INTEGER NOT NULL DEFAULT 0,
      max_zombies INTEGER NOT NULL,
      connected_to TEXT NOT NULL,
      structures TEXT NOT NULL,
      pressure_dirty INTEGER NOT NULL DEFAULT 0,
      last_pressure_tick INTEGER NOT NULL DEFAULT 0
    );

    -- Buildings & floors
    CREATE TABLE IF NOT EXISTS buildings (
      id TEXT PRIMARY KEY,
      region_id TEXT NOT NULL REFERENCES regions(id),
      name TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_buildings_region ON buildings(region_id);

    CREATE TABLE IF NOT EXISTS floors (
      building_id TEXT NOT NULL REFERENCES buildings(id),
      floor_index INTEGER NOT NULL,
      cleared INTEGER NOT NULL DEFAULT 0,
      cleared_by TEXT,
      cleared_at INTEGER,
      loot_table TEXT NOT NULL,
      PRIMARY KEY (building_id, floor_index)
    );

    -- Encounters
    CREATE TABLE IF NOT EXISTS encounters (
      id TEXT PRIMARY KEY,
      player_id TEXT NOT NULL,
      building_id TEXT NOT NULL,
      floor_index INTEGER NOT NULL,
      entered_at INTEGER NOT NULL,
      difficulty INTEGER NOT NULL,
      zombie TEXT NOT NULL,
      deadline INTEGER NOT NULL,
      pending_action_id INTEGER,
      state TEXT NOT NULL,
      decision TEXT,
      alerted INTEGER NOT NULL DEFAULT 0,
      resolved_at INTEGER,
      summary TEXT
    );
    CREATE UNIQUE INDEX IF NOT EXISTS uq_encounters_live_player ON encounters(player_id) WHERE state = 'Presented';
    CREATE INDEX IF NOT EXISTS idx_encounters_player ON encounters(player_id);

    -- Durable timers
    CREATE TABLE IF NOT EXISTS pending_actions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      kind TEXT NOT NULL,
      owner_type TEXT NOT NULL,
      owner_id TEXT NOT NULL,
      due_at INTEGER NOT NULL,
      created_at INTEGER NOT NULL,
      payload TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_pending_actions_due ON pending_actions(due_at, id);
    CREATE INDEX IF NOT EXISTS idx_pending_actions_owner ON pending_actions(owner_type, owner_id);

    -- Vehicles
    CREATE TABLE IF NOT EXISTS vehicles (
      id TEXT PRIMARY KEY,
      owner_id TEXT NOT NULL REFERENCES players(id) ON DELETE CASCADE,
      type TEXT NOT NULL,
      region_id TEXT NOT NULL,
      condition INTEGER NOT NULL DEFAULT 100,
      fuel REAL NOT NULL DEFAULT 0,
      fuel_capacity REAL NOT NULL,
      cargo_capacity INTEGER NOT NULL,
      speed REAL NOT NULL,
      fuel_consumption REAL NOT NULL,
      destination_region_id TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_vehicles_owner ON vehicles(owner_id);

    -- Construction
    CREATE TABLE IF NOT EXISTS construction_projects (
      id TEXT PRIMARY KEY,
      owner_id TEXT NOT NULL,
      region_id TEXT NOT NULL,
      structure_type TEXT NOT NULL,
      work_seconds INTEGER NOT NULL,
      started_at INTEGER NOT NULL,
      due_at INTEGER NOT NULL,
      status TEXT NOT NULL DEFAULT 'in_progress',
      pending_action_id INTEGER
    );
    CREATE INDEX IF NOT EXISTS idx_construction_owner ON construction_projects(owner_id);

    -- World metadata (single row)
    CREATE TABLE IF NOT EXISTS world_meta (
      id INTEGER PRIMARY KEY,
      epoch INTEGER NOT NULL,
      tick INTEGER NOT NULL DEFAULT 0,
      phase TEXT NOT NULL DEFAULT 'day',
      paused INTEGER NOT NULL DEFAULT 0
    );
  `);
}

// ============================================
// World definition (data/world.json)
// ============================================

const lootTableName = z.string().refine(name => name in LOOT_TABLES, {
  message: 'Unknown loot table',
});

const worldDefinitionSchema = z.object({
  spawnRegionId: z.string(),
  regions: z.array(z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    kind: z.enum(['forest', 'urban', 'military', 'coast']),
    dangerLevel: z.number().int().min(1).max(10),
    maxZombies: z.number().int().min(0),
    connectedTo: z.array(z.string()),
    buildings: z.array(z.object({
      id: z.string().min(1),
      name: z.string().min(1),
      floors: z.array(lootTableName).min(1),
    })),
  })).min(1),
});

export type WorldDefinition = z.infer<typeof worldDefinitionSchema>;

export function parseWorldDefinition(raw: unknown): WorldDefinition {
  const definition = worldDefinitionSchema.parse(raw);
  const ids = new Set(definition.regions.map(r => r.id));
  for (const region of definition.regions) {
    for (const link of region.connectedTo) {
      if (!ids.has(link)) {
        throw new Error(`Region ${region.id} links to unknown region ${link}`);
      }
    }
  }
  if (!ids.has(definition.spawnRegionId)) {
    throw new Error(`Unknown spawn region ${definition.spawnRegionId}`);
  }
  return definition;
}

export function loadWorldDefinition(file: string): WorldDefinition {
  const fullPath = path.isAbsolute(file) ? file : path.join(process.cwd(), file);
  return parseWorldDefinition(JSON.parse(fs.readFileSync(fullPath, 'utf-8')));
}

/**
 * Insert the static world (regions, buildings, floors) and the meta row.
 * Existing rows are left untouched, so seeding an existing database is a no-op.
 */
export async function seedWorld(db: DrizzleDb, definition: WorldDefinition, epoch: number): Promise<void> {
  for (const region of definition.regions) {
    await db.insert(regions).values({
      id: region.id,
      name: region.name,
      kind: region.kind,
      dangerLevel: region.dangerLevel,
      maxZombies: region.maxZombies,
      connectedTo: region.connectedTo,
      structures: [],
    }).onConflictDoNothing();

    for (const building of region.buildings) {
      await db.insert(buildings).values({
        id: building.id,
        regionId: region.id,
        name: building.name,
      }).onConflictDoNothing();

      for (const [floorIndex, lootTable] of building.floors.entries()) {
        await db.insert(floors).values({
          buildingId: building.id,
          floorIndex,
          lootTable,
        }).onConflictDoNothing();
      }
    }
  }

  await db.insert(worldMeta).values({ id: 1, epoch }).onConflictDoNothing();
}

/**
 * Put every region back to its starting danger, with no noise, zombies or structures.
 */
export async function restoreRegions(db: DrizzleDb, definition: WorldDefinition): Promise<void> {
  for (const region of definition.regions) {
    await db.update(regions).set({
      dangerLevel: region.dangerLevel,
      maxZombies: region.maxZombies,
      connectedTo: region.connectedTo,
      noise: 0,
      zombieCount: 0,
      structures: [],
      pressureDirty: false,
      lastPressureTick: 0,
    }).where(eq(regions.id, region.id));
  }
}
