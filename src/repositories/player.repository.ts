// ============================================
// DEADZONE - Player Repository
// ============================================

import { and, eq, isNull, lte, ne, sql } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { players, inventory, type PlayerRow, type PlayerInsert } from '../db/schema/players.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { Inventory, Player, PlayerClass } from '../models/types.js';
import { STARTER_ITEMS, STARTER_WEAPON, getMaxHealth, getStartingStats } from '../config/game.js';

export type PlayerChanges = Partial<Omit<PlayerInsert, 'id' | 'createdAt'>>;

export interface CreatePlayerInput {
  name: string;
  playerClass: PlayerClass;
  regionId: string;
  now: number;
}

export class PlayerRepository extends BaseRepository<typeof players> {
  constructor(db: DrizzleDb) {
    super(db, players);
  }

  async getPlayer(id: string): Promise<Player | null> {
    const results = await this.db.select().from(players).where(eq(players.id, id)).limit(1);
    return results.length > 0 ? this.rowToPlayer(results[0]) : null;
  }

  async getPlayerByName(name: string): Promise<Player | null> {
    const results = await this.db.select().from(players).where(eq(players.name, name)).limit(1);
    return results.length > 0 ? this.rowToPlayer(results[0]) : null;
  }

  async listPlayers(): Promise<Player[]> {
    const results = await this.db.select().from(players);
    return results.map(row => this.rowToPlayer(row));
  }

  /**
   * Active players standing in a region (not travelling).
   */
  async listInRegion(regionId: string): Promise<Player[]> {
    const results = await this.db
      .select()
      .from(players)
      .where(and(
        eq(players.regionId, regionId),
        eq(players.status, 'active'),
        isNull(players.travelingVehicleId)
      ))
      .orderBy(players.id);
    return results.map(row => this.rowToPlayer(row));
  }

  async listAmbushersInRegion(regionId: string, excludeId?: string): Promise<Player[]> {
    const conditions = [
      eq(players.regionId, regionId),
      eq(players.status, 'active'),
      eq(players.offlineMode, 'ambush'),
      isNull(players.travelingVehicleId),
    ];
    if (excludeId) conditions.push(ne(players.id, excludeId));
    const results = await this.db
      .select()
      .from(players)
      .where(and(...conditions))
      .orderBy(players.id);
    return results.map(row => this.rowToPlayer(row));
  }

  async listByFrequency(frequency: string): Promise<Player[]> {
    const results = await this.db
      .select()
      .from(players)
      .where(and(eq(players.radioFrequency, frequency), eq(players.status, 'active')))
      .orderBy(players.id);
    return results.map(row => this.rowToPlayer(row));
  }

  async createPlayer({ name, playerClass, regionId, now }: CreatePlayerInput): Promise<Player> {
    const id = this.generateId();
    const stats = getStartingStats(playerClass);
    const maxHealth = getMaxHealth(playerClass);

    await this.write(() => this.db.insert(players).values({
      id,
      name,
      playerClass,
      regionId,
      health: maxHealth,
      maxHealth,
      ...stats,
      equippedWeapon: STARTER_WEAPON,
      createdAt: now,
      lastActiveAt: now,
    }));
    await this.addItems(id, STARTER_ITEMS);

    const created = await this.getPlayer(id);
    if (!created) {
      throw new Error(`Player ${id} vanished after insert`);
    }
    return created;
  }

  async updatePlayer(id: string, changes: PlayerChanges): Promise<void> {
    if (Object.keys(changes).length === 0) return;
    await this.write(() => this.db.update(players).set(changes).where(eq(players.id, id)));
  }

  async deletePlayer(id: string): Promise<boolean> {
    const result = await this.write(() => this.db.delete(players).where(eq(players.id, id)).returning({ id: players.id }));
    return result.length > 0;
  }

  // === Inventory ===

  async getInventory(playerId: string): Promise<Inventory> {
    const rows = await this.db
      .select()
      .from(inventory)
      .where(eq(inventory.playerId, playerId))
      .orderBy(inventory.item);
    const items: Inventory = {};
    for (const row of rows) {
      items[row.item] = row.quantity;
    }
    return items;
  }

  async getItemCount(playerId: string, item: string): Promise<number> {
    const rows = await this.db
      .select({ quantity: inventory.quantity })
      .from(inventory)
      .where(and(eq(inventory.playerId, playerId), eq(inventory.item, item)))
      .limit(1);
    return rows[0]?.quantity ?? 0;
  }

  async addItems(playerId: string, items: Inventory): Promise<void> {
    for (const [item, quantity] of Object.entries(items)) {
      if (quantity <= 0) continue;
      await this.write(() => this.db
        .insert(inventory)
        .values({ playerId, item, quantity })
        .onConflictDoUpdate({
          target: [inventory.playerId, inventory.item],
          set: { quantity: sql`${inventory.quantity} + ${quantity}` },
        }));
    }
  }

  /**
   * Remove every listed item or nothing at all.
   * Returns the items that were missing (empty when the removal happened).
   */
  async removeItems(playerId: string, items: Inventory): Promise<Inventory> {
    const held = await this.getInventory(playerId);
    const missing: Inventory = {};
    for (const [item, quantity] of Object.entries(items)) {
      const available = held[item] ?? 0;
      if (available < quantity) {
        missing[item] = quantity - available;
      }
    }
    if (Object.keys(missing).length > 0) return missing;

    for (const [item, quantity] of Object.entries(items)) {
      await this.write(() => this.db
        .update(inventory)
        .set({ quantity: sql`${inventory.quantity} - ${quantity}` })
        .where(and(eq(inventory.playerId, playerId), eq(inventory.item, item))));
    }
    await this.write(() => this.db
      .delete(inventory)
      .where(and(eq(inventory.playerId, playerId), lte(inventory.quantity, 0))));
    return {};
  }

  private rowToPlayer(row: PlayerRow): Player {
    return {
      id: row.id,
      name: row.name,
      playerClass: row.playerClass,
      position: {
        regionId: row.regionId,
        buildingId: row.buildingId,
        floorIndex: row.floorIndex,
      },
      health: row.health,
      maxHealth: row.maxHealth,
      stats: {
        speed: row.speed,
        stealth: row.stealth,
        intelligence: row.intelligence,
        armor: row.armor,
      },
      equippedWeapon: row.equippedWeapon,
      offlineMode: row.offlineMode,
      offlineModeSetAt: row.offlineModeSetAt,
      offlineActionId: row.offlineActionId,
      radioFrequency: row.radioFrequency,
      status: row.status,
      downCount: row.downCount,
      travelingVehicleId: row.travelingVehicleId,
      lastLootAt: row.lastLootAt,
      createdAt: row.createdAt,
      lastActiveAt: row.lastActiveAt,
    };
  }
}
