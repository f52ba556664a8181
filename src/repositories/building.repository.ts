// ============================================
// DEADZONE - Building Repository
// ============================================

import { and, asc, eq } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { buildings, floors, type FloorRow } from '../db/schema/regions.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { Building, Floor } from '../models/types.js';

export class BuildingRepository extends BaseRepository<typeof buildings> {
  constructor(db: DrizzleDb) {
    super(db, buildings);
  }

  async getBuilding(id: string): Promise<Building | null> {
    const results = await this.db.select().from(buildings).where(eq(buildings.id, id)).limit(1);
    if (results.length === 0) return null;
    const row = results[0];
    return {
      id: row.id,
      regionId: row.regionId,
      name: row.name,
      floors: await this.getFloors(row.id),
    };
  }

  async listBuildings(regionId: string): Promise<Building[]> {
    const rows = await this.db
      .select()
      .from(buildings)
      .where(eq(buildings.regionId, regionId))
      .orderBy(buildings.id);
    const result: Building[] = [];
    for (const row of rows) {
      result.push({ id: row.id, regionId: row.regionId, name: row.name, floors: await this.getFloors(row.id) });
    }
    return result;
  }

  async getFloor(buildingId: string, floorIndex: number): Promise<Floor | null> {
    const results = await this.db
      .select()
      .from(floors)
      .where(and(eq(floors.buildingId, buildingId), eq(floors.floorIndex, floorIndex)))
      .limit(1);
    return results.length > 0 ? this.rowToFloor(results[0]) : null;
  }

  /**
   * Set the cleared flag. It never goes back to false outside a world reset,
   * so a floor that is already cleared keeps its first clearer.
   * Returns true when this call cleared it.
   */
  async markFloorCleared(buildingId: string, floorIndex: number, playerId: string, at: number): Promise<boolean> {
    const result = await this.write(() => this.db
      .update(floors)
      .set({ cleared: true, clearedBy: playerId, clearedAt: at })
      .where(and(
        eq(floors.buildingId, buildingId),
        eq(floors.floorIndex, floorIndex),
        eq(floors.cleared, false)
      ))
      .returning({ floorIndex: floors.floorIndex }));
    return result.length > 0;
  }

  async resetFloors(): Promise<void> {
    await this.write(() => this.db.update(floors).set({ cleared: false, clearedBy: null, clearedAt: null }));
  }

  private async getFloors(buildingId: string): Promise<Floor[]> {
    const rows = await this.db
      .select()
      .from(floors)
      .where(eq(floors.buildingId, buildingId))
      .orderBy(asc(floors.floorIndex));
    return rows.map(row => this.rowToFloor(row));
  }

  private rowToFloor(row: FloorRow): Floor {
    return {
      buildingId: row.buildingId,
      floorIndex: row.floorIndex,
      cleared: row.cleared,
      clearedBy: row.clearedBy,
      clearedAt: row.clearedAt,
      lootTable: row.lootTable,
    };
  }
}
