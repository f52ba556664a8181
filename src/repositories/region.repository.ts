// ============================================
// DEADZONE - Region Repository
// ============================================

import { eq, gt, or, sql } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { regions, type RegionRow, type RegionInsert } from '../db/schema/regions.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { Region } from '../models/types.js';

export type RegionChanges = Partial<Omit<RegionInsert, 'id'>>;

export class RegionRepository extends BaseRepository<typeof regions> {
  constructor(db: DrizzleDb) {
    super(db, regions);
  }

  async getRegion(id: string): Promise<Region | null> {
    const results = await this.db.select().from(regions).where(eq(regions.id, id)).limit(1);
    return results.length > 0 ? this.rowToRegion(results[0]) : null;
  }

  async listRegions(): Promise<Region[]> {
    const results = await this.db.select().from(regions).orderBy(regions.id);
    return results.map(row => this.rowToRegion(row));
  }

  /**
   * Regions the pressure model has to look at this tick.
   */
  async listPressureCandidates(): Promise<Region[]> {
    const results = await this.db
      .select()
      .from(regions)
      .where(or(gt(regions.noise, 0), eq(regions.pressureDirty, true)))
      .orderBy(regions.id);
    return results.map(row => this.rowToRegion(row));
  }

  async updateRegion(id: string, changes: RegionChanges): Promise<void> {
    if (Object.keys(changes).length === 0) return;
    await this.write(() => this.db.update(regions).set(changes).where(eq(regions.id, id)));
  }

  async addNoise(id: string, amount: number): Promise<void> {
    await this.write(() => this.db
      .update(regions)
      .set({ noise: sql`${regions.noise} + ${amount}` })
      .where(eq(regions.id, id)));
  }

  async lowerNoise(id: string, amount: number): Promise<void> {
    await this.write(() => this.db
      .update(regions)
      .set({ noise: sql`max(0, ${regions.noise} - ${amount})` })
      .where(eq(regions.id, id)));
  }

  private rowToRegion(row: RegionRow): Region {
    return {
      id: row.id,
      name: row.name,
      kind: row.kind,
      dangerLevel: row.dangerLevel,
      noise: row.noise,
      zombieCount: row.zombieCount,
      maxZombies: row.maxZombies,
      connectedTo: row.connectedTo,
      structures: row.structures,
      pressureDirty: row.pressureDirty,
      lastPressureTick: row.lastPressureTick,
    };
  }
}
