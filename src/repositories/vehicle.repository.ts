// ============================================
// DEADZONE - Vehicle Repository
// ============================================

import { eq } from 'drizzle-orm';
import { BaseRepository } from './base.repository.js';
import { vehicles, type VehicleRow, type VehicleInsert } from '../db/schema/vehicles.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { Vehicle, VehicleType } from '../models/types.js';
import { VEHICLE_TYPES } from '../config/game.js';

export type VehicleChanges = Partial<Omit<VehicleInsert, 'id' | 'ownerId' | 'type'>>;

export class VehicleRepository extends BaseRepository<typeof vehicles> {
  constructor(db: DrizzleDb) {
    super(db, vehicles);
  }

  async getVehicle(id: string): Promise<Vehicle | null> {
    const results = await this.db.select().from(vehicles).where(eq(vehicles.id, id)).limit(1);
    return results.length > 0 ? this.rowToVehicle(results[0]) : null;
  }

  async getVehiclesByOwner(ownerId: string): Promise<Vehicle[]> {
    const results = await this.db
      .select()
      .from(vehicles)
      .where(eq(vehicles.ownerId, ownerId))
      .orderBy(vehicles.id);
    return results.map(row => this.rowToVehicle(row));
  }

  async createVehicle(ownerId: string, type: VehicleType, regionId: string, fuel = 0): Promise<Vehicle> {
    const spec = VEHICLE_TYPES[type];
    const [row] = await this.write(() => this.db
      .insert(vehicles)
      .values({
        id: this.generateId(),
        ownerId,
        type,
        regionId,
        fuel: Math.min(fuel, spec.fuelCapacity),
        fuelCapacity: spec.fuelCapacity,
        cargoCapacity: spec.cargoCapacity,
        speed: spec.speed,
        fuelConsumption: spec.fuelConsumption,
      })
      .returning());
    return this.rowToVehicle(row);
  }

  async updateVehicle(id: string, changes: VehicleChanges): Promise<void> {
    if (Object.keys(changes).length === 0) return;
    await this.write(() => this.db.update(vehicles).set(changes).where(eq(vehicles.id, id)));
  }

  async deleteForOwner(ownerId: string): Promise<void> {
    await this.write(() => this.db.delete(vehicles).where(eq(vehicles.ownerId, ownerId)));
  }

  private rowToVehicle(row: VehicleRow): Vehicle {
    return {
      id: row.id,
      ownerId: row.ownerId,
      type: row.type,
      regionId: row.regionId,
      condition: row.condition,
      fuel: row.fuel,
      fuelCapacity: row.fuelCapacity,
      cargoCapacity: row.cargoCapacity,
      speed: row.speed,
      fuelConsumption: row.fuelConsumption,
      destinationRegionId: row.destinationRegionId,
    };
  }
}
