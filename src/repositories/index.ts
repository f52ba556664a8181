// ============================================
// DEADZONE - Repositories Barrel Export
// ============================================

import type { DrizzleDb } from '../db/drizzle.js';
import { PlayerRepository } from './player.repository.js';
import { RegionRepository } from './region.repository.js';
import { BuildingRepository } from './building.repository.js';
import { EncounterRepository } from './encounter.repository.js';
import { PendingActionRepository } from './pending-action.repository.js';
import { VehicleRepository } from './vehicle.repository.js';
import { ConstructionRepository } from './construction.repository.js';
import { WorldRepository } from './world.repository.js';

export { BaseRepository } from './base.repository.js';
export { PlayerRepository, type PlayerChanges, type CreatePlayerInput } from './player.repository.js';
export { RegionRepository, type RegionChanges } from './region.repository.js';
export { BuildingRepository } from './building.repository.js';
export { EncounterRepository, NON_TERMINAL_STATES } from './encounter.repository.js';
export { PendingActionRepository, type EnqueueInput } from './pending-action.repository.js';
export { VehicleRepository } from './vehicle.repository.js';
export { ConstructionRepository } from './construction.repository.js';
export { WorldRepository } from './world.repository.js';

export interface Repositories {
  players: PlayerRepository;
  regions: RegionRepository;
  buildings: BuildingRepository;
  encounters: EncounterRepository;
  pendingActions: PendingActionRepository;
  vehicles: VehicleRepository;
  construction: ConstructionRepository;
  world: WorldRepository;
}

export function createRepositories(db: DrizzleDb): Repositories {
  return {
    players: new PlayerRepository(db),
    regions: new RegionRepository(db),
    buildings: new BuildingRepository(db),
    encounters: new EncounterRepository(db),
    pendingActions: new PendingActionRepository(db),
    vehicles: new VehicleRepository(db),
    construction: new ConstructionRepository(db),
    world: new WorldRepository(db),
  };
}
