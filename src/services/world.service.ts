// ============================================
// DEADZONE - World Service
// ============================================

import { restoreRegions, type WorldDefinition } from '../db/bootstrap.js';
import type { DrizzleDb } from '../db/drizzle.js';
import type { Building, Region } from '../models/types.js';
import { NotFoundError } from '../plugins/error-handler.plugin.js';
import type { WorldEngine } from '../simulation/engine.js';
import { buildingLock, playerLock, regionLock, type LockKey } from '../simulation/locks.js';
import type { ClockStatus } from '../simulation/world-clock.js';

export interface RegionSummary extends Region {
  players: number;
}

export interface WorldOverview {
  clock: ClockStatus;
  regions: RegionSummary[];
}

export interface RegionDetail {
  region: Region;
  buildings: Building[];
  players: Array<{ id: string; name: string; playerClass: string }>;
}

export class WorldService {
  constructor(
    private engine: WorldEngine,
    private db: DrizzleDb,
    private definition: WorldDefinition
  ) {}

  async getOverview(): Promise<WorldOverview> {
    const { repos } = this.engine.world;
    const [clock, regions, players] = await Promise.all([
      this.engine.clock.getStatus(),
      repos.regions.listRegions(),
      repos.players.listPlayers(),
    ]);

    return {
      clock,
      regions: regions.map(region => ({
        ...region,
        players: players.filter(p =>
          p.status === 'active' && p.travelingVehicleId === null && p.position.regionId === region.id
        ).length,
      })),
    };
  }

  async getRegion(regionId: string): Promise<RegionDetail> {
    const { repos } = this.engine.world;
    const region = await repos.regions.getRegion(regionId);
    if (!region) {
      throw new NotFoundError('Region', regionId);
    }

    const [buildings, present] = await Promise.all([
      repos.buildings.listBuildings(regionId),
      repos.players.listInRegion(regionId),
    ]);
    return {
      region,
      buildings,
      players: present.map(p => ({ id: p.id, name: p.name, playerClass: p.playerClass })),
    };
  }

  /**
   * Wipe every player and their property, un-clear all floors and start a
   * new world epoch. Runs between ticks with every player, region and
   * building locked; a running clock resumes afterwards.
   */
  async reset(): Promise<void> {
    const { repos, locks, logger, now } = this.engine.world;

    await this.engine.clock.hold(() =>
      locks.withDynamicLocks(
        () => this.everyLockKey(),
        async () => {
          await repos.pendingActions.deleteAll();
          await repos.encounters.deleteAll();
          await repos.construction.deleteAll();
          await repos.vehicles.deleteAll();
          await repos.players.deleteAll();
          await repos.buildings.resetFloors();
          await restoreRegions(this.db, this.definition);
          await repos.world.restart(now());
        }
      )
    );

    logger.warn('world reset');
  }

  private async everyLockKey(): Promise<LockKey[]> {
    const { repos } = this.engine.world;
    const [players, regions] = await Promise.all([repos.players.listPlayers(), repos.regions.listRegions()]);
    const buildings = await Promise.all(regions.map(region => repos.buildings.listBuildings(region.id)));
    return [
      ...players.map(player => playerLock(player.id)),
      ...regions.map(region => regionLock(region.id)),
      ...buildings.flat().map(building => buildingLock(building.id)),
    ];
  }
}
