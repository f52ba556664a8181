// ============================================
// DEADZONE - Vehicle Simulator
// ============================================

import { CLASS_BONUSES, NOISE, VEHICLE_RULES, scaledMs } from '../config/game.js';
import type { PendingAction, Player, Vehicle } from '../models/types.js';
import {
  ConflictError,
  ForbiddenError,
  InvariantViolation,
  NotFoundError,
  ValidationError,
} from '../plugins/error-handler.plugin.js';
import { RegionGraph } from './pathfinding.js';
import { playerLock, regionLock, type LockKey, type LockScope } from './locks.js';
import type { OfflineResolver, OfflineResult } from './offline.resolver.js';
import type { PendingActionQueue } from './pending-action.queue.js';
import type { WorldState } from './world-state.js';

export interface DriveResult {
  vehicle: Vehicle;
  route: string[];
  arrivesAt: number;
}

export interface ArrivalResult {
  vehicle: Vehicle;
  ambushes: OfflineResult[];
}

export class VehicleSimulator {
  constructor(
    private world: WorldState,
    private queue: PendingActionQueue,
    private offline: OfflineResolver
  ) {}

  /**
   * Set off toward another region. The player rides along and is out of the
   * world until the VehicleArrival action lands. Caller holds the player lock.
   */
  async drive(playerId: string, vehicleId: string, destinationRegionId: string): Promise<DriveResult> {
    const { repos, config } = this.world;
    const { player, vehicle } = await this.ownedVehicle(playerId, vehicleId);

    if (player.travelingVehicleId) {
      throw new ConflictError('You are already travelling', 'PLAYER_TRAVELING');
    }
    if (await repos.encounters.getOpenForPlayer(playerId)) {
      throw new ConflictError('Finish your current encounter first', 'ENCOUNTER_IN_PROGRESS');
    }
    if (vehicle.condition < VEHICLE_RULES.MIN_DRIVE_CONDITION) {
      throw new ConflictError(
        `The ${vehicle.type} needs repairs (condition ${vehicle.condition})`,
        'VEHICLE_DAMAGED'
      );
    }

    const graph = new RegionGraph(await repos.regions.listRegions());
    if (!graph.has(destinationRegionId)) {
      throw new NotFoundError('Region', destinationRegionId);
    }
    const route = graph.findRoute(vehicle.regionId, destinationRegionId);
    const hops = route.length - 1;
    if (hops <= 0) {
      throw new ValidationError(route.length === 0 ? 'No route to that region' : 'You are already there');
    }

    const fuelNeeded = vehicle.fuelConsumption * hops;
    if (vehicle.fuel < fuelNeeded) {
      throw new ValidationError(`Not enough fuel: need ${fuelNeeded}, have ${vehicle.fuel}`);
    }

    const now = this.world.now();
    const arrivesAt = now + scaledMs(config, (VEHICLE_RULES.TRAVEL_SECONDS_PER_HOP * hops) / vehicle.speed);
    const changes = {
      fuel: vehicle.fuel - fuelNeeded,
      condition: Math.max(0, vehicle.condition - VEHICLE_RULES.WEAR_PER_HOP * hops),
      destinationRegionId,
    };

    await this.queue.cancel(player.offlineActionId);
    await repos.vehicles.updateVehicle(vehicle.id, changes);
    await repos.players.updatePlayer(playerId, {
      travelingVehicleId: vehicle.id,
      buildingId: null,
      floorIndex: null,
      offlineMode: 'none',
      offlineModeSetAt: null,
      offlineActionId: null,
      lastActiveAt: now,
    });
    await this.queue.schedule({ type: 'player', id: playerId }, arrivesAt, {
      kind: 'VehicleArrival',
      vehicleId: vehicle.id,
      destinationRegionId,
      driverId: playerId,
    });
    await repos.regions.addNoise(vehicle.regionId, NOISE.DRIVE * hops);

    this.world.logger.info({ playerId, vehicleId, route, arrivesAt }, 'vehicle departed');
    return { vehicle: { ...vehicle, ...changes }, route, arrivesAt };
  }

  async arrivalLockKeys(action: PendingAction): Promise<LockKey[]> {
    if (action.payload.kind !== 'VehicleArrival') return [playerLock(action.ownerId)];
    const { driverId, destinationRegionId } = action.payload;
    return this.offline.arrivalLockKeys(driverId, destinationRegionId);
  }

  /**
   * VehicleArrival resolver. The arrival can spring ambushes.
   */
  async arrive(action: PendingAction, scope: LockScope): Promise<ArrivalResult | null> {
    if (action.payload.kind !== 'VehicleArrival') {
      throw new InvariantViolation(`Vehicle arrival cannot resolve ${action.payload.kind}`);
    }
    const { vehicleId, destinationRegionId, driverId } = action.payload;
    const { repos } = this.world;

    const vehicle = await repos.vehicles.getVehicle(vehicleId);
    if (!vehicle) return null;

    await repos.vehicles.updateVehicle(vehicleId, { regionId: destinationRegionId, destinationRegionId: null });

    const driver = await repos.players.getPlayer(driverId);
    if (!driver || driver.travelingVehicleId !== vehicleId) {
      return { vehicle: { ...vehicle, regionId: destinationRegionId, destinationRegionId: null }, ambushes: [] };
    }

    await repos.players.updatePlayer(driverId, {
      regionId: destinationRegionId,
      buildingId: null,
      floorIndex: null,
      travelingVehicleId: null,
    });

    this.world.events.publish({
      type: 'VehicleArrived',
      playerId: driverId,
      vehicleId,
      regionId: destinationRegionId,
    });

    const ambushes = scope.has(regionLock(destinationRegionId))
      ? await this.offline.onArrival(driverId, destinationRegionId, scope)
      : [];

    return { vehicle: { ...vehicle, regionId: destinationRegionId, destinationRegionId: null }, ambushes };
  }

  async repair(playerId: string, vehicleId: string): Promise<Vehicle> {
    const { repos } = this.world;
    const { player, vehicle } = await this.parkedVehicle(playerId, vehicleId);

    if (vehicle.condition >= 100) {
      throw new ValidationError(`The ${vehicle.type} is already in perfect condition`);
    }
    const missing = await repos.players.removeItems(playerId, { repair_kit: 1 });
    if (Object.keys(missing).length > 0) {
      throw new ValidationError('You need a repair kit', { missing });
    }

    const condition = Math.min(
      100,
      vehicle.condition + VEHICLE_RULES.REPAIR_AMOUNT + CLASS_BONUSES[player.playerClass].repair
    );
    await repos.vehicles.updateVehicle(vehicle.id, { condition });
    return { ...vehicle, condition };
  }

  async refuel(playerId: string, vehicleId: string, amount: number): Promise<Vehicle> {
    const { repos } = this.world;
    const { vehicle } = await this.parkedVehicle(playerId, vehicleId);

    if (vehicle.fuelCapacity === 0) {
      throw new ValidationError(`The ${vehicle.type} does not take fuel`);
    }
    const added = Math.min(amount, vehicle.fuelCapacity - vehicle.fuel);
    if (added <= 0) {
      throw new ValidationError('The tank is already full');
    }
    const missing = await repos.players.removeItems(playerId, { fuel: added });
    if (Object.keys(missing).length > 0) {
      throw new ValidationError('Not enough fuel in your inventory', { missing });
    }

    const fuel = vehicle.fuel + added;
    await repos.vehicles.updateVehicle(vehicle.id, { fuel });
    return { ...vehicle, fuel };
  }

  private async ownedVehicle(playerId: string, vehicleId: string): Promise<{ player: Player; vehicle: Vehicle }> {
    const { repos } = this.world;
    const player = await repos.players.getPlayer(playerId);
    if (!player) {
      throw new NotFoundError('Player', playerId);
    }
    const vehicle = await repos.vehicles.getVehicle(vehicleId);
    if (!vehicle) {
      throw new NotFoundError('Vehicle', vehicleId);
    }
    if (vehicle.ownerId !== playerId) {
      throw new ForbiddenError('That vehicle is not yours');
    }
    if (vehicle.regionId !== player.position.regionId) {
      throw new ValidationError(`Your ${vehicle.type} is in ${vehicle.regionId}`);
    }
    return { player, vehicle };
  }

  private async parkedVehicle(playerId: string, vehicleId: string): Promise<{ player: Player; vehicle: Vehicle }> {
    const result = await this.ownedVehicle(playerId, vehicleId);
    if (result.vehicle.destinationRegionId !== null) {
      throw new ConflictError('That vehicle is on the road', 'VEHICLE_IN_TRANSIT');
    }
    return result;
  }
}
