// ============================================
// DEADZONE - Vehicle Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ForbiddenError, NotFoundError, ValidationError } from '../src/plugins/error-handler.plugin.js';
import type { Player, Vehicle } from '../src/models/types.js';
import { EPOCH, addPlayer, createTestWorld, eventsOfType, reload, type TestWorld } from './helpers.js';

describe('Vehicle Simulator', () => {
  let t: TestWorld;
  let driver: Player;
  let jeep: Vehicle;

  beforeEach(async () => {
    t = await createTestWorld();
    driver = await addPlayer(t.world, 'driver');
    jeep = await t.world.repos.vehicles.createVehicle(driver.id, 'jeep', 'camp', 50);
  });

  afterEach(() => {
    t.close();
  });

  describe('drive', () => {
    it('should burn fuel per hop and schedule the arrival', async () => {
      const trip = await t.engine.vehicles.drive(driver.id, jeep.id, 'base');

      expect(trip.route).toEqual(['camp', 'town', 'base']);
      expect(trip.arrivesAt).toBe(EPOCH + 400_000);
      expect(trip.vehicle).toMatchObject({ fuel: 30, condition: 90, destinationRegionId: 'base' });
      expect((await reload(t.world, driver.id)).travelingVehicleId).toBe(jeep.id);
      expect((await t.world.repos.regions.getRegion('camp'))?.noise).toBe(6);

      const [arrival] = await t.engine.queue.list();
      expect(arrival).toMatchObject({ kind: 'VehicleArrival', dueAt: EPOCH + 400_000 });
    });

    it('should deliver the driver when the arrival comes due', async () => {
      await t.engine.vehicles.drive(driver.id, jeep.id, 'base');

      t.clock.set(EPOCH + 400_000);
      await t.engine.clock.advance();

      const after = await reload(t.world, driver.id);
      expect(after.position.regionId).toBe('base');
      expect(after.travelingVehicleId).toBeNull();
      expect(await t.world.repos.vehicles.getVehicle(jeep.id)).toMatchObject({ regionId: 'base', destinationRegionId: null });
      expect(eventsOfType(t.events, 'VehicleArrived')).toEqual([
        { type: 'VehicleArrived', playerId: driver.id, vehicleId: jeep.id, regionId: 'base' },
      ]);
    });

    it('should run into an ambush waiting at the destination', async () => {
      const hunter = await addPlayer(t.world, 'hunter', 'Soldier', 'base');
      await t.engine.offline.setMode(hunter.id, 'ambush');
      await t.engine.vehicles.drive(driver.id, jeep.id, 'base');

      t.clock.set(EPOCH + 400_000);
      await t.engine.clock.advance();

      const [ambush] = eventsOfType(t.events, 'OfflineModeResolved');
      expect(ambush).toMatchObject({ playerId: hunter.id, trigger: 'arrival', outcome: 'target_down', targetId: driver.id });
    });

    it('should refuse to move while travelling', async () => {
      await t.engine.vehicles.drive(driver.id, jeep.id, 'town');
      await expect(t.engine.offline.setMode(driver.id, 'scavenge')).rejects.toMatchObject({ code: 'PLAYER_TRAVELING' });
    });

    it('should not drive a damaged vehicle', async () => {
      await t.world.repos.vehicles.updateVehicle(jeep.id, { condition: 30 });
      await expect(t.engine.vehicles.drive(driver.id, jeep.id, 'town')).rejects.toMatchObject({ code: 'VEHICLE_DAMAGED' });
    });

    it('should check fuel, destination and ownership', async () => {
      const stranger = await addPlayer(t.world, 'stranger');
      await expect(t.engine.vehicles.drive(stranger.id, jeep.id, 'town')).rejects.toBeInstanceOf(ForbiddenError);
      await expect(t.engine.vehicles.drive(driver.id, jeep.id, 'moon')).rejects.toBeInstanceOf(NotFoundError);
      await expect(t.engine.vehicles.drive(driver.id, jeep.id, 'camp')).rejects.toThrow('You are already there');

      await t.world.repos.vehicles.updateVehicle(jeep.id, { fuel: 15 });
      await expect(t.engine.vehicles.drive(driver.id, jeep.id, 'base')).rejects.toThrow('Not enough fuel: need 20, have 15');
    });
  });

  describe('repair', () => {
    it('should need a repair kit', async () => {
      await t.world.repos.vehicles.updateVehicle(jeep.id, { condition: 50 });
      await expect(t.engine.vehicles.repair(driver.id, jeep.id)).rejects.toBeInstanceOf(ValidationError);
    });

    it('should restore condition with the class bonus', async () => {
      const mechanic = await addPlayer(t.world, 'wrench', 'Mechanic');
      const truck = await t.world.repos.vehicles.createVehicle(mechanic.id, 'truck', 'camp');
      await t.world.repos.vehicles.updateVehicle(truck.id, { condition: 50 });
      await t.world.repos.players.addItems(mechanic.id, { repair_kit: 1 });

      const repaired = await t.engine.vehicles.repair(mechanic.id, truck.id);

      expect(repaired.condition).toBe(80);
      expect(await t.world.repos.players.getItemCount(mechanic.id, 'repair_kit')).toBe(0);
    });

    it('should not repair a vehicle on the road', async () => {
      await t.engine.vehicles.drive(driver.id, jeep.id, 'town');
      await t.world.repos.players.updatePlayer(driver.id, { travelingVehicleId: null });
      await expect(t.engine.vehicles.repair(driver.id, jeep.id)).rejects.toMatchObject({ code: 'VEHICLE_IN_TRANSIT' });
    });
  });

  describe('refuel', () => {
    it('should move fuel from the inventory into the tank', async () => {
      await t.world.repos.players.addItems(driver.id, { fuel: 30 });

      const refuelled = await t.engine.vehicles.refuel(driver.id, jeep.id, 30);

      expect(refuelled.fuel).toBe(80);
      expect(await t.world.repos.players.getItemCount(driver.id, 'fuel')).toBe(0);
    });

    it('should only take what fits', async () => {
      await t.world.repos.players.addItems(driver.id, { fuel: 80 });

      const refuelled = await t.engine.vehicles.refuel(driver.id, jeep.id, 80);

      expect(refuelled.fuel).toBe(100);
      expect(await t.world.repos.players.getItemCount(driver.id, 'fuel')).toBe(30);
    });

    it('should refuse a bicycle', async () => {
      const bike = await t.world.repos.vehicles.createVehicle(driver.id, 'bike', 'camp');
      await expect(t.engine.vehicles.refuel(driver.id, bike.id, 5)).rejects.toThrow('The bike does not take fuel');
    });
  });
});
