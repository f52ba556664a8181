// ============================================
// DEADZONE - Construction Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ForbiddenError, ValidationError } from '../src/plugins/error-handler.plugin.js';
import { knockDown } from '../src/simulation/player-down.js';
import type { Player } from '../src/models/types.js';
import { EPOCH, addPlayer, createTestWorld, eventsOfType, reload, type TestWorld } from './helpers.js';

const DAY_MS = 2_400_000;

describe('Construction Simulator', () => {
  let t: TestWorld;
  let builder: Player;

  beforeEach(async () => {
    t = await createTestWorld();
    builder = await addPlayer(t.world, 'builder', 'Soldier', 'town');
    await t.world.repos.players.addItems(builder.id, { wood: 25, metal: 5 });
  });

  afterEach(() => {
    t.close();
  });

  it('should take the resources and schedule completion in game days', async () => {
    const project = await t.engine.construction.startProject(builder.id, 'barricade');

    expect(project).toMatchObject({
      regionId: 'town',
      structureType: 'barricade',
      workSeconds: 2400,
      dueAt: EPOCH + DAY_MS,
      status: 'in_progress',
    });
    const inventory = await t.world.repos.players.getInventory(builder.id);
    expect(inventory.wood).toBe(5);
    expect(inventory.metal).toBeUndefined();
    expect((await t.world.repos.regions.getRegion('town'))?.noise).toBe(4);
  });

  it('should allow one project at a time', async () => {
    await t.engine.construction.startProject(builder.id, 'barricade');
    await expect(t.engine.construction.startProject(builder.id, 'barricade')).rejects.toMatchObject({
      code: 'CONSTRUCTION_IN_PROGRESS',
    });
  });

  it('should report missing resources and take nothing', async () => {
    const poor = await addPlayer(t.world, 'poor', 'Soldier', 'town');

    const attempt = t.engine.construction.startProject(poor.id, 'barricade');
    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toMatchObject({ details: { missing: { wood: 20, metal: 5 } } });
    expect((await t.world.repos.players.getInventory(poor.id)).knife).toBe(1);
  });

  it('should gate advanced structures on intelligence', async () => {
    await expect(t.engine.construction.startProject(builder.id, 'radio_tower')).rejects.toBeInstanceOf(ForbiddenError);
  });

  it('should lower the region danger when a barricade goes up', async () => {
    await t.engine.construction.startProject(builder.id, 'barricade');

    t.clock.set(EPOCH + DAY_MS);
    await t.engine.clock.advance();

    const town = await t.world.repos.regions.getRegion('town');
    expect(town).toMatchObject({ dangerLevel: 4, structures: ['barricade'] });
    expect(eventsOfType(t.events, 'ConstructionCompleted')).toEqual([
      expect.objectContaining({ playerId: builder.id, structureType: 'barricade', regionId: 'town' }),
    ]);
    expect(await t.world.repos.construction.listInProgressForOwner(builder.id)).toEqual([]);
  });

  it('should roll a finished vehicle out in the region', async () => {
    await t.world.repos.players.updatePlayer(builder.id, { intelligence: 95 });
    await t.world.repos.players.addItems(builder.id, { steel: 50, engine_parts: 10, circuit: 5 });
    const project = await t.engine.construction.startProject(builder.id, 'tank');

    t.clock.set(project.dueAt);
    await t.engine.clock.advance();

    const [tank] = await t.world.repos.vehicles.getVehiclesByOwner(builder.id);
    expect(tank).toMatchObject({ type: 'tank', regionId: 'town', fuel: 0, condition: 100 });
    expect(await t.engine.construction.hasStructureAnywhere('tank')).toBe(false);
  });

  it('should abandon the project when its owner dies for good', async () => {
    const permadeath = await createTestWorld({ config: { playerDownPolicy: 'permadeath' } });
    const owner = await addPlayer(permadeath.world, 'doomed', 'Soldier', 'town');
    await permadeath.world.repos.players.addItems(owner.id, { wood: 20, metal: 5 });
    await permadeath.engine.construction.startProject(owner.id, 'barricade');

    await knockDown(permadeath.world, permadeath.engine.queue, await reload(permadeath.world, owner.id), 'zombie');

    expect(await permadeath.engine.queue.size()).toBe(0);
    expect(await permadeath.world.repos.construction.listInProgressForOwner(owner.id)).toEqual([]);
    permadeath.close();
  });
});
