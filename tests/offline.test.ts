// ============================================
// DEADZONE - Offline Standing Order Tests
// ============================================

import { describe, it, expect, afterEach } from 'vitest';
import { CommandService } from '../src/services/command.service.js';
import { LockScope } from '../src/simulation/locks.js';
import { scavengeChance } from '../src/simulation/offline.resolver.js';
import {
  EPOCH,
  addPlayer,
  constantRandom,
  createTestWorld,
  eventsOfType,
  reload,
  type TestWorld,
} from './helpers.js';

describe('Offline Resolver', () => {
  let t: TestWorld;

  afterEach(() => {
    t.close();
  });

  describe('setMode', () => {
    it('should schedule a resolution one interval out', async () => {
      t = await createTestWorld();
      const player = await addPlayer(t.world, 'sentry');

      const updated = await t.engine.offline.setMode(player.id, 'ambush');

      const [row] = await t.engine.queue.list();
      expect(row).toMatchObject({ id: updated.offlineActionId, kind: 'OfflineResolution', dueAt: EPOCH + 60_000 });
      expect(await reload(t.world, player.id)).toMatchObject({
        offlineMode: 'ambush',
        offlineModeSetAt: EPOCH,
        offlineActionId: row.id,
      });
    });

    it('should replace the previous order and cancel its action', async () => {
      t = await createTestWorld();
      const player = await addPlayer(t.world, 'sentry');

      await t.engine.offline.setMode(player.id, 'ambush');
      await t.engine.offline.setMode(player.id, 'none');

      expect(await t.engine.queue.size()).toBe(0);
      expect((await reload(t.world, player.id)).offlineMode).toBe('none');
    });

    it('should refuse an order during an encounter', async () => {
      t = await createTestWorld();
      const player = await addPlayer(t.world, 'sentry');
      await t.engine.encounters.enter(player.id, 'shed', 0);

      await expect(t.engine.offline.setMode(player.id, 'scavenge')).rejects.toMatchObject({
        code: 'ENCOUNTER_IN_PROGRESS',
      });
    });

    it('should do nothing for a stale resolution', async () => {
      t = await createTestWorld();
      const player = await addPlayer(t.world, 'sentry');
      await t.engine.offline.setMode(player.id, 'scavenge');
      const [stale] = await t.engine.queue.list();

      await t.engine.offline.setMode(player.id, 'scavenge');

      const result = await t.engine.offline.resolveScheduled(t.engine.queue.parse(stale), new LockScope([]));
      expect(result).toBeNull();
      expect(eventsOfType(t.events, 'OfflineModeResolved')).toEqual([]);
    });
  });

  describe('scavenge', () => {
    it('should compute the success chance from danger, armor and intelligence', async () => {
      t = await createTestWorld();
      const player = await addPlayer(t.world, 'finder');

      expect(scavengeChance(player, 1)).toBeCloseTo(0.32);
      expect(scavengeChance(player, 30)).toBe(0.05);
    });

    it('should find regional loot and keep going', async () => {
      t = await createTestWorld({ rng: constantRandom(0.1) });
      const player = await addPlayer(t.world, 'finder');
      await t.world.repos.regions.updateRegion('camp', { noise: 7 });
      await t.engine.offline.setMode(player.id, 'scavenge');

      t.clock.set(EPOCH + 60_000);
      await t.engine.clock.advance();

      expect(eventsOfType(t.events, 'OfflineModeResolved')).toEqual([
        {
          type: 'OfflineModeResolved',
          playerId: player.id,
          mode: 'scavenge',
          outcome: 'found',
          trigger: 'scheduled',
          loot: { wood: 1 },
        },
      ]);
      expect((await t.world.repos.players.getInventory(player.id)).wood).toBe(1);

      const [next] = await t.engine.queue.list();
      expect(next).toMatchObject({ kind: 'OfflineResolution', dueAt: EPOCH + 120_000 });
      expect(JSON.parse(next.payload)).toEqual({ kind: 'OfflineResolution', mode: 'scavenge', modeSetAt: EPOCH });
    });

    it('should fight off a zombie when caught off guard', async () => {
      t = await createTestWorld();
      const player = await addPlayer(t.world, 'finder');
      await t.engine.offline.setMode(player.id, 'scavenge');

      t.clock.set(EPOCH + 60_000);
      await t.engine.clock.advance();

      const [resolved] = eventsOfType(t.events, 'OfflineModeResolved');
      expect(resolved.outcome).toBe('fought_off');
      expect((await reload(t.world, player.id)).health).toBeLessThan(110);
      expect((await reload(t.world, player.id)).offlineMode).toBe('scavenge');
    });
  });

  describe('ambush', () => {
    it('should strike a player who walks into the region', async () => {
      t = await createTestWorld();
      const hunter = await addPlayer(t.world, 'hunter', 'Soldier', 'town');
      const walker = await addPlayer(t.world, 'walker', 'Scavenger', 'camp');
      await t.engine.offline.setMode(hunter.id, 'ambush');

      const result = await new CommandService(t.engine).dispatch({ playerId: walker.id, verb: 'move', args: ['town'] });

      expect(result).toMatchObject({ ok: true, message: 'You arrive in Town. You were ambushed 1 time(s)!' });
      expect(eventsOfType(t.events, 'OfflineModeResolved')).toEqual([
        {
          type: 'OfflineModeResolved',
          playerId: hunter.id,
          mode: 'ambush',
          outcome: 'target_down',
          trigger: 'arrival',
          targetId: walker.id,
        },
      ]);
      expect(eventsOfType(t.events, 'PlayerDown')).toEqual([
        { type: 'PlayerDown', playerId: walker.id, cause: 'ambush', policy: 'respawn', byPlayerId: hunter.id },
      ]);

      expect(await reload(t.world, hunter.id)).toMatchObject({ health: 40, offlineMode: 'none', offlineActionId: null });
      const after = await reload(t.world, walker.id);
      expect(after).toMatchObject({ health: 30, downCount: 1 });
      expect(after.position.regionId).toBe('camp');
      expect(await t.engine.queue.size()).toBe(0);
    });

    it('should not treat a respawn as an arrival', async () => {
      t = await createTestWorld();
      const hunter = await addPlayer(t.world, 'hunter', 'Soldier', 'town');
      const lurker = await addPlayer(t.world, 'lurker', 'Soldier', 'camp');
      const walker = await addPlayer(t.world, 'walker', 'Scavenger', 'camp');
      await t.engine.offline.setMode(hunter.id, 'ambush');
      await t.engine.offline.setMode(lurker.id, 'ambush');

      await new CommandService(t.engine).dispatch({ playerId: walker.id, verb: 'move', args: ['town'] });

      const after = await reload(t.world, walker.id);
      expect(after).toMatchObject({ health: 30, downCount: 1 });
      expect(after.position.regionId).toBe('camp');
      expect(eventsOfType(t.events, 'OfflineModeResolved').map(e => e.playerId)).toEqual([hunter.id]);
      expect(await reload(t.world, lurker.id)).toMatchObject({ health: 110, offlineMode: 'ambush' });
      const [next] = await t.engine.queue.list();
      expect(next).toMatchObject({ ownerId: lurker.id, dueAt: EPOCH + 60_000 });
    });

    it('should strike from hiding when the interval comes up', async () => {
      t = await createTestWorld();
      const hunter = await addPlayer(t.world, 'hunter');
      const target = await addPlayer(t.world, 'target', 'Scavenger');
      await t.engine.offline.setMode(hunter.id, 'ambush');

      t.clock.set(EPOCH + 60_000);
      await t.engine.clock.advance();

      expect(eventsOfType(t.events, 'OfflineModeResolved')).toEqual([
        {
          type: 'OfflineModeResolved',
          playerId: hunter.id,
          mode: 'ambush',
          outcome: 'target_down',
          trigger: 'scheduled',
          targetId: target.id,
        },
      ]);
      expect(await t.engine.queue.size()).toBe(0);
    });

    it('should keep waiting when nobody is on the street', async () => {
      t = await createTestWorld();
      const hunter = await addPlayer(t.world, 'hunter');
      const indoors = await addPlayer(t.world, 'indoors');
      await t.world.repos.players.updatePlayer(indoors.id, { buildingId: 'shed', floorIndex: 0 });
      await t.engine.offline.setMode(hunter.id, 'ambush');

      t.clock.set(EPOCH + 60_000);
      await t.engine.clock.advance();

      expect(eventsOfType(t.events, 'OfflineModeResolved')).toEqual([]);
      const [next] = await t.engine.queue.list();
      expect(next).toMatchObject({ ownerId: hunter.id, dueAt: EPOCH + 120_000 });
      expect((await reload(t.world, hunter.id)).offlineMode).toBe('ambush');
    });

    it('should hold fire while the hunter is inside a building', async () => {
      t = await createTestWorld();
      const hunter = await addPlayer(t.world, 'hunter');
      const target = await addPlayer(t.world, 'target', 'Scavenger');
      await t.world.repos.players.updatePlayer(hunter.id, { buildingId: 'shed', floorIndex: 0 });
      await t.engine.offline.setMode(hunter.id, 'ambush');

      t.clock.set(EPOCH + 60_000);
      await t.engine.clock.advance();

      expect(eventsOfType(t.events, 'OfflineModeResolved')).toEqual([]);
      expect(await reload(t.world, target.id)).toMatchObject({ health: 100, downCount: 0 });
      const [next] = await t.engine.queue.list();
      expect(next).toMatchObject({ ownerId: hunter.id, dueAt: EPOCH + 120_000 });
      expect((await reload(t.world, hunter.id)).offlineMode).toBe('ambush');
    });
  });
});
