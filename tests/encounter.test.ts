// ============================================
// DEADZONE - Encounter State Machine Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { canTransition, sneakChance } from '../src/simulation/encounter.machine.js';
import { ConflictError, NotFoundError, ValidationError } from '../src/plugins/error-handler.plugin.js';
import type { Player } from '../src/models/types.js';
import {
  EPOCH,
  addPlayer,
  constantRandom,
  createTestWorld,
  eventsOfType,
  reload,
  type TestWorld,
} from './helpers.js';

describe('Encounter Machine', () => {
  describe('transition table', () => {
    it('should allow the documented paths', () => {
      expect(canTransition('Presented', 'SneakResolved')).toBe(true);
      expect(canTransition('Presented', 'Expired')).toBe(true);
      expect(canTransition('Expired', 'AttackResolved')).toBe(true);
      expect(canTransition('SneakResolved', 'Fled')).toBe(true);
      expect(canTransition('AttackResolved', 'PlayerDown')).toBe(true);
    });

    it('should never leave a terminal state', () => {
      expect(canTransition('Cleared', 'Presented')).toBe(false);
      expect(canTransition('Fled', 'AttackResolved')).toBe(false);
      expect(canTransition('PlayerDown', 'Cleared')).toBe(false);
    });
  });

  describe('sneakChance', () => {
    let t: TestWorld;
    let player: Player;

    beforeEach(async () => {
      t = await createTestWorld();
      player = await addPlayer(t.world, 'shadow', 'Scavenger');
    });

    afterEach(() => {
      t.close();
    });

    it('should add stealth and the class bonus and subtract difficulty', () => {
      expect(sneakChance(player, 1, false)).toBe(48);
    });

    it('should be harder at night', () => {
      expect(sneakChance(player, 1, true)).toBe(38);
    });

    it('should clamp to 5..95', () => {
      expect(sneakChance({ ...player, stats: { ...player.stats, stealth: 200 } }, 1, false)).toBe(95);
      expect(sneakChance(player, 50, true)).toBe(5);
    });
  });

  describe('floor encounters', () => {
    let t: TestWorld;
    let player: Player;

    beforeEach(async () => {
      t = await createTestWorld();
      player = await addPlayer(t.world, 'rook');
    });

    afterEach(() => {
      t.close();
    });

    it('should present a zombie on an uncleared floor and open the decision window', async () => {
      const result = await t.engine.encounters.enter(player.id, 'shed', 0);

      expect(result.kind).toBe('presented');
      if (result.kind !== 'presented') return;
      expect(result.encounter).toMatchObject({
        state: 'Presented',
        difficulty: 1,
        deadline: EPOCH + 10_000,
        zombie: { archetype: 'walker', health: 42, armor: 2, speed: 6 },
      });

      const [row] = await t.engine.queue.list();
      expect(row).toMatchObject({ id: result.encounter.pendingActionId, kind: 'DecisionExpiry', dueAt: EPOCH + 10_000 });
      expect((await reload(t.world, player.id)).position).toEqual({ regionId: 'camp', buildingId: 'shed', floorIndex: 0 });
      expect(eventsOfType(t.events, 'EncounterPresented')).toHaveLength(1);
    });

    it('should allow only one encounter at a time', async () => {
      await t.engine.encounters.enter(player.id, 'shed', 0);

      await expect(t.engine.encounters.enter(player.id, 'shed', 1)).rejects.toMatchObject({
        code: 'ENCOUNTER_IN_PROGRESS',
      });
    });

    it('should reject buildings in other regions and missing floors', async () => {
      await expect(t.engine.encounters.enter(player.id, 'clinic', 0)).rejects.toBeInstanceOf(ValidationError);
      await expect(t.engine.encounters.enter(player.id, 'shed', 5)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should clear the floor and hand out loot when the player wins', async () => {
      await t.engine.encounters.enter(player.id, 'shed', 0);
      const resolution = await t.engine.encounters.choose(player.id, 'attack');

      expect(resolution.encounter).toMatchObject({
        state: 'Cleared',
        decision: 'attack',
        summary: 'rook defeated walker in 4 round(s)',
      });
      expect(resolution.loot).toEqual({ rations: 2, cloth: 1 });
      expect(await t.world.repos.players.getInventory(player.id)).toEqual({
        bandage: 2,
        cloth: 1,
        knife: 1,
        rations: 5,
      });
      expect((await reload(t.world, player.id)).stats.intelligence).toBe(25);

      const floor = await t.world.repos.buildings.getFloor('shed', 0);
      expect(floor).toMatchObject({ cleared: true, clearedBy: player.id, clearedAt: EPOCH });
      expect((await t.world.repos.regions.getRegion('camp'))?.noise).toBe(11);
      expect(await t.engine.queue.size()).toBe(0);
    });

    it('should keep a cleared floor cleared', async () => {
      await t.engine.encounters.enter(player.id, 'shed', 0);
      await t.engine.encounters.choose(player.id, 'attack');

      const other = await addPlayer(t.world, 'bishop');
      const result = await t.engine.encounters.enter(other.id, 'shed', 0);

      expect(result).toEqual({ kind: 'moved', buildingId: 'shed', floorIndex: 0 });
      expect(await t.world.repos.buildings.markFloorCleared('shed', 0, other.id, EPOCH + 1)).toBe(false);
      expect((await t.world.repos.buildings.getFloor('shed', 0))?.clearedBy).toBe(player.id);
    });

    it('should attack for the player when the window runs out', async () => {
      const result = await t.engine.encounters.enter(player.id, 'shed', 0);
      if (result.kind !== 'presented') throw new Error('expected an encounter');

      t.clock.set(EPOCH + 10_000);
      const report = await t.engine.clock.advance();

      expect(report?.resolved).toBe(1);
      const encounter = await t.world.repos.encounters.getEncounter(result.encounter.id);
      expect(encounter).toMatchObject({ state: 'Cleared', decision: 'timeout', alerted: false, pendingActionId: null });
      expect(eventsOfType(t.events, 'EncounterResolved')[0]).toMatchObject({ decision: 'timeout', state: 'Cleared' });
    });

    it('should treat a decision after the deadline as a timeout', async () => {
      await t.engine.encounters.enter(player.id, 'shed', 0);
      t.clock.set(EPOCH + 10_001);

      const resolution = await t.engine.encounters.choose(player.id, 'sneak');

      expect(resolution.encounter.decision).toBe('timeout');
      expect(await t.engine.queue.size()).toBe(0);
    });

    it('should ignore an expiry that lost the race to a decision', async () => {
      const result = await t.engine.encounters.enter(player.id, 'shed', 0);
      if (result.kind !== 'presented') throw new Error('expected an encounter');
      const [row] = await t.engine.queue.list();
      const action = t.engine.queue.parse(row);

      await t.engine.encounters.choose(player.id, 'attack');

      expect(await t.engine.encounters.expire(action)).toBeNull();
    });

    it('should fight alerted when a sneak fails', async () => {
      await t.engine.encounters.enter(player.id, 'shed', 0);
      const resolution = await t.engine.encounters.choose(player.id, 'sneak');

      expect(resolution.encounter).toMatchObject({ state: 'Cleared', decision: 'sneak', alerted: true });
    });

    it('should reject a decision with no encounter waiting', async () => {
      await expect(t.engine.encounters.choose(player.id, 'attack')).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe('sneaking past', () => {
    let t: TestWorld;

    beforeEach(async () => {
      t = await createTestWorld({ rng: constantRandom(0.1) });
    });

    afterEach(() => {
      t.close();
    });

    it('should slip out of the building without a fight', async () => {
      const player = await addPlayer(t.world, 'ghost');
      await t.engine.encounters.enter(player.id, 'shed', 0);

      const resolution = await t.engine.encounters.choose(player.id, 'sneak');

      expect(resolution.combat).toBeUndefined();
      expect(resolution.encounter).toMatchObject({ state: 'Fled', summary: 'Slipped past a walker' });
      expect((await reload(t.world, player.id)).position).toEqual({ regionId: 'camp', buildingId: null, floorIndex: null });
      expect((await t.world.repos.buildings.getFloor('shed', 0))?.cleared).toBe(false);
    });
  });

  describe('player down', () => {
    async function downedIn(policy: 'respawn' | 'permadeath'): Promise<{ t: TestWorld; player: Player }> {
      const t = await createTestWorld({ config: { playerDownPolicy: policy } });
      const player = await addPlayer(t.world, 'fragile');
      await t.world.repos.players.updatePlayer(player.id, { regionId: 'town', health: 1 });
      await t.engine.encounters.enter(player.id, 'clinic', 0);
      const resolution = await t.engine.encounters.choose(player.id, 'attack');
      expect(resolution.encounter.state).toBe('PlayerDown');
      return { t, player };
    }

    it('should respawn at the spawn region with part of max health', async () => {
      const { t, player } = await downedIn('respawn');

      const after = await reload(t.world, player.id);
      expect(after).toMatchObject({ status: 'active', health: 33, downCount: 1 });
      expect(after.position).toEqual({ regionId: 'camp', buildingId: null, floorIndex: null });
      expect(eventsOfType(t.events, 'PlayerDown')).toEqual([
        { type: 'PlayerDown', playerId: player.id, cause: 'zombie', policy: 'respawn' },
      ]);
      t.close();
    });

    it('should kill the player for good under permadeath', async () => {
      const { t, player } = await downedIn('permadeath');

      expect(await reload(t.world, player.id)).toMatchObject({ status: 'dead', health: 0 });
      await expect(t.engine.encounters.enter(player.id, 'clinic', 0)).rejects.toMatchObject({ code: 'PLAYER_DEAD' });
      t.close();
    });
  });
});
