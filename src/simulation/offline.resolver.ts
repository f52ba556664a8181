// ============================================
// DEADZONE - Offline Mode Resolver
// ============================================

import { CLASS_BONUSES, NOISE, scaledMs } from '../config/game.js';
import type { Inventory, OfflineMode, PendingAction, Player } from '../models/types.js';
import { ConflictError, InvariantViolation, NotFoundError } from '../plugins/error-handler.plugin.js';
import { resolveCombat } from './combat.resolver.js';
import { playerCombatant, rollLoot, rollZombie, settleCombat, zombieCombatant } from './combatants.js';
import { playerLock, regionLock, type LockKey, type LockScope } from './locks.js';
import { knockDown } from './player-down.js';
import type { PendingActionQueue } from './pending-action.queue.js';
import type { WorldState } from './world-state.js';

type StandingOrder = Exclude<OfflineMode, 'none'>;

export type ScavengeOutcome = 'found' | 'fought_off' | 'escaped' | 'down';
export type AmbushOutcome = 'target_down' | 'ambusher_down' | 'standoff';

export interface OfflineResult {
  playerId: string;
  mode: StandingOrder;
  outcome: ScavengeOutcome | AmbushOutcome;
  targetId?: string;
  loot?: Inventory;
}

export function scavengeChance(player: Player, dangerLevel: number): number {
  const raw = 0.3
    - 0.02 * dangerLevel
    + 0.01 * player.stats.armor
    + 0.001 * player.stats.intelligence;
  return Math.min(0.8, Math.max(0.05, raw));
}

export class OfflineResolver {
  constructor(
    private world: WorldState,
    private queue: PendingActionQueue
  ) {}

  /**
   * Replace the player's standing order. The previous scheduled resolution
   * is cancelled; ambush and scavenge schedule a new one.
   * Caller holds the player lock.
   */
  async setMode(playerId: string, mode: OfflineMode): Promise<Player> {
    const { repos } = this.world;
    const player = await repos.players.getPlayer(playerId);
    if (!player) {
      throw new NotFoundError('Player', playerId);
    }
    if (player.status !== 'active') {
      throw new ConflictError('You are dead', 'PLAYER_DEAD');
    }
    if (mode !== 'none') {
      if (player.travelingVehicleId) {
        throw new ConflictError('You are travelling', 'PLAYER_TRAVELING');
      }
      if (await repos.encounters.getOpenForPlayer(playerId)) {
        throw new ConflictError('Finish your current encounter first', 'ENCOUNTER_IN_PROGRESS');
      }
    }

    await this.queue.cancel(player.offlineActionId);

    if (mode === 'none') {
      await repos.players.updatePlayer(playerId, {
        offlineMode: 'none',
        offlineModeSetAt: null,
        offlineActionId: null,
      });
      return { ...player, offlineMode: 'none', offlineModeSetAt: null, offlineActionId: null };
    }

    const now = this.world.now();
    const actionId = await this.scheduleNext(playerId, mode, now);
    await repos.players.updatePlayer(playerId, { lastActiveAt: now });
    return { ...player, offlineMode: mode, offlineModeSetAt: now, offlineActionId: actionId };
  }

  /**
   * Locks for a scheduled resolution: the owner, their region and, for an
   * ambush, everyone standing there.
   */
  async scheduledLockKeys(action: PendingAction): Promise<LockKey[]> {
    const keys = [playerLock(action.ownerId)];
    const player = await this.world.repos.players.getPlayer(action.ownerId);
    if (!player) return keys;

    keys.push(regionLock(player.position.regionId));
    if (action.payload.kind === 'OfflineResolution' && action.payload.mode === 'ambush') {
      const present = await this.world.repos.players.listInRegion(player.position.regionId);
      keys.push(...present.map(p => playerLock(p.id)));
    }
    return keys;
  }

  async arrivalLockKeys(arrivalId: string, regionId: string): Promise<LockKey[]> {
    const ambushers = await this.world.repos.players.listAmbushersInRegion(regionId, arrivalId);
    return [playerLock(arrivalId), ...ambushers.map(p => playerLock(p.id)), regionLock(regionId)];
  }

  /**
   * OfflineResolution resolver. Stale actions (mode changed or re-set since
   * scheduling) do nothing.
   */
  async resolveScheduled(action: PendingAction, scope: LockScope): Promise<OfflineResult | null> {
    if (action.payload.kind !== 'OfflineResolution') {
      throw new InvariantViolation(`Offline resolver cannot resolve ${action.payload.kind}`);
    }
    const { mode, modeSetAt } = action.payload;
    const { repos, logger } = this.world;

    const player = await repos.players.getPlayer(action.ownerId);
    if (!player || player.status !== 'active') return null;

    if (player.offlineMode !== mode || player.offlineModeSetAt !== modeSetAt || player.offlineActionId !== action.id) {
      logger.debug({ playerId: player.id, actionId: action.id }, 'stale offline resolution skipped');
      return null;
    }

    if (player.travelingVehicleId || await repos.encounters.getOpenForPlayer(player.id)) {
      await this.reschedule(player.id, mode, modeSetAt);
      return null;
    }

    return mode === 'scavenge'
      ? this.scavenge(player, modeSetAt)
      : this.ambushFromHiding(player, modeSetAt, scope);
  }

  /**
   * A player arrived in a region: every ambusher lying in wait there strikes,
   * in id order, until the arrival goes down or leaves.
   */
  async onArrival(arrivalId: string, regionId: string, scope: LockScope): Promise<OfflineResult[]> {
    const { repos } = this.world;
    const results: OfflineResult[] = [];

    const ambushers = (await repos.players.listAmbushersInRegion(regionId, arrivalId))
      .filter(p => p.position.buildingId === null && scope.has(playerLock(p.id)));

    for (const ambusher of ambushers) {
      const arrival = await repos.players.getPlayer(arrivalId);
      if (!arrival || arrival.status !== 'active' || arrival.position.regionId !== regionId) break;

      await this.queue.cancel(ambusher.offlineActionId);
      const ready = await this.clearMode(ambusher);
      results.push(await this.ambush(ready, arrival, 'arrival'));
    }

    return results;
  }

  // ============================================
  // Scavenge
  // ============================================

  private async scavenge(player: Player, modeSetAt: number): Promise<OfflineResult> {
    const { repos, rng, config } = this.world;
    const region = await repos.regions.getRegion(player.position.regionId);
    if (!region) {
      throw new InvariantViolation(`Player ${player.id} stands in missing region ${player.position.regionId}`);
    }

    let result: OfflineResult;

    if (rng.chance(scavengeChance(player, region.dangerLevel))) {
      const loot = rollLoot(rng, region.kind, CLASS_BONUSES[player.playerClass].lootYield);
      await repos.players.addItems(player.id, loot);
      await repos.regions.lowerNoise(region.id, NOISE.SCAVENGE_RELIEF);
      result = { playerId: player.id, mode: 'scavenge', outcome: 'found', loot };
    } else {
      // Caught off guard
      const zombieId = `zombie:scavenge:${player.id}`;
      const combat = resolveCombat(
        await playerCombatant(this.world, player, { armorFactor: config.offGuardArmorFactor }),
        zombieCombatant(zombieId, rollZombie(rng, region.dangerLevel)),
        rng,
        config
      );
      await settleCombat(this.world, player, combat);
      await repos.regions.addNoise(region.id, NOISE.COMBAT);

      if (combat.winnerId === player.id) {
        if (region.zombieCount > 0) {
          await repos.regions.updateRegion(region.id, { zombieCount: region.zombieCount - 1 });
        }
        result = { playerId: player.id, mode: 'scavenge', outcome: 'fought_off' };
      } else if (combat.loserId === player.id) {
        await knockDown(this.world, this.queue, { ...player, health: 0, offlineActionId: null }, 'zombie');
        result = { playerId: player.id, mode: 'scavenge', outcome: 'down' };
      } else {
        result = { playerId: player.id, mode: 'scavenge', outcome: 'escaped' };
      }
    }

    this.publish(result, 'scheduled');

    if (result.outcome !== 'down') {
      await this.reschedule(player.id, 'scavenge', modeSetAt);
    }
    return result;
  }

  // ============================================
  // Ambush
  // ============================================

  private async ambushFromHiding(player: Player, modeSetAt: number, scope: LockScope): Promise<OfflineResult | null> {
    // Ambushes are sprung from the street only
    if (player.position.buildingId !== null) {
      await this.reschedule(player.id, 'ambush', modeSetAt);
      return null;
    }

    const present = await this.world.repos.players.listInRegion(player.position.regionId);
    const targets = present.filter(p =>
      p.id !== player.id
      && p.position.buildingId === null
      && scope.has(playerLock(p.id))
    );

    if (targets.length === 0) {
      await this.reschedule(player.id, 'ambush', modeSetAt);
      return null;
    }

    const target = this.world.rng.pick(targets);
    const ready = await this.clearMode(player);
    const result = await this.ambush(ready, target, 'scheduled');
    return result;
  }

  private async ambush(ambusher: Player, target: Player, trigger: 'scheduled' | 'arrival'): Promise<OfflineResult> {
    const { repos, rng, config } = this.world;

    const combat = resolveCombat(
      await playerCombatant(this.world, ambusher, { ambusher: true }),
      await playerCombatant(this.world, target),
      rng,
      config
    );
    await settleCombat(this.world, ambusher, combat);
    await settleCombat(this.world, target, combat);
    await repos.regions.addNoise(target.position.regionId, NOISE.COMBAT);

    let outcome: AmbushOutcome = 'standoff';
    if (combat.winnerId === ambusher.id) {
      outcome = 'target_down';
      await knockDown(this.world, this.queue, { ...target, health: 0 }, 'ambush', ambusher.id);
    } else if (combat.winnerId === target.id) {
      outcome = 'ambusher_down';
      await knockDown(this.world, this.queue, { ...ambusher, health: 0 }, 'ambush', target.id);
    }

    const result: OfflineResult = { playerId: ambusher.id, mode: 'ambush', outcome, targetId: target.id };
    this.publish(result, trigger);
    return result;
  }

  // ============================================
  // Helpers
  // ============================================

  private async scheduleNext(playerId: string, mode: StandingOrder, modeSetAt: number): Promise<number> {
    const dueAt = this.world.now() + scaledMs(this.world.config, this.world.config.offlineIntervalSeconds);
    const action = await this.queue.schedule({ type: 'player', id: playerId }, dueAt, {
      kind: 'OfflineResolution',
      mode,
      modeSetAt,
    });
    await this.world.repos.players.updatePlayer(playerId, {
      offlineMode: mode,
      offlineModeSetAt: modeSetAt,
      offlineActionId: action.id,
    });
    return action.id;
  }

  private async reschedule(playerId: string, mode: StandingOrder, modeSetAt: number): Promise<void> {
    await this.scheduleNext(playerId, mode, modeSetAt);
  }

  private async clearMode(player: Player): Promise<Player> {
    await this.world.repos.players.updatePlayer(player.id, {
      offlineMode: 'none',
      offlineModeSetAt: null,
      offlineActionId: null,
    });
    return { ...player, offlineMode: 'none', offlineModeSetAt: null, offlineActionId: null };
  }

  private publish(result: OfflineResult, trigger: 'scheduled' | 'arrival'): void {
    this.world.events.publish({
      type: 'OfflineModeResolved',
      playerId: result.playerId,
      mode: result.mode,
      outcome: result.outcome,
      trigger,
      ...(result.targetId ? { targetId: result.targetId } : {}),
      ...(result.loot ? { loot: result.loot } : {}),
    });
  }
}
