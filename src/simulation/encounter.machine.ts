// ============================================
// DEADZONE - Encounter State Machine
// ============================================

import { BASE_PLAYER, CLASS_BONUSES, NOISE, scaledMs } from '../config/game.js';
import type {
  Encounter,
  EncounterDecision,
  EncounterState,
  Inventory,
  PendingAction,
  Player,
  TerminalEncounterState,
} from '../models/types.js';
import type { EncounterChanges } from '../repositories/encounter.repository.js';
import {
  ConflictError,
  InvariantViolation,
  NotFoundError,
  ValidationError,
} from '../plugins/error-handler.plugin.js';
import { resolveCombat, type CombatOutcome } from './combat.resolver.js';
import {
  describeOutcome,
  playerCombatant,
  rollLoot,
  rollZombie,
  settleCombat,
  zombieCombatant,
} from './combatants.js';
import { buildingLock, playerLock, regionLock, type LockKey } from './locks.js';
import { knockDown } from './player-down.js';
import type { PendingActionQueue } from './pending-action.queue.js';
import { isNight, type WorldState } from './world-state.js';

// ============================================
// Transition table
// ============================================

export const ENCOUNTER_TRANSITIONS: Record<EncounterState, readonly EncounterState[]> = {
  Presented: ['SneakResolved', 'AttackResolved', 'Expired'],
  SneakResolved: ['Fled', 'AttackResolved'],
  Expired: ['AttackResolved'],
  AttackResolved: ['Cleared', 'Fled', 'PlayerDown'],
  Cleared: [],
  Fled: [],
  PlayerDown: [],
};

export function canTransition(from: EncounterState, to: EncounterState): boolean {
  return ENCOUNTER_TRANSITIONS[from].includes(to);
}

/**
 * Percent chance to slip past the zombie, clamped to 5..95.
 */
export function sneakChance(player: Player, difficulty: number, night: boolean): number {
  const raw = 30
    + player.stats.stealth
    + CLASS_BONUSES[player.playerClass].stealth
    - 2 * difficulty
    - (night ? 10 : 0);
  return Math.min(95, Math.max(5, raw));
}

export type EnterResult =
  | { kind: 'moved'; buildingId: string; floorIndex: number }
  | { kind: 'presented'; encounter: Encounter };

export interface EncounterResolution {
  encounter: Encounter;
  combat?: CombatOutcome;
  loot?: Inventory;
}

export class EncounterMachine {
  constructor(
    private world: WorldState,
    private queue: PendingActionQueue
  ) {}

  /**
   * Step onto a floor. Uncleared floors present a zombie and open the
   * decision window; cleared floors just move the player.
   * Caller holds the player, region and building locks.
   */
  async enter(playerId: string, buildingId: string, floorIndex: number): Promise<EnterResult> {
    const { repos } = this.world;
    const player = await this.requireActivePlayer(playerId);

    if (player.travelingVehicleId) {
      throw new ConflictError('You are travelling', 'PLAYER_TRAVELING');
    }
    if (await repos.encounters.getOpenForPlayer(playerId)) {
      throw new ConflictError('Finish your current encounter first', 'ENCOUNTER_IN_PROGRESS');
    }

    const building = await repos.buildings.getBuilding(buildingId);
    if (!building) {
      throw new NotFoundError('Building', buildingId);
    }
    if (building.regionId !== player.position.regionId) {
      throw new ValidationError(`${building.name} is not in your region`);
    }
    const floor = building.floors.find(f => f.floorIndex === floorIndex);
    if (!floor) {
      throw new NotFoundError('Floor', `${buildingId}#${floorIndex}`);
    }

    const now = this.world.now();
    await repos.regions.addNoise(building.regionId, NOISE.MOVE);

    if (floor.cleared) {
      await repos.players.updatePlayer(playerId, { buildingId, floorIndex, lastActiveAt: now });
      return { kind: 'moved', buildingId, floorIndex };
    }

    const region = await repos.regions.getRegion(building.regionId);
    if (!region) {
      throw new InvariantViolation(`Building ${buildingId} points at missing region ${building.regionId}`);
    }

    const difficulty = (floorIndex + 1) * region.dangerLevel;
    const zombie = rollZombie(this.world.rng, difficulty);
    const deadline = now + scaledMs(this.world.config, this.world.config.decisionWindowSeconds);

    const created = await repos.encounters.createEncounter({
      playerId,
      buildingId,
      floorIndex,
      enteredAt: now,
      difficulty,
      zombie,
      deadline,
    });
    const action = await this.queue.schedule({ type: 'player', id: playerId }, deadline, {
      kind: 'DecisionExpiry',
      encounterId: created.id,
    });
    await repos.encounters.setPendingAction(created.id, action.id);
    await repos.players.updatePlayer(playerId, { buildingId, floorIndex, lastActiveAt: now });

    const encounter: Encounter = { ...created, pendingActionId: action.id };
    this.world.events.publish({
      type: 'EncounterPresented',
      playerId,
      encounterId: encounter.id,
      buildingId,
      floorIndex,
      deadline,
      zombie,
    });
    return { kind: 'presented', encounter };
  }

  /**
   * Explicit sneak or attack. A choice after the deadline counts as the timeout.
   * Caller holds the locks from `lockKeys`.
   */
  async choose(playerId: string, decision: Exclude<EncounterDecision, 'timeout'>): Promise<EncounterResolution> {
    const encounter = await this.world.repos.encounters.getOpenForPlayer(playerId);
    if (!encounter || encounter.state !== 'Presented') {
      throw new ConflictError('No encounter is waiting for your decision', 'NO_ENCOUNTER');
    }

    await this.queue.cancel(encounter.pendingActionId);
    const late = this.world.now() > encounter.deadline;
    if (late) {
      this.world.logger.debug({ encounterId: encounter.id, decision }, 'decision arrived after deadline');
    }
    return this.resolve(encounter, late ? 'timeout' : decision);
  }

  /**
   * DecisionExpiry resolver. No-op when the player already decided.
   */
  async expire(action: PendingAction): Promise<EncounterResolution | null> {
    if (action.payload.kind !== 'DecisionExpiry') {
      throw new InvariantViolation(`Encounter machine cannot resolve ${action.payload.kind}`);
    }
    const encounter = await this.world.repos.encounters.getEncounter(action.payload.encounterId);
    if (!encounter || encounter.state !== 'Presented') {
      return null;
    }
    return this.resolve(encounter, 'timeout');
  }

  /**
   * Locks needed to resolve the player's open encounter (or just the player).
   */
  async lockKeys(playerId: string, encounterId?: string): Promise<LockKey[]> {
    const { repos } = this.world;
    const encounter = encounterId
      ? await repos.encounters.getEncounter(encounterId)
      : await repos.encounters.getOpenForPlayer(playerId);
    const keys = [playerLock(playerId)];
    if (!encounter) return keys;

    const building = await repos.buildings.getBuilding(encounter.buildingId);
    keys.push(buildingLock(encounter.buildingId));
    if (building) keys.push(regionLock(building.regionId));
    return keys;
  }

  // ============================================
  // Resolution
  // ============================================

  private async resolve(encounter: Encounter, decision: EncounterDecision): Promise<EncounterResolution> {
    const player = await this.world.repos.players.getPlayer(encounter.playerId);
    if (!player) {
      throw new InvariantViolation(`Encounter ${encounter.id} belongs to missing player ${encounter.playerId}`);
    }

    if (decision === 'timeout') {
      const expired = await this.transition(encounter, 'Expired', { decision: 'timeout', pendingActionId: null });
      const attacking = await this.transition(expired, 'AttackResolved', {});
      return this.fight(attacking, player, decision);
    }

    if (decision === 'attack') {
      const attacking = await this.transition(encounter, 'AttackResolved', { decision: 'attack', pendingActionId: null });
      return this.fight(attacking, player, decision);
    }

    const chance = sneakChance(player, encounter.difficulty, await isNight(this.world));
    const sneaking = await this.transition(encounter, 'SneakResolved', { decision: 'sneak', pendingActionId: null });

    if (this.world.rng.chance(chance / 100)) {
      const summary = `Slipped past a ${encounter.zombie.archetype}`;
      const fled = await this.finish(sneaking, 'Fled', summary, decision);
      await this.leaveBuilding(player.id);
      return { encounter: fled };
    }

    const alerted = await this.transition(sneaking, 'AttackResolved', { alerted: true });
    return this.fight(alerted, player, decision);
  }

  private async fight(encounter: Encounter, player: Player, decision: EncounterDecision): Promise<EncounterResolution> {
    const { repos, rng, config } = this.world;
    const zombieId = `zombie:${encounter.id}`;

    const combat = resolveCombat(
      await playerCombatant(this.world, player),
      zombieCombatant(zombieId, encounter.zombie, encounter.alerted),
      rng,
      config
    );
    await settleCombat(this.world, player, combat);

    const building = await repos.buildings.getBuilding(encounter.buildingId);
    if (!building) {
      throw new InvariantViolation(`Encounter ${encounter.id} points at missing building ${encounter.buildingId}`);
    }
    await repos.regions.addNoise(building.regionId, NOISE.COMBAT);

    const summary = describeOutcome(combat, { [player.id]: player.name, [zombieId]: encounter.zombie.archetype });

    if (combat.winnerId === player.id) {
      const loot = await this.clearFloor(encounter, player, building.regionId);
      const cleared = await this.finish(encounter, 'Cleared', summary, decision);
      return { encounter: cleared, combat, loot };
    }

    if (combat.loserId === player.id) {
      const down = await this.finish(encounter, 'PlayerDown', summary, decision);
      await knockDown(this.world, this.queue, { ...player, health: 0 }, 'zombie');
      return { encounter: down, combat };
    }

    const fled = await this.finish(encounter, 'Fled', summary, decision);
    await this.leaveBuilding(player.id);
    return { encounter: fled, combat };
  }

  private async clearFloor(encounter: Encounter, player: Player, regionId: string): Promise<Inventory> {
    const { repos, rng } = this.world;
    const now = this.world.now();

    const region = await repos.regions.getRegion(regionId);
    if (region && region.zombieCount > 0) {
      await repos.regions.updateRegion(regionId, { zombieCount: region.zombieCount - 1 });
    }

    const newlyCleared = await repos.buildings.markFloorCleared(encounter.buildingId, encounter.floorIndex, player.id, now);
    if (!newlyCleared) {
      return {};
    }

    const floor = await repos.buildings.getFloor(encounter.buildingId, encounter.floorIndex);
    const loot = floor ? rollLoot(rng, floor.lootTable, CLASS_BONUSES[player.playerClass].lootYield) : {};
    await repos.players.addItems(player.id, loot);
    await repos.players.updatePlayer(player.id, {
      intelligence: player.stats.intelligence + BASE_PLAYER.INTELLIGENCE_PER_CLEAR,
    });

    this.world.events.publish({
      type: 'FloorCleared',
      playerId: player.id,
      buildingId: encounter.buildingId,
      floorIndex: encounter.floorIndex,
      loot,
    });
    return loot;
  }

  private async finish(
    encounter: Encounter,
    state: TerminalEncounterState,
    summary: string,
    decision: EncounterDecision
  ): Promise<Encounter> {
    const done = await this.transition(encounter, state, { resolvedAt: this.world.now(), summary });
    this.world.events.publish({
      type: 'EncounterResolved',
      playerId: encounter.playerId,
      encounterId: encounter.id,
      state,
      decision,
      summary,
    });
    return done;
  }

  private async transition(encounter: Encounter, to: EncounterState, changes: EncounterChanges): Promise<Encounter> {
    if (!canTransition(encounter.state, to)) {
      throw new InvariantViolation(`Illegal encounter transition ${encounter.state} -> ${to}`);
    }
    const updated = await this.world.repos.encounters.transition(encounter.id, encounter.state, { ...changes, state: to });
    if (!updated) {
      throw new InvariantViolation(`Encounter ${encounter.id} left ${encounter.state} while being resolved`);
    }
    return updated;
  }

  private async leaveBuilding(playerId: string): Promise<void> {
    await this.world.repos.players.updatePlayer(playerId, { buildingId: null, floorIndex: null });
  }

  private async requireActivePlayer(playerId: string): Promise<Player> {
    const player = await this.world.repos.players.getPlayer(playerId);
    if (!player) {
      throw new NotFoundError('Player', playerId);
    }
    if (player.status !== 'active') {
      throw new ConflictError('You are dead', 'PLAYER_DEAD');
    }
    return player;
  }
}
