// ============================================
// DEADZONE - Command Service
// ============================================

import {
  CLASS_BONUSES,
  ITEM_EFFECTS,
  LOOT_COOLDOWN_GAME_HOURS,
  NOISE,
  STRUCTURES,
  WEAPONS,
  scaledMs,
} from '../config/game.js';
import type { Encounter, Player, StructureType } from '../models/types.js';
import {
  ConflictError,
  InvariantViolation,
  NotFoundError,
  ValidationError,
  toErrorResponse,
} from '../plugins/error-handler.plugin.js';
import { COMMAND_VERBS, commandArgSchemas, commandVerbSchema, type CommandVerb } from '../schemas/commands.schema.js';
import { rollLoot } from '../simulation/combatants.js';
import type { WorldEngine } from '../simulation/engine.js';
import { buildingLock, playerLock, regionLock, type LockKey, type LockScope } from '../simulation/locks.js';
import { currentGameTime } from '../simulation/world-state.js';

export interface CommandRequest {
  playerId: string;
  verb: string;
  args?: ReadonlyArray<string | number>;
}

export interface CommandOutcome {
  message: string;
  data?: unknown;
}

export type CommandResult =
  | { ok: true; verb: CommandVerb; message: string; data?: unknown }
  | {
      ok: false;
      verb: string;
      statusCode: number;
      error: { code: string; message: string; details?: unknown };
    };

export class CommandService {
  constructor(private engine: WorldEngine) {}

  private get world() {
    return this.engine.world;
  }

  /**
   * Run one player command. Never throws: failures come back as a
   * CommandResult carrying the mapped error.
   */
  async dispatch(request: CommandRequest): Promise<CommandResult> {
    const { logger } = this.world;
    try {
      const verb = parseVerb(request.verb);
      const outcome = await this.execute(verb, request.playerId, request.args ?? []);
      return { ok: true, verb, ...outcome };
    } catch (error) {
      const { statusCode, body } = toErrorResponse(error);
      if (error instanceof InvariantViolation) {
        logger.fatal({ err: error, playerId: request.playerId, verb: request.verb }, 'invariant violated');
      } else if (statusCode >= 500) {
        logger.error({ err: error, playerId: request.playerId, verb: request.verb }, 'command failed');
      } else {
        logger.debug({ code: body.error.code, playerId: request.playerId, verb: request.verb }, body.error.message);
      }
      return { ok: false, verb: request.verb, statusCode, error: body.error };
    }
  }

  private async execute(verb: CommandVerb, playerId: string, args: ReadonlyArray<string | number>): Promise<CommandOutcome> {
    switch (verb) {
      case 'status':
        commandArgSchemas.status.parse(args);
        return this.status(playerId);
      case 'move': {
        const [regionId] = commandArgSchemas.move.parse(args);
        return this.move(playerId, regionId);
      }
      case 'enter': {
        const [buildingId, floorIndex] = commandArgSchemas.enter.parse(args);
        return this.enter(playerId, buildingId, floorIndex);
      }
      case 'sneak':
      case 'attack':
        commandArgSchemas[verb].parse(args);
        return this.decide(playerId, verb);
      case 'setmode': {
        const [mode] = commandArgSchemas.setmode.parse(args);
        return this.withPlayerRegion(playerId, [], async () => {
          const player = await this.engine.offline.setMode(playerId, mode);
          return {
            message: mode === 'none' ? 'Standing orders cleared' : `Standing order set: ${mode}`,
            data: { offlineMode: player.offlineMode, offlineActionId: player.offlineActionId },
          };
        });
      }
      case 'loot':
        commandArgSchemas.loot.parse(args);
        return this.loot(playerId);
      case 'equip': {
        const [weapon] = commandArgSchemas.equip.parse(args);
        return this.equip(playerId, weapon);
      }
      case 'build': {
        const [structure] = commandArgSchemas.build.parse(args);
        return this.build(playerId, structure);
      }
      case 'drive': {
        const [vehicleId, regionId] = commandArgSchemas.drive.parse(args);
        return this.withPlayerRegion(playerId, [], async () => {
          const trip = await this.engine.vehicles.drive(playerId, vehicleId, regionId);
          const seconds = Math.ceil((trip.arrivesAt - this.world.now()) / 1000);
          return {
            message: `You drive off toward ${regionId} (${trip.route.join(' > ')}), arriving in ${seconds}s`,
            data: trip,
          };
        });
      }
      case 'repair': {
        const [vehicleId] = commandArgSchemas.repair.parse(args);
        return this.withPlayer(playerId, async () => {
          const vehicle = await this.engine.vehicles.repair(playerId, vehicleId);
          return { message: `The ${vehicle.type} is now at ${vehicle.condition}% condition`, data: { vehicle } };
        });
      }
      case 'refuel': {
        const [vehicleId, amount] = commandArgSchemas.refuel.parse(args);
        return this.withPlayer(playerId, async () => {
          const vehicle = await this.engine.vehicles.refuel(playerId, vehicleId, amount);
          return { message: `Fuel: ${vehicle.fuel}/${vehicle.fuelCapacity}`, data: { vehicle } };
        });
      }
      case 'setfreq': {
        const [frequency] = commandArgSchemas.setfreq.parse(args);
        return this.withPlayer(playerId, async () => {
          await this.requireActive(playerId);
          const radioFrequency = frequency === 'off' ? null : frequency;
          await this.world.repos.players.updatePlayer(playerId, { radioFrequency });
          return {
            message: radioFrequency ? `Radio tuned to ${radioFrequency}` : 'Radio switched off',
            data: { radioFrequency },
          };
        });
      }
      case 'radio': {
        const text = commandArgSchemas.radio.parse(args);
        return this.radio(playerId, text);
      }
      case 'use': {
        const [item] = commandArgSchemas.use.parse(args);
        return this.use(playerId, item);
      }
    }
  }

  // ============================================
  // Verbs
  // ============================================

  private async status(playerId: string): Promise<CommandOutcome> {
    const { repos } = this.world;
    const player = await repos.players.getPlayer(playerId);
    if (!player) {
      throw new NotFoundError('Player', playerId);
    }
    const [inventory, vehicles, encounter, region, projects, time] = await Promise.all([
      repos.players.getInventory(playerId),
      repos.vehicles.getVehiclesByOwner(playerId),
      repos.encounters.getOpenForPlayer(playerId),
      repos.regions.getRegion(player.position.regionId),
      repos.construction.listInProgressForOwner(playerId),
      currentGameTime(this.world),
    ]);

    const where = region ? region.name : player.position.regionId;
    const state = player.status === 'dead' ? 'dead' : `${player.health}/${player.maxHealth} HP`;
    return {
      message: `${player.name} the ${player.playerClass} in ${where}: ${state}. Day ${time.day}, ${String(time.hour).padStart(2, '0')}:00 (${time.phase})`,
      data: { player, inventory, vehicles, encounter, region, construction: projects, time },
    };
  }

  private async move(playerId: string, destinationId: string): Promise<CommandOutcome> {
    const { repos, locks } = this.world;

    return locks.withDynamicLocks(
      async () => {
        const keys = await this.engine.offline.arrivalLockKeys(playerId, destinationId);
        const current = await repos.players.getPlayer(playerId);
        return current ? [...keys, regionLock(current.position.regionId)] : keys;
      },
      async (scope) => {
        const player = await this.requireFree(playerId);
        const destination = await repos.regions.getRegion(destinationId);
        if (!destination) {
          throw new NotFoundError('Region', destinationId);
        }
        if (player.position.regionId === destinationId) {
          throw new ValidationError(`You are already in ${destination.name}`);
        }
        if (!destination.connectedTo.includes(player.position.regionId)) {
          throw new ValidationError(`${destination.name} is not reachable from here`);
        }

        await this.engine.queue.cancel(player.offlineActionId);
        await repos.players.updatePlayer(playerId, {
          regionId: destinationId,
          buildingId: null,
          floorIndex: null,
          offlineMode: 'none',
          offlineModeSetAt: null,
          offlineActionId: null,
          lastActiveAt: this.world.now(),
        });
        await repos.regions.addNoise(destinationId, NOISE.MOVE);

        const ambushes = await this.engine.offline.onArrival(playerId, destinationId, scope);
        const ambushed = ambushes.length > 0 ? ` You were ambushed ${ambushes.length} time(s)!` : '';
        return {
          message: `You arrive in ${destination.name}.${ambushed}`,
          data: { regionId: destinationId, ambushes },
        };
      }
    );
  }

  private async enter(playerId: string, buildingId: string, floorIndex: number): Promise<CommandOutcome> {
    return this.withPlayerRegion(playerId, [buildingLock(buildingId)], async () => {
      const player = await this.requireActive(playerId);
      const result = await this.engine.encounters.enter(playerId, buildingId, floorIndex);

      if (player.offlineMode !== 'none') {
        await this.engine.offline.setMode(playerId, 'none');
      }

      if (result.kind === 'moved') {
        return { message: `You move to floor ${floorIndex} of ${buildingId}. It is quiet here.`, data: result };
      }
      const { encounter } = result;
      const window = this.world.config.decisionWindowSeconds;
      return {
        message: `A ${encounter.zombie.archetype} blocks floor ${floorIndex}! Sneak or attack within ${window}s.`,
        data: result,
      };
    });
  }

  private async decide(playerId: string, decision: 'sneak' | 'attack'): Promise<CommandOutcome> {
    return this.world.locks.withDynamicLocks(
      () => this.engine.encounters.lockKeys(playerId),
      async () => {
        await this.requireActive(playerId);
        const resolution = await this.engine.encounters.choose(playerId, decision);
        return {
          message: resolution.encounter.summary ?? describeState(resolution.encounter),
          data: resolution,
        };
      }
    );
  }

  private async loot(playerId: string): Promise<CommandOutcome> {
    const { repos, config, rng } = this.world;

    return this.withPlayerRegion(playerId, [], async () => {
      const player = await this.requireFree(playerId);
      const now = this.world.now();

      const cooldown = (scaledMs(config, config.dayLengthSeconds) / 24) * LOOT_COOLDOWN_GAME_HOURS;
      if (player.lastLootAt !== null && now - player.lastLootAt < cooldown) {
        const wait = Math.ceil((cooldown - (now - player.lastLootAt)) / 1000);
        throw new ConflictError(`Nothing more to find yet, try again in ${wait}s`, 'LOOT_COOLDOWN');
      }

      const table = await this.lootTableAt(player);
      const loot = rollLoot(rng, table, CLASS_BONUSES[player.playerClass].lootYield);
      await repos.players.addItems(playerId, loot);
      await repos.players.updatePlayer(playerId, { lastLootAt: now, lastActiveAt: now });
      await repos.regions.addNoise(player.position.regionId, NOISE.LOOT);

      const found = Object.entries(loot).map(([item, qty]) => `${qty} ${item}`).join(', ');
      return { message: found ? `You found ${found}` : 'You found nothing', data: { loot } };
    });
  }

  private async equip(playerId: string, weapon: string): Promise<CommandOutcome> {
    return this.withPlayer(playerId, async () => {
      await this.requireActive(playerId);
      const spec = Object.hasOwn(WEAPONS, weapon) ? WEAPONS[weapon] : undefined;
      if (!spec) {
        throw new ValidationError(`${weapon} is not a weapon`);
      }
      if (await this.world.repos.players.getItemCount(playerId, weapon) < 1) {
        throw new ValidationError(`You have no ${weapon}`);
      }
      await this.world.repos.players.updatePlayer(playerId, { equippedWeapon: weapon });
      return { message: `You ready your ${spec.name.toLowerCase()}`, data: { equippedWeapon: weapon } };
    });
  }

  private async build(playerId: string, structure: StructureType): Promise<CommandOutcome> {
    return this.withPlayerRegion(playerId, [], async () => {
      await this.requireFree(playerId);
      const project = await this.engine.construction.startProject(playerId, structure);
      const spec = STRUCTURES[structure];
      return {
        message: `Construction of ${spec.name} started, ready in ${spec.durationDays} game day(s)`,
        data: { project },
      };
    });
  }

  private async radio(playerId: string, text: string): Promise<CommandOutcome> {
    const { repos, events } = this.world;

    return this.withPlayer(playerId, async () => {
      const player = await this.requireActive(playerId);
      if (!player.radioFrequency) {
        throw new ValidationError('Tune your radio first with setfreq');
      }
      if (!(await this.engine.construction.hasStructureAnywhere('radio_tower'))) {
        throw new ConflictError('No radio tower stands anywhere; nobody can hear you', 'NO_RADIO_TOWER');
      }

      const listeners = await repos.players.listByFrequency(player.radioFrequency);
      const recipients = listeners.filter(p => p.id !== playerId).map(p => p.id);
      events.publish({
        type: 'RadioMessage',
        frequency: player.radioFrequency,
        fromPlayerId: playerId,
        recipients,
        text,
      });
      return {
        message: `Broadcast on ${player.radioFrequency} to ${recipients.length} listener(s)`,
        data: { frequency: player.radioFrequency, recipients },
      };
    });
  }

  private async use(playerId: string, item: string): Promise<CommandOutcome> {
    const { repos } = this.world;

    return this.withPlayer(playerId, async () => {
      const player = await this.requireActive(playerId);
      const effect = Object.hasOwn(ITEM_EFFECTS, item) ? ITEM_EFFECTS[item] : undefined;
      if (!effect) {
        throw new ValidationError(`You can't use ${item}`);
      }
      if (player.health >= player.maxHealth) {
        throw new ValidationError('You are already at full health');
      }
      const missing = await repos.players.removeItems(playerId, { [item]: 1 });
      if (Object.keys(missing).length > 0) {
        throw new ValidationError(`You have no ${item}`);
      }

      const health = Math.min(player.maxHealth, player.health + effect.heal);
      await repos.players.updatePlayer(playerId, { health });
      return { message: `You use the ${item}: ${health}/${player.maxHealth} HP`, data: { health } };
    });
  }

  // ============================================
  // Helpers
  // ============================================

  private withPlayer<T>(playerId: string, task: () => Promise<T>): Promise<T> {
    return this.world.locks.withLocks([playerLock(playerId)], task);
  }

  /**
   * Lock the player and the region they stand in (re-checked under the lock).
   */
  private withPlayerRegion<T>(playerId: string, extra: LockKey[], task: (scope: LockScope) => Promise<T>): Promise<T> {
    return this.world.locks.withDynamicLocks(async () => {
      const player = await this.world.repos.players.getPlayer(playerId);
      const keys = [playerLock(playerId), ...extra];
      if (player) keys.push(regionLock(player.position.regionId));
      return keys;
    }, task);
  }

  private async requireActive(playerId: string): Promise<Player> {
    const player = await this.world.repos.players.getPlayer(playerId);
    if (!player) {
      throw new NotFoundError('Player', playerId);
    }
    if (player.status !== 'active') {
      throw new ConflictError('You are dead', 'PLAYER_DEAD');
    }
    return player;
  }

  /**
   * Active, on foot and not mid-encounter.
   */
  private async requireFree(playerId: string): Promise<Player> {
    const player = await this.requireActive(playerId);
    if (player.travelingVehicleId) {
      throw new ConflictError('You are travelling', 'PLAYER_TRAVELING');
    }
    if (await this.world.repos.encounters.getOpenForPlayer(playerId)) {
      throw new ConflictError('Finish your current encounter first', 'ENCOUNTER_IN_PROGRESS');
    }
    return player;
  }

  private async lootTableAt(player: Player): Promise<string> {
    const { buildingId, floorIndex } = player.position;
    if (buildingId === null || floorIndex === null) {
      throw new ValidationError('There is nothing to search out here, enter a building first');
    }

    const floor = await this.world.repos.buildings.getFloor(buildingId, floorIndex);
    if (!floor) {
      throw new InvariantViolation(`Player ${player.id} stands on missing floor ${buildingId}#${floorIndex}`);
    }
    if (!floor.cleared) {
      throw new ValidationError('Clear this floor before searching it');
    }
    return floor.lootTable;
  }
}

function parseVerb(verb: string): CommandVerb {
  const parsed = commandVerbSchema.safeParse(verb.toLowerCase());
  if (!parsed.success) {
    throw new ValidationError(`Unknown command '${verb}'`, { verbs: COMMAND_VERBS });
  }
  return parsed.data;
}

function describeState(encounter: Encounter): string {
  return `Encounter ${encounter.state.toLowerCase()}`;
}
