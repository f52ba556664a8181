// ============================================
// DEADZONE - Player Service
// ============================================

import type { ConstructionProject, Encounter, Inventory, Player, PlayerClass, Vehicle } from '../models/types.js';
import { signToken } from '../plugins/auth.plugin.js';
import { ConflictError, NotFoundError } from '../plugins/error-handler.plugin.js';
import type { WorldEngine } from '../simulation/engine.js';
import { playerLock, regionLock } from '../simulation/locks.js';

export interface CreatedPlayer {
  player: Player;
  token: string;
}

export interface PlayerProfile {
  player: Player;
  inventory: Inventory;
  vehicles: Vehicle[];
  encounter: Encounter | null;
  construction: ConstructionProject[];
}

export class PlayerService {
  constructor(
    private engine: WorldEngine,
    private jwtSecret?: string
  ) {}

  async create(name: string, playerClass: PlayerClass): Promise<CreatedPlayer> {
    const { repos, config, logger } = this.engine.world;

    const existing = await repos.players.getPlayerByName(name);
    if (existing) {
      throw new ConflictError(`The name '${name}' is taken`, 'NAME_TAKEN');
    }

    const player = await repos.players.createPlayer({
      name,
      playerClass,
      regionId: config.spawnRegionId,
      now: this.engine.world.now(),
    });
    const token = signToken({ playerId: player.id, name: player.name }, this.jwtSecret);

    logger.info({ playerId: player.id, name, playerClass }, 'player created');
    return { player, token };
  }

  async getProfile(playerId: string): Promise<PlayerProfile> {
    const { repos } = this.engine.world;
    const player = await repos.players.getPlayer(playerId);
    if (!player) {
      throw new NotFoundError('Player', playerId);
    }

    const [inventory, vehicles, encounter, construction] = await Promise.all([
      repos.players.getInventory(playerId),
      repos.vehicles.getVehiclesByOwner(playerId),
      repos.encounters.getOpenForPlayer(playerId),
      repos.construction.listInProgressForOwner(playerId),
    ]);
    return { player, inventory, vehicles, encounter, construction };
  }

  async listEncounters(playerId: string, limit: number): Promise<Encounter[]> {
    const { repos } = this.engine.world;
    if (!(await repos.players.getPlayer(playerId))) {
      throw new NotFoundError('Player', playerId);
    }
    return repos.encounters.listForPlayer(playerId, limit);
  }

  /**
   * Remove a character and everything it owns: scheduled actions,
   * encounters, construction, vehicles and inventory.
   */
  async delete(playerId: string): Promise<void> {
    const { repos, locks, logger } = this.engine.world;

    await locks.withDynamicLocks(async () => {
      const player = await repos.players.getPlayer(playerId);
      return player ? [playerLock(playerId), regionLock(player.position.regionId)] : [playerLock(playerId)];
    }, async () => {
      const player = await repos.players.getPlayer(playerId);
      if (!player) {
        throw new NotFoundError('Player', playerId);
      }

      const cancelled = await this.engine.queue.cancelForOwner({ type: 'player', id: playerId });
      await repos.encounters.deleteForPlayer(playerId);
      await repos.construction.cancelForOwner(playerId);
      await repos.vehicles.deleteForOwner(playerId);
      await repos.players.deletePlayer(playerId);

      logger.info({ playerId, cancelledActions: cancelled }, 'player deleted');
    });
  }
}
