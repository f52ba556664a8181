// ============================================
// DEADZONE - Player Down Policy
// ============================================

import type { Player } from '../models/types.js';
import type { PendingActionQueue } from './pending-action.queue.js';
import type { WorldState } from './world-state.js';

export type DownCause = 'zombie' | 'ambush';

/**
 * Apply the configured down policy to a player whose health reached 0.
 * Respawn: back at the spawn region with part of max health, standing order cleared.
 * A respawn is not an arrival, so ambushers waiting at the spawn region stay put.
 * Only the player's own row changes, under the player lock the caller holds.
 * Permadeath: the player is dead and everything they had scheduled is dropped.
 */
export async function knockDown(
  world: WorldState,
  queue: PendingActionQueue,
  player: Player,
  cause: DownCause,
  byPlayerId?: string
): Promise<void> {
  const policy = world.config.playerDownPolicy;

  if (policy === 'respawn') {
    await queue.cancel(player.offlineActionId);
    await world.repos.players.updatePlayer(player.id, {
      health: Math.max(1, Math.round(player.maxHealth * world.config.respawnHealthFraction)),
      regionId: world.config.spawnRegionId,
      buildingId: null,
      floorIndex: null,
      offlineMode: 'none',
      offlineModeSetAt: null,
      offlineActionId: null,
      downCount: player.downCount + 1,
    });
  } else {
    await queue.cancelForOwner({ type: 'player', id: player.id });
    await world.repos.construction.cancelForOwner(player.id);
    await world.repos.players.updatePlayer(player.id, {
      health: 0,
      status: 'dead',
      buildingId: null,
      floorIndex: null,
      offlineMode: 'none',
      offlineModeSetAt: null,
      offlineActionId: null,
      downCount: player.downCount + 1,
    });
  }

  world.logger.info({ playerId: player.id, cause, policy }, 'player down');
  world.events.publish({
    type: 'PlayerDown',
    playerId: player.id,
    cause,
    policy,
    ...(byPlayerId ? { byPlayerId } : {}),
  });
}
