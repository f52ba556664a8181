// ============================================
// DEADZONE - Zombie Pressure Simulator
// ============================================

import { NOISE_FLOOR, type GameConfig } from '../config/game.js';
import type { Region } from '../models/types.js';
import { regionLock } from './locks.js';
import type { WorldState } from './world-state.js';

export interface PressureInput {
  dangerLevel: number;
  noise: number;
  zombieCount: number;
  maxZombies: number;
}

export interface PressureResult {
  spawned: number;
  zombieCount: number;
  noise: number;
}

export type PressureRules = Pick<GameConfig, 'spawnRate' | 'nightSpawnBonus' | 'noiseDecayFactor'>;

/**
 * One tick of pressure for one region.
 */
export function computePressure(input: PressureInput, night: boolean, rules: PressureRules): PressureResult {
  const nightFactor = night ? 1 + rules.nightSpawnBonus : 1;
  const wanted = Math.floor(input.dangerLevel * input.noise * rules.spawnRate * nightFactor);
  const room = Math.max(0, input.maxZombies - input.zombieCount);
  const spawned = Math.max(0, Math.min(wanted, room));

  let noise = Math.max(0, input.noise * rules.noiseDecayFactor);
  if (noise < NOISE_FLOOR) noise = 0;

  return { spawned, zombieCount: input.zombieCount + spawned, noise };
}

export class ZombiePressureSimulator {
  constructor(private world: WorldState) {}

  /**
   * Apply pressure to every region with noise or a pending danger change.
   * A region already processed for `tick` is skipped.
   */
  async simulate(tick: number, night: boolean): Promise<Region[]> {
    const candidates = await this.world.repos.regions.listPressureCandidates();
    const updated: Region[] = [];

    for (const candidate of candidates) {
      const region = await this.world.locks.withLocks([regionLock(candidate.id)], async () => {
        const current = await this.world.repos.regions.getRegion(candidate.id);
        if (!current || current.lastPressureTick >= tick) return null;
        return this.applyTo(current, tick, night);
      });
      if (region) updated.push(region);
    }

    return updated;
  }

  private async applyTo(region: Region, tick: number, night: boolean): Promise<Region> {
    const result = computePressure(region, night, this.world.config);

    await this.world.repos.regions.updateRegion(region.id, {
      zombieCount: result.zombieCount,
      noise: result.noise,
      pressureDirty: false,
      lastPressureTick: tick,
    });

    if (result.spawned > 0) {
      this.world.logger.debug({ regionId: region.id, spawned: result.spawned }, 'zombies spawned');
      this.world.events.publish({
        type: 'ZombiesSpawned',
        regionId: region.id,
        spawned: result.spawned,
        zombieCount: result.zombieCount,
        tick,
      });
    }

    return {
      ...region,
      zombieCount: result.zombieCount,
      noise: result.noise,
      pressureDirty: false,
      lastPressureTick: tick,
    };
  }
}
