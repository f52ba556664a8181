// ============================================
// DEADZONE - World State Aggregate
// ============================================

import { EventEmitter } from 'events';
import type { BaseLogger } from 'pino';
import type { Repositories } from '../repositories/index.js';
import type { DayPhase, WorldEvent } from '../models/types.js';
import { scaledMs, type GameConfig } from '../config/game.js';
import type { Random } from '../utils/random.js';
import { LockManager } from './locks.js';

export interface EventSink {
  publish(event: WorldEvent): void;
}

/**
 * In-process fan-out for world events. Listeners subscribe to 'event'
 * (everything) or to a single event type.
 */
export class WorldEventBus extends EventEmitter implements EventSink {
  publish(event: WorldEvent): void {
    this.emit('event', event);
    this.emit(event.type, event);
  }
}

/**
 * Everything a resolver needs. Passed explicitly; the core keeps no module state.
 */
export interface WorldState {
  repos: Repositories;
  locks: LockManager;
  config: GameConfig;
  rng: Random;
  now: () => number;
  events: EventSink;
  logger: BaseLogger;
}

// ============================================
// Game time
// ============================================

// A fresh world starts at dawn
const EPOCH_HOUR = 6;
const NIGHT_STARTS = 18;
const NIGHT_ENDS = 6;

export interface GameTime {
  day: number;
  hour: number;
  phase: DayPhase;
}

export function gameTimeAt(config: GameConfig, epoch: number, now: number): GameTime {
  const dayMs = scaledMs(config, config.dayLengthSeconds);
  const elapsed = Math.max(0, now - epoch);
  const totalHours = (elapsed / dayMs) * 24 + EPOCH_HOUR;
  const hour = Math.floor(totalHours) % 24;
  return {
    day: Math.floor(totalHours / 24) + 1,
    hour,
    phase: hour >= NIGHT_STARTS || hour < NIGHT_ENDS ? 'night' : 'day',
  };
}

export async function currentGameTime(world: WorldState): Promise<GameTime> {
  const meta = await world.repos.world.getMeta();
  return gameTimeAt(world.config, meta.epoch, world.now());
}

export async function isNight(world: WorldState): Promise<boolean> {
  return (await currentGameTime(world)).phase === 'night';
}
