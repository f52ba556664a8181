// ============================================
// DEADZONE - World Engine
// ============================================

import type { BaseLogger } from 'pino';
import type { GameConfig } from '../config/game.js';
import type { DrizzleDb } from '../db/drizzle.js';
import { createRepositories } from '../repositories/index.js';
import { makeRandom, type Random } from '../utils/random.js';
import { ConstructionSimulator } from './construction.simulator.js';
import { EncounterMachine } from './encounter.machine.js';
import { LockManager } from './locks.js';
import { OfflineResolver } from './offline.resolver.js';
import { PendingActionQueue } from './pending-action.queue.js';
import { VehicleSimulator } from './vehicle.simulator.js';
import { WorldClock, type ActionHandlers } from './world-clock.js';
import { WorldEventBus, type EventSink, type WorldState } from './world-state.js';
import { ZombiePressureSimulator } from './zombie-pressure.simulator.js';

export interface WorldStateOptions {
  db: DrizzleDb;
  config: GameConfig;
  logger: BaseLogger;
  events?: EventSink;
  rng?: Random;
  now?: () => number;
}

export function createWorldState(options: WorldStateOptions): WorldState {
  return {
    repos: createRepositories(options.db),
    locks: new LockManager(),
    config: options.config,
    rng: options.rng ?? makeRandom(options.config.worldSeed),
    now: options.now ?? Date.now,
    events: options.events ?? new WorldEventBus(),
    logger: options.logger,
  };
}

/**
 * Every simulator wired to one world.
 */
export class WorldEngine {
  readonly queue: PendingActionQueue;
  readonly encounters: EncounterMachine;
  readonly offline: OfflineResolver;
  readonly construction: ConstructionSimulator;
  readonly vehicles: VehicleSimulator;
  readonly pressure: ZombiePressureSimulator;
  readonly clock: WorldClock;

  constructor(readonly world: WorldState) {
    this.queue = new PendingActionQueue(world);
    this.encounters = new EncounterMachine(world, this.queue);
    this.offline = new OfflineResolver(world, this.queue);
    this.construction = new ConstructionSimulator(world, this.queue);
    this.vehicles = new VehicleSimulator(world, this.queue, this.offline);
    this.pressure = new ZombiePressureSimulator(world);
    this.clock = new WorldClock(world, this.queue, this.handlers(), this.pressure);
  }

  private handlers(): ActionHandlers {
    return {
      DecisionExpiry: {
        lockKeys: (action) => this.encounters.lockKeys(
          action.ownerId,
          action.payload.kind === 'DecisionExpiry' ? action.payload.encounterId : undefined
        ),
        resolve: (action) => this.encounters.expire(action),
      },
      OfflineResolution: {
        lockKeys: (action) => this.offline.scheduledLockKeys(action),
        resolve: (action, scope) => this.offline.resolveScheduled(action, scope),
      },
      ConstructionComplete: {
        lockKeys: (action) => this.construction.lockKeys(action),
        resolve: (action) => this.construction.complete(action),
      },
      VehicleArrival: {
        lockKeys: (action) => this.vehicles.arrivalLockKeys(action),
        resolve: (action, scope) => this.vehicles.arrive(action, scope),
      },
    };
  }
}

export function createEngine(world: WorldState): WorldEngine {
  return new WorldEngine(world);
}
