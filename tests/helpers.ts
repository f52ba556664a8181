// ============================================
// DEADZONE - Test Helpers
// ============================================

import { pino } from 'pino';
import { openDatabase, type DatabaseHandle } from '../src/config/database.js';
import { createGameConfig, type GameConfig } from '../src/config/game.js';
import { parseWorldDefinition, seedWorld, type WorldDefinition } from '../src/db/bootstrap.js';
import type { Player, PlayerClass, WorldEvent } from '../src/models/types.js';
import { createEngine, createWorldState, type WorldEngine } from '../src/simulation/engine.js';
import { WorldEventBus, type WorldState } from '../src/simulation/world-state.js';
import { fromSource, type Random } from '../src/utils/random.js';

export const EPOCH = 1_000_000;

// 2400s game day: one game hour is 100_000ms at multiplier 1
export const HOUR_MS = 100_000;

/**
 * camp (forest, danger 1) <-> town (urban, danger 5) <-> base (military, danger 3)
 */
export const TEST_WORLD: WorldDefinition = parseWorldDefinition({
  spawnRegionId: 'camp',
  regions: [
    {
      id: 'camp',
      name: 'Camp',
      kind: 'forest',
      dangerLevel: 1,
      maxZombies: 10,
      connectedTo: ['town'],
      buildings: [{ id: 'shed', name: 'Tool Shed', floors: ['residential', 'medical'] }],
    },
    {
      id: 'town',
      name: 'Town',
      kind: 'urban',
      dangerLevel: 5,
      maxZombies: 20,
      connectedTo: ['camp', 'base'],
      buildings: [{ id: 'clinic', name: 'Clinic', floors: ['medical'] }],
    },
    {
      id: 'base',
      name: 'Base',
      kind: 'military',
      dangerLevel: 3,
      maxZombies: 5,
      connectedTo: ['town'],
      buildings: [],
    },
  ],
});

export const TEST_CONFIG: Partial<GameConfig> = {
  dayLengthSeconds: 2400,
  worldTickSeconds: 1,
  decisionWindowSeconds: 10,
  offlineIntervalSeconds: 60,
  spawnRegionId: 'camp',
};

export class ManualClock {
  constructor(public value: number = EPOCH) {}

  now = (): number => this.value;

  set(value: number): number {
    this.value = value;
    return value;
  }

  advance(ms: number): number {
    this.value += ms;
    return this.value;
  }
}

export function constantRandom(value = 0.5): Random {
  return fromSource(() => value);
}

/**
 * Replays `values` in order, then keeps returning `fallback`.
 */
export function scriptedRandom(values: number[], fallback = 0.5): Random {
  const queue = [...values];
  return fromSource(() => queue.shift() ?? fallback);
}

export interface TestWorld {
  handle: DatabaseHandle;
  world: WorldState;
  engine: WorldEngine;
  clock: ManualClock;
  events: WorldEvent[];
  close(): void;
}

export interface TestWorldOptions {
  config?: Partial<GameConfig>;
  rng?: Random;
  definition?: WorldDefinition;
  handle?: DatabaseHandle;
  clock?: ManualClock;
}

export async function createTestWorld(options: TestWorldOptions = {}): Promise<TestWorld> {
  const handle = options.handle ?? openDatabase(':memory:');
  const clock = options.clock ?? new ManualClock();
  await seedWorld(handle.db, options.definition ?? TEST_WORLD, clock.now());

  const bus = new WorldEventBus();
  const events: WorldEvent[] = [];
  bus.on('event', (event: WorldEvent) => events.push(event));

  const world = createWorldState({
    db: handle.db,
    config: createGameConfig({ ...TEST_CONFIG, ...options.config }),
    logger: pino({ level: 'silent' }),
    events: bus,
    rng: options.rng ?? constantRandom(),
    now: clock.now,
  });

  return {
    handle,
    world,
    engine: createEngine(world),
    clock,
    events,
    close: () => handle.sqlite.close(),
  };
}

export async function addPlayer(
  world: WorldState,
  name: string,
  playerClass: PlayerClass = 'Soldier',
  regionId = 'camp'
): Promise<Player> {
  return world.repos.players.createPlayer({ name, playerClass, regionId, now: world.now() });
}

export async function reload(world: WorldState, playerId: string): Promise<Player> {
  const player = await world.repos.players.getPlayer(playerId);
  if (!player) {
    throw new Error(`Player ${playerId} is gone`);
  }
  return player;
}

export function eventsOfType<T extends WorldEvent['type']>(
  events: WorldEvent[],
  type: T
): Array<Extract<WorldEvent, { type: T }>> {
  return events.filter((event): event is Extract<WorldEvent, { type: T }> => event.type === type);
}
