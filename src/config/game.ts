// ============================================
// DEADZONE - Game Configuration & Rules
// ============================================

import type { PlayerClass, PlayerStats, StructureType, VehicleType, ZombieArchetype, Inventory } from '../models/types.js';
import type { Env } from './env.js';

// ============================================
// Tunable rules (overridable per world / test)
// ============================================

export type PlayerDownPolicy = 'respawn' | 'permadeath';

export interface GameConfig {
  // Time. Every duration below is multiplied by timeMultiplier.
  timeMultiplier: number;
  dayLengthSeconds: number;
  worldTickSeconds: number;
  decisionWindowSeconds: number;
  offlineIntervalSeconds: number;

  // Combat
  criticalHitChance: number;
  criticalMultiplier: number;
  alertedBonus: number;
  ambushBonus: number;
  damageVariance: number;
  initiativeJitter: number;
  unarmedDamage: number;
  maxCombatRounds: number;

  // Zombie pressure
  noiseDecayFactor: number;
  spawnRate: number;
  nightSpawnBonus: number;

  // Players
  playerDownPolicy: PlayerDownPolicy;
  respawnHealthFraction: number;
  spawnRegionId: string;
  offGuardArmorFactor: number;

  worldSeed: string;
}

export const DEFAULT_GAME_CONFIG: GameConfig = {
  timeMultiplier: 1,
  dayLengthSeconds: 1800, // 30 real minutes per game day
  worldTickSeconds: 30,
  decisionWindowSeconds: 7,
  offlineIntervalSeconds: 3600,

  criticalHitChance: 0.05,
  criticalMultiplier: 1.5,
  alertedBonus: 0.15,
  ambushBonus: 1, // +100%, i.e. double damage
  damageVariance: 5,
  initiativeJitter: 2,
  unarmedDamage: 5,
  maxCombatRounds: 20,

  noiseDecayFactor: 0.8,
  spawnRate: 0.05,
  nightSpawnBonus: 0.15,

  playerDownPolicy: 'respawn',
  respawnHealthFraction: 0.3,
  spawnRegionId: 'forest',
  offGuardArmorFactor: 0.5,

  worldSeed: 'deadzone',
};

export function createGameConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  return { ...DEFAULT_GAME_CONFIG, ...overrides };
}

export function gameConfigFromEnv(env: Env): GameConfig {
  return createGameConfig({
    timeMultiplier: env.TIME_MULTIPLIER,
    dayLengthSeconds: env.DAY_LENGTH_SECONDS,
    worldTickSeconds: env.WORLD_TICK_SECONDS,
    decisionWindowSeconds: env.DECISION_WINDOW_SECONDS,
    offlineIntervalSeconds: env.OFFLINE_INTERVAL_SECONDS,
    criticalHitChance: env.CRITICAL_HIT_CHANCE,
    alertedBonus: env.ALERTED_BONUS,
    ambushBonus: env.AMBUSH_BONUS,
    playerDownPolicy: env.PLAYER_DOWN_POLICY,
    worldSeed: env.WORLD_SEED,
  });
}

/**
 * Convert a game duration in seconds to real milliseconds.
 */
export function scaledMs(config: GameConfig, seconds: number): number {
  return Math.round(seconds * 1000 * config.timeMultiplier);
}

// ============================================
// Character Classes
// ============================================

export interface ClassBonus {
  damage: number; // fraction added to weapon damage
  initiative: number;
  stealth: number;
  maxHealth: number;
  intelligence: number;
  lootYield: number; // fraction added to loot quantities
  repair: number; // extra condition per repair kit
  description: string;
}

export const CLASS_BONUSES: Record<PlayerClass, ClassBonus> = {
  Scavenger: {
    damage: 0,
    initiative: 2,
    stealth: 10,
    maxHealth: 0,
    intelligence: 0,
    lootYield: 0.1,
    repair: 0,
    description: 'Expert at finding resources and staying hidden',
  },
  Mechanic: {
    damage: 0,
    initiative: 0,
    stealth: 0,
    maxHealth: 0,
    intelligence: 10,
    lootYield: 0,
    repair: 10,
    description: 'Skilled at building and repairing equipment',
  },
  Soldier: {
    damage: 0.1,
    initiative: 1,
    stealth: 0,
    maxHealth: 10,
    intelligence: 0,
    lootYield: 0,
    repair: 0,
    description: 'Trained in combat and survival tactics',
  },
};

export const BASE_PLAYER = {
  HEALTH: 100,
  STATS: {
    speed: 10,
    stealth: 10,
    intelligence: 20,
    armor: 2,
  } satisfies PlayerStats,
  INTELLIGENCE_PER_CLEAR: 5,
};

export const STARTER_ITEMS: Inventory = {
  knife: 1,
  bandage: 2,
  rations: 3,
};

export const STARTER_WEAPON = 'knife';

// Consumables for the `use` command
export const ITEM_EFFECTS: Record<string, { heal: number }> = {
  bandage: { heal: 15 },
  medkit: { heal: 40 },
  herbs: { heal: 8 },
  rations: { heal: 5 },
  fish: { heal: 5 },
};

// One active search per game hour
export const LOOT_COOLDOWN_GAME_HOURS = 1;

// ============================================
// Weapons
// ============================================

export interface WeaponSpec {
  name: string;
  damage: number;
  ammoItem: string | null; // null = melee, never runs dry
  outOfAmmo: 'unarmed' | 'disabled';
}

export const WEAPONS: Record<string, WeaponSpec> = {
  knife: { name: 'Knife', damage: 12, ammoItem: null, outOfAmmo: 'unarmed' },
  crowbar: { name: 'Crowbar', damage: 15, ammoItem: null, outOfAmmo: 'unarmed' },
  pistol: { name: 'Pistol', damage: 20, ammoItem: 'ammo', outOfAmmo: 'unarmed' },
  rifle: { name: 'Rifle', damage: 32, ammoItem: 'ammo', outOfAmmo: 'disabled' },
};

// ============================================
// Zombies
// ============================================

export interface ZombieArchetypeSpec {
  health: number;
  damage: number;
  armor: number;
  speed: number;
  weight: number;
}

export const ZOMBIE_ARCHETYPES: Record<ZombieArchetype, ZombieArchetypeSpec> = {
  walker: { health: 40, damage: 10, armor: 2, speed: 6, weight: 70 },
  runner: { health: 30, damage: 8, armor: 0, speed: 12, weight: 20 },
  brute: { health: 80, damage: 16, armor: 6, speed: 4, weight: 8 },
  mutant: { health: 70, damage: 20, armor: 4, speed: 10, weight: 2 },
};

// Difficulty points per +100% zombie health/damage
export const ZOMBIE_DIFFICULTY_SCALE = 20;

// ============================================
// Noise generated by player activity
// ============================================

export const NOISE = {
  MOVE: 1,
  LOOT: 5,
  COMBAT: 10,
  DRIVE: 3,
  BUILD: 4,
  SCAVENGE_RELIEF: 5,
};

export const NOISE_FLOOR = 0.01;

// ============================================
// Loot
// ============================================

export interface LootEntry {
  item: string;
  min: number;
  max: number;
}

export const LOOT_TABLES: Record<string, LootEntry[]> = {
  // Region-level scavenging
  forest: [
    { item: 'wood', min: 1, max: 3 },
    { item: 'herbs', min: 0, max: 2 },
  ],
  urban: [
    { item: 'metal', min: 1, max: 2 },
    { item: 'cloth', min: 1, max: 2 },
    { item: 'circuit', min: 0, max: 1 },
  ],
  military: [
    { item: 'ammo', min: 1, max: 3 },
    { item: 'metal', min: 2, max: 4 },
    { item: 'circuit', min: 1, max: 2 },
  ],
  coast: [
    { item: 'fish', min: 1, max: 2 },
    { item: 'fuel', min: 0, max: 2 },
  ],
  // Building floors
  residential: [
    { item: 'rations', min: 1, max: 3 },
    { item: 'cloth', min: 0, max: 2 },
  ],
  medical: [
    { item: 'bandage', min: 1, max: 3 },
    { item: 'medkit', min: 0, max: 1 },
  ],
  commercial: [
    { item: 'metal', min: 1, max: 3 },
    { item: 'circuit', min: 0, max: 2 },
    { item: 'repair_kit', min: 0, max: 1 },
  ],
  armory: [
    { item: 'ammo', min: 3, max: 8 },
    { item: 'pistol', min: 0, max: 1 },
    { item: 'steel', min: 1, max: 3 },
  ],
};

// ============================================
// Vehicles
// ============================================

export interface VehicleTypeSpec {
  name: string;
  fuelCapacity: number;
  cargoCapacity: number;
  speed: number;
  fuelConsumption: number; // per hop
}

export const VEHICLE_TYPES: Record<VehicleType, VehicleTypeSpec> = {
  bike: { name: 'Bicycle', fuelCapacity: 0, cargoCapacity: 10, speed: 1, fuelConsumption: 0 },
  jeep: { name: 'Jeep', fuelCapacity: 100, cargoCapacity: 50, speed: 3, fuelConsumption: 10 },
  truck: { name: 'Truck', fuelCapacity: 150, cargoCapacity: 100, speed: 2, fuelConsumption: 15 },
  tank: { name: 'Tank', fuelCapacity: 200, cargoCapacity: 30, speed: 1, fuelConsumption: 25 },
  helicopter: { name: 'Helicopter', fuelCapacity: 300, cargoCapacity: 20, speed: 5, fuelConsumption: 30 },
};

export const VEHICLE_RULES = {
  MIN_DRIVE_CONDITION: 40,
  REPAIR_AMOUNT: 20,
  WEAR_PER_HOP: 5,
  TRAVEL_SECONDS_PER_HOP: 600, // at speed 1
};

// ============================================
// Construction
// ============================================

export interface StructureSpec {
  name: string;
  durationDays: number; // game days
  resources: Inventory;
  intelligenceRequired: number;
  dangerDelta: number;
  vehicle: VehicleType | null;
}

export const STRUCTURES: Record<StructureType, StructureSpec> = {
  barricade: {
    name: 'Barricade',
    durationDays: 1,
    resources: { wood: 20, metal: 5 },
    intelligenceRequired: 0,
    dangerDelta: -1,
    vehicle: null,
  },
  radio_tower: {
    name: 'Radio Tower',
    durationDays: 3,
    resources: { metal: 20, circuit: 5, wood: 10 },
    intelligenceRequired: 30,
    dangerDelta: 0,
    vehicle: null,
  },
  advanced_workshop: {
    name: 'Advanced Workshop',
    durationDays: 5,
    resources: { metal: 30, circuit: 8, wood: 15 },
    intelligenceRequired: 50,
    dangerDelta: 0,
    vehicle: null,
  },
  tank: {
    name: 'Tank',
    durationDays: 7,
    resources: { steel: 50, engine_parts: 10, circuit: 5 },
    intelligenceRequired: 90,
    dangerDelta: 0,
    vehicle: 'tank',
  },
  helicopter: {
    name: 'Helicopter',
    durationDays: 10,
    resources: { steel: 30, engine_parts: 8, circuit: 3, fuel: 20 },
    intelligenceRequired: 85,
    dangerDelta: 0,
    vehicle: 'helicopter',
  },
};

export const MIN_DANGER_LEVEL = 1;

// ============================================
// Helper Functions
// ============================================

export function getMaxHealth(playerClass: PlayerClass): number {
  return BASE_PLAYER.HEALTH + CLASS_BONUSES[playerClass].maxHealth;
}

export function getStartingStats(playerClass: PlayerClass): PlayerStats {
  const bonus = CLASS_BONUSES[playerClass];
  // Stealth and damage bonuses stay in CLASS_BONUSES and apply at roll time
  return {
    ...BASE_PLAYER.STATS,
    intelligence: BASE_PLAYER.STATS.intelligence + bonus.intelligence,
  };
}
