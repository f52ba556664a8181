// ============================================
// DEADZONE - Combatant Builders
// ============================================

import {
  CLASS_BONUSES,
  WEAPONS,
  ZOMBIE_ARCHETYPES,
  ZOMBIE_DIFFICULTY_SCALE,
  LOOT_TABLES,
} from '../config/game.js';
import type { Inventory, Player, ZombieArchetype, ZombieStats } from '../models/types.js';
import type { Random } from '../utils/random.js';
import type { Combatant, CombatOutcome } from './combat.resolver.js';
import type { WorldState } from './world-state.js';

const ARCHETYPES: readonly ZombieArchetype[] = ['walker', 'runner', 'brute', 'mutant'];
const ARCHETYPE_WEIGHTS = ARCHETYPES.map(value => ({ value, weight: ZOMBIE_ARCHETYPES[value].weight }));

/**
 * Roll a zombie scaled to the encounter difficulty.
 */
export function rollZombie(rng: Random, difficulty: number): ZombieStats {
  const archetype = rng.weighted(ARCHETYPE_WEIGHTS);
  const spec = ZOMBIE_ARCHETYPES[archetype];
  const scale = 1 + difficulty / ZOMBIE_DIFFICULTY_SCALE;
  return {
    archetype,
    health: Math.round(spec.health * scale),
    damage: Math.round(spec.damage * scale),
    armor: spec.armor + Math.floor(difficulty / 10),
    speed: spec.speed,
  };
}

export function zombieCombatant(id: string, zombie: ZombieStats, alerted = false): Combatant {
  return {
    id,
    side: 'zombie',
    health: zombie.health,
    armor: zombie.armor,
    speed: zombie.speed,
    damageBonus: 0,
    initiativeBonus: 0,
    weapon: { damage: zombie.damage, ammo: null, outOfAmmo: 'unarmed' },
    alerted,
  };
}

export interface PlayerCombatOptions {
  ambusher?: boolean;
  armorFactor?: number;
}

export async function playerCombatant(world: WorldState, player: Player, options: PlayerCombatOptions = {}): Promise<Combatant> {
  const bonus = CLASS_BONUSES[player.playerClass];
  const weapon = player.equippedWeapon ? WEAPONS[player.equippedWeapon] : undefined;
  const ammo = weapon?.ammoItem
    ? await world.repos.players.getItemCount(player.id, weapon.ammoItem)
    : null;

  return {
    id: player.id,
    side: 'player',
    health: player.health,
    armor: Math.floor(player.stats.armor * (options.armorFactor ?? 1)),
    speed: player.stats.speed,
    damageBonus: bonus.damage,
    initiativeBonus: bonus.initiative,
    weapon: weapon
      ? { damage: weapon.damage, ammo, outOfAmmo: weapon.outOfAmmo }
      : { damage: world.config.unarmedDamage, ammo: null, outOfAmmo: 'unarmed' },
    ambusher: options.ambusher,
  };
}

/**
 * Write a fight's health and ammo use back to a player.
 */
export async function settleCombat(world: WorldState, player: Player, outcome: CombatOutcome): Promise<number> {
  const health = outcome.health[player.id] ?? player.health;
  await world.repos.players.updatePlayer(player.id, { health });

  const spent = outcome.ammoSpent[player.id] ?? 0;
  const ammoItem = player.equippedWeapon ? WEAPONS[player.equippedWeapon]?.ammoItem : null;
  if (spent > 0 && ammoItem) {
    await world.repos.players.removeItems(player.id, { [ammoItem]: spent });
  }
  return health;
}

export function rollLoot(rng: Random, tableName: string, lootYield: number): Inventory {
  const loot: Inventory = {};
  for (const entry of LOOT_TABLES[tableName] ?? []) {
    let quantity = rng.between(entry.min, entry.max);
    if (quantity > 0 && rng.chance(lootYield)) quantity += 1;
    if (quantity > 0) loot[entry.item] = quantity;
  }
  return loot;
}

export function describeOutcome(outcome: CombatOutcome, names: Record<string, string>): string {
  const name = (id: string | null) => (id ? names[id] ?? id : 'nobody');
  if (outcome.stalemate) {
    return `No one fell after ${outcome.rounds} rounds`;
  }
  const crits = outcome.hits.filter(hit => hit.critical).length;
  return `${name(outcome.winnerId)} defeated ${name(outcome.loserId)} in ${outcome.rounds} round(s)`
    + (crits > 0 ? ` with ${crits} critical hit(s)` : '');
}
