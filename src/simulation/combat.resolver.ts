// ============================================
// DEADZONE - Combat Resolver
// ============================================

import type { Random } from '../utils/random.js';

export type CombatSide = 'player' | 'zombie';

export interface WeaponProfile {
  damage: number;
  ammo: number | null; // null = unlimited
  outOfAmmo: 'unarmed' | 'disabled';
}

export interface Combatant {
  id: string;
  side: CombatSide;
  health: number;
  armor: number;
  speed: number;
  damageBonus: number;
  initiativeBonus: number;
  weapon: WeaponProfile;
  alerted?: boolean;
  ambusher?: boolean;
}

export interface CombatRules {
  criticalHitChance: number;
  criticalMultiplier: number;
  alertedBonus: number;
  ambushBonus: number;
  damageVariance: number;
  initiativeJitter: number;
  unarmedDamage: number;
  maxCombatRounds: number;
}

export interface CombatHit {
  round: number;
  attackerId: string;
  defenderId: string;
  damage: number;
  critical: boolean;
  ambush: boolean;
  defenderHealth: number;
}

export interface CombatOutcome {
  winnerId: string | null;
  loserId: string | null;
  stalemate: boolean;
  rounds: number;
  firstStrikerId: string;
  hits: CombatHit[];
  health: Record<string, number>;
  ammoSpent: Record<string, number>;
}

interface Fighter {
  base: Combatant;
  health: number;
  ammo: number | null;
  ammoSpent: number;
  ambushPending: boolean;
}

function jitter(rng: Random, amount: number): number {
  return (rng.next() * 2 - 1) * amount;
}

/**
 * Which fighter acts first. An ambusher always does; otherwise the higher
 * initiative score, then the player side, then argument order.
 */
function orderFighters(a: Fighter, b: Fighter, rng: Random, rules: CombatRules): [Fighter, Fighter] {
  const scoreA = a.base.speed + a.base.initiativeBonus + jitter(rng, rules.initiativeJitter);
  const scoreB = b.base.speed + b.base.initiativeBonus + jitter(rng, rules.initiativeJitter);

  if (a.base.ambusher && !b.base.ambusher) return [a, b];
  if (b.base.ambusher && !a.base.ambusher) return [b, a];
  if (scoreA !== scoreB) return scoreA > scoreB ? [a, b] : [b, a];
  if (a.base.side !== b.base.side) return a.base.side === 'player' ? [a, b] : [b, a];
  return [a, b];
}

/**
 * Base damage of the next hit, spending ammo. Null when the weapon is dry
 * and disabled.
 */
function drawWeaponDamage(fighter: Fighter, rules: CombatRules): number | null {
  const weapon = fighter.base.weapon;
  if (fighter.ammo === null) return weapon.damage;
  if (fighter.ammo > 0) {
    fighter.ammo -= 1;
    fighter.ammoSpent += 1;
    return weapon.damage;
  }
  return weapon.outOfAmmo === 'unarmed' ? rules.unarmedDamage : null;
}

export function computeHitDamage(
  weaponDamage: number,
  attacker: Pick<Combatant, 'damageBonus' | 'alerted'>,
  defenderArmor: number,
  modifiers: { variation: number; critical: boolean; ambush: boolean },
  rules: CombatRules
): number {
  const multiplier = 1 + attacker.damageBonus + (attacker.alerted ? rules.alertedBonus : 0);
  const raw = Math.round(
    (weaponDamage * multiplier + modifiers.variation)
      * (modifiers.critical ? rules.criticalMultiplier : 1)
      * (modifiers.ambush ? 1 + rules.ambushBonus : 1)
  );
  return Math.max(1, raw - defenderArmor);
}

function strike(attacker: Fighter, defender: Fighter, round: number, rng: Random, rules: CombatRules): CombatHit {
  const weaponDamage = drawWeaponDamage(attacker, rules);
  const ambush = attacker.ambushPending;
  attacker.ambushPending = false;

  if (weaponDamage === null) {
    return {
      round,
      attackerId: attacker.base.id,
      defenderId: defender.base.id,
      damage: 0,
      critical: false,
      ambush,
      defenderHealth: defender.health,
    };
  }

  const variation = jitter(rng, rules.damageVariance);
  const critical = rng.chance(rules.criticalHitChance);
  const damage = computeHitDamage(weaponDamage, attacker.base, defender.base.armor, { variation, critical, ambush }, rules);
  defender.health = Math.max(0, defender.health - damage);

  return {
    round,
    attackerId: attacker.base.id,
    defenderId: defender.base.id,
    damage,
    critical,
    ambush,
    defenderHealth: defender.health,
  };
}

/**
 * Fight until one side drops to 0 health or the round cap is hit.
 * Pure: inputs are not mutated, all randomness comes from `rng`.
 */
export function resolveCombat(a: Combatant, b: Combatant, rng: Random, rules: CombatRules): CombatOutcome {
  const toFighter = (c: Combatant): Fighter => ({
    base: c,
    health: c.health,
    ammo: c.weapon.ammo,
    ammoSpent: 0,
    ambushPending: c.ambusher === true,
  });
  const fighterA = toFighter(a);
  const fighterB = toFighter(b);
  const [first, second] = orderFighters(fighterA, fighterB, rng, rules);

  const hits: CombatHit[] = [];
  let rounds = 0;
  let loser: Fighter | null = null;

  while (rounds < rules.maxCombatRounds && loser === null) {
    rounds += 1;
    hits.push(strike(first, second, rounds, rng, rules));
    if (second.health <= 0) {
      loser = second;
      break;
    }
    hits.push(strike(second, first, rounds, rng, rules));
    if (first.health <= 0) {
      loser = first;
    }
  }

  const winner = loser === null ? null : loser === first ? second : first;

  return {
    winnerId: winner ? winner.base.id : null,
    loserId: loser ? loser.base.id : null,
    stalemate: loser === null,
    rounds,
    firstStrikerId: first.base.id,
    hits,
    health: { [fighterA.base.id]: fighterA.health, [fighterB.base.id]: fighterB.health },
    ammoSpent: { [fighterA.base.id]: fighterA.ammoSpent, [fighterB.base.id]: fighterB.ammoSpent },
  };
}
