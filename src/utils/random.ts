// ============================================
// DEADZONE - Seeded Random Streams
// ============================================

export interface Random {
  next(): number; // [0,1)
  int(maxExclusive: number): number;
  between(min: number, max: number): number; // inclusive integers
  pick<T>(items: readonly T[]): T;
  weighted<T>(entries: ReadonlyArray<{ value: T; weight: number }>): T;
  chance(probability: number): boolean;
}

function hashSeed(seed: string): number {
  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i += 1) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return (h >>> 0) || 1;
}

// Mulberry32
function mulberry32(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a |= 0;
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Wrap any [0,1) source in the Random helpers. Tests use this with a
 * constant or scripted source.
 */
export function fromSource(source: () => number): Random {
  const random: Random = {
    next: source,
    int(maxExclusive: number) {
      if (maxExclusive <= 1) return 0;
      return Math.floor(source() * maxExclusive);
    },
    between(min: number, max: number) {
      if (max <= min) return min;
      return min + random.int(max - min + 1);
    },
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) {
        throw new Error('Attempted to pick from an empty list.');
      }
      return items[random.int(items.length)];
    },
    weighted<T>(entries: ReadonlyArray<{ value: T; weight: number }>): T {
      if (entries.length === 0) {
        throw new Error('Attempted to pick from an empty list.');
      }
      const total = entries.reduce((sum, entry) => sum + entry.weight, 0);
      let roll = source() * total;
      for (const entry of entries) {
        roll -= entry.weight;
        if (roll < 0) return entry.value;
      }
      return entries[entries.length - 1].value;
    },
    chance(probability: number) {
      if (probability <= 0) return false;
      if (probability >= 1) return true;
      return source() < probability;
    },
  };
  return random;
}

export function makeRandom(seed: string): Random {
  return fromSource(mulberry32(hashSeed(seed)));
}
