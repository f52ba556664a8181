// ============================================
// DEADZONE - Per-Entity Locks
// ============================================

export type LockKind = 'player' | 'region' | 'building';

export interface LockKey {
  kind: LockKind;
  id: string;
}

// Global acquisition order: players, then regions, then buildings
const KIND_ORDER: Record<LockKind, number> = {
  player: 0,
  region: 1,
  building: 2,
};

export const playerLock = (id: string): LockKey => ({ kind: 'player', id });
export const regionLock = (id: string): LockKey => ({ kind: 'region', id });
export const buildingLock = (id: string): LockKey => ({ kind: 'building', id });

function keyName(key: LockKey): string {
  return `${key.kind}:${key.id}`;
}

export function orderLockKeys(keys: readonly LockKey[]): LockKey[] {
  const unique = new Map<string, LockKey>();
  for (const key of keys) {
    unique.set(keyName(key), key);
  }
  return [...unique.values()].sort((a, b) =>
    KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

/**
 * The keys a task holds. Work on an entity outside the scope must be skipped.
 */
export class LockScope {
  private names: Set<string>;

  constructor(keys: readonly LockKey[]) {
    this.names = new Set(keys.map(keyName));
  }

  has(key: LockKey): boolean {
    return this.names.has(keyName(key));
  }
}

/**
 * Exclusive async locks keyed by entity. Each key holds a promise chain;
 * waiters are served in arrival order. Not reentrant.
 */
export class LockManager {
  private tails = new Map<string, Promise<void>>();

  async withLocks<T>(keys: readonly LockKey[], task: () => Promise<T>): Promise<T> {
    const releases: Array<() => void> = [];
    try {
      for (const key of orderLockKeys(keys)) {
        releases.push(await this.acquire(keyName(key)));
      }
      return await task();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  /**
   * Lock a set of keys that depends on world state (e.g. everyone standing in
   * a region). The set is recomputed under the locks; if it grew, the locks
   * are released and taken again. The last attempt runs with whatever it holds.
   */
  async withDynamicLocks<T>(
    compute: () => Promise<LockKey[]>,
    task: (scope: LockScope) => Promise<T>,
    attempts = 3
  ): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      const keys = await compute();
      const result = await this.withLocks(keys, async () => {
        const scope = new LockScope(keys);
        if (attempt < attempts) {
          const again = await compute();
          if (!again.every(key => scope.has(key))) {
            return { settled: false as const };
          }
        }
        return { settled: true as const, value: await task(scope) };
      });
      if (result.settled) return result.value;
    }
  }

  isLocked(key: LockKey): boolean {
    return this.tails.has(keyName(key));
  }

  get heldCount(): number {
    return this.tails.size;
  }

  private async acquire(name: string): Promise<() => void> {
    const previous = this.tails.get(name) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(name, tail);

    await previous;

    return () => {
      release();
      if (this.tails.get(name) === tail) {
        this.tails.delete(name);
      }
    };
  }
}
