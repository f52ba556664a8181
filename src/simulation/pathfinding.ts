// ============================================
// DEADZONE - Region Graph Pathfinding
// ============================================

import type { Region } from '../models/types.js';

export class RegionGraph {
  private links: Map<string, string[]>;

  constructor(regions: Region[]) {
    this.links = new Map();
    for (const region of regions) {
      this.links.set(region.id, [...region.connectedTo].sort());
    }
  }

  has(regionId: string): boolean {
    return this.links.has(regionId);
  }

  areConnected(from: string, to: string): boolean {
    return this.links.get(from)?.includes(to) ?? false;
  }

  /**
   * Shortest route by hop count, start and goal included.
   * Returns an empty array if no route exists.
   */
  findRoute(start: string, goal: string): string[] {
    if (!this.links.has(start) || !this.links.has(goal)) return [];
    if (start === goal) return [start];

    const parents = new Map<string, string>();
    const visited = new Set<string>([start]);
    const frontier = [start];

    while (frontier.length > 0) {
      const current = frontier.shift();
      if (current === undefined) break;

      for (const next of this.links.get(current) ?? []) {
        if (visited.has(next)) continue;
        visited.add(next);
        parents.set(next, current);

        if (next === goal) {
          return this.reconstructRoute(parents, goal);
        }
        frontier.push(next);
      }
    }

    return [];
  }

  /**
   * Number of hops between two regions, or null if unreachable.
   */
  distance(start: string, goal: string): number | null {
    const route = this.findRoute(start, goal);
    return route.length === 0 ? null : route.length - 1;
  }

  private reconstructRoute(parents: Map<string, string>, goal: string): string[] {
    const route = [goal];
    let current = parents.get(goal);
    while (current !== undefined) {
      route.unshift(current);
      current = parents.get(current);
    }
    return route;
  }
}
