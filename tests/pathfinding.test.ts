// ============================================
// DEADZONE - Region Graph Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { RegionGraph } from '../src/simulation/pathfinding.js';
import type { Region } from '../src/models/types.js';

function region(id: string, connectedTo: string[]): Region {
  return {
    id,
    name: id,
    kind: 'urban',
    dangerLevel: 1,
    noise: 0,
    zombieCount: 0,
    maxZombies: 10,
    connectedTo,
    structures: [],
    pressureDirty: false,
    lastPressureTick: 0,
  };
}

describe('RegionGraph', () => {
  // a - b - c - d, plus a shortcut a - e - d and an island f
  const graph = new RegionGraph([
    region('a', ['b', 'e']),
    region('b', ['a', 'c']),
    region('c', ['b', 'd']),
    region('d', ['c', 'e']),
    region('e', ['a', 'd']),
    region('f', []),
  ]);

  describe('findRoute', () => {
    it('should find the route with the fewest hops', () => {
      expect(graph.findRoute('a', 'd')).toEqual(['a', 'e', 'd']);
    });

    it('should return just the start when already there', () => {
      expect(graph.findRoute('c', 'c')).toEqual(['c']);
    });

    it('should return an empty route to an unreachable region', () => {
      expect(graph.findRoute('a', 'f')).toEqual([]);
    });

    it('should return an empty route for unknown regions', () => {
      expect(graph.findRoute('a', 'zz')).toEqual([]);
    });

    it('should go around through a neighbour', () => {
      expect(graph.findRoute('b', 'e')).toEqual(['b', 'a', 'e']);
    });

    it('should break ties by region id', () => {
      const diamond = new RegionGraph([
        region('x', ['z', 'y']),
        region('y', ['x', 'w']),
        region('z', ['x', 'w']),
        region('w', ['y', 'z']),
      ]);
      expect(diamond.findRoute('x', 'w')).toEqual(['x', 'y', 'w']);
    });
  });

  describe('distance', () => {
    it('should count hops', () => {
      expect(graph.distance('a', 'c')).toBe(2);
      expect(graph.distance('a', 'a')).toBe(0);
    });

    it('should be null when unreachable', () => {
      expect(graph.distance('f', 'a')).toBeNull();
    });
  });

  it('should know direct links', () => {
    expect(graph.areConnected('a', 'b')).toBe(true);
    expect(graph.areConnected('a', 'c')).toBe(false);
    expect(graph.has('f')).toBe(true);
  });
});
