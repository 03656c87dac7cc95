import { describe, expect, it } from 'vitest';

import { GameMap } from '../map/game-map.js';
import { createMineObject } from '../map/map-object.js';
import { isAdjacent, positionKey } from '../map/position.js';
import type { Position } from '../map/position.js';
import type { TerrainType } from '../map/terrain.js';
import { calculatePathCost, findPath, getReachablePositions } from './astar.js';

const patchwork: TerrainType[] = ['grass', 'swamp', 'sand', 'rough', 'rock', 'grass', 'water'];

// 7x7 map cycling through cheap, expensive and impassable terrain.
function createPatchworkMap(): GameMap {
  const map = new GameMap(7, 7);
  map.forEachTile((_tile, position) => {
    map.setTerrain(position, patchwork[(position.x * 3 + position.y * 5) % patchwork.length]);
  });
  map.addObject(createMineObject({ position: { x: 3, y: 3 }, resourceType: 'ore', dailyProduction: 2 }));
  return map;
}

// Reference costs by repeated relaxation over every legal step.
function referenceCosts(map: GameMap, start: Position): Map<string, number> {
  const costs = new Map<string, number>([[positionKey(start), 0]]);
  let changed = true;
  while (changed) {
    changed = false;
    map.forEachTile((_tile, position) => {
      const base = costs.get(positionKey(position));
      if (base === undefined) return;
      for (const neighbor of map.getAdjacentPositions(position)) {
        if (!map.canMoveBetween(position, neighbor)) continue;
        const candidate = base + map.getMovementCost(position, neighbor);
        if (candidate < (costs.get(positionKey(neighbor)) ?? Number.POSITIVE_INFINITY)) {
          costs.set(positionKey(neighbor), candidate);
          changed = true;
        }
      }
    });
  }
  return costs;
}

describe('findPath', () => {
  it('returns the single start cell when start equals end', () => {
    const map = new GameMap(5, 5);
    const path = findPath(map, { x: 2, y: 2 }, { x: 2, y: 2 });
    expect(path).toEqual([{ x: 2, y: 2 }]);
    expect(calculatePathCost(map, path)).toBe(0);
  });

  it('walks the diagonal on open ground', () => {
    const map = new GameMap(5, 5);
    expect(findPath(map, { x: 0, y: 0 }, { x: 4, y: 4 })).toEqual([
      { x: 0, y: 0 },
      { x: 1, y: 1 },
      { x: 2, y: 2 },
      { x: 3, y: 3 },
      { x: 4, y: 4 }
    ]);
  });

  it('goes around a wall', () => {
    const map = new GameMap(5, 5);
    for (let y = 0; y < 4; y++) {
      map.setTerrain({ x: 2, y }, 'rock');
    }

    const path = findPath(map, { x: 0, y: 0 }, { x: 4, y: 0 });
    expect(path).toBeDefined();
    expect(path).toHaveLength(9);
    expect(path).toContainEqual({ x: 2, y: 4 });
    expect(calculatePathCost(map, path)).toBe(800);
  });

  it('prefers a longer-looking detour over expensive swamp', () => {
    const map = new GameMap(5, 3);
    for (let x = 1; x <= 3; x++) {
      map.setTerrain({ x, y: 0 }, 'swamp');
    }

    const path = findPath(map, { x: 0, y: 0 }, { x: 4, y: 0 });
    expect(path).toHaveLength(5);
    expect(calculatePathCost(map, path)).toBe(400);
    expect(path?.some((position) => position.y === 0 && position.x >= 1 && position.x <= 3)).toBe(false);
  });

  it('gives up on off-map, impassable, blocked and enclosed goals', () => {
    const map = new GameMap(6, 6);
    map.setTerrain({ x: 5, y: 5 }, 'rock');
    map.addObject(createMineObject({ position: { x: 5, y: 0 }, resourceType: 'ore', dailyProduction: 2 }));
    for (const position of [
      { x: 0, y: 4 },
      { x: 1, y: 4 },
      { x: 1, y: 5 }
    ]) {
      map.setTerrain(position, 'rock');
    }

    expect(findPath(map, { x: 0, y: 0 }, { x: 6, y: 0 })).toBeUndefined();
    expect(findPath(map, { x: -1, y: 0 }, { x: 2, y: 2 })).toBeUndefined();
    expect(findPath(map, { x: 0, y: 0 }, { x: 5, y: 5 })).toBeUndefined();
    expect(findPath(map, { x: 0, y: 0 }, { x: 5, y: 0 })).toBeUndefined();
    expect(findPath(map, { x: 0, y: 0 }, { x: 0, y: 5 })).toBeUndefined();
  });

  it('matches the cheapest cost to every cell of a mixed map', () => {
    const map = createPatchworkMap();
    const start = { x: 0, y: 0 };
    const expected = referenceCosts(map, start);

    map.forEachTile((_tile, target) => {
      const path = findPath(map, start, target);
      const cost = expected.get(positionKey(target));
      if (cost === undefined) {
        expect(path).toBeUndefined();
        return;
      }
      expect(path?.[0]).toEqual(start);
      expect(path?.[path.length - 1]).toEqual(target);
      const steps = path ?? [];
      for (let i = 1; i < steps.length; i++) {
        expect(isAdjacent(steps[i - 1], steps[i])).toBe(true);
      }
      expect(calculatePathCost(map, path)).toBe(cost);
    });
  });
});

describe('calculatePathCost', () => {
  it('is zero for missing, empty and single-cell paths', () => {
    const map = new GameMap(3, 3);
    expect(calculatePathCost(map, undefined)).toBe(0);
    expect(calculatePathCost(map, null)).toBe(0);
    expect(calculatePathCost(map, [])).toBe(0);
    expect(calculatePathCost(map, [{ x: 1, y: 1 }])).toBe(0);
  });

  it('sums destination costs step by step', () => {
    const map = new GameMap(3, 3);
    map.setTerrain({ x: 1, y: 0 }, 'swamp');
    map.setTerrain({ x: 2, y: 1 }, 'rough');
    expect(
      calculatePathCost(map, [
        { x: 0, y: 0 },
        { x: 1, y: 0 },
        { x: 2, y: 1 },
        { x: 2, y: 2 }
      ])
    ).toBe(400);
  });
});

describe('getReachablePositions', () => {
  const keysOf = (positions: Position[]) => positions.map(positionKey).sort();

  it('returns nothing for an empty budget or an off-map start', () => {
    const map = new GameMap(5, 5);
    expect(getReachablePositions(map, { x: 2, y: 2 }, 0)).toEqual([]);
    expect(getReachablePositions(map, { x: 2, y: 2 }, -50)).toEqual([]);
    expect(getReachablePositions(map, { x: 9, y: 2 }, 500)).toEqual([]);
    expect(getReachablePositions(map, { x: 2, y: 2 }, 99)).toEqual([]);
  });

  it('reaches the ring of neighbours with one step of budget', () => {
    const map = new GameMap(5, 5);
    expect(keysOf(getReachablePositions(map, { x: 2, y: 2 }, 100))).toEqual([
      '1,1',
      '1,2',
      '1,3',
      '2,1',
      '2,3',
      '3,1',
      '3,2',
      '3,3'
    ]);
    expect(getReachablePositions(map, { x: 2, y: 2 }, 200)).toHaveLength(24);
  });

  it('leaves out costly and blocked neighbours', () => {
    const map = new GameMap(5, 5);
    map.setTerrain({ x: 3, y: 2 }, 'swamp');
    map.addObject(createMineObject({ position: { x: 1, y: 1 }, resourceType: 'ore', dailyProduction: 2 }));

    const cheap = keysOf(getReachablePositions(map, { x: 2, y: 2 }, 100));
    expect(cheap).toEqual(['1,2', '1,3', '2,1', '2,3', '3,1', '3,3']);

    const wider = keysOf(getReachablePositions(map, { x: 2, y: 2 }, 175));
    expect(wider).toEqual(['1,2', '1,3', '2,1', '2,3', '3,1', '3,2', '3,3']);
  });

  it('agrees with the reference costs on a mixed map', () => {
    const map = createPatchworkMap();
    const start = { x: 1, y: 1 };
    const budget = 350;
    const expected = Array.from(referenceCosts(map, start).entries())
      .filter(([key, cost]) => key !== positionKey(start) && cost <= budget)
      .map(([key]) => key)
      .sort();

    const reachable = getReachablePositions(map, start, budget);
    expect(keysOf(reachable)).toEqual(expected);
    expect(new Set(keysOf(reachable)).size).toBe(reachable.length);
  });
});
