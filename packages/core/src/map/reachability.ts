import type { GameMap } from './game-map.js';
import { getVisitablePositions, relocateMapObject } from './map-object.js';
import type { MapObject } from './map-object.js';
import { positionKey } from './position.js';
import type { Position } from './position.js';

export interface ReachabilityReport {
  totalReachableTiles: number;
  totalUnreachableObjects: number;
  objectsRelocated: number;
  objectsRemoved: number;
}

export interface ReachabilityStats {
  totalTiles: number;
  passableTiles: number;
  reachableTiles: number;
  unreachableTiles: number;
  totalObjects: number;
  unreachableObjects: number;
  /** Reachable share of the passable tiles, 0 to 100; 0 on a map with nothing passable. */
  reachabilityPercentage: number;
}

/**
 * 8-way flood fill over passable terrain from every usable start. Objects are
 * ignored: the question is whether the ground connects, not whether a hero
 * can walk it today.
 */
export function findReachableTiles(map: GameMap, startPositions: Iterable<Position>): Set<string> {
  const reachable = new Set<string>();
  const queue: Position[] = [];

  for (const start of startPositions) {
    const key = positionKey(start);
    if (map.isPassable(start) && !reachable.has(key)) {
      reachable.add(key);
      queue.push(start);
    }
  }

  for (let head = 0; head < queue.length; head++) {
    for (const neighbor of map.getAdjacentPositions(queue[head])) {
      const key = positionKey(neighbor);
      if (reachable.has(key) || !map.isPassable(neighbor)) {
        continue;
      }
      reachable.add(key);
      queue.push(neighbor);
    }
  }

  return reachable;
}

function isObjectReachable(object: MapObject, reachable: Set<string>): boolean {
  if (!reachable.has(positionKey(object.position))) {
    return false;
  }
  if (!object.isVisitable) {
    return true;
  }
  return getVisitablePositions(object).some((position) => reachable.has(positionKey(position)));
}

export function findUnreachableObjects(map: GameMap, startPositions: Iterable<Position>): MapObject[] {
  const reachable = findReachableTiles(map, startPositions);
  return map.getAllObjects().filter((object) => !isObjectReachable(object, reachable));
}

export function calculateReachabilityStats(map: GameMap, startPositions: Iterable<Position>): ReachabilityStats {
  const reachable = findReachableTiles(map, startPositions);
  let passableTiles = 0;
  map.forEachTile((tile) => {
    if (tile.isPassable) passableTiles++;
  });
  const objects = map.getAllObjects();

  return {
    totalTiles: map.width * map.height,
    passableTiles,
    reachableTiles: reachable.size,
    unreachableTiles: passableTiles - reachable.size,
    totalObjects: objects.length,
    unreachableObjects: objects.filter((object) => !isObjectReachable(object, reachable)).length,
    reachabilityPercentage: passableTiles > 0 ? (reachable.size / passableTiles) * 100 : 0
  };
}

/** Returns how many objects were removed. */
export function removeUnreachableObjects(map: GameMap, startPositions: Iterable<Position>): number {
  const unreachable = findUnreachableObjects(map, startPositions);
  for (const object of unreachable) {
    map.removeObject(object.instanceId);
  }
  return unreachable.length;
}

// Walks Manhattan rings of growing radius around the target.
function findNearestReachablePosition(
  map: GameMap,
  target: Position,
  reachable: Set<string>,
  maxRadius: number
): Position | undefined {
  for (let radius = 1; radius <= maxRadius; radius++) {
    for (let dx = -radius; dx <= radius; dx++) {
      for (let dy = -radius; dy <= radius; dy++) {
        if (Math.abs(dx) + Math.abs(dy) !== radius) {
          continue;
        }
        const candidate = { x: target.x + dx, y: target.y + dy };
        if (reachable.has(positionKey(candidate)) && map.isClear(candidate)) {
          return candidate;
        }
      }
    }
  }
  return undefined;
}

/**
 * Moves each unreachable object to the nearest clear reachable cell within
 * `maxSearchRadius`, or removes it when there is none. Relocated objects are
 * re-added and so receive new instance ids.
 */
export function fixUnreachableObjects(
  map: GameMap,
  startPositions: Iterable<Position>,
  maxSearchRadius = 5
): ReachabilityReport {
  const reachable = findReachableTiles(map, startPositions);
  const unreachable = map.getAllObjects().filter((object) => !isObjectReachable(object, reachable));

  const report: ReachabilityReport = {
    totalReachableTiles: reachable.size,
    totalUnreachableObjects: unreachable.length,
    objectsRelocated: 0,
    objectsRemoved: 0
  };

  for (const object of unreachable) {
    map.removeObject(object.instanceId);
    const destination = findNearestReachablePosition(map, object.position, reachable, maxSearchRadius);
    if (destination) {
      map.addObject(relocateMapObject(object, destination));
      report.objectsRelocated++;
    } else {
      report.objectsRemoved++;
    }
  }

  return report;
}
