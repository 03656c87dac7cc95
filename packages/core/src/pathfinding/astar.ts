/**
 * Built-in search over a {@link GameMap}.
 *
 * - findPath: A* with f = g + h, h the Manhattan distance to the goal; equal f
 *   prefers the smaller h so ties resolve toward the goal.
 * - getReachablePositions: the same expansion with h = 0, cut off at the
 *   movement budget.
 *
 * Every call builds fresh search state; nothing is cached between queries.
 */

import type { GameMap } from '../map/game-map.js';
import { manhattanDistance, positionKey, positionsEqual } from '../map/position.js';
import type { Position } from '../map/position.js';
import { PriorityQueue } from './priority-queue.js';

interface SearchNode {
  position: Position;
  costFromStart: number;
  heuristic: number;
  parent?: SearchNode;
}

function compareNodes(a: SearchNode, b: SearchNode): number {
  const byTotal = a.costFromStart + a.heuristic - (b.costFromStart + b.heuristic);
  return byTotal !== 0 ? byTotal : a.heuristic - b.heuristic;
}

function reconstructPath(goal: SearchNode): Position[] {
  const path: Position[] = [];
  let cursor: SearchNode | undefined = goal;
  while (cursor) {
    path.push(cursor.position);
    cursor = cursor.parent;
  }
  return path.reverse();
}

/**
 * Neighbours of `node` that a hero may step onto, paired with the step cost.
 */
function* expandableNeighbors(map: GameMap, node: SearchNode, closed: Set<string>) {
  for (const neighbor of map.getAdjacentPositions(node.position)) {
    const key = positionKey(neighbor);
    if (closed.has(key)) {
      continue;
    }
    if (!map.getTile(neighbor).isPassable || !map.canMoveBetween(node.position, neighbor)) {
      continue;
    }
    yield { neighbor, key, stepCost: map.getMovementCost(node.position, neighbor) };
  }
}

/**
 * Cheapest path from `start` to `end`, both included, or `undefined` when the
 * endpoints are off the map, the goal terrain is impassable, or the frontier
 * runs dry.
 */
export function findPath(map: GameMap, start: Position, end: Position): Position[] | undefined {
  if (!map.isInBounds(start) || !map.isInBounds(end)) {
    return undefined;
  }
  if (positionsEqual(start, end)) {
    return [start];
  }
  if (!map.getTile(end).isPassable) {
    return undefined;
  }

  const open = new PriorityQueue<SearchNode>(compareNodes);
  const closed = new Set<string>();
  const nodes = new Map<string, SearchNode>();

  const startNode: SearchNode = { position: start, costFromStart: 0, heuristic: manhattanDistance(start, end) };
  nodes.set(positionKey(start), startNode);
  open.enqueue(startNode);

  while (open.count > 0) {
    const current = open.dequeue();
    if (positionsEqual(current.position, end)) {
      return reconstructPath(current);
    }
    closed.add(positionKey(current.position));

    for (const { neighbor, key, stepCost } of expandableNeighbors(map, current, closed)) {
      const tentativeCost = current.costFromStart + stepCost;
      const existing = nodes.get(key);

      if (!existing) {
        const node: SearchNode = {
          position: neighbor,
          costFromStart: tentativeCost,
          heuristic: manhattanDistance(neighbor, end),
          parent: current
        };
        nodes.set(key, node);
        open.enqueue(node);
      } else if (tentativeCost < existing.costFromStart) {
        existing.costFromStart = tentativeCost;
        existing.parent = current;
        open.updatePriority(existing);
      }
    }
  }

  return undefined;
}

/** Sum of the per-step movement costs; 0 for paths with fewer than two cells. */
export function calculatePathCost(map: GameMap, path: readonly Position[] | null | undefined): number {
  if (!path || path.length < 2) {
    return 0;
  }
  let total = 0;
  for (let i = 0; i < path.length - 1; i++) {
    total += map.getMovementCost(path[i], path[i + 1]);
  }
  return total;
}

/**
 * Every cell whose cheapest cost from `start` fits in `movementPoints`, each
 * listed once in the order the search settled it. `start` itself is never
 * included.
 */
export function getReachablePositions(map: GameMap, start: Position, movementPoints: number): Position[] {
  if (!map.isInBounds(start) || !(movementPoints > 0)) {
    return [];
  }

  const reachable: Position[] = [];
  const open = new PriorityQueue<SearchNode>(compareNodes);
  const closed = new Set<string>();
  const nodes = new Map<string, SearchNode>();

  const startNode: SearchNode = { position: start, costFromStart: 0, heuristic: 0 };
  nodes.set(positionKey(start), startNode);
  open.enqueue(startNode);

  while (open.count > 0) {
    const current = open.dequeue();
    closed.add(positionKey(current.position));
    if (current !== startNode && current.costFromStart <= movementPoints) {
      reachable.push(current.position);
    }

    for (const { neighbor, key, stepCost } of expandableNeighbors(map, current, closed)) {
      const tentativeCost = current.costFromStart + stepCost;
      if (tentativeCost > movementPoints) {
        continue;
      }

      const existing = nodes.get(key);
      if (!existing) {
        const node: SearchNode = { position: neighbor, costFromStart: tentativeCost, heuristic: 0, parent: current };
        nodes.set(key, node);
        open.enqueue(node);
      } else if (tentativeCost < existing.costFromStart) {
        existing.costFromStart = tentativeCost;
        existing.parent = current;
        open.updatePriority(existing);
      }
    }
  }

  return reachable;
}
