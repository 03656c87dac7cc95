import type { GameMap } from '../map/game-map.js';
import { addPositions, neighborOffsets, positionsEqual } from '../map/position.js';
import type { Position } from '../map/position.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import * as engine from './astar.js';
import type { Mover, PathProvider } from './types.js';

export interface PathfinderOptions {
  provider?: PathProvider;
  logger?: Logger;
}

/** The eight cells around `center` (NW, N, NE, W, E, SW, S, SE), unclipped. */
export function getAdjacentPositions(center: Position): Position[] {
  return neighborOffsets.map((offset) => addPositions(center, offset));
}

/**
 * Entry point for movement queries. Answers come from the injected provider
 * when it has a usable one and from the built-in search otherwise.
 *
 * Malformed queries (no map, off-map positions, empty budgets) return empty
 * results instead of throwing.
 */
export class Pathfinder {
  private readonly provider?: PathProvider;
  private readonly logger: Logger;

  constructor(options: PathfinderOptions = {}) {
    this.provider = options.provider;
    this.logger = options.logger ?? createLogger('pathfinder');
  }

  get hasProvider(): boolean {
    return this.provider !== undefined;
  }

  findPath(map: GameMap | undefined, start: Position, end: Position): Position[] | undefined {
    if (!map || !map.isInBounds(start) || !map.isInBounds(end)) {
      return undefined;
    }
    if (positionsEqual(start, end)) {
      return [start];
    }

    if (this.provider?.findPath) {
      const path = this.provider.findPath(map, start, end);
      if (path && path.length > 0) {
        return path;
      }
      this.logger.debug({ start, end }, 'provider returned no path, using built-in search');
    }

    return engine.findPath(map, start, end);
  }

  getReachablePositions(map: GameMap | undefined, start: Position, movementPoints: number): Position[] {
    if (!map || !map.isInBounds(start) || !(movementPoints > 0)) {
      return [];
    }

    if (this.provider?.getReachablePositions) {
      const positions = this.provider.getReachablePositions(map, start, movementPoints);
      if (positions) {
        return positions;
      }
      this.logger.debug({ start, movementPoints }, 'provider returned no reachable set, using built-in search');
    }

    return engine.getReachablePositions(map, start, movementPoints);
  }

  calculatePathCost(map: GameMap | undefined, path: readonly Position[] | null | undefined): number {
    if (!map || !path || path.length < 2) {
      return 0;
    }

    if (this.provider?.calculatePathCost) {
      const cost = this.provider.calculatePathCost(map, path);
      if (cost >= 0) {
        return cost;
      }
      this.logger.debug({ steps: path.length - 1, cost }, 'provider returned an unusable cost, summing steps');
    }

    return engine.calculatePathCost(map, path);
  }

  /** True when a path to `target` exists and fits in the mover's remaining points. */
  canReachPosition(map: GameMap | undefined, mover: Mover, target: Position): boolean {
    if (!map || !map.isInBounds(target) || !(mover.movementPoints > 0)) {
      return false;
    }
    const path = this.findPath(map, mover.position, target);
    if (!path) {
      return false;
    }
    return this.calculatePathCost(map, path) <= mover.movementPoints;
  }
}
