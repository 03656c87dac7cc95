import type { GameMap } from '../map/game-map.js';
import type { Position } from '../map/position.js';

/**
 * An external pathfinding backend. Every hook is optional; a hook that is
 * missing or answers with an unusable value (null/undefined, an empty path, a
 * negative cost) hands the query back to the built-in search.
 */
export interface PathProvider {
  findPath?(map: GameMap, start: Position, end: Position): Position[] | null | undefined;
  getReachablePositions?(map: GameMap, start: Position, movementPoints: number): Position[] | null | undefined;
  calculatePathCost?(map: GameMap, path: readonly Position[]): number;
}

/** Anything that stands somewhere and has movement left this turn, usually a hero. */
export interface Mover {
  position: Position;
  movementPoints: number;
}
