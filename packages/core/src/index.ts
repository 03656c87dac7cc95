export * from './config.js';
export * from './map/errors.js';
export * from './map/game-map.js';
export * from './map/map-object.js';
export * from './map/map-tile.js';
export * from './map/position.js';
export * from './map/reachability.js';
export * from './map/terrain.js';
export { PriorityQueue } from './pathfinding/priority-queue.js';
export { calculatePathCost, findPath, getReachablePositions } from './pathfinding/astar.js';
export { Pathfinder, getAdjacentPositions } from './pathfinding/pathfinder.js';
export type { PathfinderOptions } from './pathfinding/pathfinder.js';
export type { Mover, PathProvider } from './pathfinding/types.js';
export { createLogger, createRootLogger, getRootLogger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
