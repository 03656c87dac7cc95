import { addPositions, formatPosition, positionsEqual } from './position.js';
import type { Position } from './position.js';

export const playerColors = ['red', 'blue', 'tan', 'green', 'orange', 'purple', 'teal', 'pink', 'neutral'] as const;
export type PlayerColor = (typeof playerColors)[number];

export const resourceTypes = ['wood', 'mercury', 'ore', 'sulfur', 'crystal', 'gems', 'gold'] as const;
export type ResourceType = (typeof resourceTypes)[number];

export const mapObjectTypes = ['generic', 'resource', 'mine', 'dwelling'] as const;
export type MapObjectType = (typeof mapObjectTypes)[number];

/** Instance id carried by an object that has not been placed on a map. */
export const UNASSIGNED_INSTANCE_ID = -1;

interface MapObjectBase {
  instanceId: number;
  readonly position: Position;
  owner: PlayerColor;
  instanceName: string;
  readonly blocksMovement: boolean;
  readonly isVisitable: boolean;
  // Visited from a neighbouring cell; a hero cannot stand on the object itself.
  readonly blockedVisitable: boolean;
  readonly isRemovable: boolean;
}

/** Decorative object or obstacle. */
export interface GenericObject extends MapObjectBase {
  readonly objectType: 'generic';
}

export interface ResourceObject extends MapObjectBase {
  readonly objectType: 'resource';
  readonly resourceType: ResourceType;
  readonly amount: number;
}

export interface MineObject extends MapObjectBase {
  readonly objectType: 'mine';
  readonly resourceType: ResourceType;
  readonly dailyProduction: number;
}

export interface DwellingObject extends MapObjectBase {
  readonly objectType: 'dwelling';
  readonly creatureId: number;
  availableCount: number;
  readonly weeklyGrowth: number;
}

export type MapObject = GenericObject | ResourceObject | MineObject | DwellingObject;

export type MapObjectOfType<T extends MapObjectType> = Extract<MapObject, { objectType: T }>;

interface PlacementConfig {
  position: Position;
  owner?: PlayerColor;
  instanceName?: string;
}

export interface GenericObjectConfig extends PlacementConfig {
  blocksMovement?: boolean;
  isVisitable?: boolean;
  blockedVisitable?: boolean;
  isRemovable?: boolean;
}

export interface ResourceObjectConfig extends PlacementConfig {
  resourceType: ResourceType;
  amount: number;
}

export interface MineObjectConfig extends PlacementConfig {
  resourceType: ResourceType;
  dailyProduction: number;
}

export interface DwellingObjectConfig extends PlacementConfig {
  creatureId: number;
  initialCount: number;
  weeklyGrowth: number;
}

const placement = (config: PlacementConfig) => ({
  instanceId: UNASSIGNED_INSTANCE_ID,
  position: config.position,
  owner: config.owner ?? 'neutral',
  instanceName: config.instanceName ?? ''
});

export function createGenericObject(config: GenericObjectConfig): GenericObject {
  return {
    ...placement(config),
    objectType: 'generic',
    blocksMovement: config.blocksMovement ?? true,
    isVisitable: config.isVisitable ?? false,
    blockedVisitable: config.blockedVisitable ?? false,
    isRemovable: config.isRemovable ?? false
  };
}

/** Resource pile a hero walks onto and picks up. */
export function createResourceObject(config: ResourceObjectConfig): ResourceObject {
  return {
    ...placement(config),
    objectType: 'resource',
    resourceType: config.resourceType,
    amount: config.amount,
    blocksMovement: false,
    isVisitable: true,
    blockedVisitable: false,
    isRemovable: true
  };
}

export function createMineObject(config: MineObjectConfig): MineObject {
  return {
    ...placement(config),
    objectType: 'mine',
    resourceType: config.resourceType,
    dailyProduction: config.dailyProduction,
    blocksMovement: true,
    isVisitable: true,
    blockedVisitable: true,
    isRemovable: false
  };
}

export function createDwellingObject(config: DwellingObjectConfig): DwellingObject {
  return {
    ...placement(config),
    objectType: 'dwelling',
    creatureId: config.creatureId,
    availableCount: config.initialCount,
    weeklyGrowth: config.weeklyGrowth,
    blocksMovement: true,
    isVisitable: true,
    blockedVisitable: true,
    isRemovable: false
  };
}

export const isGenericObject = (object: MapObject): object is GenericObject => object.objectType === 'generic';
export const isResourceObject = (object: MapObject): object is ResourceObject => object.objectType === 'resource';
export const isMineObject = (object: MapObject): object is MineObject => object.objectType === 'mine';
export const isDwellingObject = (object: MapObject): object is DwellingObject => object.objectType === 'dwelling';

// North, east, south, west, then the diagonals.
const visitOffsets: ReadonlyArray<Position> = [
  { x: 0, y: 1 },
  { x: 1, y: 0 },
  { x: 0, y: -1 },
  { x: -1, y: 0 },
  { x: 1, y: 1 },
  { x: 1, y: -1 },
  { x: -1, y: -1 },
  { x: -1, y: 1 }
];

/**
 * Cells the object occupies. Every variant is a single-cell object, so this is
 * either the anchor or nothing.
 */
export function getBlockedPositions(object: MapObject): Position[] {
  switch (object.objectType) {
    case 'resource':
      return [];
    case 'mine':
    case 'dwelling':
      return [object.position];
    case 'generic':
      return object.blocksMovement ? [object.position] : [];
    default: {
      const unreachable: never = object;
      return unreachable;
    }
  }
}

/**
 * Cells from which a hero can interact with the object. Neighbours are not
 * clipped to the map; {@link GameMap.addObject} skips those outside it.
 */
export function getVisitablePositions(object: MapObject): Position[] {
  if (!object.isVisitable) {
    return [];
  }
  if (object.blockedVisitable) {
    return visitOffsets.map((offset) => addPositions(object.position, offset));
  }
  return [object.position];
}

export function isVisitableAt(object: MapObject, position: Position): boolean {
  return getVisitablePositions(object).some((candidate) => positionsEqual(candidate, position));
}

export function isBlockingAt(object: MapObject, position: Position): boolean {
  if (!object.blocksMovement) {
    return false;
  }
  return getBlockedPositions(object).some((candidate) => positionsEqual(candidate, position));
}

export function setOwner(object: MapObject, owner: PlayerColor): void {
  object.owner = owner;
}

/** Start-of-week growth for a dwelling; returns the new available count. */
export function addWeeklyGrowth(dwelling: DwellingObject): number {
  dwelling.availableCount += dwelling.weeklyGrowth;
  return dwelling.availableCount;
}

export function canRecruit(dwelling: DwellingObject, count: number): boolean {
  return Number.isInteger(count) && count >= 0 && count <= dwelling.availableCount;
}

/** Takes `count` creatures from the dwelling; returns false and changes nothing when there are too few. */
export function recruit(dwelling: DwellingObject, count: number): boolean {
  if (!canRecruit(dwelling, count)) {
    return false;
  }
  dwelling.availableCount -= count;
  return true;
}

/**
 * Copy of the object anchored somewhere else. The copy is unplaced and gets a
 * fresh instance id when it is added to a map.
 */
export function relocateMapObject<T extends MapObject>(object: T, position: Position): T {
  return { ...object, position, instanceId: UNASSIGNED_INSTANCE_ID };
}

export function describeMapObject(object: MapObject): string {
  const name = object.instanceName.length > 0 ? object.instanceName : object.objectType;
  return `${name} at ${formatPosition(object.position)} (owner: ${object.owner})`;
}
