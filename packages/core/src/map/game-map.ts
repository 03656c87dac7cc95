import { nanoid } from 'nanoid';

import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { MapDimensionsError, OutOfBoundsError } from './errors.js';
import { MapTile } from './map-tile.js';
import {
  UNASSIGNED_INSTANCE_ID,
  addWeeklyGrowth,
  describeMapObject,
  getBlockedPositions,
  getVisitablePositions,
  isDwellingObject
} from './map-object.js';
import type { MapObject, MapObjectType } from './map-object.js';
import { addPositions, chebyshevDistance, neighborOffsets } from './position.js';
import type { Position } from './position.js';
import { DEFAULT_TERRAIN, IMPASSABLE_MOVEMENT_COST } from './terrain.js';
import type { TerrainType } from './terrain.js';

export interface GameMapOptions {
  id?: string;
  name?: string;
  description?: string;
  defaultTerrain?: TerrainType;
  logger?: Logger;
}

interface TileAttachment {
  blocked: Position[];
  visitable: Position[];
}

/**
 * The authoritative adventure-map grid: tiles, placed objects and the
 * movement rules the pathfinder queries.
 *
 * Single-writer: mutating the map while a search over it is running is not
 * supported.
 */
export class GameMap {
  readonly id: string;
  readonly width: number;
  readonly height: number;
  name: string;
  description: string;

  private readonly tiles: MapTile[];
  private readonly objects = new Map<number, MapObject>();
  private readonly attachments = new Map<number, TileAttachment>();
  private readonly logger: Logger;
  private nextObjectId = 0;

  constructor(width: number, height: number, options: GameMapOptions = {}) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new MapDimensionsError(width, height);
    }

    this.id = options.id ?? `map-${nanoid(8)}`;
    this.width = width;
    this.height = height;
    this.name = options.name ?? 'Untitled Map';
    this.description = options.description ?? '';
    this.logger = options.logger ?? createLogger('game-map');

    const terrain = options.defaultTerrain ?? DEFAULT_TERRAIN;
    this.tiles = Array.from({ length: width * height }, () => new MapTile(terrain));
  }

  /** Integer cell inside `[0, width) x [0, height)`. */
  isInBounds(position: Position): boolean {
    if (!Number.isInteger(position.x) || !Number.isInteger(position.y)) {
      return false;
    }
    return position.x >= 0 && position.x < this.width && position.y >= 0 && position.y < this.height;
  }

  getTile(position: Position): MapTile {
    if (!this.isInBounds(position)) {
      throw new OutOfBoundsError(position, this.width, this.height);
    }
    return this.tiles[position.y * this.width + position.x];
  }

  /**
   * Repaints one tile. Coastal flags are left as they were; call
   * {@link calculateCoastalTiles} once a batch of edits is done.
   */
  setTerrain(position: Position, terrain: TerrainType): void {
    this.getTile(position).setTerrain(terrain);
  }

  isPassable(position: Position): boolean {
    return this.isInBounds(position) && this.getTile(position).isPassable;
  }

  isClear(position: Position): boolean {
    return this.isInBounds(position) && this.getTile(position).isClear;
  }

  /**
   * Places an object and returns the instance id it was given. Ids start at 0
   * and are never handed out twice. An object sits on at most one map at a
   * time; removing it clears its id so it can be placed again.
   */
  addObject(object: MapObject): number {
    if (!this.isInBounds(object.position)) {
      throw new OutOfBoundsError(object.position, this.width, this.height);
    }
    if (object.instanceId !== UNASSIGNED_INSTANCE_ID) {
      const where = this.objects.get(object.instanceId) === object ? `map ${this.id}` : 'another map';
      throw new Error(`Object ${object.instanceId} is already placed on ${where}`);
    }

    const instanceId = this.nextObjectId++;
    object.instanceId = instanceId;
    this.objects.set(instanceId, object);

    const attachment: TileAttachment = {
      blocked: getBlockedPositions(object).filter((position) => this.isInBounds(position)),
      visitable: getVisitablePositions(object).filter((position) => this.isInBounds(position))
    };
    for (const position of attachment.blocked) {
      this.getTile(position).addBlockingObject(instanceId);
    }
    for (const position of attachment.visitable) {
      this.getTile(position).addVisitableObject(instanceId);
    }
    this.attachments.set(instanceId, attachment);

    this.logger.debug({ instanceId, objectType: object.objectType }, `placed ${describeMapObject(object)}`);
    return instanceId;
  }

  removeObject(instanceId: number): boolean {
    const object = this.objects.get(instanceId);
    if (!object) {
      return false;
    }

    const attachment = this.attachments.get(instanceId);
    for (const position of attachment?.blocked ?? []) {
      this.getTile(position).removeBlockingObject(instanceId);
    }
    for (const position of attachment?.visitable ?? []) {
      this.getTile(position).removeVisitableObject(instanceId);
    }

    this.attachments.delete(instanceId);
    this.objects.delete(instanceId);
    object.instanceId = UNASSIGNED_INSTANCE_ID;
    this.logger.debug({ instanceId }, `removed ${describeMapObject(object)}`);
    return true;
  }

  getObject(instanceId: number): MapObject | undefined {
    return this.objects.get(instanceId);
  }

  getAllObjects(): MapObject[] {
    return Array.from(this.objects.values());
  }

  get objectCount(): number {
    return this.objects.size;
  }

  /** Objects blocking or visitable at the cell, in placement order. */
  getObjectsAt(position: Position): MapObject[] {
    if (!this.isInBounds(position)) {
      return [];
    }
    const tile = this.getTile(position);
    const ids = new Set<number>([...tile.visitableObjectIds, ...tile.blockingObjectIds]);
    return this.getAllObjects().filter((object) => ids.has(object.instanceId));
  }

  getObjectsByType(objectType: MapObjectType): MapObject[] {
    return this.getAllObjects().filter((object) => object.objectType === objectType);
  }

  getObjectsOfClass<T extends MapObject>(guard: (object: MapObject) => object is T): T[] {
    return this.getAllObjects().filter(guard);
  }

  /** Start-of-week pass over every dwelling on the map. Returns how many grew. */
  applyWeeklyGrowth(): number {
    const dwellings = this.getObjectsOfClass(isDwellingObject);
    for (const dwelling of dwellings) {
      addWeeklyGrowth(dwelling);
    }
    this.logger.debug({ mapId: this.id, dwellings: dwellings.length }, 'applied weekly growth');
    return dwellings.length;
  }

  /**
   * A single step onto a free, passable neighbour. Diagonal steps are legal
   * even when both orthogonal cells beside them are blocked.
   */
  canMoveBetween(from: Position, to: Position): boolean {
    if (!this.isInBounds(from) || !this.isInBounds(to)) {
      return false;
    }
    if (chebyshevDistance(from, to) !== 1) {
      return false;
    }
    const target = this.getTile(to);
    return target.isPassable && !target.isBlocked;
  }

  getMovementCost(from: Position, to: Position): number {
    if (!this.canMoveBetween(from, to)) {
      return IMPASSABLE_MOVEMENT_COST;
    }
    return this.getTile(to).movementCost;
  }

  getAdjacentPositions(position: Position): Position[] {
    return neighborOffsets
      .map((offset) => addPositions(position, offset))
      .filter((neighbor) => this.isInBounds(neighbor));
  }

  /** Full-grid pass: any non-water tile with a water neighbour (8-way) is coastal, impassable rock included. */
  calculateCoastalTiles(): void {
    let coastalCount = 0;
    this.forEachTile((tile, position) => {
      const coastal =
        !tile.isWater && this.getAdjacentPositions(position).some((neighbor) => this.getTile(neighbor).isWater);
      tile.setCoastal(coastal);
      if (coastal) coastalCount++;
    });
    this.logger.debug({ mapId: this.id, coastalCount }, 'recalculated coastal tiles');
  }

  forEachTile(visit: (tile: MapTile, position: Position) => void): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        visit(this.tiles[y * this.width + x], { x, y });
      }
    }
  }

  toString(): string {
    return `Map '${this.name}' (${this.width}x${this.height}, ${this.objects.size} objects)`;
  }
}
