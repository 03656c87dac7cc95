import { DEFAULT_TERRAIN, terrainDefinitions } from './terrain.js';
import type { TerrainType } from './terrain.js';

/**
 * State of a single grid cell.
 *
 * Terrain decides cost and passability. Objects are referenced by instance id
 * only; {@link GameMap} is the one place that attaches and detaches them, so
 * callers should treat the mutators here as map-internal.
 */
export class MapTile {
  private currentTerrain: TerrainType;
  private coastal = false;
  private favorableWinds = false;
  // Insertion order is visiting priority: the last id is on top.
  private readonly visitable: number[] = [];
  private readonly blocking = new Set<number>();

  constructor(terrain: TerrainType = DEFAULT_TERRAIN) {
    this.currentTerrain = terrain;
  }

  get terrain(): TerrainType {
    return this.currentTerrain;
  }

  get movementCost(): number {
    return terrainDefinitions[this.currentTerrain].movementCost;
  }

  get isPassable(): boolean {
    return terrainDefinitions[this.currentTerrain].passable;
  }

  get isWater(): boolean {
    return terrainDefinitions[this.currentTerrain].water;
  }

  get isLand(): boolean {
    return this.isPassable && !this.isWater;
  }

  get isBlocked(): boolean {
    return this.blocking.size > 0;
  }

  get isVisitable(): boolean {
    return this.visitable.length > 0;
  }

  get isClear(): boolean {
    return this.isPassable && !this.isBlocked;
  }

  get isCoastal(): boolean {
    return this.coastal;
  }

  get hasFavorableWinds(): boolean {
    return this.favorableWinds;
  }

  get visitableObjectIds(): readonly number[] {
    return this.visitable;
  }

  get blockingObjectIds(): ReadonlySet<number> {
    return this.blocking;
  }

  get topVisitableObjectId(): number | undefined {
    return this.visitable.length > 0 ? this.visitable[this.visitable.length - 1] : undefined;
  }

  setTerrain(terrain: TerrainType): void {
    this.currentTerrain = terrain;
  }

  setCoastal(coastal: boolean): void {
    this.coastal = coastal;
  }

  setFavorableWinds(favorableWinds: boolean): void {
    this.favorableWinds = favorableWinds;
  }

  addVisitableObject(objectId: number): void {
    if (!this.visitable.includes(objectId)) {
      this.visitable.push(objectId);
    }
  }

  removeVisitableObject(objectId: number): void {
    const index = this.visitable.indexOf(objectId);
    if (index >= 0) {
      this.visitable.splice(index, 1);
    }
  }

  hasVisitableObject(objectId: number): boolean {
    return this.visitable.includes(objectId);
  }

  addBlockingObject(objectId: number): void {
    this.blocking.add(objectId);
  }

  removeBlockingObject(objectId: number): void {
    this.blocking.delete(objectId);
  }

  hasBlockingObject(objectId: number): boolean {
    return this.blocking.has(objectId);
  }

  toString(): string {
    return `Tile(${this.currentTerrain}, cost ${this.movementCost}, blocked ${this.isBlocked}, visitable ${this.isVisitable})`;
  }
}
