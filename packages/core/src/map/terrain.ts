export const terrainTypes = [
  'dirt',
  'sand',
  'grass',
  'snow',
  'swamp',
  'rough',
  'subterranean',
  'lava',
  'water',
  'rock',
  'border'
] as const;

export type TerrainType = (typeof terrainTypes)[number];

export interface TerrainDefinition {
  movementCost: number;
  passable: boolean;
  water: boolean;
}

/** Cost of a move that cannot be made; the largest signed 32-bit integer. */
export const IMPASSABLE_MOVEMENT_COST = 2_147_483_647;

export const DEFAULT_TERRAIN: TerrainType = 'grass';

const land = (movementCost: number): TerrainDefinition => ({ movementCost, passable: true, water: false });

const impassable: TerrainDefinition = {
  movementCost: IMPASSABLE_MOVEMENT_COST,
  passable: false,
  water: false
};

export const terrainDefinitions: Readonly<Record<TerrainType, TerrainDefinition>> = {
  dirt: land(100),
  sand: land(150),
  grass: land(100),
  snow: land(150),
  swamp: land(175),
  rough: land(125),
  subterranean: land(100),
  lava: land(100),
  water: { movementCost: 100, passable: true, water: true },
  rock: impassable,
  border: impassable
};

export function movementCostForTerrain(terrain: TerrainType): number {
  return terrainDefinitions[terrain].movementCost;
}
