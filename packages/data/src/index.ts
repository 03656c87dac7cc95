import { z } from 'zod';

import {
  GameMap,
  createDwellingObject,
  createGenericObject,
  createMineObject,
  createResourceObject,
  playerColors,
  resourceTypes,
  terrainTypes
} from '@advmap/core';
import type { MapObject, Position } from '@advmap/core';

export const positionSchema = z.object({
  x: z.number().int(),
  y: z.number().int()
});

export const terrainTypeSchema = z.enum(terrainTypes);

export const terrainPatchSchema = z.object({
  terrain: terrainTypeSchema,
  from: positionSchema,
  to: positionSchema
});

const placementFields = {
  position: positionSchema,
  owner: z.enum(playerColors).optional(),
  name: z.string().optional()
};

const genericObjectSchema = z.object({
  type: z.literal('generic'),
  ...placementFields,
  blocksMovement: z.boolean().optional(),
  isVisitable: z.boolean().optional(),
  blockedVisitable: z.boolean().optional(),
  isRemovable: z.boolean().optional()
});

const resourceObjectSchema = z.object({
  type: z.literal('resource'),
  ...placementFields,
  resourceType: z.enum(resourceTypes),
  amount: z.number().int().positive()
});

const mineObjectSchema = z.object({
  type: z.literal('mine'),
  ...placementFields,
  resourceType: z.enum(resourceTypes),
  dailyProduction: z.number().int().nonnegative()
});

const dwellingObjectSchema = z.object({
  type: z.literal('dwelling'),
  ...placementFields,
  creatureId: z.number().int().nonnegative(),
  initialCount: z.number().int().nonnegative(),
  weeklyGrowth: z.number().int().nonnegative()
});

export const mapObjectDefinitionSchema = z.discriminatedUnion('type', [
  genericObjectSchema,
  resourceObjectSchema,
  mineObjectSchema,
  dwellingObjectSchema
]);

export const mapDefinitionSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    description: z.string().optional(),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    defaultTerrain: terrainTypeSchema.optional(),
    terrain: z.array(terrainPatchSchema),
    objects: z.array(mapObjectDefinitionSchema)
  })
  .superRefine((definition, ctx) => {
    const inside = (position: Position) =>
      position.x >= 0 && position.y >= 0 && position.x < definition.width && position.y < definition.height;
    const outside = (path: Array<string | number>, position: Position) =>
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path,
        message: `(${position.x}, ${position.y}) lies outside the ${definition.width}x${definition.height} map`
      });

    definition.terrain.forEach((patch, index) => {
      if (!inside(patch.from)) outside(['terrain', index, 'from'], patch.from);
      if (!inside(patch.to)) outside(['terrain', index, 'to'], patch.to);
    });
    definition.objects.forEach((object, index) => {
      if (!inside(object.position)) outside(['objects', index, 'position'], object.position);
    });
  });

export type TerrainPatch = z.infer<typeof terrainPatchSchema>;
export type MapObjectDefinition = z.infer<typeof mapObjectDefinitionSchema>;
export type MapDefinition = z.infer<typeof mapDefinitionSchema>;

export function loadMapDefinition(raw: unknown): MapDefinition {
  return mapDefinitionSchema.parse(raw);
}

function createObject(definition: MapObjectDefinition): MapObject {
  const placement = { position: definition.position, owner: definition.owner, instanceName: definition.name };
  switch (definition.type) {
    case 'generic':
      return createGenericObject({
        ...placement,
        blocksMovement: definition.blocksMovement,
        isVisitable: definition.isVisitable,
        blockedVisitable: definition.blockedVisitable,
        isRemovable: definition.isRemovable
      });
    case 'resource':
      return createResourceObject({ ...placement, resourceType: definition.resourceType, amount: definition.amount });
    case 'mine':
      return createMineObject({
        ...placement,
        resourceType: definition.resourceType,
        dailyProduction: definition.dailyProduction
      });
    case 'dwelling':
      return createDwellingObject({
        ...placement,
        creatureId: definition.creatureId,
        initialCount: definition.initialCount,
        weeklyGrowth: definition.weeklyGrowth
      });
    default: {
      const unreachable: never = definition;
      return unreachable;
    }
  }
}

/**
 * Builds a live map from a validated definition. Patches are painted in
 * order, so later patches overwrite earlier ones; coastal flags are computed
 * once everything is in place.
 */
export function buildGameMap(definition: MapDefinition): GameMap {
  const map = new GameMap(definition.width, definition.height, {
    id: definition.id,
    name: definition.name,
    description: definition.description,
    defaultTerrain: definition.defaultTerrain
  });

  for (const patch of definition.terrain) {
    const [left, right] = [Math.min(patch.from.x, patch.to.x), Math.max(patch.from.x, patch.to.x)];
    const [top, bottom] = [Math.min(patch.from.y, patch.to.y), Math.max(patch.from.y, patch.to.y)];
    for (let y = top; y <= bottom; y++) {
      for (let x = left; x <= right; x++) {
        map.setTerrain({ x, y }, patch.terrain);
      }
    }
  }

  for (const object of definition.objects) {
    map.addObject(createObject(object));
  }

  map.calculateCoastalTiles();
  return map;
}

export const starterMaps: MapDefinition[] = [
  {
    id: 'lakeside',
    name: 'Lakeside',
    description: 'A grassy valley around a small lake, split by a rock ridge.',
    width: 12,
    height: 10,
    terrain: [
      { terrain: 'water', from: { x: 4, y: 3 }, to: { x: 6, y: 5 } },
      { terrain: 'sand', from: { x: 7, y: 3 }, to: { x: 7, y: 5 } },
      { terrain: 'rock', from: { x: 9, y: 0 }, to: { x: 9, y: 6 } },
      { terrain: 'swamp', from: { x: 0, y: 8 }, to: { x: 3, y: 9 } }
    ],
    objects: [
      { type: 'mine', position: { x: 2, y: 2 }, resourceType: 'ore', dailyProduction: 2, name: 'Ore Pit' },
      { type: 'dwelling', position: { x: 10, y: 8 }, creatureId: 7, initialCount: 4, weeklyGrowth: 4, owner: 'red' },
      { type: 'resource', position: { x: 5, y: 7 }, resourceType: 'wood', amount: 5 },
      { type: 'resource', position: { x: 11, y: 0 }, resourceType: 'gold', amount: 500 }
    ]
  },
  {
    id: 'dune-crossing',
    name: 'Dune Crossing',
    width: 8,
    height: 8,
    defaultTerrain: 'sand',
    terrain: [
      { terrain: 'dirt', from: { x: 0, y: 3 }, to: { x: 7, y: 4 } },
      { terrain: 'lava', from: { x: 6, y: 6 }, to: { x: 7, y: 7 } }
    ],
    objects: [
      { type: 'mine', position: { x: 1, y: 6 }, resourceType: 'sulfur', dailyProduction: 1, owner: 'blue' },
      { type: 'generic', position: { x: 4, y: 1 }, name: 'Boulder' },
      { type: 'resource', position: { x: 6, y: 1 }, resourceType: 'crystal', amount: 3 }
    ]
  }
];

export const validatedStarterMaps = starterMaps.map((definition) => loadMapDefinition(definition));
