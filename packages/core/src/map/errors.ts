import { formatPosition } from './position.js';
import type { Position } from './position.js';

export class MapDimensionsError extends Error {
  constructor(readonly width: number, readonly height: number) {
    super(`Map dimensions must be positive integers, got ${width}x${height}`);
    this.name = 'MapDimensionsError';
  }
}

export class OutOfBoundsError extends RangeError {
  constructor(readonly position: Position, width: number, height: number) {
    super(`Position ${formatPosition(position)} is outside the ${width}x${height} map`);
    this.name = 'OutOfBoundsError';
  }
}
