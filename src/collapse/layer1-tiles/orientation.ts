import type { Coordinates, Orientation } from '../types/index.js';

export const ORIENTATIONS: readonly Orientation[] = ['north', 'east', 'south', 'west'];

// Unit steps on the grid. North is +y, east is +x.
const OFFSETS: Record<Orientation, Coordinates> = {
  north: { x: 0, y: 1 },
  east: { x: 1, y: 0 },
  south: { x: 0, y: -1 },
  west: { x: -1, y: 0 },
};

export function isOrientation(value: unknown): value is Orientation {
  return typeof value === 'string' && (ORIENTATIONS as readonly string[]).includes(value);
}

/** Advance by `amount` quarter turns clockwise. Negative amounts turn counter-clockwise. */
export function rotateOrientation(orientation: Orientation, amount: number): Orientation {
  const index = ORIENTATIONS.indexOf(orientation);
  const turned = (((index + amount) % 4) + 4) % 4;
  return ORIENTATIONS[turned];
}

export function oppositeOrientation(orientation: Orientation): Orientation {
  return rotateOrientation(orientation, 2);
}

export function offsetCoordinates(orientation: Orientation, coordinates: Coordinates): Coordinates {
  const step = OFFSETS[orientation];
  return { x: coordinates.x + step.x, y: coordinates.y + step.y };
}
