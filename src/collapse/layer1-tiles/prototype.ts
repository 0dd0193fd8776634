import type { Equivalence, Orientation, Tile, TileKey } from '../types/index.js';
import { isOrientation, ORIENTATIONS, rotateOrientation } from './orientation.js';

/**
 * Collapse an orientation onto the representative of its class, so that
 * rotations a symmetric model cannot show produce the same Tile.
 */
export function canonicalOrientation(equivalence: Equivalence, orientation: Orientation): Orientation {
  switch (equivalence) {
    case 'none':
      return orientation;
    case 'half-turn':
      return orientation === 'north' || orientation === 'south' ? 'north' : 'east';
    case 'quarter-turn':
      return 'north';
  }
}

export function tileKey(tile: Tile): TileKey {
  return `${tile.prototypeIndex}:${tile.orientation}`;
}

export function parseTileKey(key: TileKey): Tile {
  const [index, orientation] = key.split(':');
  const prototypeIndex = Number(index);
  if (!Number.isInteger(prototypeIndex) || !isOrientation(orientation)) {
    throw new Error(`Malformed tile key "${key}"`);
  }
  return { prototypeIndex, orientation };
}

export function tilesEqual(a: Tile | null, b: Tile | null): boolean {
  if (a === null || b === null) return a === b;
  return a.prototypeIndex === b.prototypeIndex && a.orientation === b.orientation;
}

/** A palette entry: one model plus the symmetry it has. */
export class Prototype {
  constructor(
    readonly index: number,
    readonly name: string,
    readonly model: string,
    readonly equivalence: Equivalence = 'none',
  ) {}

  makeTile(orientation: Orientation): Tile {
    return { prototypeIndex: this.index, orientation };
  }

  makeRotatedTile(baseOrientation: Orientation, rotation: number): Tile {
    const rotated = rotateOrientation(baseOrientation, rotation);
    return this.makeTile(canonicalOrientation(this.equivalence, rotated));
  }

  /** Distinct tiles this prototype produces across all four rotations. */
  variants(): Tile[] {
    const seen = new Map<TileKey, Tile>();
    for (const orientation of ORIENTATIONS) {
      const tile = this.makeRotatedTile(orientation, 0);
      seen.set(tileKey(tile), tile);
    }
    return [...seen.values()];
  }
}
