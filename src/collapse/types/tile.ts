/** Cardinal direction, also used as a tile's facing. Ordered N, E, S, W. */
export type Orientation = 'north' | 'east' | 'south' | 'west';

/**
 * Rotational symmetry of a prototype's model.
 * - none: four distinct variants
 * - half-turn: north/south and east/west look the same (two variants)
 * - quarter-turn: every rotation looks the same (one variant)
 */
export type Equivalence = 'none' | 'half-turn' | 'quarter-turn';

export interface Coordinates {
  x: number;
  y: number;
}

/** An oriented tile, the value every wave cell holds candidates of. */
export interface Tile {
  readonly prototypeIndex: number;
  readonly orientation: Orientation;
}

/** Hashable form of a canonical Tile, e.g. `4:east`. */
export type TileKey = `${number}:${Orientation}`;
