import type { Orientation } from './tile.js';

export type SolveStatus = 'unconfigured' | 'idle' | 'propagating' | 'stable';

/** Persisted form of a tile: [prototypeIndex, orientation] */
export type SerializedTile = [number, Orientation];

/**
 * One output cell: the resolved tile, or a marker for a cell that still has
 * several candidates or none. `null` only when the rule grid is empty.
 */
export type MapCell = SerializedTile | 'undecided' | 'impossible' | null;

export interface SerializedRuleGrid {
  width: number;
  height: number;
  cells: Array<Array<SerializedTile | null>>;  // cells[y][x]
}

export interface CollapseStats {
  resolved: number;
  undecided: number;
  impossible: number;
  observations: number;
  contradictions: number;
  backtracks: number;
  ticks: number;
}

export interface CollapsedMap {
  width: number;            // output cells horizontally
  height: number;           // output cells vertically
  seed: string;
  status: SolveStatus;
  cells: MapCell[];         // flat row-major
  stats: CollapseStats;
}
