import type { Coordinates, Orientation, TileKey } from '../types/index.js';
import { offsetCoordinates } from '../layer1-tiles/orientation.js';

export const DEFAULT_OUTPUT_SIZE = 32;

/** Neighbour cell index per direction; null at the grid edge. */
export type Connectivity = Readonly<Record<Orientation, number | null>>;

export interface WaveCell {
  readonly index: number;
  readonly coordinates: Coordinates;
  readonly connectivity: Connectivity;
  /** Candidate tiles. Empty = impossible, one = resolved. */
  wave: Set<TileKey>;
  /** Set while the cell still has to push its restrictions to its neighbours. */
  dirty: boolean;
}

/**
 * Output grid stored as a flat arena of cells, row-major. Neighbours are
 * resolved to indices once at construction.
 */
export class WaveGrid {
  readonly width: number;
  readonly height: number;
  readonly cells: readonly WaveCell[];
  private dirtyCells = new Set<number>();

  constructor(width: number = DEFAULT_OUTPUT_SIZE, height: number = DEFAULT_OUTPUT_SIZE) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Output grid dimensions must be positive integers, got ${width}x${height}`);
    }
    this.width = width;
    this.height = height;

    const cells: WaveCell[] = [];
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const coordinates = { x, y };
        const neighbour = (orientation: Orientation) =>
          this.indexOf(offsetCoordinates(orientation, coordinates));
        const connectivity: Connectivity = {
          north: neighbour('north'),
          east: neighbour('east'),
          south: neighbour('south'),
          west: neighbour('west'),
        };
        cells.push({
          index: y * width + x,
          coordinates,
          connectivity,
          wave: new Set(),
          dirty: false,
        });
      }
    }
    this.cells = cells;
  }

  get size(): number {
    return this.cells.length;
  }

  /** Cell index for `coordinates`, or null outside the grid. */
  indexOf(coordinates: Coordinates): number | null {
    const { x, y } = coordinates;
    if (!Number.isInteger(x) || !Number.isInteger(y)) return null;
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return null;
    return y * this.width + x;
  }

  cellAt(coordinates: Coordinates): WaveCell | undefined {
    const index = this.indexOf(coordinates);
    return index === null ? undefined : this.cells[index];
  }

  /** Give every cell the full universe and forget any pending propagation. */
  reset(universe: Iterable<TileKey>): void {
    const tiles = [...universe];
    for (const cell of this.cells) {
      cell.wave = new Set(tiles);
      cell.dirty = false;
    }
    this.dirtyCells.clear();
  }

  markDirty(index: number): void {
    this.cells[index].dirty = true;
    this.dirtyCells.add(index);
  }

  clearDirty(index: number): void {
    this.cells[index].dirty = false;
    this.dirtyCells.delete(index);
  }

  clearAllDirty(): void {
    for (const index of this.dirtyCells) {
      this.cells[index].dirty = false;
    }
    this.dirtyCells.clear();
  }

  /** Any dirty cell; pick order carries no meaning. */
  nextDirty(): number | null {
    for (const index of this.dirtyCells) return index;
    return null;
  }

  hasDirty(): boolean {
    return this.dirtyCells.size > 0;
  }

  get dirtyCount(): number {
    return this.dirtyCells.size;
  }
}
