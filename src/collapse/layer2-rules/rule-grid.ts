import type { Coordinates, Tile } from '../types/index.js';
import { tilesEqual } from '../layer1-tiles/prototype.js';
import type { TileSelection } from '../layer1-tiles/selection.js';

export const DEFAULT_RULE_GRID_SIZE = 16;

/**
 * The exemplar grid the adjacency rules are read from.
 *
 * Every write that changes a cell bumps `generation`; consumers compare it
 * against the generation they last built from to know the rules are stale.
 */
export class RuleGrid {
  readonly width: number;
  readonly height: number;
  private cells: Array<Tile | null>;
  private _generation = 0;

  constructor(width: number = DEFAULT_RULE_GRID_SIZE, height: number = DEFAULT_RULE_GRID_SIZE) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new RangeError(`Rule grid dimensions must be positive integers, got ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.cells = new Array<Tile | null>(width * height).fill(null);
  }

  get generation(): number {
    return this._generation;
  }

  contains(coordinates: Coordinates): boolean {
    const { x, y } = coordinates;
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  /** Tile at `coordinates`, or null when unfilled or outside the grid. */
  get(coordinates: Coordinates): Tile | null {
    if (!this.contains(coordinates)) return null;
    return this.cells[coordinates.y * this.width + coordinates.x];
  }

  /** Returns true when the cell actually changed. */
  set(coordinates: Coordinates, tile: Tile | null): boolean {
    if (!this.contains(coordinates)) {
      throw new RangeError(
        `Rule cell (${coordinates.x}, ${coordinates.y}) is outside the ${this.width}x${this.height} rule grid`,
      );
    }
    const index = coordinates.y * this.width + coordinates.x;
    if (tilesEqual(this.cells[index], tile)) return false;

    this.cells[index] = tile ? { prototypeIndex: tile.prototypeIndex, orientation: tile.orientation } : null;
    this._generation++;
    return true;
  }

  /** Paint with the current brush; an empty selection erases. */
  paint(coordinates: Coordinates, selection: TileSelection): boolean {
    return this.set(coordinates, selection.makeTile());
  }

  clear(): void {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        this.set({ x, y }, null);
      }
    }
  }

  *filledCells(): Generator<[Coordinates, Tile]> {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        const tile = this.cells[y * this.width + x];
        if (tile) yield [{ x, y }, tile];
      }
    }
  }
}
