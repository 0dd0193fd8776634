import type { Tile } from '../types/index.js';
import type { Prototype } from './prototype.js';

/**
 * The brush the rule editor paints with: a chosen prototype and the
 * rotation accumulated from scroll input.
 */
export class TileSelection {
  prototype: Prototype | null = null;
  rotation = 0;

  select(prototype: Prototype | null): void {
    this.prototype = prototype;
  }

  rotate(delta: number): void {
    this.rotation += delta;
  }

  makeTile(): Tile | null {
    if (!this.prototype) return null;
    return this.prototype.makeRotatedTile('north', this.rotation);
  }
}
