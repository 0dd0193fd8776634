import { describe, it, expect } from 'vitest';
import { DEFAULT_OUTPUT_SIZE, WaveGrid } from './wave-grid.js';

describe('WaveGrid', () => {
  it('defaults to a 32x32 grid of empty waves', () => {
    const grid = new WaveGrid();
    expect(grid.width).toBe(DEFAULT_OUTPUT_SIZE);
    expect(grid.size).toBe(1024);
    expect(grid.cells.every(cell => cell.wave.size === 0 && !cell.dirty)).toBe(true);
  });

  it('links neighbours by index and leaves edges empty', () => {
    const grid = new WaveGrid(3, 2);
    expect(grid.cells[0].connectivity).toEqual({ north: 3, east: 1, south: null, west: null });
    expect(grid.cells[5].connectivity).toEqual({ north: null, east: null, south: 2, west: 4 });
    expect(grid.cells[4].coordinates).toEqual({ x: 1, y: 1 });
  });

  it('treats lookups outside the grid as absent', () => {
    const grid = new WaveGrid(3, 2);
    expect(grid.indexOf({ x: 3, y: 0 })).toBeNull();
    expect(grid.indexOf({ x: 2, y: 1 })).toBe(5);
    expect(grid.cellAt({ x: -1, y: 0 })).toBeUndefined();
  });

  it('rejects empty dimensions', () => {
    expect(() => new WaveGrid(4, 0)).toThrow(RangeError);
  });

  it('resets every wave to its own copy of the universe', () => {
    const grid = new WaveGrid(2, 2);
    grid.markDirty(1);
    grid.reset(['0:north', '1:north']);

    expect(grid.cells.map(cell => cell.wave.size)).toEqual([2, 2, 2, 2]);
    expect(grid.cells[0].wave).not.toBe(grid.cells[1].wave);
    expect(grid.hasDirty()).toBe(false);
    expect(grid.cells[1].dirty).toBe(false);
  });

  it('tracks dirty cells in insertion order', () => {
    const grid = new WaveGrid(3, 2);
    grid.markDirty(4);
    grid.markDirty(1);
    grid.markDirty(4);

    expect(grid.dirtyCount).toBe(2);
    expect(grid.cells[4].dirty).toBe(true);
    expect(grid.nextDirty()).toBe(4);

    grid.clearDirty(4);
    expect(grid.cells[4].dirty).toBe(false);
    expect(grid.nextDirty()).toBe(1);

    grid.clearAllDirty();
    expect(grid.nextDirty()).toBeNull();
    expect(grid.cells[1].dirty).toBe(false);
  });
});
