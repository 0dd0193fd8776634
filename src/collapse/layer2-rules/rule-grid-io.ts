import { readFileSync, writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import type { SerializedRuleGrid, SerializedTile } from '../types/index.js';
import { isOrientation } from '../layer1-tiles/orientation.js';
import { RuleGrid } from './rule-grid.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const SAMPLE_RULES_PATH = resolve(__dirname, '../../../fixtures/sample-rules.json');

export function serializeRuleGrid(grid: RuleGrid): SerializedRuleGrid {
  const cells: Array<Array<SerializedTile | null>> = [];
  for (let y = 0; y < grid.height; y++) {
    const row: Array<SerializedTile | null> = [];
    for (let x = 0; x < grid.width; x++) {
      const tile = grid.get({ x, y });
      row.push(tile ? [tile.prototypeIndex, tile.orientation] : null);
    }
    cells.push(row);
  }
  return { width: grid.width, height: grid.height, cells };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate persisted rule-grid JSON and rebuild the grid. Throws on the
 * first malformed value. The returned grid's generation counts the filled cells.
 */
export function parseRuleGrid(data: unknown): RuleGrid {
  if (!isRecord(data)) {
    throw new Error('Rule grid must be an object with width, height and cells');
  }
  const { width, height, cells } = data;
  if (typeof width !== 'number' || typeof height !== 'number') {
    throw new Error('Rule grid width and height must be numbers');
  }
  if (!Array.isArray(cells) || cells.length !== height) {
    throw new Error(`Rule grid must have ${height} rows of cells`);
  }

  const grid = new RuleGrid(width, height);

  cells.forEach((row: unknown, y) => {
    if (!Array.isArray(row) || row.length !== width) {
      throw new Error(`Rule grid row ${y} must have ${width} cells`);
    }
    row.forEach((cell: unknown, x) => {
      if (cell === null) return;
      if (!Array.isArray(cell) || cell.length !== 2) {
        throw new Error(`Rule cell (${x}, ${y}) must be null or [prototypeIndex, orientation]`);
      }
      const [prototypeIndex, orientation] = cell;
      if (typeof prototypeIndex !== 'number' || !Number.isInteger(prototypeIndex) || prototypeIndex < 0) {
        throw new Error(`Rule cell (${x}, ${y}) has invalid prototype index ${JSON.stringify(prototypeIndex)}`);
      }
      if (!isOrientation(orientation)) {
        throw new Error(`Rule cell (${x}, ${y}) has invalid orientation ${JSON.stringify(orientation)}`);
      }
      grid.set({ x, y }, { prototypeIndex, orientation });
    });
  });

  return grid;
}

export function loadRuleGrid(path: string): RuleGrid {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseRuleGrid(raw);
}

export function saveRuleGrid(path: string, grid: RuleGrid): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, JSON.stringify(serializeRuleGrid(grid), null, 2));
}
