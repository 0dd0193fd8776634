import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { Equivalence } from '../types/index.js';
import { Prototype } from './prototype.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_PALETTE_PATH = resolve(__dirname, '../../../fixtures/palette.json');

const EQUIVALENCES: readonly Equivalence[] = ['none', 'half-turn', 'quarter-turn'];

function isEquivalence(value: unknown): value is Equivalence {
  return typeof value === 'string' && (EQUIVALENCES as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build prototypes from palette JSON. Each entry's position in the array
 * is its prototype index.
 */
export function parsePalette(data: unknown): Prototype[] {
  if (!Array.isArray(data)) {
    throw new Error('Palette must be an array of entries');
  }

  return data.map((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new Error(`Palette entry ${index} must be an object`);
    }
    const { name, model, equivalence } = entry;
    if (typeof name !== 'string' || name.length === 0) {
      throw new Error(`Palette entry ${index} is missing a name`);
    }
    if (typeof model !== 'string') {
      throw new Error(`Palette entry ${index} ("${name}") is missing a model`);
    }
    if (!isEquivalence(equivalence)) {
      throw new Error(`Palette entry ${index} ("${name}") has unknown equivalence ${JSON.stringify(equivalence)}`);
    }
    return new Prototype(index, name, model, equivalence);
  });
}

export function loadPalette(path: string = DEFAULT_PALETTE_PATH): Prototype[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parsePalette(raw);
}
