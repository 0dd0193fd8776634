import type { Tile } from '../types/index.js';

/**
 * What a renderer needs to know about one output cell. `unconfigured`
 * means no rules exist yet, which is different from `impossible`.
 */
export type CellState =
  | { kind: 'unconfigured' }
  | { kind: 'resolved'; tile: Tile }
  | { kind: 'undecided'; entropy: number; fraction: number }
  | { kind: 'impossible' };

export const SHADE_LEVELS = 100;

/** Shade bucket in [0, levels) for an undecided cell's remaining-candidate fraction. */
export function undecidedShade(fraction: number, levels: number = SHADE_LEVELS): number {
  const clamped = Math.max(0, Math.min(1, fraction));
  return Math.min(levels - 1, Math.floor(clamped * levels));
}
