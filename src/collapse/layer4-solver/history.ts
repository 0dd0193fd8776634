import type { TileKey } from '../types/index.js';

export const DEFAULT_HISTORY_SIZE = 100;

/** A wave as it was before a write, kept so the write can be undone. */
export interface TrailEntry {
  cell: number;
  wave: ReadonlySet<TileKey>;
}

export interface Guess {
  cell: number;
  tile: TileKey;
  /** Every wave overwritten since this guess, oldest first. */
  trail: TrailEntry[];
}

/**
 * Bounded stack of observations. Once `limit` guesses are held the oldest
 * is dropped, so backtracking can only rewind that far.
 */
export class GuessHistory {
  private guesses: Guess[] = [];

  constructor(readonly limit: number = DEFAULT_HISTORY_SIZE) {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`History size must be a non-negative integer, got ${limit}`);
    }
  }

  get size(): number {
    return this.guesses.length;
  }

  get enabled(): boolean {
    return this.limit > 0;
  }

  push(cell: number, tile: TileKey): void {
    if (!this.enabled) return;
    this.guesses.push({ cell, tile, trail: [] });
    if (this.guesses.length > this.limit) this.guesses.shift();
  }

  /** Remember `previous` on the newest guess's trail. No-op without one. */
  record(cell: number, previous: ReadonlySet<TileKey>): void {
    const current = this.guesses[this.guesses.length - 1];
    current?.trail.push({ cell, wave: previous });
  }

  pop(): Guess | undefined {
    return this.guesses.pop();
  }

  peek(): Guess | undefined {
    return this.guesses[this.guesses.length - 1];
  }

  clear(): void {
    this.guesses = [];
  }
}
