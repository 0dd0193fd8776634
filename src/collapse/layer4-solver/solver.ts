import Alea from 'alea';
import type { Coordinates, SolveStatus, TileKey } from '../types/index.js';
import { ORIENTATIONS } from '../layer1-tiles/orientation.js';
import { parseTileKey, type Prototype } from '../layer1-tiles/prototype.js';
import type { RuleGrid } from '../layer2-rules/rule-grid.js';
import { extractAdjacency, unionAllowed, type AdjacencyTable } from '../layer2-rules/extractor.js';
import { DEFAULT_OUTPUT_SIZE, WaveGrid } from '../layer3-wave/wave-grid.js';
import { DEFAULT_HISTORY_SIZE, GuessHistory } from './history.js';
import type { CellState } from './cell-state.js';
import { pickRandom, type Rng } from './random.js';

export interface SolverOptions {
  ruleGrid: RuleGrid;
  prototypes: readonly Prototype[];
  width?: number;
  height?: number;
  rng?: Rng;
  /** Guesses kept for backtracking; 0 leaves contradictions standing. */
  historySize?: number;
}

export interface SolveCounters {
  steps: number;
  observations: number;
  contradictions: number;
  backtracks: number;
}

export interface Progress extends SolveCounters {
  status: SolveStatus;
}

function emptyCounters(): SolveCounters {
  return { steps: 0, observations: 0, contradictions: 0, backtracks: 0 };
}

function intersect(wave: ReadonlySet<TileKey>, allowed: ReadonlySet<TileKey>): Set<TileKey> {
  const result = new Set<TileKey>();
  for (const key of wave) {
    if (allowed.has(key)) result.add(key);
  }
  return result;
}

/**
 * Wave Function Collapse over a rectangular grid.
 *
 * Driven by `step()`, which does a bounded amount of work so it can be
 * called once per frame. Rule edits are picked up at the start of every
 * entry point through the rule grid's generation counter and throw away
 * all progress.
 */
export class Solver {
  readonly grid: WaveGrid;
  private readonly ruleGrid: RuleGrid;
  private readonly prototypes: readonly Prototype[];
  private readonly rng: Rng;
  private readonly history: GuessHistory;
  private table: AdjacencyTable = new Map();
  private tiles: TileKey[] = [];
  private seenGeneration = -1;
  private counters = emptyCounters();

  constructor(options: SolverOptions) {
    this.ruleGrid = options.ruleGrid;
    this.prototypes = options.prototypes;
    this.grid = new WaveGrid(options.width ?? DEFAULT_OUTPUT_SIZE, options.height ?? DEFAULT_OUTPUT_SIZE);
    this.rng = options.rng ?? Alea(Date.now());
    this.history = new GuessHistory(options.historySize ?? DEFAULT_HISTORY_SIZE);
  }

  /** Current adjacency table. Replaced wholesale on every rule change. */
  get adjacency(): AdjacencyTable {
    this.sync();
    return this.table;
  }

  /** Every tile the current rules know about. */
  get universe(): readonly TileKey[] {
    this.sync();
    return this.tiles;
  }

  /** Totals since the last rule rebuild. */
  get totals(): SolveCounters {
    return { ...this.counters };
  }

  get status(): SolveStatus {
    this.sync();
    if (this.table.size === 0) return 'unconfigured';
    if (this.grid.hasDirty()) return 'propagating';
    return this.grid.cells.some(cell => cell.wave.size > 1) ? 'idle' : 'stable';
  }

  /** Rebuild rules and reset every wave when the rule grid has been edited. */
  private sync(): void {
    if (this.seenGeneration === this.ruleGrid.generation) return;
    this.seenGeneration = this.ruleGrid.generation;

    this.table = extractAdjacency(this.ruleGrid, this.prototypes);
    this.tiles = [...this.table.keys()];
    this.grid.reset(this.tiles);
    this.history.clear();
    this.counters = emptyCounters();
  }

  /**
   * Do up to `maxSteps` propagation steps, observing a new cell whenever
   * propagation has settled. Resumes where the previous call stopped.
   */
  step(maxSteps: number): Progress {
    if (!Number.isInteger(maxSteps) || maxSteps < 1) {
      throw new RangeError(`Step budget must be a positive integer, got ${maxSteps}`);
    }
    this.sync();
    const before = this.totals;

    if (this.table.size > 0) {
      let steps = 0;
      while (steps < maxSteps) {
        if (this.grid.hasDirty()) {
          this.propagateOnce();
          steps++;
        } else if (!this.observe()) {
          break;
        }
      }
    }

    const after = this.counters;
    return {
      status: this.status,
      steps: after.steps - before.steps,
      observations: after.observations - before.observations,
      contradictions: after.contradictions - before.contradictions,
      backtracks: after.backtracks - before.backtracks,
    };
  }

  /**
   * Step until nothing is left to do or `stepLimit` steps have run. The
   * default limit covers every possible wave reduction when backtracking
   * is off.
   */
  run(stepLimit?: number): Progress {
    this.sync();
    const cells = this.grid.size;
    const limit = stepLimit ?? cells * (this.tiles.length + 1) * (this.history.enabled ? 32 : 1);
    const total: Progress = { status: this.status, ...emptyCounters() };

    while (total.steps < limit && (total.status === 'idle' || total.status === 'propagating')) {
      const progress = this.step(Math.min(limit - total.steps, cells));
      total.status = progress.status;
      total.steps += progress.steps;
      total.observations += progress.observations;
      total.contradictions += progress.contradictions;
      total.backtracks += progress.backtracks;
      if (progress.steps === 0 && progress.observations === 0) break;
    }

    return total;
  }

  /**
   * Collapse one of the lowest-entropy undecided cells to a random
   * candidate. Only acts when no propagation is pending; returns whether
   * a cell was observed.
   */
  observe(): boolean {
    this.sync();
    if (this.grid.hasDirty()) return false;

    let minEntropy = Infinity;
    const lowest: number[] = [];
    for (const cell of this.grid.cells) {
      const entropy = cell.wave.size;
      if (entropy <= 1) continue;
      if (entropy < minEntropy) {
        minEntropy = entropy;
        lowest.length = 0;
      }
      if (entropy === minEntropy) lowest.push(cell.index);
    }
    if (lowest.length === 0) return false;

    const index = pickRandom(lowest, this.rng);
    const tile = pickRandom([...this.grid.cells[index].wave], this.rng);

    this.history.push(index, tile);
    this.writeWave(index, new Set([tile]));
    this.grid.markDirty(index);
    this.counters.observations++;
    return true;
  }

  /**
   * Push one dirty cell's candidates onto its undecided neighbours.
   * Returns false when nothing was dirty.
   */
  propagateOnce(): boolean {
    this.sync();
    const source = this.grid.nextDirty();
    if (source === null) return false;
    this.counters.steps++;

    const cell = this.grid.cells[source];
    for (const orientation of ORIENTATIONS) {
      if (cell.wave.size === 0) break;
      const neighbourIndex = cell.connectivity[orientation];
      if (neighbourIndex === null) continue;

      const neighbour = this.grid.cells[neighbourIndex];
      if (neighbour.wave.size <= 1) continue;

      const allowed = unionAllowed(this.table, cell.wave, orientation);
      if (allowed === null) continue;

      const next = intersect(neighbour.wave, allowed);
      if (next.size === neighbour.wave.size) continue;

      this.writeWave(neighbourIndex, next);
      if (next.size > 0) {
        this.grid.markDirty(neighbourIndex);
        continue;
      }

      this.counters.contradictions++;
      if (this.backtrack()) return true;
    }

    this.grid.clearDirty(source);
    return true;
  }

  /**
   * Undo the latest guess and rule its tile out of that cell. Returns false
   * when there is no guess to undo, leaving the contradiction in place.
   */
  private backtrack(): boolean {
    const guess = this.history.pop();
    if (!guess) return false;

    for (let i = guess.trail.length - 1; i >= 0; i--) {
      const entry = guess.trail[i];
      this.grid.cells[entry.cell].wave = new Set(entry.wave);
    }
    this.grid.clearAllDirty();
    this.counters.backtracks++;

    // The wave held more than one tile when it was observed.
    const remaining = new Set(this.grid.cells[guess.cell].wave);
    remaining.delete(guess.tile);
    this.writeWave(guess.cell, remaining);
    this.grid.markDirty(guess.cell);
    return true;
  }

  private writeWave(index: number, wave: Set<TileKey>): void {
    const cell = this.grid.cells[index];
    this.history.record(index, cell.wave);
    cell.wave = wave;
  }

  /** Candidate count, or undefined outside the grid. */
  entropyAt(coordinates: Coordinates): number | undefined {
    this.sync();
    return this.grid.cellAt(coordinates)?.wave.size;
  }

  cellState(coordinates: Coordinates): CellState | undefined {
    this.sync();
    const cell = this.grid.cellAt(coordinates);
    if (!cell) return undefined;
    return this.describe(cell.wave);
  }

  /** Every cell's state, row-major. */
  snapshot(): CellState[] {
    this.sync();
    return this.grid.cells.map(cell => this.describe(cell.wave));
  }

  private describe(wave: ReadonlySet<TileKey>): CellState {
    if (this.table.size === 0) return { kind: 'unconfigured' };
    if (wave.size === 0) return { kind: 'impossible' };
    if (wave.size === 1) {
      const [key] = wave;
      return { kind: 'resolved', tile: parseTileKey(key) };
    }
    return { kind: 'undecided', entropy: wave.size, fraction: wave.size / this.tiles.length };
  }
}
