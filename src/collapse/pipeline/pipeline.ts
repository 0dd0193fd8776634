import Alea from 'alea';
import type { CollapsedMap, MapCell } from '../types/index.js';
import { loadPalette } from '../layer1-tiles/palette.js';
import type { Prototype } from '../layer1-tiles/prototype.js';
import type { RuleGrid } from '../layer2-rules/rule-grid.js';
import { loadRuleGrid, SAMPLE_RULES_PATH } from '../layer2-rules/rule-grid-io.js';
import { DEFAULT_OUTPUT_SIZE } from '../layer3-wave/wave-grid.js';
import { Solver } from '../layer4-solver/solver.js';
import { DEFAULT_TUNING, type Tuning } from './config.js';
import { renderAscii } from './ascii.js';

export interface MapConfig {
  seed: string;
  width?: number;
  height?: number;
  rulesPath?: string;
  palettePath?: string;
  /** Use an in-memory rule grid instead of loading one. */
  ruleGrid?: RuleGrid;
  prototypes?: readonly Prototype[];
  tuning?: Partial<Tuning>;
  /** Log an ASCII preview of the result. */
  preview?: boolean;
}

export function generateMap(config: MapConfig): CollapsedMap {
  const { seed, width = DEFAULT_OUTPUT_SIZE, height = DEFAULT_OUTPUT_SIZE } = config;
  const tuning: Tuning = { ...DEFAULT_TUNING, ...config.tuning };

  const prototypes = config.prototypes ?? loadPalette(config.palettePath);
  let ruleGrid: RuleGrid;
  if (config.ruleGrid) {
    ruleGrid = config.ruleGrid;
  } else {
    const rulesPath = config.rulesPath ?? SAMPLE_RULES_PATH;
    console.log(`[Rules] Loading rule grid from ${rulesPath}...`);
    ruleGrid = loadRuleGrid(rulesPath);
  }

  const solver = new Solver({
    ruleGrid,
    prototypes,
    width,
    height,
    rng: Alea(seed),
    historySize: tuning.historySize,
  });
  console.log(
    `[Rules] ${ruleGrid.width}x${ruleGrid.height} rule grid, ${prototypes.length} prototypes, ` +
    `${solver.universe.length} oriented tiles`,
  );

  console.log(`[Wave] Output grid ${width}x${height} (${solver.grid.size} cells)`);

  // Without backtracking every step shrinks a wave, so this bounds the solve.
  const stepLimit = solver.grid.size * (solver.universe.length + 1) * (tuning.historySize > 0 ? 32 : 1);
  const maxTicks = Math.ceil(stepLimit / tuning.stepsPerTick) + 1;

  console.log(`[Solve] Collapsing (${tuning.stepsPerTick} steps per tick, history ${tuning.historySize})...`);
  const stats = { resolved: 0, undecided: 0, impossible: 0, observations: 0, contradictions: 0, backtracks: 0, ticks: 0 };
  let status = solver.status;
  while ((status === 'idle' || status === 'propagating') && stats.ticks < maxTicks) {
    const progress = solver.step(tuning.stepsPerTick);
    status = progress.status;
    stats.ticks++;
    stats.observations += progress.observations;
    stats.contradictions += progress.contradictions;
    stats.backtracks += progress.backtracks;
  }

  if (status === 'unconfigured') {
    console.log('[Solve] Rule grid is empty, nothing to collapse');
  } else if (status !== 'stable') {
    console.log(`[Solve] Stopped after ${stats.ticks} ticks without settling (status: ${status})`);
  }

  const states = solver.snapshot();
  const cells: MapCell[] = states.map(state => {
    switch (state.kind) {
      case 'resolved':
        stats.resolved++;
        return [state.tile.prototypeIndex, state.tile.orientation];
      case 'undecided':
        stats.undecided++;
        return 'undecided';
      case 'impossible':
        stats.impossible++;
        return 'impossible';
      case 'unconfigured':
        return null;
    }
  });

  console.log(
    `[Solve] ${stats.resolved} resolved, ${stats.impossible} impossible, ${stats.undecided} undecided ` +
    `(${stats.observations} observations, ${stats.contradictions} contradictions, ${stats.backtracks} backtracks)`,
  );
  if (config.preview) {
    console.log(renderAscii(states, width, height));
  }

  return { width, height, seed, status, cells, stats };
}
