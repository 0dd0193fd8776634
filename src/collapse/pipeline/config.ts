import { DEFAULT_HISTORY_SIZE } from '../layer4-solver/history.js';

export interface Tuning {
  /** Propagation steps per tick; at least 1. */
  stepsPerTick: number;
  /** Guesses kept for backtracking; 0 disables it. */
  historySize: number;
}

export const DEFAULT_TUNING: Tuning = {
  stepsPerTick: 100,
  historySize: DEFAULT_HISTORY_SIZE,
};

export function parseInteger(name: string, raw: string, min: number): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isInteger(value)) {
    throw new Error(`${name} must be an integer, got "${raw}"`);
  }
  if (value < min) {
    throw new Error(`${name} must be at least ${min}, got ${value}`);
  }
  return value;
}

/**
 * Read tuning from the environment (COLLAPSE_STEPS_PER_TICK,
 * COLLAPSE_HISTORY_SIZE). Unset variables fall back to the defaults.
 */
export function loadTuning(env: NodeJS.ProcessEnv = process.env): Tuning {
  const steps = env.COLLAPSE_STEPS_PER_TICK;
  const history = env.COLLAPSE_HISTORY_SIZE;
  return {
    stepsPerTick: steps === undefined ? DEFAULT_TUNING.stepsPerTick : parseInteger('COLLAPSE_STEPS_PER_TICK', steps, 1),
    historySize: history === undefined ? DEFAULT_TUNING.historySize : parseInteger('COLLAPSE_HISTORY_SIZE', history, 0),
  };
}
