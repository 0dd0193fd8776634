import { describe, it, expect } from 'vitest';
import { DEFAULT_TUNING, loadTuning, parseInteger } from './config.js';

describe('loadTuning', () => {
  it('falls back to the defaults', () => {
    expect(loadTuning({})).toEqual(DEFAULT_TUNING);
    expect(DEFAULT_TUNING).toEqual({ stepsPerTick: 100, historySize: 100 });
  });

  it('reads both settings from the environment', () => {
    expect(loadTuning({ COLLAPSE_STEPS_PER_TICK: '25', COLLAPSE_HISTORY_SIZE: '0' })).toEqual({
      stepsPerTick: 25,
      historySize: 0,
    });
  });

  it('requires at least one step per tick', () => {
    expect(() => loadTuning({ COLLAPSE_STEPS_PER_TICK: '0' })).toThrow(
      'COLLAPSE_STEPS_PER_TICK must be at least 1, got 0',
    );
  });

  it('rejects values that are not integers', () => {
    expect(() => loadTuning({ COLLAPSE_HISTORY_SIZE: 'lots' })).toThrow(
      'COLLAPSE_HISTORY_SIZE must be an integer, got "lots"',
    );
    expect(() => parseInteger('--width', '', 1)).toThrow('--width must be an integer, got ""');
  });
});
