import { describe, it, expect } from 'vitest';
import { undecidedShade } from './cell-state.js';

describe('undecidedShade', () => {
  it('buckets the remaining fraction', () => {
    expect(undecidedShade(0)).toBe(0);
    expect(undecidedShade(0.5)).toBe(50);
    expect(undecidedShade(1)).toBe(99);
    expect(undecidedShade(0.55, 10)).toBe(5);
  });

  it('clamps out-of-range fractions', () => {
    expect(undecidedShade(-0.2)).toBe(0);
    expect(undecidedShade(3, 10)).toBe(9);
  });
});
