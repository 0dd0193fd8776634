import { describe, it, expect } from 'vitest';
import Alea from 'alea';
import { pickRandom } from './random.js';

describe('pickRandom', () => {
  it('maps the unit interval across the list', () => {
    const items = ['a', 'b', 'c', 'd'];
    expect(pickRandom(items, () => 0)).toBe('a');
    expect(pickRandom(items, () => 0.5)).toBe('c');
    expect(pickRandom(items, () => 0.999)).toBe('d');
  });

  it('is reproducible with a seeded generator', () => {
    const items = Array.from({ length: 50 }, (_, i) => i);
    const first = Alea('test-seed');
    const second = Alea('test-seed');
    const a = Array.from({ length: 20 }, () => pickRandom(items, first));
    const b = Array.from({ length: 20 }, () => pickRandom(items, second));
    expect(a).toEqual(b);
  });

  it('refuses an empty list', () => {
    expect(() => pickRandom([], () => 0)).toThrow('Cannot pick from an empty list');
  });
});
