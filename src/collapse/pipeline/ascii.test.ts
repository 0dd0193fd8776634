import { describe, it, expect } from 'vitest';
import { renderAscii } from './ascii.js';

describe('renderAscii', () => {
  it('draws north at the top with one glyph per state', () => {
    const preview = renderAscii(
      [
        { kind: 'resolved', tile: { prototypeIndex: 0, orientation: 'north' } },
        { kind: 'impossible' },
        { kind: 'undecided', entropy: 11, fraction: 0.55 },
        { kind: 'unconfigured' },
      ],
      2,
      2,
    );
    expect(preview).toBe('5?\nA!');
  });

  it('falls back to # past the alphabet', () => {
    const preview = renderAscii(
      [
        { kind: 'resolved', tile: { prototypeIndex: 25, orientation: 'east' } },
        { kind: 'resolved', tile: { prototypeIndex: 26, orientation: 'east' } },
      ],
      2,
      1,
    );
    expect(preview).toBe('Z#');
  });
});
