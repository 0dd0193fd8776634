import { undecidedShade, type CellState } from '../layer4-solver/cell-state.js';

/**
 * Text preview of a solve, north at the top. Resolved cells show their
 * prototype index as a letter (A = 0), undecided cells a shade digit 0-9.
 */
export function renderAscii(states: readonly CellState[], width: number, height: number): string {
  const lines: string[] = [];
  for (let y = height - 1; y >= 0; y--) {
    let line = '';
    for (let x = 0; x < width; x++) {
      line += glyph(states[y * width + x]);
    }
    lines.push(line);
  }
  return lines.join('\n');
}

function glyph(state: CellState): string {
  switch (state.kind) {
    case 'unconfigured':
      return '?';
    case 'impossible':
      return '!';
    case 'undecided':
      return String(undecidedShade(state.fraction, 10));
    case 'resolved':
      return state.tile.prototypeIndex < 26 ? String.fromCharCode(65 + state.tile.prototypeIndex) : '#';
  }
}
