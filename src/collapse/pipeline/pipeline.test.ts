import { describe, it, expect, vi, beforeEach, afterAll } from 'vitest';
import { Prototype } from '../layer1-tiles/prototype.js';
import { RuleGrid } from '../layer2-rules/rule-grid.js';
import { generateMap } from './pipeline.js';

describe('generateMap', () => {
  const log = vi.spyOn(console, 'log').mockImplementation(() => {});

  beforeEach(() => {
    log.mockClear();
  });

  afterAll(() => {
    log.mockRestore();
  });

  it('collapses the bundled sample rules', () => {
    const map = generateMap({ seed: 'test-seed-42', width: 12, height: 12, tuning: { historySize: 0 } });

    expect(map.status).toBe('stable');
    expect(map.cells).toHaveLength(144);
    expect(map.stats.undecided).toBe(0);
    expect(map.stats.resolved + map.stats.impossible).toBe(144);
    expect(map.cells.filter(cell => Array.isArray(cell))).toHaveLength(map.stats.resolved);
    expect(map.cells.filter(cell => cell === 'impossible')).toHaveLength(map.stats.impossible);
    expect(log).toHaveBeenCalledWith('[Wave] Output grid 12x12 (144 cells)');
  });

  it('is deterministic for a seed', () => {
    const a = generateMap({ seed: 'same-seed', width: 10, height: 10 });
    const b = generateMap({ seed: 'same-seed', width: 10, height: 10 });
    expect(a).toEqual(b);
    expect(a.stats.resolved + a.stats.impossible + a.stats.undecided).toBe(100);
  });

  it('fills a grid from an in-memory rule grid', () => {
    const stone = new Prototype(0, 'stone', 'stone.glb', 'quarter-turn');
    const rules = new RuleGrid(2, 1);
    rules.set({ x: 0, y: 0 }, stone.makeTile('north'));
    rules.set({ x: 1, y: 0 }, stone.makeTile('north'));

    const map = generateMap({
      seed: 'stone',
      width: 3,
      height: 2,
      ruleGrid: rules,
      prototypes: [stone],
      tuning: { stepsPerTick: 1 },
      preview: true,
    });

    expect(map.status).toBe('stable');
    expect(map.cells).toEqual(new Array(6).fill([0, 'north']));
    expect(map.stats.resolved).toBe(6);
    expect(map.stats.ticks).toBe(0);
    expect(log).toHaveBeenCalledWith('AAA\nAAA');
  });

  it('marks contradictions apart from resolved cells', () => {
    const a = new Prototype(0, 'a', 'a.glb', 'none');
    const b = new Prototype(1, 'b', 'b.glb', 'none');
    const rules = new RuleGrid(2, 1);
    rules.set({ x: 0, y: 0 }, a.makeTile('north'));
    rules.set({ x: 1, y: 0 }, b.makeTile('north'));

    let contradicted = 0;
    for (let seed = 0; seed < 20; seed++) {
      const map = generateMap({
        seed: `pair-${seed}`,
        width: 2,
        height: 1,
        ruleGrid: rules,
        prototypes: [a, b],
        tuning: { historySize: 0 },
      });
      expect(map.status).toBe('stable');
      expect(map.cells.filter(cell => cell === 'impossible')).toHaveLength(map.stats.impossible);
      expect(map.cells).not.toContain(null);
      if (map.stats.impossible > 0) contradicted++;
    }
    expect(contradicted).toBeGreaterThan(0);
  });

  it('reports an empty rule grid as unconfigured', () => {
    const map = generateMap({
      seed: 'empty',
      width: 2,
      height: 2,
      ruleGrid: new RuleGrid(3, 3),
      prototypes: [],
    });

    expect(map.status).toBe('unconfigured');
    expect(map.cells).toEqual([null, null, null, null]);
    expect(map.stats.impossible).toBe(0);
    expect(log).toHaveBeenCalledWith('[Solve] Rule grid is empty, nothing to collapse');
  });
});
