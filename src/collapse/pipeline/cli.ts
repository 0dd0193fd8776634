import 'dotenv/config';
import { generateMap } from './pipeline.js';
import { loadTuning, parseInteger } from './config.js';
import { writeFileSync, mkdirSync } from 'fs';
import { dirname, resolve } from 'path';

function parseArgs(argv: string[]): {
  seed: string;
  width: number;
  height: number;
  output: string;
  rulesPath?: string;
  palettePath?: string;
  stepsPerTick?: number;
  historySize?: number;
  preview: boolean;
} {
  const args = argv.slice(2);
  let seed = `map-${Date.now()}`;
  let width = 32;
  let height = 32;
  let output = 'output/map.json';
  let rulesPath: string | undefined;
  let palettePath: string | undefined;
  let stepsPerTick: number | undefined;
  let historySize: number | undefined;
  let preview = false;

  const value = (i: number): string => {
    const next = args[i];
    if (next === undefined) throw new Error(`Missing value for ${args[i - 1]}`);
    return next;
  };

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--seed':
        seed = value(++i);
        break;
      case '--width':
        width = parseInteger('--width', value(++i), 1);
        break;
      case '--height':
        height = parseInteger('--height', value(++i), 1);
        break;
      case '--output':
        output = value(++i);
        break;
      case '--rules':
        rulesPath = value(++i);
        break;
      case '--palette':
        palettePath = value(++i);
        break;
      case '--steps-per-tick':
        stepsPerTick = parseInteger('--steps-per-tick', value(++i), 1);
        break;
      case '--history':
        historySize = parseInteger('--history', value(++i), 0);
        break;
      case '--preview':
        preview = true;
        break;
      default:
        throw new Error(`Unknown argument "${args[i]}"`);
    }
  }

  return { seed, width, height, output, rulesPath, palettePath, stepsPerTick, historySize, preview };
}

function main() {
  const args = parseArgs(process.argv);
  const envTuning = loadTuning();
  const tuning = {
    stepsPerTick: args.stepsPerTick ?? envTuning.stepsPerTick,
    historySize: args.historySize ?? envTuning.historySize,
  };
  const startTime = Date.now();

  console.log('=== Tile Collapse ===');
  console.log(`Seed: "${args.seed}"`);
  console.log(`Grid: ${args.width}x${args.height} cells`);
  console.log(`Output: ${args.output}`);
  console.log();

  const map = generateMap({
    seed: args.seed,
    width: args.width,
    height: args.height,
    rulesPath: args.rulesPath,
    palettePath: args.palettePath,
    tuning,
    preview: args.preview,
  });

  const outputPath = resolve(args.output);
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, JSON.stringify(map, null, 2));

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);
  console.log();
  console.log('=== Collapse Complete ===');
  console.log(`Status: ${map.status}`);
  console.log(`Resolved: ${map.stats.resolved}/${map.cells.length} cells`);
  console.log(`Impossible: ${map.stats.impossible}`);
  console.log(`Time: ${elapsed}s`);
  console.log(`Output: ${outputPath}`);
}

try {
  main();
} catch (err) {
  console.error('Generation failed:', err instanceof Error ? err.message : String(err));
  process.exit(1);
}
