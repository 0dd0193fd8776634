export type {
  Orientation,
  Equivalence,
  Coordinates,
  Tile,
  TileKey,
} from './tile.js';

export type {
  SolveStatus,
  SerializedTile,
  MapCell,
  SerializedRuleGrid,
  CollapseStats,
  CollapsedMap,
} from './collapsed-map.js';
