import type { Orientation, Tile, TileKey } from '../types/index.js';
import { ORIENTATIONS, offsetCoordinates, rotateOrientation } from '../layer1-tiles/orientation.js';
import { parseTileKey, tileKey, type Prototype } from '../layer1-tiles/prototype.js';
import type { RuleGrid } from './rule-grid.js';

/** For each tile: which tiles may sit next to it, per direction. */
export type Constraints = Map<Orientation, Set<TileKey>>;
export type AdjacencyTable = Map<TileKey, Constraints>;

function getPrototype(prototypes: readonly Prototype[], tile: Tile): Prototype {
  const prototype = prototypes[tile.prototypeIndex];
  if (!prototype) {
    throw new Error(`Rule grid references unknown prototype ${tile.prototypeIndex}`);
  }
  return prototype;
}

function getOrCreate<K, V>(map: Map<K, V>, key: K, create: () => V): V {
  let value = map.get(key);
  if (value === undefined) {
    value = create();
    map.set(key, value);
  }
  return value;
}

/**
 * Record every pair of filled neighbours in the rule grid. Each filled tile
 * gets an entry, even when nothing is next to it.
 */
function collectNeighbours(ruleGrid: RuleGrid): AdjacencyTable {
  const table: AdjacencyTable = new Map();

  for (const [coordinates, tile] of ruleGrid.filledCells()) {
    const constraints = getOrCreate(table, tileKey(tile), () => new Map());

    for (const orientation of ORIENTATIONS) {
      const neighbour = ruleGrid.get(offsetCoordinates(orientation, coordinates));
      if (!neighbour) continue;
      getOrCreate(constraints, orientation, () => new Set()).add(tileKey(neighbour));
    }
  }

  return table;
}

/**
 * Copy every authored rule into all four rotations. Rotated tiles go
 * through their prototype's equivalence, so symmetric prototypes fold
 * several rotations onto the same entry.
 */
export function expandWithRotations(
  table: AdjacencyTable,
  prototypes: readonly Prototype[],
): AdjacencyTable {
  const expanded: AdjacencyTable = new Map();

  for (const [key, constraints] of table) {
    const tile = parseTileKey(key);
    const prototype = getPrototype(prototypes, tile);

    for (let rotation = 0; rotation < ORIENTATIONS.length; rotation++) {
      const rotatedTile = prototype.makeRotatedTile(tile.orientation, rotation);
      const rotatedConstraints = getOrCreate(expanded, tileKey(rotatedTile), () => new Map());

      for (const [orientation, allowed] of constraints) {
        const target = getOrCreate(
          rotatedConstraints,
          rotateOrientation(orientation, rotation),
          () => new Set<TileKey>(),
        );
        for (const allowedKey of allowed) {
          const allowedTile = parseTileKey(allowedKey);
          const rotatedAllowed = getPrototype(prototypes, allowedTile)
            .makeRotatedTile(allowedTile.orientation, rotation);
          target.add(tileKey(rotatedAllowed));
        }
      }
    }
  }

  return expanded;
}

/**
 * Isolated tiles may sit next to anything, so every constrained tile has to
 * accept them in every direction as well.
 */
function admitUnconstrained(table: AdjacencyTable): AdjacencyTable {
  const isolated = [...table.keys()].filter(key => isUnconstrained(table, key));
  if (isolated.length === 0) return table;

  for (const constraints of table.values()) {
    if (constraints.size === 0) continue;
    for (const orientation of ORIENTATIONS) {
      const allowed = getOrCreate(constraints, orientation, () => new Set<TileKey>());
      for (const key of isolated) allowed.add(key);
    }
  }
  return table;
}

/** Build a fresh adjacency table from the rule grid. */
export function extractAdjacency(ruleGrid: RuleGrid, prototypes: readonly Prototype[]): AdjacencyTable {
  return admitUnconstrained(expandWithRotations(collectNeighbours(ruleGrid), prototypes));
}

export function allowedNeighbours(
  table: AdjacencyTable,
  tile: Tile,
  orientation: Orientation,
): ReadonlySet<TileKey> {
  return table.get(tileKey(tile))?.get(orientation) ?? new Set();
}

/** A tile whose exemplar had no neighbours at all constrains nothing. */
export function isUnconstrained(table: AdjacencyTable, key: TileKey): boolean {
  const constraints = table.get(key);
  return constraints === undefined || constraints.size === 0;
}

/**
 * Union of what every candidate allows in `orientation`, or null when any
 * candidate is unconstrained (the neighbour may then be anything).
 */
export function unionAllowed(
  table: AdjacencyTable,
  candidates: Iterable<TileKey>,
  orientation: Orientation,
): Set<TileKey> | null {
  const union = new Set<TileKey>();
  for (const key of candidates) {
    if (isUnconstrained(table, key)) return null;
    const allowed = table.get(key)?.get(orientation);
    if (!allowed) continue;
    for (const neighbour of allowed) union.add(neighbour);
  }
  return union;
}
