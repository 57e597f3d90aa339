import { Vector3, clamp } from '../types';
import { CONNECTION_ENDPOINTS, connectionServes } from './connections';
import type { RailCell, RailGrid } from './grid';
import type { CellCoord, ConnectionKind, Direction, EdgeSector, Sector } from './types';

export const SECTORS: readonly Sector[] = ['NW', 'N', 'NE', 'W', 'CENTER', 'E', 'SW', 'S', 'SE'];

const THIRD = 1 / 3;
const SECTOR_ROWS: readonly (readonly [Sector, Sector, Sector])[] = [
  ['NW', 'N', 'NE'],
  ['W', 'CENTER', 'E'],
  ['SW', 'S', 'SE'],
];

/** Column/row of each sector relative to the middle one, in thirds of a cell */
const SECTOR_OFFSETS: Record<Sector, readonly [number, number]> = {
  NW: [-1, -1], N: [0, -1], NE: [1, -1],
  W: [-1, 0], CENTER: [0, 0], E: [1, 0],
  SW: [-1, 1], S: [0, 1], SE: [1, 1],
};

const EDGE_DIRECTIONS: Record<EdgeSector, Direction> = {
  N: 'north',
  E: 'east',
  S: 'south',
  W: 'west',
};

const DIRECTION_SECTORS: Record<Direction, EdgeSector> = {
  north: 'N',
  east: 'E',
  south: 'S',
  west: 'W',
};

export const OPPOSITE_DIRECTION: Record<Direction, Direction> = {
  north: 'south',
  east: 'west',
  south: 'north',
  west: 'east',
};

const DIRECTION_STEPS: Record<Direction, CellCoord> = {
  north: { x: 0, z: -1 },
  east: { x: 1, z: 0 },
  south: { x: 0, z: 1 },
  west: { x: -1, z: 0 },
};

export function isEdgeSector(sector: Sector): sector is EdgeSector {
  return sector === 'N' || sector === 'E' || sector === 'S' || sector === 'W';
}

export function isSector(value: unknown): value is Sector {
  return typeof value === 'string' && SECTORS.some((sector) => sector === value);
}

export function directionOfSector(sector: Sector): Direction | null {
  return isEdgeSector(sector) ? EDGE_DIRECTIONS[sector] : null;
}

export function sectorOfDirection(direction: Direction): EdgeSector {
  return DIRECTION_SECTORS[direction];
}

function bandOf(frac: number): 0 | 1 | 2 {
  if (frac < THIRD) return 0;
  if (frac < 2 * THIRD) return 1;
  return 2;
}

/**
 * Classify a cell-local point. Bands are half-open: [0, 1/3), [1/3, 2/3), [2/3, 1).
 * Values outside [0, 1) are clamped into the nearest band.
 */
export function sectorFromLocalPoint(fracX: number, fracZ: number): Sector {
  const x = Number.isFinite(fracX) ? clamp(fracX, 0, 1) : 0;
  const z = Number.isFinite(fracZ) ? clamp(fracZ, 0, 1) : 0;
  return SECTOR_ROWS[bandOf(z)][bandOf(x)];
}

export function sectorFromWorldPoint(grid: RailGrid, point: Vector3): { coord: CellCoord; sector: Sector } {
  const coord = grid.coordFromWorld(point);
  const origin = grid.cellOriginPosition(coord);
  const fracX = (point.x - origin.x) / grid.cellSize;
  const fracZ = (point.z - origin.z) / grid.cellSize;
  return { coord, sector: sectorFromLocalPoint(fracX, fracZ) };
}

/** Sector centroid relative to the cell center, in cell units */
export function sectorCenterOffset(sector: Sector): Vector3 {
  const offset = SECTOR_OFFSETS[sector];
  if (!offset) return Vector3.zero();
  return new Vector3(offset[0] * THIRD, 0, offset[1] * THIRD);
}

/**
 * Edge sectors pushed half a sector further out, onto the midpoint of the
 * cell edge they name. Corners and CENTER have no edge position.
 */
export function sectorEdgeOffset(sector: Sector): Vector3 {
  if (!isEdgeSector(sector)) return Vector3.zero();
  const [dx, dz] = SECTOR_OFFSETS[sector];
  return new Vector3(dx * 0.5, 0, dz * 0.5);
}

export function sectorCenterPosition(grid: RailGrid, cell: CellCoord, sector: Sector): Vector3 {
  return grid.cellCenterPosition(cell).add(sectorCenterOffset(sector).multiply(grid.cellSize));
}

export function sectorEdgePosition(grid: RailGrid, cell: CellCoord, sector: Sector): Vector3 {
  return grid.cellCenterPosition(cell).add(sectorEdgeOffset(sector).multiply(grid.cellSize));
}

/**
 * Given the sector a train entered through, the sector it leaves through.
 * Null when the entry is not an endpoint of the connection.
 */
export function exitSectorFor(kind: ConnectionKind, entry: Sector): EdgeSector | null {
  const direction = directionOfSector(entry);
  if (!direction) return null;
  const [a, b] = CONNECTION_ENDPOINTS[kind];
  if (direction === a) return DIRECTION_SECTORS[b];
  if (direction === b) return DIRECTION_SECTORS[a];
  return null;
}

/** Leaving through N means entering the next cell through S, and so on */
export function nextEntrySectorFor(exit: Sector): EdgeSector | null {
  const direction = directionOfSector(exit);
  return direction ? DIRECTION_SECTORS[OPPOSITE_DIRECTION[direction]] : null;
}

/** Neighbor across the exit edge, clamped to the grid; non-edge sectors stay put */
export function neighborCellFor(grid: RailGrid, cell: CellCoord, exit: Sector): CellCoord {
  const direction = directionOfSector(exit);
  if (!direction) return grid.clampCoord(cell);
  const step = DIRECTION_STEPS[direction];
  return grid.clampCoord({ x: cell.x + step.x, z: cell.z + step.z });
}

export function hasConnectionForEntry(cell: RailCell, entry: Sector): boolean {
  const direction = directionOfSector(entry);
  if (!direction) return false;
  return cell.connectionOptions.kinds().some((kind) => connectionServes(kind, direction));
}
