import { sameCoord } from './grid';
import type { CellCoord, ConnectionKind, Sector } from './types';

export interface TrailSample {
  coord: CellCoord;
  sector: Sector;
}

/** A finished gesture inside one cell, ready to become a connection */
export interface BakedStroke {
  coord: CellCoord;
  kind: ConnectionKind;
}

const MIN_BAKE_LENGTH = 3;

// First/last sector pairs, order-insensitive. Corner pairs along one side of the
// cell stand in for a straight stroke that clipped the corners.
const BAKE_TABLE: ReadonlyArray<[Sector, Sector, ConnectionKind]> = [
  ['N', 'S', 'N_S'],
  ['NW', 'SW', 'N_S'],
  ['NE', 'SE', 'N_S'],
  ['E', 'W', 'E_W'],
  ['NW', 'NE', 'E_W'],
  ['SW', 'SE', 'E_W'],
  ['N', 'E', 'N_E'],
  ['N', 'W', 'N_W'],
  ['E', 'S', 'E_S'],
  ['S', 'W', 'S_W'],
];

/**
 * Connection a trail describes, judged by its first and last sector only.
 * Trails shorter than three samples are too ambiguous and give null.
 */
export function classifyTrail(trail: readonly TrailSample[]): ConnectionKind | null {
  if (trail.length < MIN_BAKE_LENGTH) return null;

  const first = trail[0].sector;
  const last = trail[trail.length - 1].sector;
  const match = BAKE_TABLE.find(([a, b]) => (a === first && b === last) || (a === last && b === first));
  return match ? match[2] : null;
}

/**
 * Sectors visited by the pointer since it last changed cell
 */
export class BrushTrail {
  private samples: TrailSample[] = [];
  private readonly capacity: number;

  constructor(capacity: number) {
    this.capacity = capacity;
  }

  get length(): number {
    return this.samples.length;
  }

  entries(): readonly TrailSample[] {
    return this.samples;
  }

  /**
   * Record the sector under the pointer. Returns the stroke baked from the
   * previous cell when the pointer has just crossed into a new one.
   */
  sample(coord: CellCoord, sector: Sector): BakedStroke | null {
    const last = this.samples[this.samples.length - 1];

    if (!last) {
      this.samples.push({ coord: { ...coord }, sector });
      return null;
    }

    if (sameCoord(last.coord, coord)) {
      if (last.sector !== sector && this.samples.length < this.capacity) {
        this.samples.push({ coord: { ...coord }, sector });
      }
      return null;
    }

    const baked = this.bake();
    this.samples = [{ coord: { ...coord }, sector }];
    return baked;
  }

  /** Pointer released: bake whatever is pending and start over */
  release(): BakedStroke | null {
    const baked = this.bake();
    this.clear();
    return baked;
  }

  clear(): void {
    this.samples = [];
  }

  private bake(): BakedStroke | null {
    const kind = classifyTrail(this.samples);
    if (!kind) return null;
    return { coord: { ...this.samples[0].coord }, kind };
  }
}
