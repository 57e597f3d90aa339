import { Vector3, clamp } from '../types';
import { ConnectionSet } from './connections';
import type { CellCoord, CellKind, RailModel } from './types';

export interface RailCell {
  readonly coord: CellCoord;
  kind: CellKind;
  connectionOptions: ConnectionSet;
  connectionsActive: ConnectionSet;
  model: RailModel;
  modelDirty: boolean;       // model must be resolved before the next render
}

export function sameCoord(a: CellCoord, b: CellCoord): boolean {
  return a.x === b.x && a.z === b.z;
}

export function formatCoord(c: CellCoord): string {
  return `(${c.x},${c.z})`;
}

/**
 * Fixed square grid of cells addressed by (x, z) or by flat index z * size + x.
 * Cell (x, z) spans [x, x+1) × [z, z+1) in cell units on the ground plane.
 */
export class RailGrid {
  readonly size: number;
  readonly cellSize: number;
  private readonly cells: RailCell[];

  constructor(size: number, cellSize = 1) {
    this.size = size;
    this.cellSize = cellSize;
    this.cells = [];
    for (let i = 0; i < size * size; i++) {
      this.cells.push(this.emptyCell(this.coordOf(i)));
    }
  }

  get cellCount(): number {
    return this.cells.length;
  }

  indexOf(coord: CellCoord): number {
    const c = this.clampCoord(coord);
    return c.z * this.size + c.x;
  }

  coordOf(index: number): CellCoord {
    const i = clamp(Math.trunc(index), 0, this.size * this.size - 1);
    return { x: i % this.size, z: Math.floor(i / this.size) };
  }

  isInside(coord: CellCoord): boolean {
    return coord.x >= 0 && coord.z >= 0 && coord.x < this.size && coord.z < this.size;
  }

  clampCoord(coord: CellCoord): CellCoord {
    return {
      x: clamp(Math.trunc(coord.x), 0, this.size - 1),
      z: clamp(Math.trunc(coord.z), 0, this.size - 1),
    };
  }

  /** Out-of-range coordinates are clamped onto the border */
  cellAt(coord: CellCoord): RailCell {
    return this.cells[this.indexOf(coord)];
  }

  cellOriginPosition(coord: CellCoord): Vector3 {
    const c = this.clampCoord(coord);
    return new Vector3(c.x * this.cellSize, 0, c.z * this.cellSize);
  }

  cellCenterPosition(coord: CellCoord): Vector3 {
    const half = this.cellSize / 2;
    return this.cellOriginPosition(coord).add(new Vector3(half, 0, half));
  }

  coordFromWorld(point: Vector3): CellCoord {
    return this.clampCoord({
      x: Math.floor(point.x / this.cellSize),
      z: Math.floor(point.z / this.cellSize),
    });
  }

  /** World extents of the ground plane covered by the grid */
  worldSize(): number {
    return this.size * this.cellSize;
  }

  resetCell(coord: CellCoord): void {
    const cell = this.cellAt(coord);
    cell.kind = 'empty';
    cell.connectionOptions = ConnectionSet.EMPTY;
    cell.connectionsActive = ConnectionSet.EMPTY;
    cell.model = { variant: 'none', rotation: 0 };
    cell.modelDirty = false;
  }

  reset(): void {
    for (const cell of this.cells) {
      this.resetCell(cell.coord);
    }
  }

  forEachCell(fn: (cell: RailCell) => void): void {
    this.cells.forEach(fn);
  }

  nonEmptyCells(): RailCell[] {
    return this.cells.filter((cell) => cell.kind !== 'empty');
  }

  private emptyCell(coord: CellCoord): RailCell {
    return {
      coord,
      kind: 'empty',
      connectionOptions: ConnectionSet.EMPTY,
      connectionsActive: ConnectionSet.EMPTY,
      model: { variant: 'none', rotation: 0 },
      modelDirty: false,
    };
  }
}
