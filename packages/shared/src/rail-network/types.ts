// Core types for the grid rail network
// Cells carry undirected connections, trains move one cell at a time

import type { Vector3 } from '../types';

export type Direction = 'north' | 'east' | 'south' | 'west';

/** Undirected pairing of two cell edges joined by a rail segment */
export type ConnectionKind = 'N_S' | 'N_E' | 'N_W' | 'E_S' | 'E_W' | 'S_W';

/**
 * 3×3 subdivision of a cell. North is −z, east is +x.
 */
export type Sector =
  | 'NW' | 'N' | 'NE'
  | 'W'  | 'CENTER' | 'E'
  | 'SW' | 'S' | 'SE';

export type EdgeSector = 'N' | 'E' | 'S' | 'W';

export type CellKind = 'empty' | 'rail' | 'reserved';

export type RailVariant =
  | 'none'
  | 'straight'
  | 'curve'
  | 'crossing'
  | 'merge'
  | 'merge_mirrored'
  | 'unresolved';

export type TrainState =
  | 'disabled'    // free pool slot
  | 'hidden'      // drawn differently, not advanced
  | 'blocked'     // next cell cannot be entered
  | 'driving'
  | 'loading'
  | 'unloading'
  | 'derailed';   // terminal

export type TrainModel = 'locomotive' | 'railcar' | 'freight';

export interface CellCoord {
  x: number;
  z: number;
}

export interface RailModel {
  variant: RailVariant;
  rotation: number;         // degrees clockwise seen from above, north = 0
}

export interface Train {
  id: number;
  state: TrainState;
  model: TrainModel;
  tileCurrent: CellCoord;
  tilePrevious: CellCoord;
  tileNext: CellCoord;
  connectionUsed: ConnectionKind | null;
  fromSector: Sector;
  toSector: Sector;
  pathProgress: number;     // 0..1 within tileCurrent
  speedDrive: number;       // cells per second
  speedLoad: number;
  speedUnload: number;
  controlPoints: [Vector3, Vector3, Vector3, Vector3];
  position: Vector3;
  rotationDegrees: number;
}

export type InteractionMode = 'pan' | 'build' | 'bulldoze' | 'switch';

export type BulldozeResult = 'cleared' | 'vetoed' | 'ignored';
