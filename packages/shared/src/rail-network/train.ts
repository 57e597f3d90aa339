/**
 * Train state machine - per-frame progress along a cell and the hand-off to
 * the next cell
 */

import type { EventBus } from '../eventBus';
import type { Logger } from '../logger';
import { Vector3, rad2deg } from '../types';
import { bezier3D, bezierControlPoints } from './bezier';
import { connectionServes } from './connections';
import type { SimulationEvents } from './events';
import { formatCoord, sameCoord, type RailCell, type RailGrid } from './grid';
import {
  directionOfSector,
  exitSectorFor,
  hasConnectionForEntry,
  neighborCellFor,
  nextEntrySectorFor,
  sectorEdgePosition,
} from './sectors';
import type { CellCoord, ConnectionKind, EdgeSector, Sector, Train, TrainModel } from './types';

export interface TrainContext {
  grid: RailGrid;
  lookahead: number;
  events: EventBus<SimulationEvents>;
  log: Logger;
}

export interface TrainSpeeds {
  speedDrive: number;
  speedLoad: number;
  speedUnload: number;
}

export type BlockReason =
  | 'no-exit'       // toSector is not an edge sector
  | 'grid-edge'     // neighbor clamped back onto the current cell
  | 'not-rail'
  | 'no-entry';     // no connection serves the entry sector

export type HandOffPlan =
  | { kind: 'blocked'; reason: BlockReason }
  | {
      kind: 'advance';
      tile: CellCoord;
      entry: EdgeSector;
      connection: ConnectionKind;
      exit: Sector;
      next: CellCoord;
    };

export function createDisabledTrain(id: number, speeds: TrainSpeeds): Train {
  return {
    id,
    state: 'disabled',
    model: 'locomotive',
    tileCurrent: { x: 0, z: 0 },
    tilePrevious: { x: 0, z: 0 },
    tileNext: { x: 0, z: 0 },
    connectionUsed: null,
    fromSector: 'CENTER',
    toSector: 'CENTER',
    pathProgress: 0,
    speedDrive: speeds.speedDrive,
    speedLoad: speeds.speedLoad,
    speedUnload: speeds.speedUnload,
    controlPoints: [Vector3.zero(), Vector3.zero(), Vector3.zero(), Vector3.zero()],
    position: Vector3.zero(),
    rotationDegrees: 0,
  };
}

export interface TrainPlacement {
  tile: CellCoord;
  connection: ConnectionKind;
  from: EdgeSector;
  to: EdgeSector;
  model: TrainModel;
  progress: number;
  speedDrive: number;
}

/** Put a pool slot on the grid as a driving train */
export function placeTrain(train: Train, placement: TrainPlacement, ctx: TrainContext): void {
  const { grid } = ctx;
  train.state = 'driving';
  train.model = placement.model;
  train.tileCurrent = grid.clampCoord(placement.tile);
  train.tilePrevious = neighborCellFor(grid, train.tileCurrent, placement.from);
  train.tileNext = neighborCellFor(grid, train.tileCurrent, placement.to);
  train.connectionUsed = placement.connection;
  train.fromSector = placement.from;
  train.toSector = placement.to;
  train.pathProgress = placement.progress;
  train.speedDrive = placement.speedDrive;
  train.rotationDegrees = 0;
  updateTrainPose(train, ctx);
}

/**
 * Connection a train takes when entering `cell` through `entry`.
 * Active legs serving the entry win (on a crossing the one on the entry's
 * axis); with none active the first serving option is used, which is a
 * trailing move through a switch set the other way.
 */
export function resolveConnectionForEntry(cell: RailCell, entry: Sector): ConnectionKind | null {
  const direction = directionOfSector(entry);
  if (!direction) return null;

  const active = cell.connectionsActive.kinds().filter((kind) => connectionServes(kind, direction));
  if (active.length === 1) return active[0];
  if (active.length > 1) {
    const axis: ConnectionKind = direction === 'north' || direction === 'south' ? 'N_S' : 'E_W';
    return active.includes(axis) ? axis : active[0];
  }

  return cell.connectionOptions.kinds().find((kind) => connectionServes(kind, direction)) ?? null;
}

/**
 * What happens when the train reaches the end of its cell. Pure: depends only on
 * the train's tiles/sectors and the grid.
 */
export function planHandOff(train: Train, grid: RailGrid): HandOffPlan {
  const entry = nextEntrySectorFor(train.toSector);
  if (!entry) return { kind: 'blocked', reason: 'no-exit' };

  if (sameCoord(train.tileNext, train.tileCurrent)) {
    return { kind: 'blocked', reason: 'grid-edge' };
  }

  const cell = grid.cellAt(train.tileNext);
  if (cell.kind !== 'rail') return { kind: 'blocked', reason: 'not-rail' };
  if (!hasConnectionForEntry(cell, entry)) return { kind: 'blocked', reason: 'no-entry' };

  const connection = resolveConnectionForEntry(cell, entry);
  if (!connection) return { kind: 'blocked', reason: 'no-entry' };

  // Nevalidní spojení - ponecháme předchozí výstup
  const exit = exitSectorFor(connection, entry) ?? train.toSector;
  const tile = { ...cell.coord };

  return {
    kind: 'advance',
    tile,
    entry,
    connection,
    exit,
    next: neighborCellFor(grid, tile, exit),
  };
}

function block(train: Train, reason: BlockReason, ctx: TrainContext): void {
  train.state = 'blocked';
  train.pathProgress = 1;
  updateTrainPose(train, ctx);

  ctx.log.debug(`train ${train.id} blocked at ${formatCoord(train.tileCurrent)} (${reason})`);
  ctx.events.emit('trainBlocked', train);
}

/**
 * Attempt to move into tileNext. Returns true when the train changed cell.
 */
export function tryHandOff(train: Train, ctx: TrainContext): boolean {
  const plan = planHandOff(train, ctx.grid);

  if (plan.kind === 'blocked') {
    block(train, plan.reason, ctx);
    return false;
  }

  const left = train.tileCurrent;
  train.pathProgress = train.pathProgress % 1;
  train.tilePrevious = left;
  train.tileCurrent = plan.tile;
  train.tileNext = plan.next;
  train.fromSector = plan.entry;
  train.toSector = plan.exit;
  train.connectionUsed = plan.connection;

  ctx.log.debug(`train ${train.id} ${formatCoord(left)} -> ${formatCoord(plan.tile)} via ${plan.connection}`);
  ctx.events.emit('trainHandoff', train, left);
  return true;
}

/**
 * World position on the cell's curve and heading towards a point slightly
 * further along it
 */
export function updateTrainPose(train: Train, ctx: TrainContext): void {
  const { grid } = ctx;
  const start = sectorEdgePosition(grid, train.tileCurrent, train.fromSector);
  const middle = grid.cellCenterPosition(train.tileCurrent);
  const end = sectorEdgePosition(grid, train.tileCurrent, train.toSector);

  const position = bezier3D(start, middle, end, train.pathProgress);
  const ahead = bezier3D(start, middle, end, train.pathProgress + ctx.lookahead);

  train.controlPoints = bezierControlPoints(start, middle, end);
  train.position = position;

  if (position.groundDistanceTo(ahead) > 1e-9) {
    // 0° = sever (−z), po směru hodinových ručiček
    const degrees = rad2deg(Math.atan2(ahead.x - position.x, -(ahead.z - position.z)));
    train.rotationDegrees = (degrees + 360) % 360;
  }
}

/**
 * Advance one train by one frame. A blocked train only switches back to
 * driving once tileNext is rail again; it moves from the next frame on and
 * the entry is checked at that hand-off. Trains held at the grid edge stay put.
 */
export function updateTrain(train: Train, dt: number, ctx: TrainContext): void {
  if (train.state === 'blocked') {
    // Obnoví se, jakmile je další buňka opět kolejí
    if (sameCoord(train.tileNext, train.tileCurrent)) return;
    if (ctx.grid.cellAt(train.tileNext).kind !== 'rail') return;
    train.state = 'driving';
    ctx.log.debug(`train ${train.id} resumed at ${formatCoord(train.tileCurrent)}`);
    ctx.events.emit('trainResumed', train);
    return;
  }

  if (train.state !== 'driving') return;

  train.pathProgress += train.speedDrive * Math.max(0, dt);

  if (train.pathProgress >= 1 && !tryHandOff(train, ctx)) return;

  updateTrainPose(train, ctx);
}
