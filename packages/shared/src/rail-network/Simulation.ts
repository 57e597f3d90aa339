import { resolveSimulationConfig, type SimulationConfig } from '../config';
import { ScenarioError } from '../errors';
import { EventBus } from '../eventBus';
import { logger as rootLogger, type Logger } from '../logger';
import type { Vector3 } from '../types';
import { BrushTrail, type BakedStroke } from './brushTrail';
import {
  addConnection,
  connectionBetween,
  cycleActiveConnection,
  setActiveConnection as setCellActiveConnection,
} from './connections';
import type { SimulationEvents } from './events';
import { RailGrid, formatCoord, sameCoord, type RailCell } from './grid';
import { refreshRailModels } from './railModel';
import { loadDefaultScenario, type Scenario } from './scenario';
import { directionOfSector, sectorFromWorldPoint } from './sectors';
import { createDisabledTrain, placeTrain, updateTrain, type TrainContext, type TrainPlacement } from './train';
import type { BulldozeResult, CellCoord, ConnectionKind, RailModel, Train, TrainState } from './types';

export interface CellView {
  coord: CellCoord;
  kind: RailCell['kind'];
  connections: ConnectionKind[];
  active: ConnectionKind[];
  model: RailModel;
}

export interface TrainView {
  id: number;
  state: TrainState;
  model: Train['model'];
  tile: CellCoord;
  position: { x: number; y: number; z: number };
  rotationDegrees: number;
  connection: ConnectionKind | null;
  progress: number;
}

export interface SimulationSnapshot {
  scenario: string;
  gridSize: number;
  cells: CellView[];
  trains: TrainView[];
}

export function toCellView(cell: RailCell): CellView {
  return {
    coord: { ...cell.coord },
    kind: cell.kind,
    connections: cell.connectionOptions.kinds(),
    active: cell.connectionsActive.kinds(),
    model: { ...cell.model },
  };
}

export function toTrainView(train: Train): TrainView {
  return {
    id: train.id,
    state: train.state,
    model: train.model,
    tile: { ...train.tileCurrent },
    position: { x: train.position.x, y: train.position.y, z: train.position.z },
    rotationDegrees: train.rotationDegrees,
    connection: train.connectionUsed,
    progress: train.pathProgress,
  };
}

function applyScenarioCells(grid: RailGrid, scenario: Scenario): void {
  scenario.cells.forEach((entry, i) => {
    const coord = { x: entry.x, z: entry.z };
    if (!grid.isInside(coord)) {
      throw new ScenarioError(`scenario.cells[${i}]`, `${formatCoord(coord)} is outside the grid`);
    }
    const cell = grid.cellAt(coord);
    if (entry.kind === 'reserved') {
      cell.kind = 'reserved';
      return;
    }
    entry.connections.forEach((kind) => addConnection(cell, kind));
    if (entry.active) setCellActiveConnection(cell, entry.active);
  });
}

function resolveTrainPlacements(
  grid: RailGrid,
  scenario: Scenario,
  capacity: number,
  defaultSpeed: number,
): TrainPlacement[] {
  if (scenario.trains.length > capacity) {
    throw new ScenarioError('scenario.trains', `at most ${capacity} trains fit the pool`);
  }

  return scenario.trains.map((entry, i) => {
    const tile = { x: entry.x, z: entry.z };
    const from = directionOfSector(entry.from);
    const to = directionOfSector(entry.to);
    const connection = from && to ? connectionBetween(from, to) : null;
    if (!grid.isInside(tile) || !connection || !grid.cellAt(tile).connectionOptions.has(connection)) {
      throw new ScenarioError(`scenario.trains[${i}]`, `no ${entry.from}-${entry.to} rail at ${formatCoord(tile)}`);
    }
    return {
      tile,
      connection,
      from: entry.from,
      to: entry.to,
      model: entry.model,
      progress: entry.progress,
      speedDrive: entry.speed ?? defaultSpeed,
    };
  });
}

/**
 * Owns one rail grid, its train pool and the editing session. Instances share
 * nothing, each has its own event bus.
 */
export class Simulation {
  readonly config: SimulationConfig;
  readonly grid: RailGrid;
  readonly trains: Train[];
  readonly events = new EventBus<SimulationEvents>();
  private readonly brush: BrushTrail;
  private readonly log: Logger;
  private scenarioName = 'empty';

  constructor(config: Partial<SimulationConfig> = {}, log: Logger = rootLogger.child('sim')) {
    this.config = resolveSimulationConfig(config);
    this.log = log;
    this.grid = new RailGrid(this.config.gridSize, this.config.cellSize);
    this.brush = new BrushTrail(this.grid.cellCount);
    this.trains = [];
    for (let id = 0; id < this.config.trainCapacity; id++) {
      this.trains.push(createDisabledTrain(id, this.config));
    }
  }

  private get trainContext(): TrainContext {
    return { grid: this.grid, lookahead: this.config.lookahead, events: this.events, log: this.log };
  }

  get scenario(): string {
    return this.scenarioName;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * New game: every cell emptied, every train disabled, then the scenario's
   * cells and trains applied. Throws ScenarioError if the scenario does not
   * fit; the running world is then left as it was.
   */
  reset(scenario: Scenario = loadDefaultScenario()): void {
    const staged = new RailGrid(this.config.gridSize, this.config.cellSize);
    applyScenarioCells(staged, scenario);
    const placements = resolveTrainPlacements(staged, scenario, this.trains.length, this.config.speedDrive);

    this.grid.reset();
    this.brush.clear();
    for (const train of this.trains) {
      Object.assign(train, createDisabledTrain(train.id, this.config));
    }

    applyScenarioCells(this.grid, scenario);
    const ctx = this.trainContext;
    placements.forEach((placement, i) => placeTrain(this.trains[i], placement, ctx));

    refreshRailModels(this.grid);
    this.scenarioName = scenario.name;
    this.log.info(`reset to "${scenario.name}": ${this.grid.nonEmptyCells().length} cells, ${placements.length} trains`);
    this.events.emit('simulationReset', scenario.name);
  }

  /**
   * Trains only. Reads the grid as left by the previous frame's edits.
   */
  update(dt: number): void {
    const ctx = this.trainContext;
    for (const train of this.trains) {
      if (train.state === 'disabled') continue;
      updateTrain(train, dt, ctx);
    }
  }

  /** Resolve rail models of cells edited since the last call */
  refreshVisuals(): number {
    return refreshRailModels(this.grid);
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  /** Pointer held over `point` in build mode */
  brushSample(point: Vector3): BakedStroke | null {
    const { coord, sector } = sectorFromWorldPoint(this.grid, point);
    return this.commitStroke(this.brush.sample(coord, sector));
  }

  /** Pointer released in build mode */
  brushRelease(): BakedStroke | null {
    return this.commitStroke(this.brush.release());
  }

  /** Drop the trail without baking it */
  brushCancel(): void {
    this.brush.clear();
  }

  get brushLength(): number {
    return this.brush.length;
  }

  private commitStroke(stroke: BakedStroke | null): BakedStroke | null {
    if (!stroke) return null;
    const cell = this.grid.cellAt(stroke.coord);
    if (!addConnection(cell, stroke.kind)) return null;

    this.log.debug(`laid ${stroke.kind} at ${formatCoord(stroke.coord)}`);
    this.events.emit('connectionAdded', { ...stroke.coord }, stroke.kind);
    return stroke;
  }

  /**
   * Clear a rail cell unless a driving train is on it
   */
  bulldoze(coord: CellCoord): BulldozeResult {
    const target = this.grid.clampCoord(coord);
    const cell = this.grid.cellAt(target);
    let result: BulldozeResult;

    if (cell.kind !== 'rail') {
      result = 'ignored';
    } else if (this.trains.some((t) => t.state === 'driving' && sameCoord(t.tileCurrent, target))) {
      result = 'vetoed';
    } else {
      this.grid.resetCell(target);
      result = 'cleared';
    }

    this.log.debug(`bulldoze ${formatCoord(target)}: ${result}`);
    this.events.emit('bulldozed', target, result);
    return result;
  }

  setActiveConnection(coord: CellCoord, kind: ConnectionKind): boolean {
    const cell = this.grid.cellAt(coord);
    if (!setCellActiveConnection(cell, kind)) return false;
    this.events.emit('switchChanged', { ...cell.coord }, kind);
    return true;
  }

  /** Flip a switch to its next leg */
  toggleSwitch(coord: CellCoord): boolean {
    const cell = this.grid.cellAt(coord);
    if (!cycleActiveConnection(cell)) return false;
    const active = cell.connectionsActive.first();
    if (active) this.events.emit('switchChanged', { ...cell.coord }, active);
    return true;
  }

  // ==========================================================================
  // Trains
  // ==========================================================================

  /**
   * External state trigger (hide, derail, load…). Derailed is terminal and
   * only a reset brings the slot back; disabling frees the slot.
   */
  setTrainState(id: number, state: TrainState): boolean {
    const train = this.trains.find((t) => t.id === id);
    if (!train || train.state === 'derailed' || train.state === state) return false;
    if (train.state === 'disabled') {
      this.log.warn(`train ${id} is not placed, ignoring ${state}`);
      return false;
    }

    const previous = train.state;
    train.state = state;
    this.events.emit('trainStateChanged', train, previous);
    return true;
  }

  activeTrains(): Train[] {
    return this.trains.filter((t) => t.state !== 'disabled');
  }

  cellAt(coord: CellCoord): RailCell {
    return this.grid.cellAt(coord);
  }

  snapshot(): SimulationSnapshot {
    return {
      scenario: this.scenarioName,
      gridSize: this.grid.size,
      cells: this.grid.nonEmptyCells().map(toCellView),
      trains: this.activeTrains().map(toTrainView),
    };
  }
}
