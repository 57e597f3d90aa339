import { EventBus } from '../src/eventBus';
import { Logger } from '../src/logger';
import { addConnection } from '../src/rail-network/connections';
import type { SimulationEvents } from '../src/rail-network/events';
import { RailGrid } from '../src/rail-network/grid';
import { createDisabledTrain, placeTrain, type TrainContext } from '../src/rail-network/train';
import type { ConnectionKind, EdgeSector, Train } from '../src/rail-network/types';

export function quietLogger(): Logger {
  const log = new Logger('test');
  log.setLogLevel('error');
  return log;
}

export function makeContext(size = 10): TrainContext {
  return {
    grid: new RailGrid(size),
    lookahead: 0.1,
    events: new EventBus<SimulationEvents>(),
    log: quietLogger(),
  };
}

export function layRail(grid: RailGrid, x: number, z: number, ...kinds: ConnectionKind[]): void {
  const cell = grid.cellAt({ x, z });
  kinds.forEach((kind) => addConnection(cell, kind));
}

export function makeTrain(
  ctx: TrainContext,
  x: number,
  z: number,
  connection: ConnectionKind,
  from: EdgeSector,
  to: EdgeSector,
  progress = 0,
  speedDrive = 1,
): Train {
  const train = createDisabledTrain(0, { speedDrive, speedLoad: 0.5, speedUnload: 0.5 });
  placeTrain(train, { tile: { x, z }, connection, from, to, model: 'locomotive', progress, speedDrive }, ctx);
  return train;
}
