import type { BulldozeResult, CellCoord, ConnectionKind, Train, TrainState } from './types';

/** Events published on a Simulation's own bus */
export type SimulationEvents = {
  trainBlocked: [train: Train];
  trainResumed: [train: Train];
  trainHandoff: [train: Train, left: CellCoord];
  trainStateChanged: [train: Train, previous: TrainState];
  connectionAdded: [coord: CellCoord, kind: ConnectionKind];
  switchChanged: [coord: CellCoord, active: ConnectionKind];
  bulldozed: [coord: CellCoord, result: BulldozeResult];
  simulationReset: [scenario: string];
};
