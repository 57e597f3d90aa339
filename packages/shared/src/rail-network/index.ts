// Rail network model exports
export * from './types';
export * from './connections';
export * from './sectors';
export { RailGrid, sameCoord, formatCoord } from './grid';
export { resolveRailModel, refreshRailModels } from './railModel';
export { bezier3D, bezierControlPoints } from './bezier';
export { BrushTrail, classifyTrail } from './brushTrail';
export {
  createDisabledTrain,
  placeTrain,
  planHandOff,
  resolveConnectionForEntry,
  tryHandOff,
  updateTrain,
  updateTrainPose,
} from './train';
export { parseScenario, loadDefaultScenario, EMPTY_SCENARIO } from './scenario';
export { Simulation, toCellView, toTrainView } from './Simulation';
export { stepFrame } from './frame';

// Re-export key types for convenience
export type { RailCell } from './grid';
export type { TrailSample, BakedStroke } from './brushTrail';
export type { TrainContext, TrainPlacement, HandOffPlan, BlockReason } from './train';
export type { Scenario, ScenarioCell, ScenarioTrain } from './scenario';
export type { CellView, TrainView, SimulationSnapshot } from './Simulation';
export type { PointerState, HostInput, DrawSink } from './host';
export type { FrameResult } from './frame';
export type { SimulationEvents } from './events';
