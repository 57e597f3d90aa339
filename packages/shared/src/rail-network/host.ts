import type { Vector3 } from '../types';
import type { CellView, TrainView } from './Simulation';
import type { InteractionMode } from './types';

/**
 * Pointer projected onto the ground plane by the host (ray/plane hit in 3D,
 * inverse view transform in 2D). `hit` is null when the pointer misses the grid.
 */
export interface PointerState {
  hit: Vector3 | null;
  down: boolean;       // held this frame
  pressed: boolean;    // went down this frame
  released: boolean;   // went up this frame
}

/** Services the frame driver reads from the host */
export interface HostInput {
  deltaTime(): number;
  pointer(): PointerState;
  mode(): InteractionMode;
}

/** Draw submission, called once per frame after the simulation step */
export interface DrawSink {
  beginFrame(): void;
  drawCell(cell: CellView): void;
  drawTrain(train: TrainView): void;
  endFrame(): void;
}
