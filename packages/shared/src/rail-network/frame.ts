import type { BakedStroke } from './brushTrail';
import type { DrawSink, HostInput } from './host';
import { toCellView, toTrainView, type Simulation } from './Simulation';
import type { BulldozeResult } from './types';

export interface FrameResult {
  dt: number;
  stroke: BakedStroke | null;
  bulldoze: BulldozeResult | null;
  switched: boolean;
  refreshedCells: number;
}

/**
 * Pointer → edits, by interaction mode. Build mode samples while the pointer is
 * held and bakes on release; bulldoze and switch act on press.
 */
function applyPointer(sim: Simulation, input: HostInput, result: FrameResult): void {
  const pointer = input.pointer();
  const mode = input.mode();

  if (mode === 'build') {
    if (pointer.down && pointer.hit) {
      result.stroke = sim.brushSample(pointer.hit);
    }
    if (pointer.released || (!pointer.down && sim.brushLength > 0)) {
      result.stroke = sim.brushRelease() ?? result.stroke;
    }
    return;
  }

  // Tah rozpracovaný před přepnutím režimu se zahodí
  if (sim.brushLength > 0) sim.brushCancel();

  if (!pointer.pressed || !pointer.hit) return;
  const coord = sim.grid.coordFromWorld(pointer.hit);

  if (mode === 'bulldoze') {
    result.bulldoze = sim.bulldoze(coord);
  } else if (mode === 'switch') {
    result.switched = sim.toggleSwitch(coord);
  }
}

/**
 * One frame in fixed order: trains, editing, rail models, draw submission.
 * Trains never see an edit made in the same frame.
 */
export function stepFrame(sim: Simulation, input: HostInput, sink: DrawSink | null): FrameResult {
  const dt = input.deltaTime();
  const result: FrameResult = { dt, stroke: null, bulldoze: null, switched: false, refreshedCells: 0 };

  sim.update(dt);
  applyPointer(sim, input, result);
  result.refreshedCells = sim.refreshVisuals();

  if (sink) {
    sink.beginFrame();
    sim.grid.nonEmptyCells().forEach((cell) => sink.drawCell(toCellView(cell)));
    sim.activeTrains().forEach((train) => sink.drawTrain(toTrainView(train)));
    sink.endFrame();
  }

  return result;
}
