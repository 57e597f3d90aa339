import { stepFrame } from '../src/rail-network/frame';
import type { DrawSink, HostInput, PointerState } from '../src/rail-network/host';
import type { Scenario } from '../src/rail-network/scenario';
import type { CellView, TrainView } from '../src/rail-network/Simulation';
import { Simulation } from '../src/rail-network/Simulation';
import type { InteractionMode } from '../src/rail-network/types';
import { Vector3 } from '../src/types';
import { quietLogger } from './helpers';

class FakeInput implements HostInput {
  currentMode: InteractionMode = 'build';
  state: PointerState = { hit: null, down: false, pressed: false, released: false };

  deltaTime(): number {
    return 0.1;
  }

  pointer(): PointerState {
    return this.state;
  }

  mode(): InteractionMode {
    return this.currentMode;
  }

  hold(x: number, z: number): void {
    this.state = { hit: new Vector3(x, 0, z), down: true, pressed: false, released: false };
  }

  press(x: number, z: number): void {
    this.state = { hit: new Vector3(x, 0, z), down: true, pressed: true, released: false };
  }

  release(): void {
    this.state = { hit: null, down: false, pressed: false, released: true };
  }
}

class RecordingSink implements DrawSink {
  calls: string[] = [];
  cells: CellView[] = [];
  trains: TrainView[] = [];

  beginFrame(): void {
    this.calls.push('begin');
    this.cells = [];
    this.trains = [];
  }

  drawCell(cell: CellView): void {
    this.calls.push('cell');
    this.cells.push(cell);
  }

  drawTrain(train: TrainView): void {
    this.calls.push('train');
    this.trains.push(train);
  }

  endFrame(): void {
    this.calls.push('end');
  }
}

// Train about to run off the end of a two-cell line heading east
const DEAD_END: Scenario = {
  name: 'dead-end',
  cells: [
    { x: 3, z: 5, kind: 'rail', connections: ['E_W'] },
    { x: 4, z: 5, kind: 'rail', connections: ['E_W'] },
  ],
  trains: [{ x: 4, z: 5, from: 'W', to: 'E', model: 'locomotive', speed: 1, progress: 0.95 }],
};

describe('stepFrame', () => {
  let sim: Simulation;
  let input: FakeInput;

  beforeEach(() => {
    sim = new Simulation({ gridSize: 12, trainCapacity: 2 }, quietLogger());
    sim.reset(DEAD_END);
    input = new FakeInput();
  });

  it('should let trains see an edit only on the next frame', () => {
    stepFrame(sim, input, null);
    expect(sim.trains[0].state).toBe('blocked');

    input.hold(5.1, 5.5);
    stepFrame(sim, input, null);
    input.hold(5.5, 5.5);
    stepFrame(sim, input, null);
    input.hold(5.9, 5.5);
    stepFrame(sim, input, null);

    input.release();
    const baked = stepFrame(sim, input, null);
    expect(baked.stroke).toEqual({ coord: { x: 5, z: 5 }, kind: 'E_W' });
    expect(baked.refreshedCells).toBe(1);
    expect(sim.trains[0].state).toBe('blocked');

    input.state = { hit: null, down: false, pressed: false, released: false };
    stepFrame(sim, input, null);
    expect(sim.trains[0].state).toBe('driving');
    expect(sim.trains[0].tileCurrent).toEqual({ x: 4, z: 5 });

    stepFrame(sim, input, null);
    expect(sim.trains[0].tileCurrent).toEqual({ x: 5, z: 5 });
  });

  it('should submit cells then trains between begin and end', () => {
    const sink = new RecordingSink();
    stepFrame(sim, input, sink);
    expect(sink.calls).toEqual(['begin', 'cell', 'cell', 'train', 'end']);
    expect(sink.cells[1].model).toEqual({ variant: 'straight', rotation: 90 });
    expect(sink.trains[0].tile).toEqual({ x: 4, z: 5 });
  });

  it('should bulldoze on press in bulldoze mode', () => {
    input.currentMode = 'bulldoze';
    input.press(3.5, 5.5);
    expect(stepFrame(sim, input, null).bulldoze).toBe('cleared');

    input.press(0.5, 0.5);
    expect(stepFrame(sim, input, null).bulldoze).toBe('ignored');
  });

  it('should only act on the press itself', () => {
    input.currentMode = 'bulldoze';
    input.hold(3.5, 5.5);
    expect(stepFrame(sim, input, null).bulldoze).toBeNull();
    expect(sim.cellAt({ x: 3, z: 5 }).kind).toBe('rail');
  });

  it('should toggle switches in switch mode', () => {
    sim.reset({
      name: 'junction',
      cells: [{ x: 2, z: 2, kind: 'rail', connections: ['N_S', 'N_E'] }],
      trains: [],
    });
    input.currentMode = 'switch';
    input.press(2.5, 2.5);
    expect(stepFrame(sim, input, null).switched).toBe(true);
    expect(sim.cellAt({ x: 2, z: 2 }).connectionsActive.kinds()).toEqual(['N_E']);
  });

  it('should drop an unfinished stroke when the mode changes', () => {
    input.hold(7.1, 7.5);
    stepFrame(sim, input, null);
    input.hold(7.5, 7.5);
    stepFrame(sim, input, null);
    expect(sim.brushLength).toBe(2);

    input.currentMode = 'pan';
    stepFrame(sim, input, null);
    expect(sim.brushLength).toBe(0);
    expect(sim.cellAt({ x: 7, z: 7 }).kind).toBe('empty');
  });

  it('should not lay a bakeable stroke left unfinished by a mode change', () => {
    const added = jest.fn();
    sim.events.on('connectionAdded', added);
    input.hold(7.5, 7.1);
    stepFrame(sim, input, null);
    input.hold(7.5, 7.5);
    stepFrame(sim, input, null);
    input.hold(7.5, 7.9);
    stepFrame(sim, input, null);
    expect(sim.brushLength).toBe(3);

    input.currentMode = 'pan';
    const result = stepFrame(sim, input, null);
    expect(result.stroke).toBeNull();
    expect(sim.brushLength).toBe(0);
    expect(sim.cellAt({ x: 7, z: 7 }).kind).toBe('empty');
    expect(added).not.toHaveBeenCalled();
  });
});
