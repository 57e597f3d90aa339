import {
  PerformanceMonitor,
  Simulation,
  eventBus,
  stepFrame,
  type HostInput,
  type InteractionMode,
  type Logger,
  type PointerState,
  Vector3,
} from '@shared';

export interface GroundPoint {
  x: number;
  z: number;
}

interface QueuedFrame {
  mode: InteractionMode;
  pointer: PointerState;
}

const IDLE_POINTER: PointerState = { hit: null, down: false, pressed: false, released: false };

/**
 * Input fed by API requests instead of a mouse: every queued frame is consumed
 * by exactly one tick, an empty queue reads as an idle pointer in pan mode.
 */
export class ScriptedInput implements HostInput {
  private queue: QueuedFrame[] = [];
  private current: QueuedFrame = { mode: 'pan', pointer: IDLE_POINTER };

  constructor(private readonly step: number) {}

  get pending(): number {
    return this.queue.length;
  }

  /** Called once per tick before the frame runs */
  advance(): void {
    this.current = this.queue.shift() ?? { mode: 'pan', pointer: IDLE_POINTER };
  }

  deltaTime(): number {
    return this.step;
  }

  pointer(): PointerState {
    return this.current.pointer;
  }

  mode(): InteractionMode {
    return this.current.mode;
  }

  /** One held sample per point, then a release frame */
  stroke(points: GroundPoint[]): number {
    points.forEach((p, i) => {
      this.queue.push({
        mode: 'build',
        pointer: { hit: new Vector3(p.x, 0, p.z), down: true, pressed: i === 0, released: false },
      });
    });
    this.queue.push({ mode: 'build', pointer: { hit: null, down: false, pressed: false, released: true } });
    return points.length + 1;
  }

  click(mode: InteractionMode, point: GroundPoint): number {
    this.queue.push({
      mode,
      pointer: { hit: new Vector3(point.x, 0, point.z), down: true, pressed: true, released: false },
    });
    return 1;
  }

  clear(): void {
    this.queue = [];
    this.current = { mode: 'pan', pointer: IDLE_POINTER };
  }
}

/**
 * Headless frame loop running one Simulation at a fixed tick rate
 */
export class SimulationHost {
  readonly sim: Simulation;
  readonly input: ScriptedInput;
  private readonly perf: PerformanceMonitor;
  private readonly log: Logger;
  private readonly tickRate: number;
  private timer: NodeJS.Timeout | number | null = null;
  private frames = 0;

  constructor(sim: Simulation, tickRate: number, log: Logger, perf = new PerformanceMonitor()) {
    this.sim = sim;
    this.tickRate = tickRate;
    this.log = log;
    this.perf = perf;
    this.input = new ScriptedInput(1 / tickRate);
  }

  get frameCount(): number {
    return this.frames;
  }

  get running(): boolean {
    return this.timer !== null;
  }

  tick(): void {
    this.perf.startFrame();
    this.input.advance();
    const result = stepFrame(this.sim, this.input, null);
    this.perf.endFrame();
    this.frames++;

    if (result.stroke) {
      this.log.info(`laid ${result.stroke.kind} at (${result.stroke.coord.x},${result.stroke.coord.z})`);
    }
    if (result.bulldoze && result.bulldoze !== 'ignored') {
      this.log.info(`bulldoze ${result.bulldoze}`);
    }

    eventBus.emit('update', result.dt);
    eventBus.emit('tickMs', this.perf.getTickMs());
    eventBus.emit('entityCount', this.sim.activeTrains().length);
  }

  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => this.tick(), 1000 / this.tickRate);
    this.log.info(`simulation running at ${this.tickRate} ticks/s`);
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info(`simulation stopped after ${this.frames} frames`);
  }

  stats(): { frames: number; fps: number; tickMs: number; pendingFrames: number } {
    return {
      frames: this.frames,
      fps: this.perf.getFps(),
      tickMs: this.perf.getTickMs(),
      pendingFrames: this.input.pending,
    };
  }
}
