import {
  PerformanceMonitor,
  Simulation,
  formatCoord,
  logger,
  sectorFromWorldPoint,
  stepFrame,
} from '@shared';
import { eventBus } from '@shared/eventBus';
import { Vector3 } from '@shared/types';
import {
  OrbitCamera,
  PAN_KEY_SPEED,
  ROTATE_DRAG_SPEED,
  ROTATE_KEY_SPEED,
} from './camera';
import { DebugOverlay } from './debug';
import { HUD } from './hud';
import { InputManager } from './input';
import { CanvasRenderer } from './renderer';

const log = logger.child('client');

// Canvas - fullscreen
const canvas = document.createElement('canvas');
document.body.appendChild(canvas);
const context = canvas.getContext('2d');
if (!context) {
  throw new Error('Canvas 2D context is not available');
}
const ctx: CanvasRenderingContext2D = context;

canvas.style.position = 'fixed';
canvas.style.top = '0';
canvas.style.left = '0';
canvas.style.width = '100%';
canvas.style.height = '100%';
canvas.style.zIndex = '0';

canvas.width = window.innerWidth;
canvas.height = window.innerHeight;

window.addEventListener('resize', () => {
  canvas.width = window.innerWidth;
  canvas.height = window.innerHeight;
});

document.body.style.margin = '0';
document.body.style.padding = '0';
document.body.style.overflow = 'hidden';

const viewport = () => ({ width: canvas.width, height: canvas.height });

// ---- Simulace ----
const sim = new Simulation({}, log.child('sim'));
sim.reset();

const half = sim.grid.worldSize() / 2;
const camera = new OrbitCamera(new Vector3(half, 0, half), 16);

const inputManager = new InputManager(canvas, (x, y) => {
  const hit = camera.screenToWorld(x, y, viewport());
  const size = sim.grid.worldSize();
  // Mimo mřížku paprsek nic nezasáhne
  return hit.x >= 0 && hit.z >= 0 && hit.x < size && hit.z < size ? hit : null;
});

const renderer = new CanvasRenderer(ctx, camera, sim.grid);
const debugOverlay = new DebugOverlay();
const perf = new PerformanceMonitor();

const hud = new HUD({
  initialMode: inputManager.mode(),
  onSelectMode: (mode) => inputManager.setMode(mode),
});
inputManager.onModeChange = (mode) => hud.setMode(mode);

sim.events.on('bulldozed', (_coord, result) => {
  if (result === 'vetoed') hud.flash('A train is on that cell');
});
sim.events.on('trainBlocked', (train) => {
  log.debug(`train ${train.id} waiting at ${formatCoord(train.tileCurrent)}`);
});

window.addEventListener('keydown', (e) => {
  if (e.code === 'KeyN' && !e.repeat) {
    sim.reset();
    hud.flash('New game');
  }
});

// Wheel zoom
canvas.addEventListener('wheel', (e) => {
  e.preventDefault();
  camera.zoom(e.deltaY < 0 ? 1 : -1);
}, { passive: false });

function updateCamera() {
  camera.rotate(inputManager.getAxis('KeyE', 'KeyQ') * ROTATE_KEY_SPEED);
  camera.pan(
    inputManager.getAxis('KeyD', 'KeyA') * PAN_KEY_SPEED,
    inputManager.getAxis('KeyW', 'KeyS') * PAN_KEY_SPEED,
  );

  const zoomIn = inputManager.isPressed('KeyR') || inputManager.isPressed('PageUp');
  const zoomOut = inputManager.isPressed('KeyF') || inputManager.isPressed('PageDown');
  if (zoomIn !== zoomOut) camera.zoom(zoomIn ? 1 : -1);

  const drag = inputManager.consumeDrag();
  if (drag.rotate) {
    camera.rotate(drag.dx * ROTATE_DRAG_SPEED);
  } else if (drag.dx !== 0 || drag.dy !== 0) {
    camera.panByPixels(drag.dx, drag.dy, viewport());
  }
}

let lastTime = 0;

// ---- GAME LOOP ----
function gameLoop(timestamp: number) {
  // Po přepnutí záložky nechceme obří krok
  const dt = Math.min((timestamp - lastTime) / 1000 || 0, 0.1);
  lastTime = timestamp;

  updateCamera();

  perf.startFrame();
  inputManager.beginFrame(dt);
  stepFrame(sim, inputManager, renderer);
  perf.endFrame();

  const trains = sim.activeTrains();
  eventBus.emit('update', dt);
  eventBus.emit('entityCount', trains.length);
  eventBus.emit('tickMs', perf.getTickMs());

  renderer.showModels = debugOverlay.showModels;
  renderer.showGrid = debugOverlay.showGrid;
  const hit = inputManager.pointer().hit;
  const under = hit ? sectorFromWorldPoint(sim.grid, hit) : null;
  debugOverlay.update({
    mode: inputManager.mode(),
    pointerCell: under ? formatCoord(under.coord) : null,
    pointerSector: under ? under.sector : null,
    brushLength: sim.brushLength,
    blocked: trains.filter((t) => t.state === 'blocked').length,
    zoom: camera.distance,
  });

  requestAnimationFrame(gameLoop);
}

log.info(`scenario "${sim.scenario}" loaded, ${sim.grid.size}x${sim.grid.size} grid`);
requestAnimationFrame(gameLoop);
