import { eventBus } from '@shared/eventBus';
import type { InteractionMode, Sector } from '@shared';

export interface DebugInfo {
  mode: InteractionMode;
  pointerCell: string | null;
  pointerSector: Sector | null;
  brushLength: number;
  blocked: number;
  zoom: number;
}

export class DebugOverlay {
  private element: HTMLDivElement;
  private fps = 0;
  private entityCount = 0;
  private tickMs = 0;
  public showModels = false;
  public showGrid = true;

  constructor() {
    this.element = document.createElement('div');
    this.element.style.position = 'fixed';
    this.element.style.top = '10px';
    this.element.style.left = '10px';
    this.element.style.color = 'white';
    this.element.style.backgroundColor = 'rgba(0, 0, 0, 0.5)';
    this.element.style.padding = '5px';
    this.element.style.display = 'none';
    this.element.style.zIndex = '100';
    this.element.style.fontFamily = 'monospace';
    this.element.style.fontSize = '12px';
    document.body.appendChild(this.element);

    window.addEventListener('keydown', (e) => {
      if (e.key === ';') {
        this.toggle();
        this.showModels = !this.showModels;
      } else if (e.key === 'g') {
        this.showGrid = !this.showGrid;
      }
    });

    eventBus.on('update', (dt) => {
      if (dt > 0) this.fps = 1 / dt;
    });

    eventBus.on('entityCount', (count) => {
      this.entityCount = count;
    });

    eventBus.on('tickMs', (ms) => {
      this.tickMs = ms;
    });
  }

  public update(info: DebugInfo): void {
    if (this.element.style.display === 'none') return;

    this.element.innerHTML = `
        FPS: ${this.fps.toFixed(1)}<br>
        Step: ${this.tickMs.toFixed(2)} ms<br>
        Trains: ${this.entityCount} (${info.blocked} blocked)<br>
        <br>
        Mode: ${info.mode}<br>
        Cell: ${info.pointerCell ?? '-'}<br>
        Sector: ${info.pointerSector ?? '-'}<br>
        Brush: ${info.brushLength} samples<br>
        Zoom: ${info.zoom.toFixed(1)}<br>
        <br>
        <em>Keys: 1-4 mode, WASD pan, Q/E rotate, R/F zoom, N new game</em>
    `;
  }

  private toggle(): void {
    this.element.style.display = this.element.style.display === 'none' ? 'block' : 'none';
  }
}
