import {
  CONNECTION_ENDPOINTS,
  bezier3D,
  sectorEdgePosition,
  sectorOfDirection,
  type CellView,
  type ConnectionKind,
  type DrawSink,
  type RailGrid,
  type TrainModel,
  type TrainView,
} from '@shared';
import { Vector3 } from '@shared/types';
import type { OrbitCamera, Viewport } from './camera';

const CURVE_SEGMENTS = 12;

const TRAIN_COLORS: Record<TrainModel, string> = {
  locomotive: '#d94a3a',
  railcar: '#3a7bd9',
  freight: '#8a6a3a',
};

/**
 * Top-down canvas renderer fed by the frame driver
 */
export class CanvasRenderer implements DrawSink {
  public showGrid = true;
  public showModels = false;

  constructor(
    private readonly ctx: CanvasRenderingContext2D,
    private readonly camera: OrbitCamera,
    private readonly grid: RailGrid,
  ) {}

  private get viewport(): Viewport {
    return { width: this.ctx.canvas.width, height: this.ctx.canvas.height };
  }

  private get scale(): number {
    return this.camera.pixelsPerUnit(this.viewport);
  }

  private moveTo(p: Vector3): void {
    const s = this.camera.worldToScreen(p, this.viewport);
    this.ctx.moveTo(s.x, s.y);
  }

  private lineTo(p: Vector3): void {
    const s = this.camera.worldToScreen(p, this.viewport);
    this.ctx.lineTo(s.x, s.y);
  }

  beginFrame(): void {
    const { ctx } = this;
    ctx.fillStyle = '#2f4a2a';
    ctx.fillRect(0, 0, ctx.canvas.width, ctx.canvas.height);

    const size = this.grid.worldSize();
    ctx.fillStyle = '#3d5c36';
    ctx.beginPath();
    this.moveTo(new Vector3(0, 0, 0));
    this.lineTo(new Vector3(size, 0, 0));
    this.lineTo(new Vector3(size, 0, size));
    this.lineTo(new Vector3(0, 0, size));
    ctx.closePath();
    ctx.fill();

    if (this.showGrid) this.drawGridLines(size);
  }

  private drawGridLines(size: number): void {
    const { ctx } = this;
    ctx.strokeStyle = 'rgba(255,255,255,0.08)';
    ctx.lineWidth = 1;
    ctx.beginPath();
    for (let i = 0; i <= this.grid.size; i++) {
      const d = i * this.grid.cellSize;
      this.moveTo(new Vector3(d, 0, 0));
      this.lineTo(new Vector3(d, 0, size));
      this.moveTo(new Vector3(0, 0, d));
      this.lineTo(new Vector3(size, 0, d));
    }
    ctx.stroke();
  }

  drawCell(cell: CellView): void {
    const { ctx } = this;

    if (cell.kind === 'reserved') {
      const origin = this.grid.cellOriginPosition(cell.coord);
      const c = this.grid.cellSize;
      ctx.fillStyle = 'rgba(120,120,120,0.6)';
      ctx.beginPath();
      this.moveTo(origin);
      this.lineTo(new Vector3(origin.x + c, 0, origin.z));
      this.lineTo(new Vector3(origin.x + c, 0, origin.z + c));
      this.lineTo(new Vector3(origin.x, 0, origin.z + c));
      ctx.closePath();
      ctx.fill();
      return;
    }

    // Neaktivní větve výhybky nejdřív, aktivní přes ně
    cell.connections
      .filter((kind) => !cell.active.includes(kind))
      .forEach((kind) => this.drawConnection(cell, kind, 'rgba(200,200,200,0.35)'));
    cell.active.forEach((kind) => {
      const color = cell.model.variant === 'unresolved' ? '#e0a030' : '#e8e8e8';
      this.drawConnection(cell, kind, color);
    });

    if (this.showModels) {
      const center = this.camera.worldToScreen(this.grid.cellCenterPosition(cell.coord), this.viewport);
      ctx.fillStyle = '#fff';
      ctx.font = '10px monospace';
      ctx.textAlign = 'center';
      ctx.fillText(`${cell.model.variant} ${cell.model.rotation}`, center.x, center.y);
    }
  }

  private drawConnection(cell: CellView, kind: ConnectionKind, color: string): void {
    const [a, b] = CONNECTION_ENDPOINTS[kind];
    const start = sectorEdgePosition(this.grid, cell.coord, sectorOfDirection(a));
    const middle = this.grid.cellCenterPosition(cell.coord);
    const end = sectorEdgePosition(this.grid, cell.coord, sectorOfDirection(b));

    const { ctx } = this;
    ctx.strokeStyle = color;
    ctx.lineWidth = Math.max(1, this.scale * 0.12);
    ctx.lineCap = 'round';
    ctx.beginPath();
    this.moveTo(start);
    for (let i = 1; i <= CURVE_SEGMENTS; i++) {
      this.lineTo(bezier3D(start, middle, end, i / CURVE_SEGMENTS));
    }
    ctx.stroke();
  }

  drawTrain(train: TrainView): void {
    const { ctx } = this;
    const p = this.camera.worldToScreen(new Vector3(train.position.x, 0, train.position.z), this.viewport);
    const length = 0.6 * this.scale;
    const width = 0.3 * this.scale;

    ctx.save();
    ctx.translate(p.x, p.y);
    // rotationDegrees: 0 = sever, po směru hodinových ručiček; kamera rotuje opačně
    ctx.rotate((train.rotationDegrees * Math.PI) / 180 - this.camera.angle);
    ctx.fillStyle = TRAIN_COLORS[train.model];
    ctx.globalAlpha = train.state === 'hidden' ? 0.3 : 1;
    ctx.fillRect(-width / 2, -length / 2, width, length);
    if (train.state === 'blocked' || train.state === 'derailed') {
      ctx.strokeStyle = train.state === 'derailed' ? '#ff2020' : '#ffd000';
      ctx.lineWidth = 2;
      ctx.strokeRect(-width / 2, -length / 2, width, length);
    }
    ctx.restore();
  }

  endFrame(): void {
    this.ctx.globalAlpha = 1;
  }
}
