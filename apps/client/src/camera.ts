import { Vector2, Vector3, clamp } from '@shared/types';

export const ZOOM_MIN = 4;
export const ZOOM_MAX = 30;
const ZOOM_SPEED = 0.1;       // podíl vzdálenosti na jeden krok
export const ROTATE_KEY_SPEED = 0.02;   // rad za snímek (Q/E)
export const ROTATE_DRAG_SPEED = 0.005; // rad na pixel (Alt + pravé tlačítko)
export const PAN_KEY_SPEED = 0.1;       // world units za snímek (WASD)

export interface Viewport {
  width: number;
  height: number;
}

/**
 * Top-down camera circling a pivot on the ground plane. `distance` sets how
 * many world units fit across the shorter side of the viewport and `angle`
 * rotates the view around the pivot.
 */
export class OrbitCamera {
  pivot: Vector3;
  distance: number;
  angle = 0;

  constructor(pivot: Vector3, distance = 12) {
    this.pivot = pivot.clone();
    this.distance = clamp(distance, ZOOM_MIN, ZOOM_MAX);
  }

  /** Positive steps zoom in */
  zoom(steps: number): void {
    this.distance = clamp(this.distance * (1 - ZOOM_SPEED * steps), ZOOM_MIN, ZOOM_MAX);
  }

  rotate(radians: number): void {
    this.angle = (this.angle + radians) % (Math.PI * 2);
  }

  /** Move the pivot in view space: +right is screen right, +forward is screen up */
  pan(right: number, forward: number): void {
    const step = new Vector2(right, -forward).rotate(this.angle);
    this.pivot = this.pivot.add(new Vector3(step.x, 0, step.y));
  }

  /** Drag by screen pixels, keeping the ground under the pointer */
  panByPixels(dx: number, dy: number, viewport: Viewport): void {
    const scale = this.pixelsPerUnit(viewport);
    this.pan(-dx / scale, dy / scale);
  }

  pixelsPerUnit(viewport: Viewport): number {
    return Math.min(viewport.width, viewport.height) / this.distance;
  }

  worldToScreen(point: Vector3, viewport: Viewport): Vector2 {
    const scale = this.pixelsPerUnit(viewport);
    const rel = new Vector2(point.x - this.pivot.x, point.z - this.pivot.z).rotate(-this.angle);
    return new Vector2(viewport.width / 2 + rel.x * scale, viewport.height / 2 + rel.y * scale);
  }

  screenToWorld(x: number, y: number, viewport: Viewport): Vector3 {
    const scale = this.pixelsPerUnit(viewport);
    const rel = new Vector2((x - viewport.width / 2) / scale, (y - viewport.height / 2) / scale).rotate(this.angle);
    return new Vector3(this.pivot.x + rel.x, 0, this.pivot.z + rel.y);
  }
}
