import { Vector3 } from '@shared/types';
import { OrbitCamera, ZOOM_MAX, ZOOM_MIN } from '../src/camera';

describe('OrbitCamera', () => {
  const viewport = { width: 400, height: 400 };
  let camera: OrbitCamera;

  beforeEach(() => {
    camera = new OrbitCamera(new Vector3(5, 0, 5), 10);
  });

  it('should map the pivot to the viewport center', () => {
    const s = camera.worldToScreen(new Vector3(5, 0, 5), viewport);
    expect(s.x).toBe(200);
    expect(s.y).toBe(200);
  });

  it('should fit the zoom distance across the viewport', () => {
    const s = camera.worldToScreen(new Vector3(6, 0, 5), viewport);
    expect(s.x).toBeCloseTo(240);
    expect(s.y).toBeCloseTo(200);
  });

  it('should invert its projection at any angle', () => {
    camera.rotate(0.7);
    const world = new Vector3(7.25, 0, 3.5);
    const s = camera.worldToScreen(world, viewport);
    const back = camera.screenToWorld(s.x, s.y, viewport);
    expect(back.x).toBeCloseTo(7.25);
    expect(back.z).toBeCloseTo(3.5);
  });

  it('should clamp the zoom distance', () => {
    camera.zoom(1);
    expect(camera.distance).toBeCloseTo(9);
    camera.zoom(50);
    expect(camera.distance).toBe(ZOOM_MIN);
    camera.zoom(-100);
    expect(camera.distance).toBe(ZOOM_MAX);
  });

  it('should pan forward towards the top of the screen', () => {
    camera.pan(0, 1);
    expect(camera.pivot.x).toBeCloseTo(5);
    expect(camera.pivot.z).toBeCloseTo(4);
    camera.pan(1, 0);
    expect(camera.pivot.x).toBeCloseTo(6);
  });

  it('should keep the dragged ground under the pointer', () => {
    const world = camera.screenToWorld(300, 260, viewport);
    camera.panByPixels(50, -20, viewport);
    const s = camera.worldToScreen(world, viewport);
    expect(s.x).toBeCloseTo(350);
    expect(s.y).toBeCloseTo(240);
  });
});
