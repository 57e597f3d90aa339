import { Vector3, clamp } from '../types';

/**
 * Cubic Bezier through three points. The inner control points sit halfway
 * between the middle point and each end, so the curve starts at `start`,
 * ends at `end` and bends around `middle`. Straight inputs give a straight line.
 */
export function bezier3D(start: Vector3, middle: Vector3, end: Vector3, t: number): Vector3 {
  const s = clamp(t, 0, 1);
  if (s === 0) return start.clone();
  if (s === 1) return end.clone();

  const c1 = Vector3.midpoint(start, middle);
  const c2 = Vector3.midpoint(middle, end);

  const u = 1 - s;
  const b0 = u * u * u;
  const b1 = 3 * u * u * s;
  const b2 = 3 * u * s * s;
  const b3 = s * s * s;

  return new Vector3(
    b0 * start.x + b1 * c1.x + b2 * c2.x + b3 * end.x,
    b0 * start.y + b1 * c1.y + b2 * c2.y + b3 * end.y,
    b0 * start.z + b1 * c1.z + b2 * c2.z + b3 * end.z,
  );
}

/** The four control points used by bezier3D, for debug drawing */
export function bezierControlPoints(
  start: Vector3,
  middle: Vector3,
  end: Vector3,
): [Vector3, Vector3, Vector3, Vector3] {
  return [start.clone(), Vector3.midpoint(start, middle), Vector3.midpoint(middle, end), end.clone()];
}
