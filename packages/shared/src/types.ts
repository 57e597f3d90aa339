export const clamp = (x: number, a: number, b: number) => Math.min(b, Math.max(a, x));
export const lerp = (a: number, b: number, t: number) => a + (b - a) * t;
export const rad2deg = (r: number) => r * 180 / Math.PI;

export class Vector2 {
  x: number;
  y: number;

  constructor(x = 0, y = 0) {
    this.x = x;
    this.y = y;
  }

  clone(): Vector2 {
    return new Vector2(this.x, this.y);
  }

  add(v: Vector2): this {
    this.x += v.x;
    this.y += v.y;
    return this;
  }

  subtract(v: Vector2): this {
    this.x -= v.x;
    this.y -= v.y;
    return this;
  }

  multiply(scalar: number): this {
    this.x *= scalar;
    this.y *= scalar;
    return this;
  }

  /** Rotates around the origin (radians, counter-clockwise in screen space) */
  rotate(angle: number): this {
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    const x = this.x * cos - this.y * sin;
    this.y = this.x * sin + this.y * cos;
    this.x = x;
    return this;
  }
}

/**
 * World-space position. The ground plane is x/z, y points up.
 */
export class Vector3 {
  x: number;
  y: number;
  z: number;

  constructor(x = 0, y = 0, z = 0) {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  static zero(): Vector3 {
    return new Vector3(0, 0, 0);
  }

  clone(): Vector3 {
    return new Vector3(this.x, this.y, this.z);
  }

  add(v: Vector3): this {
    this.x += v.x;
    this.y += v.y;
    this.z += v.z;
    return this;
  }

  subtract(v: Vector3): this {
    this.x -= v.x;
    this.y -= v.y;
    this.z -= v.z;
    return this;
  }

  multiply(scalar: number): this {
    this.x *= scalar;
    this.y *= scalar;
    this.z *= scalar;
    return this;
  }

  equals(v: Vector3, epsilon = 1e-9): boolean {
    return Math.abs(this.x - v.x) <= epsilon
      && Math.abs(this.y - v.y) <= epsilon
      && Math.abs(this.z - v.z) <= epsilon;
  }

  /** Distance measured on the ground plane only */
  groundDistanceTo(v: Vector3): number {
    const dx = v.x - this.x;
    const dz = v.z - this.z;
    return Math.sqrt(dx * dx + dz * dz);
  }

  static lerp(a: Vector3, b: Vector3, t: number): Vector3 {
    return new Vector3(lerp(a.x, b.x, t), lerp(a.y, b.y, t), lerp(a.z, b.z, t));
  }

  static midpoint(a: Vector3, b: Vector3): Vector3 {
    return Vector3.lerp(a, b, 0.5);
  }
}
