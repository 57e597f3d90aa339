import { BrushTrail, classifyTrail, type TrailSample } from '../src/rail-network/brushTrail';
import type { Sector } from '../src/rail-network/types';

function trail(...sectors: Sector[]): TrailSample[] {
  return sectors.map((sector) => ({ coord: { x: 5, z: 5 }, sector }));
}

describe('classifyTrail', () => {
  it('should classify by first and last sector in either order', () => {
    expect(classifyTrail(trail('N', 'CENTER', 'S'))).toBe('N_S');
    expect(classifyTrail(trail('S', 'CENTER', 'N'))).toBe('N_S');
    expect(classifyTrail(trail('W', 'CENTER', 'E'))).toBe('E_W');
    expect(classifyTrail(trail('N', 'CENTER', 'E'))).toBe('N_E');
    expect(classifyTrail(trail('W', 'NW', 'N'))).toBe('N_W');
    expect(classifyTrail(trail('S', 'SE', 'E'))).toBe('E_S');
    expect(classifyTrail(trail('W', 'CENTER', 'S'))).toBe('S_W');
  });

  it('should read strokes along a side as straights', () => {
    expect(classifyTrail(trail('NW', 'W', 'SW'))).toBe('N_S');
    expect(classifyTrail(trail('SE', 'E', 'NE'))).toBe('N_S');
    expect(classifyTrail(trail('NW', 'N', 'NE'))).toBe('E_W');
    expect(classifyTrail(trail('SW', 'S', 'SE'))).toBe('E_W');
  });

  it('should ignore short or unknown strokes', () => {
    expect(classifyTrail(trail('N', 'S'))).toBeNull();
    expect(classifyTrail(trail('N', 'CENTER', 'N'))).toBeNull();
    expect(classifyTrail(trail('NW', 'CENTER', 'SE'))).toBeNull();
  });
});

describe('BrushTrail', () => {
  let brush: BrushTrail;

  beforeEach(() => {
    brush = new BrushTrail(64);
  });

  it('should bake a stroke on release', () => {
    brush.sample({ x: 5, z: 5 }, 'N');
    brush.sample({ x: 5, z: 5 }, 'CENTER');
    brush.sample({ x: 5, z: 5 }, 'S');
    expect(brush.release()).toEqual({ coord: { x: 5, z: 5 }, kind: 'N_S' });
    expect(brush.length).toBe(0);
  });

  it('should bake nothing from two samples', () => {
    brush.sample({ x: 5, z: 5 }, 'N');
    brush.sample({ x: 5, z: 5 }, 'S');
    expect(brush.release()).toBeNull();
    expect(brush.length).toBe(0);
  });

  it('should skip repeated sectors', () => {
    brush.sample({ x: 5, z: 5 }, 'N');
    brush.sample({ x: 5, z: 5 }, 'N');
    brush.sample({ x: 5, z: 5 }, 'CENTER');
    expect(brush.length).toBe(2);
  });

  it('should bake the previous cell when the pointer moves on', () => {
    brush.sample({ x: 5, z: 5 }, 'N');
    brush.sample({ x: 5, z: 5 }, 'CENTER');
    brush.sample({ x: 5, z: 5 }, 'S');
    expect(brush.sample({ x: 5, z: 6 }, 'N')).toEqual({ coord: { x: 5, z: 5 }, kind: 'N_S' });
    expect(brush.entries()).toEqual([{ coord: { x: 5, z: 6 }, sector: 'N' }]);
  });

  it('should stop recording at capacity', () => {
    const small = new BrushTrail(3);
    small.sample({ x: 0, z: 0 }, 'N');
    small.sample({ x: 0, z: 0 }, 'CENTER');
    small.sample({ x: 0, z: 0 }, 'S');
    small.sample({ x: 0, z: 0 }, 'E');
    expect(small.length).toBe(3);
    expect(small.release()).toEqual({ coord: { x: 0, z: 0 }, kind: 'N_S' });
  });
});
