import { ScenarioError } from '../src/errors';
import { Simulation } from '../src/rail-network/Simulation';
import type { Scenario } from '../src/rail-network/scenario';
import { Vector3 } from '../src/types';
import { quietLogger } from './helpers';

const SIDING: Scenario = {
  name: 'siding',
  cells: [
    { x: 3, z: 5, kind: 'rail', connections: ['E_W'] },
    { x: 4, z: 5, kind: 'rail', connections: ['E_W'] },
    { x: 3, z: 6, kind: 'rail', connections: ['N_S'] },
  ],
  trains: [{ x: 3, z: 5, from: 'W', to: 'E', model: 'railcar', progress: 0.2 }],
};

describe('Simulation', () => {
  let sim: Simulation;

  beforeEach(() => {
    sim = new Simulation({ gridSize: 16, trainCapacity: 4 }, quietLogger());
  });

  describe('reset', () => {
    it('should start with a disabled pool and an empty grid', () => {
      expect(sim.trains).toHaveLength(4);
      expect(sim.trains.every((t) => t.state === 'disabled')).toBe(true);
      expect(sim.snapshot()).toEqual({ scenario: 'empty', gridSize: 16, cells: [], trains: [] });
    });

    it('should load the bundled scenario', () => {
      sim.reset();
      expect(sim.scenario).toBe('loop-with-crossing');
      expect(sim.activeTrains()).toHaveLength(2);
      expect(sim.cellAt({ x: 7, z: 4 }).model).toEqual({ variant: 'crossing', rotation: 0 });
      expect(sim.cellAt({ x: 2, z: 2 }).kind).toBe('reserved');

      const junction = sim.cellAt({ x: 10, z: 6 });
      expect(junction.connectionOptions.kinds()).toEqual(['N_S', 'E_S']);
      expect(junction.connectionsActive.kinds()).toEqual(['N_S']);
      expect(junction.model).toEqual({ variant: 'merge_mirrored', rotation: 180 });
    });

    it('should take speeds from the scenario or the config', () => {
      sim.reset();
      expect(sim.trains[0].speedDrive).toBe(0.8);
      expect(sim.trains[1].speedDrive).toBe(0.5);
      expect(sim.trains[1].model).toBe('freight');
    });

    it('should discard earlier edits', () => {
      sim.reset(SIDING);
      sim.bulldoze({ x: 4, z: 5 });
      sim.reset(SIDING);
      expect(sim.cellAt({ x: 4, z: 5 }).kind).toBe('rail');
      expect(sim.trains[0].pathProgress).toBe(0.2);
    });

    it('should announce the reset', () => {
      const listener = jest.fn();
      sim.events.on('simulationReset', listener);
      sim.reset(SIDING);
      expect(listener).toHaveBeenCalledWith('siding');
    });

    it('should reject trains without matching rail', () => {
      const scenario: Scenario = {
        name: 'broken',
        cells: [],
        trains: [{ x: 5, z: 5, from: 'W', to: 'E', model: 'locomotive', progress: 0 }],
      };
      expect(() => sim.reset(scenario)).toThrow(ScenarioError);
      expect(() => sim.reset(scenario)).toThrow('scenario.trains[0]: no W-E rail at (5,5)');
    });

    it('should reject cells outside the grid', () => {
      const scenario: Scenario = {
        name: 'broken',
        cells: [{ x: 16, z: 0, kind: 'rail', connections: ['N_S'] }],
        trains: [],
      };
      expect(() => sim.reset(scenario)).toThrow('scenario.cells[0]: (16,0) is outside the grid');
    });

    it('should reject more trains than the pool holds', () => {
      const small = new Simulation({ gridSize: 16, trainCapacity: 1 }, quietLogger());
      const scenario: Scenario = { ...SIDING, trains: [...SIDING.trains, ...SIDING.trains] };
      expect(() => small.reset(scenario)).toThrow('scenario.trains: at most 1 trains fit the pool');
    });

    it('should keep the running world when a scenario is rejected', () => {
      const listener = jest.fn();
      sim.reset(SIDING);
      sim.update(0.1);
      const before = sim.snapshot();
      sim.events.on('simulationReset', listener);

      const outside: Scenario = {
        name: 'outside',
        cells: [
          { x: 9, z: 9, kind: 'rail', connections: ['N_S'] },
          { x: 40, z: 0, kind: 'rail', connections: ['N_S'] },
        ],
        trains: [],
      };
      const missingRail: Scenario = {
        name: 'missing-rail',
        cells: [{ x: 9, z: 9, kind: 'rail', connections: ['N_S'] }],
        trains: [{ x: 5, z: 5, from: 'W', to: 'E', model: 'locomotive', progress: 0 }],
      };
      expect(() => sim.reset(outside)).toThrow(ScenarioError);
      expect(() => sim.reset(missingRail)).toThrow(ScenarioError);

      expect(sim.snapshot()).toEqual(before);
      expect(sim.cellAt({ x: 9, z: 9 }).kind).toBe('empty');
      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('bulldoze', () => {
    beforeEach(() => {
      sim.reset(SIDING);
    });

    it('should refuse the cell a driving train is on', () => {
      expect(sim.bulldoze({ x: 3, z: 5 })).toBe('vetoed');
      expect(sim.cellAt({ x: 3, z: 5 }).kind).toBe('rail');
    });

    it('should clear cells in the same column or row as a train', () => {
      expect(sim.bulldoze({ x: 3, z: 6 })).toBe('cleared');
      expect(sim.bulldoze({ x: 4, z: 5 })).toBe('cleared');

      const cell = sim.cellAt({ x: 4, z: 5 });
      expect(cell.kind).toBe('empty');
      expect(cell.connectionOptions.count()).toBe(0);
      expect(cell.model).toEqual({ variant: 'none', rotation: 0 });
    });

    it('should clear under trains that are not driving', () => {
      sim.setTrainState(0, 'hidden');
      expect(sim.bulldoze({ x: 3, z: 5 })).toBe('cleared');
    });

    it('should ignore empty cells', () => {
      const listener = jest.fn();
      sim.events.on('bulldozed', listener);
      expect(sim.bulldoze({ x: 0, z: 0 })).toBe('ignored');
      expect(listener).toHaveBeenCalledWith({ x: 0, z: 0 }, 'ignored');
    });
  });

  describe('building', () => {
    it('should lay a connection from a brush stroke', () => {
      const added = jest.fn();
      sim.events.on('connectionAdded', added);

      sim.brushSample(new Vector3(5.5, 0, 5.1));
      sim.brushSample(new Vector3(5.5, 0, 5.5));
      sim.brushSample(new Vector3(5.5, 0, 5.9));
      expect(sim.brushLength).toBe(3);
      expect(sim.brushRelease()).toEqual({ coord: { x: 5, z: 5 }, kind: 'N_S' });

      expect(added).toHaveBeenCalledWith({ x: 5, z: 5 }, 'N_S');
      expect(sim.refreshVisuals()).toBe(1);
      expect(sim.cellAt({ x: 5, z: 5 }).model).toEqual({ variant: 'straight', rotation: 0 });
    });

    it('should not lay rail on reserved cells', () => {
      sim.reset();
      sim.brushSample(new Vector3(2.1, 0, 2.5));
      sim.brushSample(new Vector3(2.5, 0, 2.5));
      sim.brushSample(new Vector3(2.9, 0, 2.5));
      expect(sim.brushRelease()).toBeNull();
      expect(sim.cellAt({ x: 2, z: 2 }).kind).toBe('reserved');
    });
  });

  describe('switches', () => {
    beforeEach(() => {
      sim.reset();
    });

    it('should toggle a switch to its next leg', () => {
      const listener = jest.fn();
      sim.events.on('switchChanged', listener);
      expect(sim.toggleSwitch({ x: 10, z: 6 })).toBe(true);
      expect(sim.cellAt({ x: 10, z: 6 }).connectionsActive.kinds()).toEqual(['E_S']);
      expect(listener).toHaveBeenCalledWith({ x: 10, z: 6 }, 'E_S');
    });

    it('should not toggle plain rail or crossings', () => {
      expect(sim.toggleSwitch({ x: 5, z: 4 })).toBe(false);
      expect(sim.toggleSwitch({ x: 7, z: 4 })).toBe(false);
    });

    it('should set a leg directly', () => {
      expect(sim.setActiveConnection({ x: 10, z: 6 }, 'E_S')).toBe(true);
      expect(sim.setActiveConnection({ x: 10, z: 6 }, 'E_W')).toBe(false);
    });
  });

  describe('train states', () => {
    beforeEach(() => {
      sim.reset(SIDING);
    });

    it('should stop updating hidden trains', () => {
      sim.setTrainState(0, 'hidden');
      sim.update(0.5);
      expect(sim.trains[0].pathProgress).toBe(0.2);
    });

    it('should keep derailed trains derailed', () => {
      expect(sim.setTrainState(0, 'derailed')).toBe(true);
      expect(sim.setTrainState(0, 'driving')).toBe(false);
      expect(sim.trains[0].state).toBe('derailed');
    });

    it('should ignore empty pool slots and unknown ids', () => {
      expect(sim.setTrainState(3, 'hidden')).toBe(false);
      expect(sim.setTrainState(99, 'hidden')).toBe(false);
    });

    it('should report state changes', () => {
      const listener = jest.fn();
      sim.events.on('trainStateChanged', listener);
      sim.setTrainState(0, 'loading');
      expect(listener).toHaveBeenCalledWith(sim.trains[0], 'driving');
    });
  });

  it('should keep instances independent', () => {
    const other = new Simulation({ gridSize: 16, trainCapacity: 4 }, quietLogger());
    sim.reset(SIDING);
    other.reset(SIDING);

    sim.bulldoze({ x: 4, z: 5 });
    sim.update(0.5);

    expect(other.cellAt({ x: 4, z: 5 }).kind).toBe('rail');
    expect(other.trains[0].pathProgress).toBe(0.2);
  });

  it('should describe itself in a snapshot', () => {
    sim.reset(SIDING);
    const snapshot = sim.snapshot();
    expect(snapshot.scenario).toBe('siding');
    expect(snapshot.cells.map((c) => c.coord)).toEqual([
      { x: 3, z: 5 },
      { x: 4, z: 5 },
      { x: 3, z: 6 },
    ]);
    expect(snapshot.trains).toHaveLength(1);
    expect(snapshot.trains[0]).toMatchObject({ id: 0, state: 'driving', model: 'railcar', tile: { x: 3, z: 5 } });
  });
});
