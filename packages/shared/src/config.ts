import { ConfigError } from './errors';

export interface SimulationConfig {
  gridSize: number;        // cells per side
  cellSize: number;        // world units per cell
  trainCapacity: number;   // fixed pool size
  lookahead: number;       // path progress used to derive heading
  speedDrive: number;      // cells per second
  speedLoad: number;
  speedUnload: number;
}

export const DEFAULT_SIMULATION_CONFIG: Readonly<SimulationConfig> = {
  gridSize: 32,
  cellSize: 1,
  trainCapacity: 16,
  lookahead: 0.1,
  speedDrive: 0.8,
  speedLoad: 0.5,
  speedUnload: 0.5,
};

// Sdílená frekvence simulace pro server i klienta
export const TICK_RATE = 30;

function requirePositive(key: keyof SimulationConfig, value: number, integer: boolean): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(key, `expected a positive number, got ${value}`);
  }
  if (integer && !Number.isInteger(value)) {
    throw new ConfigError(key, `expected an integer, got ${value}`);
  }
  return value;
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveSimulationConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  const merged: SimulationConfig = { ...DEFAULT_SIMULATION_CONFIG, ...overrides };

  requirePositive('gridSize', merged.gridSize, true);
  requirePositive('cellSize', merged.cellSize, false);
  requirePositive('trainCapacity', merged.trainCapacity, true);
  requirePositive('speedDrive', merged.speedDrive, false);
  requirePositive('speedLoad', merged.speedLoad, false);
  requirePositive('speedUnload', merged.speedUnload, false);

  if (!(merged.lookahead > 0 && merged.lookahead < 1)) {
    throw new ConfigError('lookahead', `expected a value in (0, 1), got ${merged.lookahead}`);
  }

  return merged;
}
