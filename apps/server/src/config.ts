import { ConfigError, TICK_RATE, isLogLevelName, type LogLevelName, type SimulationConfig } from '@shared';

export interface ServerConfig {
  port: number;
  tickRate: number;
  logLevel: LogLevelName;
  simulation: Partial<SimulationConfig>;
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(key, `expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

/**
 * Server settings from the environment: PORT, TICK_RATE, LOG_LEVEL, GRID_SIZE
 */
export function readServerConfig(env: Env = process.env): ServerConfig {
  const level = (env.LOG_LEVEL ?? 'info').toLowerCase();
  if (!isLogLevelName(level)) {
    throw new ConfigError('LOG_LEVEL', `unknown level "${env.LOG_LEVEL}"`);
  }

  const simulation: Partial<SimulationConfig> = {};
  if (env.GRID_SIZE) {
    simulation.gridSize = readInteger(env, 'GRID_SIZE', 0, 1);
  }

  return {
    port: readInteger(env, 'PORT', 3000, 0),
    tickRate: readInteger(env, 'TICK_RATE', TICK_RATE, 1),
    logLevel: level,
    simulation,
  };
}
