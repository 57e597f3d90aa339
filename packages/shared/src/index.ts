export * from './rail-network';
export { Logger, LogLevel, logger, isLogLevelName } from './logger';
export type { LogLevelName } from './logger';
export { EventBus, eventBus } from './eventBus';
export type { HostEvents } from './eventBus';
export { PerformanceMonitor } from './performance';
export { Vector2, Vector3, clamp, lerp, rad2deg } from './types';
export { TICK_RATE, DEFAULT_SIMULATION_CONFIG, resolveSimulationConfig } from './config';
export type { SimulationConfig } from './config';
export { TracklayerError, ScenarioError, ConfigError } from './errors';
