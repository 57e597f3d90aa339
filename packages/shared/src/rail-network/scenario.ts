import { ScenarioError } from '../errors';
import { isConnectionKind } from './connections';
import type { ConnectionKind, EdgeSector, TrainModel } from './types';
import defaultScenarioJson from '../../scenarios/default.json';

export interface ScenarioCell {
  x: number;
  z: number;
  kind: 'rail' | 'reserved';
  connections: ConnectionKind[];
  active?: ConnectionKind;     // switch leg to enable after the connections are laid
}

export interface ScenarioTrain {
  x: number;
  z: number;
  from: EdgeSector;
  to: EdgeSector;
  model: TrainModel;
  speed?: number;
  progress: number;
}

/**
 * Starting layout applied by Simulation.reset()
 */
export interface Scenario {
  name: string;
  cells: ScenarioCell[];
  trains: ScenarioTrain[];
}

const EDGE_SECTORS: readonly EdgeSector[] = ['N', 'E', 'S', 'W'];
const CELL_KINDS: readonly ScenarioCell['kind'][] = ['rail', 'reserved'];
const TRAIN_MODELS: readonly TrainModel[] = ['locomotive', 'railcar', 'freight'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readInteger(obj: Record<string, unknown>, key: string, path: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ScenarioError(`${path}.${key}`, 'expected a non-negative integer');
  }
  return value;
}

function readEdgeSector(obj: Record<string, unknown>, key: string, path: string): EdgeSector {
  const value = obj[key];
  const match = EDGE_SECTORS.find((s) => s === value);
  if (!match) {
    throw new ScenarioError(`${path}.${key}`, `expected one of ${EDGE_SECTORS.join(', ')}`);
  }
  return match;
}

function parseCell(value: unknown, path: string): ScenarioCell {
  if (!isRecord(value)) throw new ScenarioError(path, 'expected an object');

  const rawKind = value.kind ?? 'rail';
  const kind = CELL_KINDS.find((k) => k === rawKind);
  if (!kind) {
    throw new ScenarioError(`${path}.kind`, 'expected "rail" or "reserved"');
  }

  const rawConnections = value.connections ?? [];
  if (!Array.isArray(rawConnections)) {
    throw new ScenarioError(`${path}.connections`, 'expected an array');
  }
  const connections = rawConnections.map((c: unknown, i) => {
    if (!isConnectionKind(c)) throw new ScenarioError(`${path}.connections[${i}]`, 'unknown connection kind');
    return c;
  });
  if (kind === 'rail' && connections.length === 0) {
    throw new ScenarioError(`${path}.connections`, 'a rail cell needs at least one connection');
  }

  const cell: ScenarioCell = {
    x: readInteger(value, 'x', path),
    z: readInteger(value, 'z', path),
    kind,
    connections,
  };

  if (value.active !== undefined) {
    const active = value.active;
    if (!isConnectionKind(active) || !connections.includes(active)) {
      throw new ScenarioError(`${path}.active`, 'must be one of the cell connections');
    }
    cell.active = active;
  }

  return cell;
}

function parseTrain(value: unknown, path: string): ScenarioTrain {
  if (!isRecord(value)) throw new ScenarioError(path, 'expected an object');

  const from = readEdgeSector(value, 'from', path);
  const to = readEdgeSector(value, 'to', path);
  if (from === to) throw new ScenarioError(`${path}.to`, 'must differ from "from"');

  const model = value.model ?? 'locomotive';
  const matchedModel = TRAIN_MODELS.find((m) => m === model);
  if (!matchedModel) {
    throw new ScenarioError(`${path}.model`, `expected one of ${TRAIN_MODELS.join(', ')}`);
  }

  const progress = value.progress ?? 0;
  if (typeof progress !== 'number' || progress < 0 || progress >= 1) {
    throw new ScenarioError(`${path}.progress`, 'expected a number in [0, 1)');
  }

  const train: ScenarioTrain = {
    x: readInteger(value, 'x', path),
    z: readInteger(value, 'z', path),
    from,
    to,
    model: matchedModel,
    progress,
  };

  const speed = value.speed;
  if (speed !== undefined) {
    if (typeof speed !== 'number' || !(speed > 0)) {
      throw new ScenarioError(`${path}.speed`, 'expected a positive number');
    }
    train.speed = speed;
  }

  return train;
}

/**
 * Validate an untrusted scenario document (JSON file or request body)
 */
export function parseScenario(value: unknown): Scenario {
  if (!isRecord(value)) throw new ScenarioError('scenario', 'expected an object');

  const name = value.name;
  if (typeof name !== 'string' || name.length === 0) {
    throw new ScenarioError('scenario.name', 'expected a non-empty string');
  }

  const cells = value.cells ?? [];
  const trains = value.trains ?? [];
  if (!Array.isArray(cells)) throw new ScenarioError('scenario.cells', 'expected an array');
  if (!Array.isArray(trains)) throw new ScenarioError('scenario.trains', 'expected an array');

  return {
    name,
    cells: cells.map((c: unknown, i) => parseCell(c, `scenario.cells[${i}]`)),
    trains: trains.map((t: unknown, i) => parseTrain(t, `scenario.trains[${i}]`)),
  };
}

export const EMPTY_SCENARIO: Scenario = { name: 'empty', cells: [], trains: [] };

export function loadDefaultScenario(): Scenario {
  return parseScenario(defaultScenarioJson);
}
