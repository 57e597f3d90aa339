import { Router, type NextFunction, type Request, type Response } from 'express';
import {
  TracklayerError,
  loadDefaultScenario,
  parseScenario,
  type Logger,
} from '@shared';
import type { GroundPoint, SimulationHost } from './host';

/** Rejected request body, answered with 400 */
export class RequestError extends TracklayerError {}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readPoint(value: unknown, path: string): GroundPoint {
  if (!isRecord(value)) throw new RequestError(`${path}: expected an object with x and z`);
  const { x, z } = value;
  if (typeof x !== 'number' || typeof z !== 'number' || !Number.isFinite(x) || !Number.isFinite(z)) {
    throw new RequestError(`${path}: x and z must be finite numbers`);
  }
  return { x, z };
}

function readCell(host: SimulationHost, body: unknown): GroundPoint {
  const point = readPoint(body, 'body');
  if (!Number.isInteger(point.x) || !Number.isInteger(point.z) || !host.sim.grid.isInside(point)) {
    throw new RequestError(`body: (${point.x},${point.z}) is not a cell of the grid`);
  }
  // Klik doprostřed buňky
  const center = host.sim.grid.cellCenterPosition(point);
  return { x: center.x, z: center.z };
}

export function createRouter(host: SimulationHost, log: Logger): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', ...host.stats() });
  });

  router.get('/state', (_req, res) => {
    res.json(host.sim.snapshot());
  });

  router.post('/stroke', (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || !Array.isArray(body.points) || body.points.length === 0) {
      throw new RequestError('body.points: expected a non-empty array');
    }
    const points = body.points.map((p: unknown, i) => readPoint(p, `body.points[${i}]`));
    res.status(202).json({ queued: host.input.stroke(points) });
  });

  router.post('/bulldoze', (req, res) => {
    res.status(202).json({ queued: host.input.click('bulldoze', readCell(host, req.body)) });
  });

  router.post('/switch', (req, res) => {
    res.status(202).json({ queued: host.input.click('switch', readCell(host, req.body)) });
  });

  router.post('/reset', (req, res) => {
    const body: unknown = req.body;
    const scenario = isRecord(body) && Object.keys(body).length > 0 ? parseScenario(body) : loadDefaultScenario();
    host.sim.reset(scenario);
    host.input.clear();
    log.info(`reset to "${scenario.name}" over HTTP`);
    res.json({ scenario: scenario.name, trains: host.sim.activeTrains().length });
  });

  return router;
}

// Express pozná error handler podle čtyř parametrů
export function errorHandler(log: Logger) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof TracklayerError || err instanceof SyntaxError) {
      res.status(400).json({ error: err.message });
      return;
    }
    log.error('request failed', err);
    res.status(500).json({ error: 'internal error' });
  };
}
