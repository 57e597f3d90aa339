import express from 'express';
import type { Logger } from '@shared';
import type { SimulationHost } from './host';
import { createRouter, errorHandler } from './routes';

export function createApp(host: SimulationHost, log: Logger): express.Express {
  const app = express();
  app.use(express.json());
  app.use('/api', createRouter(host, log));
  app.use(errorHandler(log));
  return app;
}
