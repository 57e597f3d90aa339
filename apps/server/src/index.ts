import { Simulation, logger } from '@shared';
import { createApp } from './app';
import { readServerConfig } from './config';
import { SimulationHost } from './host';

const config = readServerConfig();
logger.setLogLevel(config.logLevel);

const sim = new Simulation(config.simulation, logger.child('sim'));
sim.reset();

const host = new SimulationHost(sim, config.tickRate, logger.child('host'));
const app = createApp(host, logger.child('http'));

const server = app.listen(config.port, () => {
  logger.info(`Server listening on http://localhost:${config.port}`);
  host.start();
});

process.on('SIGINT', () => {
  host.stop();
  server.close(() => process.exit(0));
});
