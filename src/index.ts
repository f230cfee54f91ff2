import express, { Application as ExpressApplication } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createLogger, setLogLevel } from './log';
import { createApplication } from './app';
import { createEventLoop } from './engine';
import { createApiKeyGuard } from './middleware/auth';
import { createHealthCheckRouter } from './routes/healthCheck';
import { createCircuitRouter } from './routes/circuit';
import { createFactsRouter } from './routes/facts';

dotenv.config();

const config = loadConfig();
setLogLevel(config.runtime.logLevel);

const log = createLogger('Server');

log.info('=== Circuit Configuration ===');
log.info(`Await timeout: ${config.circuit.awaitTimeoutMs}ms`);
log.info(`Max events per drain: ${config.circuit.maxEventsPerDrain}`);
log.info(`Generation bits: ${config.storage.generationBits} (max generation ${config.derived.maxGeneration})`);
log.info(`Log Level: ${config.runtime.logLevel}`);
log.info('=============================');

const application = createApplication({ maxGeneration: config.derived.maxGeneration });
const loop = createEventLoop(application.circuit, {
  awaitTimeoutMs: config.circuit.awaitTimeoutMs,
  maxEventsPerDrain: config.circuit.maxEventsPerDrain,
});

const app: ExpressApplication = express();
const PORT = config.server.port;

app.use(cors({ origin: config.server.corsOrigin }));
app.use(express.json());

app.use('/api/health-check', createHealthCheckRouter(application));

app.use(createApiKeyGuard());

// All routes after this point require API key authentication
app.use('/api/circuit', createCircuitRouter(application, loop));
app.use('/api/facts', createFactsRouter(application));

const server = app.listen(PORT, () => {
  log.info(`Server is running on port ${PORT}`);
  log.info(`Health check available at http://localhost:${PORT}/api/health-check`);

  loop.start();
});

function shutdown(signal: string): void {
  log.info(`Received ${signal}, shutting down`);
  server.close();

  loop
    .stop()
    .then(() => {
      const handled = loop.drain();
      if (handled > 0) log.info(`Drained ${handled} queued event(s)`);
      application.shutdown();
    })
    .catch((err: unknown) => {
      log.error('Shutdown failed:', err);
      process.exitCode = 1;
    });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
