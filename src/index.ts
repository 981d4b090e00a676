import express, { Application } from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import healthCheckRouter from './routes/healthCheck';
import engineStatusRouter from './routes/engineStatus';
import hostEventsRouter from './routes/hostEvents';
import { getConfig } from './config';
import { createLogger, setLogLevel } from './logging';
import { validateHostToken } from './middleware/auth';
import { initRuntime, shutdownRuntime } from './runtime';

dotenv.config();

const config = getConfig();
setLogLevel(config.runtime.logLevel);

const logger = createLogger('Shim');

console.log('=== Host Engine Shim Configuration ===');
console.log(`Engine: ${config.engine.name} (debug logging ${config.engine.debugLogging ? 'on' : 'off'})`);
console.log(`Watched events: ${config.engine.watchEvents.join(', ')}`);
console.log(`Workspaces: ${config.derived.workspaceCount}`);
for (const ws of config.workspaces) {
  console.log(`  ${ws.projectId}: ${ws.root} [${ws.entityLevels.join(' / ') || 'project only'}]`);
}
console.log(`Log Level: ${config.runtime.logLevel}`);
console.log('======================================\n');

const app: Application = express();
const PORT = process.env.PORT || 3001;

app.use(cors());
app.use(express.json());

app.use('/api/health-check', healthCheckRouter);

app.use(validateHostToken);

// All routes after this point require the host token
app.use('/api/engine', engineStatusRouter);
app.use('/api/host/events', hostEventsRouter);

const server = app.listen(PORT, () => {
  logger.info(`Listening on port ${PORT}`);
  logger.info(`Health check available at http://localhost:${PORT}/api/health-check`);

  initRuntime(config);
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info(`Received ${signal}, shutting down`);
  shutdownRuntime();
  server.close((err) => {
    if (err) {
      logger.error('Error while closing server:', err);
      process.exitCode = 1;
    }
  });
}

process.once('SIGINT', shutdown);
process.once('SIGTERM', shutdown);
