import { loadConfig, validateConfig } from './config.js';
import { buildApp } from './app.js';

const config = loadConfig();
const validation = validateConfig(config);

for (const warning of validation.warnings) {
  console.warn(`[Config] ${warning.key}: ${warning.reason}`);
}
if (!validation.ok) {
  for (const error of validation.errors) {
    console.error(`[Config] ${error.key}: ${error.reason}`);
  }
  process.exit(1);
}

const { app } = await buildApp(config);

// Start server
const start = async () => {
  try {
    await app.listen({ port: config.port, host: config.host });
    app.log.info(`Rendezvous relay listening on ws://${config.host}:${config.port}${config.wsPath}`);
    app.log.info(`Environment: ${config.nodeEnv}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

// Graceful shutdown
const shutdown = async () => {
  app.log.info('Shutting down...');
  try {
    await app.close();
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
  process.exit(0);
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

await start();
