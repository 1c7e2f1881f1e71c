/**
 * Entry point: load config, start the server, close it on SIGINT/SIGTERM.
 */
import { loadConfig } from './config';
import { logger } from './config/logger';
import { installShutdown, startServer } from './server';

async function main() {
  const server = await startServer(loadConfig());
  installShutdown(server);
  return server;
}

const serverPromise = main().catch((e: unknown) => {
  logger.error('Startup failed', e);
  process.exit(1);
});

export default serverPromise;
