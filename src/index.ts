/**
 * Bakery: build-matrix orchestrator.
 *
 * Entry point for the HTTP server, and the public exports for programmatic
 * use (planning a matrix, running it, routing artifacts).
 */

import { AppConfig, loadConfig } from './config';
import { ConfigurationError, toTypedError } from './domain/errors';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';

function main(): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    const errors = err instanceof ConfigurationError ? err.errors : [toTypedError(err)];
    for (const error of errors) {
      logger.error('Invalid configuration', { code: error.code, error: error.message });
    }
    process.exitCode = 1;
    return;
  }
  setLogLevel(config.logLevel);

  const app = createApp(createAppContext({ config }));
  app.listen(config.port, () => {
    logger.info('Server listening', { port: config.port, backend: config.buildBackend });
  });
}

if (require.main === module) {
  main();
}

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export * from './artifacts';
export * from './command-runner';
export * from './config';
export * from './data-plane';
export * from './domain';
export * from './engine';
export * from './logger';
export * from './matrix';
export * from './pipeline';
export * from './storage';
