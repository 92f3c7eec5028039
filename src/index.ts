/**
 * DevTrack server.
 *
 * Entry point: loads configuration from the environment, builds the
 * services and serves the HTTP API. Importing this module only exposes the
 * public API; the server starts when it is run directly.
 */

import { AppConfig, ConfigError, loadConfig } from './config';
import { createApp, createAppContext } from './server';
import { logger, setLogLevel } from './logger';

export function main(): void {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(err.message, { fieldErrors: err.fieldErrors });
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  setLogLevel(config.logLevel);
  const context = createAppContext(config);
  const app = createApp(context);

  const server = app.listen(config.port, config.host, () => {
    logger.info('Server listening', { host: config.host, port: config.port, env: config.env });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close((err) => {
      if (err) logger.error('Error during shutdown', { error: err.message });
    });
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

if (require.main === module) {
  main();
}

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOverrides } from './server';
export { loadConfig, ConfigError } from './config';
export type { AppConfig } from './config';
export * from './domain';
export * from './storage';
export * from './audit/audit-service';
export * from './auth/password';
export * from './auth/session-tokens';
export * from './notifications/invitation-notifier';
export * from './services/account-service';
export * from './services/project-service';
export * from './services/collaboration-service';
export * from './health/health-service';
export * from './logger';
