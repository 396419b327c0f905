/**
 * matrix-fanout — build-once, fan-out test orchestration.
 *
 * Entry point for the HTTP service. Importing this module has no side
 * effects; the server starts only when it is run directly.
 */

import { loadPipelineConfig, resolveEnvConfig } from './config/pipeline-config';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext } from './server';

function main(): void {
  const env = resolveEnvConfig();
  setLogLevel(env.logLevel);

  const config = loadPipelineConfig(env.configPath);
  const context = createAppContext({
    config,
    workDir: env.workDir,
    coverageUrl: env.coverageUrl,
    coverageToken: env.coverageToken,
    // Re-read per run so matrix edits apply without a restart
    loadMatrix: () => loadPipelineConfig(env.configPath).matrix,
  });

  createApp(context).listen(env.port, () => {
    logger.info('Server listening', { port: env.port, configPath: env.configPath, workDir: env.workDir });
  });
}

if (require.main === module) {
  main();
}

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export type { AppContext, AppContextOptions } from './server';
export * from './config/pipeline-config';
export * from './domain';
export * from './engine';
export * from './storage';
export * from './data-plane';
export * from './integrations';
export { logger, createLogger, setLogHandler, setLogLevel, resetLogging, LogLevel } from './logger';
export type { Logger, LogEntry, LogHandler } from './logger';
