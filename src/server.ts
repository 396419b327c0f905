/**
 * Express server configuration.
 *
 * Assembles the pipeline services and the API surface. Collaborators
 * default to the Docker and HTTP integrations; tests pass in-process fakes.
 */

import express from 'express';
import path from 'path';
import { validationError } from './domain/errors';
import { MatrixDeclaration } from './domain/matrix';
import { PipelineConfig, ConfigError } from './config/pipeline-config';
import { PipelinePublisher } from './data-plane/publisher';
import { BuildRecipeExecutor, CoverageSink, ExecutionSandbox } from './engine/collaborators';
import { RunConcurrencyController } from './engine/concurrency-controller';
import { CoverageAggregator } from './engine/coverage-aggregator';
import { JobExecutor } from './engine/job-executor';
import { PipelineOrchestrator } from './engine/orchestrator';
import { DockerImageBuilder } from './integrations/docker-builder';
import { DockerSandbox } from './integrations/docker-sandbox';
import { HttpCoverageSink } from './integrations/http-coverage-sink';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { errorHandler } from './api/middleware';
import { createRunRoutes } from './api/runs';
import { createArtifactRoutes } from './api/artifacts';
import { createEventRoutes } from './api/events';
import { createLaneRoutes } from './api/lanes';

const startTime = Date.now();

export interface AppContextOptions {
  config: PipelineConfig;
  /** Root for image tarballs and job outputs. */
  workDir?: string;
  coverageUrl?: string;
  coverageToken?: string;
  /** Defaults to the matrix in `config`. */
  loadMatrix?: () => MatrixDeclaration;
  store?: Store;
  builder?: BuildRecipeExecutor;
  sandbox?: ExecutionSandbox;
  sink?: CoverageSink;
}

/** Application context containing all services. */
export interface AppContext {
  config: PipelineConfig;
  store: Store;
  publisher: PipelinePublisher;
  controller: RunConcurrencyController;
  orchestrator: PipelineOrchestrator;
  loadMatrix: () => MatrixDeclaration;
}

function createCoverageSink(options: AppContextOptions): CoverageSink {
  if (options.sink) return options.sink;
  const url = options.coverageUrl ?? options.config.coverage.url;
  if (!url) {
    throw new ConfigError(
      validationError('No coverage upload URL configured', { env: 'COVERAGE_UPLOAD_URL', field: 'coverage.url' }),
    );
  }
  return new HttpCoverageSink({ url, token: options.coverageToken });
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions): AppContext {
  const { config } = options;
  const workDir = options.workDir ?? path.resolve('.matrix-fanout');
  const store = options.store ?? createMemoryStore();
  const publisher = new PipelinePublisher(store);
  const controller = new RunConcurrencyController();
  const builder = options.builder ?? new DockerImageBuilder({ workDir });
  const sandbox = options.sandbox ?? new DockerSandbox(config.sandbox, { workDir });
  const aggregator = new CoverageAggregator(createCoverageSink(options));
  const jobExecutor = new JobExecutor(store.artifacts, sandbox);
  const loadMatrix = options.loadMatrix ?? (() => config.matrix);

  const orchestrator = new PipelineOrchestrator(
    { store, publisher, controller, builder, jobExecutor, aggregator },
    { recipe: config.recipe, policy: config.policy, loadMatrix },
  );

  return { config, store, publisher, controller, orchestrator, loadMatrix };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      activeLanes: ctx.controller.activeLanes().length,
    });
  });

  const v1 = express.Router();
  v1.use('/', createRunRoutes(ctx.store, ctx.orchestrator));
  v1.use('/', createArtifactRoutes(ctx.store));
  v1.use('/', createEventRoutes(ctx.store, ctx.publisher));
  v1.use('/', createLaneRoutes(ctx.controller, ctx.loadMatrix));
  app.use('/api/v1', v1);

  app.use(errorHandler);

  return app;
}
