/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { DirectoryArtifactChannel, DirectorySiteChannel } from './artifacts/channels';
import { DockerCliPrimitives, ExtractionPrimitives } from './artifacts/primitives';
import { AppConfig, loadConfig } from './config';
import { EventPublisher } from './data-plane/publisher';
import { ConfigurationError, createTypedError } from './domain/errors';
import { registerBuiltinBackends } from './engine/backends';
import { BuildBackend, getBuildBackend, getRegisteredBackends } from './engine/build-runner';
import { BuildOrchestrator } from './engine/orchestrator';
import { PipelineRunner } from './pipeline/runner';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { errorHandler, notFoundHandler } from './api/middleware';
import { createEventRoutes } from './api/events';
import { createPipelineRoutes } from './api/pipelines';
import { createPlanRoutes } from './api/plans';
import { createRunRoutes } from './api/runs';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  store: Store;
  publisher: EventPublisher;
  orchestrator: BuildOrchestrator;
  pipelines: PipelineRunner;
  backend: BuildBackend;
}

export interface AppContextOptions {
  config?: AppConfig;
  store?: Store;
  /** Replaces the backend named by the configuration. */
  backend?: BuildBackend;
  primitives?: ExtractionPrimitives;
}

/** Resolve the configured backend from the registry. */
function resolveBackend(name: string): BuildBackend {
  registerBuiltinBackends();
  const backend = getBuildBackend(name);
  if (!backend) {
    throw new ConfigurationError([
      createTypedError({
        code: 'CONFIG.UNKNOWN_BACKEND',
        message: `Unknown build backend "${name}"`,
        details: { available: getRegisteredBackends() },
      }),
    ]);
  }
  return backend;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? loadConfig();
  const store = options.store ?? createMemoryStore();
  const publisher = new EventPublisher(store);
  const backend = options.backend ?? resolveBackend(config.buildBackend);

  const orchestrator = new BuildOrchestrator(store, publisher, {
    backend,
    stagingDir: config.stagingDir,
    primitives: options.primitives ?? new DockerCliPrimitives(),
    artifactChannel: new DirectoryArtifactChannel(config.artifactDir),
    siteChannel: new DirectorySiteChannel(config.siteDir),
    defaultOptions: config.runDefaults,
  });
  const pipelines = new PipelineRunner(store, publisher, orchestrator);

  return { config, store, publisher, orchestrator, pipelines, backend };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Health check: uptime, backend and storage type
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      uptimeMs: Date.now() - startTime,
      backend: ctx.backend.name,
      storage: 'memory',
    });
  });

  const v1 = express.Router();
  v1.use('/', createPlanRoutes());
  v1.use('/', createRunRoutes(ctx.store, ctx.orchestrator));
  v1.use('/', createPipelineRoutes(ctx.store, ctx.pipelines, ctx.config.defaultDimensions));
  v1.use('/', createEventRoutes(ctx.store, ctx.publisher));
  app.use('/api/v1', v1);
  app.use('/api', notFoundHandler);

  // Error handler
  app.use(errorHandler);

  return app;
}
