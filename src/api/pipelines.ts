/**
 * Pipeline API routes.
 *
 * POST /pipelines/runs: Validate a pipeline definition and start it
 * GET /pipelines/:pipelineId: Get per-stage status
 */

import { Router } from 'express';
import { apiError, notFoundError } from '../domain/errors';
import { logger } from '../logger';
import { parsePipelineDefinition } from '../pipeline/parse';
import { PipelineRunner, withDefaultOverrides } from '../pipeline/runner';
import { Store } from '../storage/store';
import { sendError } from './middleware';

export function createPipelineRoutes(
  store: Store,
  runner: PipelineRunner,
  defaultDimensions: Readonly<Record<string, string[]>> = {},
): Router {
  const router = Router();
  const log = logger.child({ component: 'api' });

  router.post('/pipelines/runs', async (req, res) => {
    try {
      const definition = withDefaultOverrides(parsePipelineDefinition(req.body), defaultDimensions);
      const pipeline = await runner.createPipelineRun(definition);

      // Execute asynchronously (non-blocking); stage outcomes are recorded on the pipeline
      runner.executePipeline(pipeline.id).catch((err: unknown) => {
        log.error('Background pipeline execution failed', {
          pipelineId: pipeline.id,
          error: err instanceof Error ? err.message : String(err),
        });
      });

      res.status(201).json({ pipeline });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/pipelines/:pipelineId', async (req, res) => {
    try {
      const pipeline = await store.pipelines.getById(req.params.pipelineId);
      if (!pipeline) {
        res.status(404).json(apiError(notFoundError('Pipeline', req.params.pipelineId)));
        return;
      }
      const runs = await store.runs.list({ pipelineId: pipeline.id, limit: Number.MAX_SAFE_INTEGER });
      res.json({ pipeline, runs });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
