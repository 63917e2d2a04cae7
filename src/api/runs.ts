/**
 * Run API routes.
 *
 * POST /runs: Plan a matrix and start a run
 * GET /runs: List runs
 * GET /runs/:runId: Get run status, job ledger and report
 * POST /runs/:runId/cancel: Cancel a created or in-flight run
 */

import { Router } from 'express';
import { ConfigurationError, TypedError, apiError, notFoundError } from '../domain/errors';
import { RunStatus } from '../domain/run';
import { BuildOrchestrator } from '../engine/orchestrator';
import { readRunOptions } from '../engine/run-options';
import { isRecord, isString, schemaError } from '../guards';
import { logger } from '../logger';
import { readMatrixConfig } from '../matrix/parse';
import { Store, toListResult } from '../storage/store';
import { sendError } from './middleware';

const RUN_STATUSES: ReadonlySet<string> = new Set<string>(Object.values(RunStatus));

function isRunStatus(value: unknown): value is RunStatus {
  return typeof value === 'string' && RUN_STATUSES.has(value);
}

/** Parse a `limit`/`offset` query pair the way every list endpoint does. */
export function readPaging(query: Record<string, unknown>): { limit: number; offset: number } {
  const rawLimit = isString(query.limit) ? parseInt(query.limit, 10) : 100;
  const rawOffset = isString(query.offset) ? parseInt(query.offset, 10) : 0;
  return {
    limit: Number.isNaN(rawLimit) || rawLimit < 1 ? 100 : Math.min(rawLimit, 1000),
    offset: Number.isNaN(rawOffset) || rawOffset < 0 ? 0 : rawOffset,
  };
}

export function createRunRoutes(store: Store, orchestrator: BuildOrchestrator): Router {
  const router = Router();
  const log = logger.child({ component: 'api' });

  /**
   * POST /runs
   * Body: { matrix, artifacts?, failFast?, concurrency?, artifactsMandatory?, artifactsOnCancel?, buildTimeoutMs? }
   */
  router.post('/runs', async (req, res) => {
    try {
      const body: unknown = req.body;
      const errors: TypedError[] = [];
      if (!isRecord(body)) {
        throw new ConfigurationError([schemaError('body', 'object', body)]);
      }
      const matrix = readMatrixConfig(body.matrix, 'matrix', errors);
      const options = readRunOptions(body, 'body', errors);
      if (!isRecord(body.artifacts) && body.artifacts !== undefined) {
        errors.push(schemaError('artifacts', 'object', body.artifacts));
      }
      if (errors.length > 0 || !matrix) {
        throw new ConfigurationError(errors);
      }

      const run = await orchestrator.createRun({
        matrix,
        artifacts: isRecord(body.artifacts) ? body.artifacts : undefined,
        options,
      });

      // Execute asynchronously (non-blocking); the outcome is recorded on the run
      orchestrator.executeRun(run.id).catch((err: unknown) => {
        log.error('Background run execution failed', {
          runId: run.id,
          error: err instanceof Error ? err.message : String(err),
        });
      });

      res.status(201).json({ run });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * GET /runs
   * Optional `status`, `limit` and `offset` query parameters.
   */
  router.get('/runs', async (req, res) => {
    try {
      const status = isRunStatus(req.query.status) ? req.query.status : undefined;
      const { limit, offset } = readPaging(req.query);
      const all = await store.runs.list({ status, limit: Number.MAX_SAFE_INTEGER });
      res.json(toListResult(all.slice(offset, offset + limit), all.length, { limit, offset }));
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * GET /runs/:runId
   */
  router.get('/runs/:runId', async (req, res) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(notFoundError('Run', req.params.runId)));
        return;
      }
      res.json({ run });
    } catch (err) {
      sendError(res, err);
    }
  });

  /**
   * POST /runs/:runId/cancel
   * Body: { reason? }
   */
  router.post('/runs/:runId/cancel', async (req, res) => {
    try {
      const body: unknown = req.body;
      const reason = isRecord(body) && isString(body.reason) ? body.reason : undefined;
      const run = await orchestrator.cancelRun(req.params.runId, reason);
      res.json({ run });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
