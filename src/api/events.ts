/**
 * Event stream API routes.
 *
 * GET /runs/:runId/events: List events for a run
 * GET /pipelines/:pipelineId/events: List events for a pipeline
 */

import { Router } from 'express';
import { apiError, notFoundError } from '../domain/errors';
import { OrchestrationEvent } from '../domain/events';
import { EventPublisher } from '../data-plane/publisher';
import { isString } from '../guards';
import { Store, toListResult } from '../storage/store';
import { sendError } from './middleware';
import { readPaging } from './runs';

/** Keep events whose type is in the comma-separated `types` query value. */
function filterByTypes(events: OrchestrationEvent[], types: unknown): OrchestrationEvent[] {
  if (!isString(types) || types.length === 0) return events;
  const wanted = new Set(types.split(',').map((t) => t.trim()));
  return events.filter((event) => wanted.has(event.type));
}

export function createEventRoutes(store: Store, publisher: EventPublisher): Router {
  const router = Router();

  router.get('/runs/:runId/events', async (req, res) => {
    try {
      // Verify run exists
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        res.status(404).json(apiError(notFoundError('Run', req.params.runId)));
        return;
      }

      const events = filterByTypes(await publisher.getEventsByRun(run.id), req.query.types);
      res.json({ events, total: events.length });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get('/pipelines/:pipelineId/events', async (req, res) => {
    try {
      const pipeline = await store.pipelines.getById(req.params.pipelineId);
      if (!pipeline) {
        res.status(404).json(apiError(notFoundError('Pipeline', req.params.pipelineId)));
        return;
      }

      const events = filterByTypes(await publisher.getEventsByPipeline(pipeline.id), req.query.types);
      const { limit, offset } = readPaging(req.query);
      res.json(toListResult(events.slice(offset, offset + limit), events.length, { limit, offset }));
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
