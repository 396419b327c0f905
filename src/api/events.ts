/**
 * Event stream API routes.
 *
 * GET /runs/:runId/events — List events for a run (filter: types=a,b)
 */

import { Router } from 'express';
import { runNotFoundError } from '../domain/errors';
import { isPipelineEventType } from '../domain/events';
import { PipelinePublisher } from '../data-plane/publisher';
import { Store } from '../storage/store';
import { RequestError, queryString } from './middleware';

export function createEventRoutes(store: Store, publisher: PipelinePublisher): Router {
  const router = Router();

  router.get('/runs/:runId/events', async (req, res, next) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        throw new RequestError(runNotFoundError(req.params.runId));
      }

      const types = queryString(req.query.types);
      const eventTypes = types ? types.split(',').filter(isPipelineEventType) : undefined;

      const events = await publisher.getEventsByRun(run.id, eventTypes);
      res.json({ events, total: events.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
