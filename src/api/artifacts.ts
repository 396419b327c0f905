/**
 * Artifact API routes.
 *
 * GET /runs/:runId/artifact — The artifact published by a run
 */

import { Router } from 'express';
import { notFoundError, runNotFoundError } from '../domain/errors';
import { Store } from '../storage/store';
import { RequestError } from './middleware';

export function createArtifactRoutes(store: Store): Router {
  const router = Router();

  router.get('/runs/:runId/artifact', async (req, res, next) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        throw new RequestError(runNotFoundError(req.params.runId));
      }
      const artifact = await store.artifacts.getByRunId(run.id);
      if (!artifact) {
        throw new RequestError(notFoundError('Artifact for run', run.id));
      }
      res.json({ artifact });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
