/**
 * Lane and matrix API routes.
 *
 * GET /lanes — Runs currently holding each lane
 * GET /matrix?kind= — The jobs a trigger of that kind would fan out to
 */

import { Router } from 'express';
import { validationError } from '../domain/errors';
import { MatrixDeclaration } from '../domain/matrix';
import { TRIGGER_KINDS, isTriggerKind } from '../domain/trigger';
import { RunConcurrencyController } from '../engine/concurrency-controller';
import { expandMatrix } from '../engine/matrix-expander';
import { isGroupAdmitted } from '../engine/trigger-policy';
import { RequestError, queryString } from './middleware';

export function createLaneRoutes(
  controller: RunConcurrencyController,
  loadMatrix: () => MatrixDeclaration,
): Router {
  const router = Router();

  router.get('/lanes', (_req, res) => {
    const lanes = controller.activeLanes();
    res.json({ lanes, total: lanes.length });
  });

  router.get('/matrix', (req, res, next) => {
    try {
      const kind = queryString(req.query.kind) ?? 'pull_request';
      if (!isTriggerKind(kind)) {
        throw new RequestError(validationError(`Unknown trigger kind: ${kind}`, { allowed: [...TRIGGER_KINDS] }));
      }
      const jobs = expandMatrix(loadMatrix(), { includeGroup: (group) => isGroupAdmitted(group, kind) });
      res.json({ kind, jobs, total: jobs.length });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
