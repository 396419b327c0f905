/**
 * Run API routes.
 *
 * POST /runs — Submit a trigger; starts a run when the trigger is admitted
 * GET /runs — List runs, newest first (filters: lane, status)
 * GET /runs/:runId — Get run status and per-job results
 */

import { Router } from 'express';
import { runNotFoundError, validationError } from '../domain/errors';
import { RunStatus } from '../domain/run';
import { RunTrigger, TRIGGER_KINDS, isTriggerKind } from '../domain/trigger';
import { PipelineOrchestrator } from '../engine/orchestrator';
import { logger } from '../logger';
import { Store } from '../storage/store';
import { RequestError, parsePagination, queryString } from './middleware';

const log = logger.child({ module: 'api.runs' });

const RUN_STATUSES: readonly RunStatus[] = Object.values(RunStatus);

function isRunStatus(value: unknown): value is RunStatus {
  return RUN_STATUSES.some((status) => status === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new RequestError(validationError(`${field} must be a string`, { field }));
  }
  return value;
}

/** Validate a POST /runs body into a trigger. */
export function parseTrigger(body: unknown): RunTrigger {
  if (!isRecord(body)) {
    throw new RequestError(validationError('Request body must be a JSON object'));
  }
  const fields = body;
  if (!isTriggerKind(fields.kind)) {
    throw new RequestError(
      validationError('kind must be a known trigger kind', { field: 'kind', allowed: [...TRIGGER_KINDS] }),
    );
  }
  if (typeof fields.lane !== 'string' || fields.lane.trim() === '') {
    throw new RequestError(validationError('lane is required', { field: 'lane' }));
  }
  return {
    kind: fields.kind,
    lane: fields.lane,
    sha: optionalString(fields, 'sha'),
    triggeredBy: optionalString(fields, 'triggeredBy'),
    receivedAt: new Date().toISOString(),
  };
}

export function createRunRoutes(store: Store, orchestrator: PipelineOrchestrator): Router {
  const router = Router();

  /**
   * POST /runs
   * 202 with the created run, or 200 with `skipped: true` when the trigger
   * kind does not start runs.
   */
  router.post('/runs', async (req, res, next) => {
    try {
      const trigger = parseTrigger(req.body);
      const evaluation = orchestrator.evaluateTrigger(trigger);
      if (!evaluation.admitted) {
        res.json({ skipped: true, reason: evaluation.reason });
        return;
      }

      const run = await orchestrator.createRun(trigger);

      // Execute asynchronously; the outcome is recorded on the run
      orchestrator.executeRun(run.id).catch((err: unknown) => {
        log.error('Run execution crashed', {
          runId: run.id,
          error: err instanceof Error ? err.message : String(err),
        });
      });

      res.status(202).json({ run });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /runs
   */
  router.get('/runs', async (req, res, next) => {
    try {
      const status = queryString(req.query.status);
      if (status !== undefined && !isRunStatus(status)) {
        throw new RequestError(validationError(`Unknown run status: ${status}`, { allowed: [...RUN_STATUSES] }));
      }
      const result = await store.runs.list({
        ...parsePagination(req.query),
        lane: queryString(req.query.lane),
        status,
      });
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /runs/:runId
   */
  router.get('/runs/:runId', async (req, res, next) => {
    try {
      const run = await store.runs.getById(req.params.runId);
      if (!run) {
        throw new RequestError(runNotFoundError(req.params.runId));
      }
      res.json({ run });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
