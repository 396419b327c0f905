/**
 * Job executor — runs one matrix job against the run's artifact.
 *
 * Sandbox execution races the job's timeout and the run's cancellation
 * signal; whichever settles first decides the job status. When the timeout
 * or the cancellation wins, the sandbox's own signal is aborted so the
 * environment can be torn down.
 */

import { Artifact, ArtifactHandle } from '../domain/artifact';
import {
  TypedError,
  hasTypedError,
  jobCancelledError,
  jobExecutionError,
  jobTestFailedError,
  jobTimeoutError,
} from '../domain/errors';
import { JobSpec, MAX_TIMER_MS } from '../domain/matrix';
import { JobResult, JobStatus } from '../domain/run';
import { logger } from '../logger';
import { ArtifactStore } from '../storage/store';
import { ExecutionSandbox, SandboxResult } from './collaborators';

const log = logger.child({ module: 'job-executor' });

type RaceOutcome =
  | { kind: 'completed'; result: SandboxResult }
  | { kind: 'crashed'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

export class JobExecutor {
  constructor(
    private artifacts: ArtifactStore,
    private sandbox: ExecutionSandbox,
  ) {}

  async run(spec: JobSpec, handle: ArtifactHandle, cancelSignal: AbortSignal): Promise<JobResult> {
    const startedAt = new Date().toISOString();
    const jobLog = log.child({ runId: handle.runId, jobName: spec.name, group: spec.group });
    const finish = (status: JobStatus, extra: Partial<JobResult> = {}): JobResult => {
      const completedAt = new Date().toISOString();
      return {
        jobName: spec.name,
        group: spec.group,
        status,
        startedAt,
        completedAt,
        durationMs: new Date(completedAt).getTime() - new Date(startedAt).getTime(),
        ...extra,
      };
    };

    if (cancelSignal.aborted) {
      return finish(JobStatus.Cancelled, { error: jobCancelledError(handle.runId, spec.name, 'run superseded') });
    }

    let artifact: Artifact;
    try {
      artifact = await this.artifacts.fetch(handle);
    } catch (err) {
      const error: TypedError = hasTypedError(err)
        ? { ...err.typedError, jobName: spec.name }
        : jobExecutionError(handle.runId, spec.name, errorMessage(err));
      jobLog.error('Artifact unavailable', { code: error.code });
      return finish(JobStatus.Failed, { error });
    }

    const sandboxController = new AbortController();
    jobLog.info('Job started', { timeoutMs: spec.timeoutMs, artifactId: artifact.id });

    const outcome = await raceExecution(
      () =>
        this.sandbox.execute(
          {
            runId: handle.runId,
            jobName: spec.name,
            group: spec.group,
            timeoutMs: spec.timeoutMs,
            artifact,
          },
          sandboxController.signal,
        ),
      spec.timeoutMs,
      cancelSignal,
    );

    switch (outcome.kind) {
      case 'timeout':
        sandboxController.abort();
        jobLog.warn('Job timed out', { timeoutMs: spec.timeoutMs });
        return finish(JobStatus.TimedOut, { error: jobTimeoutError(handle.runId, spec.name, spec.timeoutMs) });

      case 'cancelled':
        sandboxController.abort();
        jobLog.info('Job cancelled');
        return finish(JobStatus.Cancelled, { error: jobCancelledError(handle.runId, spec.name, 'run superseded') });

      case 'crashed':
        jobLog.error('Sandbox crashed', { error: errorMessage(outcome.error) });
        return finish(JobStatus.Failed, { error: jobExecutionError(handle.runId, spec.name, errorMessage(outcome.error)) });

      case 'completed': {
        const { result } = outcome;
        if (result.output) {
          jobLog.debug('Job output', { output: result.output });
        }
        const coverage = result.coverage ? { ...result.coverage, jobName: spec.name } : undefined;
        if (result.passed) {
          jobLog.info('Job passed', { hasCoverage: coverage !== undefined });
          return finish(JobStatus.Passed, { coverage });
        }
        jobLog.warn('Job failed', { exitCode: result.exitCode, hasCoverage: coverage !== undefined });
        return finish(JobStatus.Failed, {
          coverage,
          error: jobTestFailedError(handle.runId, spec.name, result.exitCode),
        });
      }
    }
  }
}

/**
 * Settle with whichever of execution, timeout or cancellation happens
 * first. Execution is never started if the signal is already aborted.
 */
function raceExecution(
  execute: () => Promise<SandboxResult>,
  timeoutMs: number,
  cancelSignal: AbortSignal,
): Promise<RaceOutcome> {
  return new Promise<RaceOutcome>((resolve) => {
    if (cancelSignal.aborted) {
      resolve({ kind: 'cancelled' });
      return;
    }

    let settled = false;
    const settle = (outcome: RaceOutcome) => {
      if (settled) return;
      settled = true;
      stopTimer();
      cancelSignal.removeEventListener('abort', onAbort);
      resolve(outcome);
    };
    const onAbort = () => settle({ kind: 'cancelled' });
    const stopTimer = startTimer(timeoutMs, () => settle({ kind: 'timeout' }));
    cancelSignal.addEventListener('abort', onAbort, { once: true });

    Promise.resolve()
      .then(execute)
      .then(
        (result) => settle({ kind: 'completed', result }),
        (error: unknown) => settle({ kind: 'crashed', error }),
      );
  });
}

/**
 * Fire `onElapsed` after `delayMs`, chaining timers for delays a single
 * timer cannot hold. Returns a function that stops it.
 */
export function startTimer(delayMs: number, onElapsed: () => void): () => void {
  let timer: NodeJS.Timeout;
  const schedule = (remaining: number) => {
    if (remaining > MAX_TIMER_MS) {
      timer = setTimeout(() => schedule(remaining - MAX_TIMER_MS), MAX_TIMER_MS);
    } else {
      timer = setTimeout(onElapsed, remaining);
    }
  };
  schedule(delayMs);
  return () => clearTimeout(timer);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
