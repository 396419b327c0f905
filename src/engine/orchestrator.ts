/**
 * Pipeline orchestrator — the core sequencing engine.
 *
 * Build once, publish the artifact, expand the matrix, then run every job
 * concurrently against that artifact. Results stream to the coverage
 * aggregator as each job finishes. Job failures are isolated (fail-fast is
 * off) but still fail the run; a build failure stops everything downstream.
 */

import { v4 as uuid } from 'uuid';
import { ArtifactHandle, BuildOutput } from '../domain/artifact';
import {
  TypedError,
  createTypedError,
  hasTypedError,
  runAlreadyExecutingError,
  runJobsFailedError,
  runNotAdmittedError,
  runNotFoundError,
  runSupersededError,
  triggerNotAdmittedError,
} from '../domain/errors';
import { PipelineEventType } from '../domain/events';
import { JobSpec, MatrixDeclaration } from '../domain/matrix';
import { JobStatus, Run, RunOutcome, RunPhase, RunStatus } from '../domain/run';
import { RunTrigger, TriggerPolicy } from '../domain/trigger';
import { PipelinePublisher } from '../data-plane/publisher';
import { Logger, logger } from '../logger';
import { ArtifactStoreError, Store } from '../storage/store';
import { BuildRecipe, BuildRecipeExecutor } from './collaborators';
import { RunConcurrencyController } from './concurrency-controller';
import { CoverageAggregator, ReportingError } from './coverage-aggregator';
import { JobExecutor } from './job-executor';
import { expandMatrix } from './matrix-expander';
import { isTerminalJobStatus, isTerminalRunStatus, transitionJobStatus, transitionRunStatus } from './state-machine';
import { isGroupAdmitted, resolveCancelOnSupersede, shouldAdmit } from './trigger-policy';

/** Everything the orchestrator drives. */
export interface OrchestratorDeps {
  store: Store;
  publisher: PipelinePublisher;
  controller: RunConcurrencyController;
  builder: BuildRecipeExecutor;
  jobExecutor: JobExecutor;
  aggregator: CoverageAggregator;
}

/** Orchestrator configuration. */
export interface OrchestratorConfig {
  recipe: BuildRecipe;
  policy: TriggerPolicy;
  /** Called once per run, at the start of the fan-out stage. */
  loadMatrix: () => MatrixDeclaration;
}

export type TriggerEvaluation =
  | { admitted: true }
  | { admitted: false; reason: TypedError };

const JOB_EVENT: Record<JobStatus, PipelineEventType> = {
  [JobStatus.Pending]: 'job.started',
  [JobStatus.Running]: 'job.started',
  [JobStatus.Passed]: 'job.passed',
  [JobStatus.Failed]: 'job.failed',
  [JobStatus.TimedOut]: 'job.timed_out',
  [JobStatus.Cancelled]: 'job.cancelled',
};

export class PipelineOrchestrator {
  /** Guard against concurrent executeRun calls on the same run. */
  private runningRuns = new Set<string>();
  private log: Logger = logger.child({ module: 'orchestrator' });

  constructor(
    private deps: OrchestratorDeps,
    private config: OrchestratorConfig,
  ) {}

  /** Gate a trigger before any run exists. */
  evaluateTrigger(trigger: RunTrigger): TriggerEvaluation {
    if (shouldAdmit(trigger, this.config.policy)) {
      return { admitted: true };
    }
    return {
      admitted: false,
      reason: triggerNotAdmittedError(trigger.kind, this.config.policy.admitKinds),
    };
  }

  /** Evaluate, create and execute a run for one trigger. */
  async execute(trigger: RunTrigger): Promise<RunOutcome> {
    const evaluation = this.evaluateTrigger(trigger);
    if (!evaluation.admitted) {
      this.log.info('Trigger skipped', { kind: trigger.kind, lane: trigger.lane });
      return { kind: 'skipped', trigger, reason: evaluation.reason };
    }
    const run = await this.createRun(trigger);
    return this.executeRun(run.id);
  }

  /**
   * Create a run and admit it to its lane. A previous run in the lane is
   * superseded (and cancelled, if the new run's policy says so) before this
   * returns.
   */
  async createRun(trigger: RunTrigger): Promise<Run> {
    const evaluation = this.evaluateTrigger(trigger);
    if (!evaluation.admitted) {
      throw new OrchestratorError(evaluation.reason);
    }

    const now = new Date().toISOString();
    const run: Run = {
      id: `run_${uuid()}`,
      lane: trigger.lane,
      trigger,
      cancelOnSupersede: resolveCancelOnSupersede(trigger.kind, this.config.policy),
      status: RunStatus.Pending,
      phase: RunPhase.Admission,
      createdAt: now,
      updatedAt: now,
      jobResults: {},
    };

    await this.deps.store.runs.create(run);
    const decision = this.deps.controller.admit(run);
    await this.safePublishRunEvent(run, 'run.created');

    if (decision.superseded) {
      const previous = await this.deps.store.runs.getById(decision.superseded.runId);
      if (previous) {
        await this.safePublishRunEvent(previous, 'run.superseded', {
          supersededBy: run.id,
          cancelled: decision.superseded.cancelled,
        });
      }
    }

    return run;
  }

  /** Execute an admitted run through build, fan-out and aggregation. */
  async executeRun(runId: string): Promise<RunOutcome> {
    if (this.runningRuns.has(runId)) {
      throw new OrchestratorError(runAlreadyExecutingError(runId));
    }
    this.runningRuns.add(runId);

    let run: Run | null = null;
    try {
      run = await this.deps.store.runs.getById(runId);
      if (!run) {
        throw new OrchestratorError(runNotFoundError(runId));
      }
      const signal = this.deps.controller.signalFor(run.id);
      if (!signal) {
        throw new OrchestratorError(runNotAdmittedError(run.id));
      }
      const active = run;
      let finished: Run;
      try {
        finished = await this.executeRunInternal(active, signal);
      } catch (err) {
        await this.failOnCrash(active, err);
        throw err;
      } finally {
        await this.cleanupBuild(active);
      }
      return { kind: 'completed', run: finished, jobResults: Object.values(finished.jobResults) };
    } finally {
      if (run) this.deps.controller.release(run);
      this.runningRuns.delete(runId);
    }
  }

  /** Record an unexpected error on a run that has not reached a terminal status. */
  private async failOnCrash(run: Run, err: unknown): Promise<void> {
    if (isTerminalRunStatus(run.status)) return;
    const message = err instanceof Error ? err.message : String(err);
    this.log.error('Run crashed', { runId: run.id, error: message });
    try {
      await this.failRun(
        run,
        createTypedError({ code: 'SYSTEM.INTERNAL', message: `Run execution crashed: ${message}`, runId: run.id }),
      );
    } catch (persistErr) {
      this.log.error('Could not record run crash', {
        runId: run.id,
        error: persistErr instanceof Error ? persistErr.message : String(persistErr),
      });
    }
  }

  private async cleanupBuild(run: Run): Promise<void> {
    if (!this.deps.builder.cleanup) return;
    try {
      await this.deps.builder.cleanup(run.id);
    } catch (err) {
      this.log.warn('Build cleanup failed', { runId: run.id, error: err instanceof Error ? err.message : String(err) });
    }
  }

  private async executeRunInternal(run: Run, signal: AbortSignal): Promise<Run> {
    const runLog = this.log.child({ runId: run.id, lane: run.lane });

    if (signal.aborted) {
      runLog.info('Run superseded before build');
      return this.cancelRun(run);
    }

    // --- Build ---
    run = await this.transitionRun(run, RunStatus.Running);
    run.startedAt = new Date().toISOString();
    run.phase = RunPhase.Build;
    await this.persist(run);
    await this.safePublishRunEvent(run, 'run.started');
    await this.safePublishRunEvent(run, 'build.started');

    const output = await this.runBuild(run, signal, runLog);
    if (signal.aborted) {
      runLog.info('Run superseded during build; artifact not published');
      return this.cancelRun(run);
    }

    let handle: ArtifactHandle;
    try {
      handle = await this.deps.store.artifacts.publish(run, output);
    } catch (err) {
      if (err instanceof ArtifactStoreError) {
        runLog.error('Build failed', { code: err.typedError.code, message: err.typedError.message });
        run.error = err.typedError;
        await this.safePublishRunEvent(run, 'build.failed');
        return this.failRun(run, err.typedError);
      }
      throw err;
    }
    run.artifactId = handle.artifactId;
    await this.persist(run);
    await this.safePublishRunEvent(run, 'artifact.published');

    // --- Fan-out ---
    let specs: JobSpec[];
    try {
      specs = expandMatrix(this.config.loadMatrix(), {
        includeGroup: (group) => isGroupAdmitted(group, run.trigger.kind),
      });
    } catch (err) {
      // MatrixError, or a ConfigError from a matrix loader
      if (hasTypedError(err)) {
        runLog.error('Matrix expansion failed', { code: err.typedError.code });
        return this.failRun(run, err.typedError);
      }
      throw err;
    }

    run.phase = RunPhase.FanOut;
    for (const spec of specs) {
      run.jobResults[spec.name] = { jobName: spec.name, group: spec.group, status: JobStatus.Pending };
    }
    await this.persist(run);
    runLog.info('Dispatching jobs', { jobs: specs.length, artifactId: handle.artifactId });

    const settled = await Promise.allSettled(
      specs.map((spec) => this.runJob(run, spec, handle, signal)),
    );
    const crashed = settled.find((s): s is PromiseRejectedResult => s.status === 'rejected');
    if (crashed) {
      throw crashed.reason;
    }

    // --- Outcome ---
    if (signal.aborted) {
      return this.cancelRun(run);
    }

    const results = Object.values(run.jobResults);
    const failedJobs = results.filter((r) => r.status !== JobStatus.Passed).map((r) => r.jobName);
    const reportingFailures = results.filter((r) => r.reportingError).map((r) => r.jobName);

    if (failedJobs.length === 0 && reportingFailures.length === 0) {
      run.status = RunStatus.Succeeded;
      run.phase = RunPhase.Complete;
      run.completedAt = new Date().toISOString();
      await this.persist(run);
      await this.safePublishRunEvent(run, 'run.succeeded');
      runLog.info('Run succeeded', { jobs: results.length });
      return run;
    }

    runLog.warn('Run failed', { failedJobs, reportingFailures });
    return this.failRun(run, runJobsFailedError(run.id, failedJobs, reportingFailures));
  }

  private async runBuild(run: Run, signal: AbortSignal, runLog: Logger): Promise<BuildOutput> {
    try {
      const image = await this.deps.builder.build({ runId: run.id, recipe: this.config.recipe }, signal);
      runLog.info('Build finished', { pointer: image.pointer.uri, contentHash: image.contentHash });
      return { status: 'succeeded', image };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { status: 'failed', message, details: { tag: this.config.recipe.tag } };
    }
  }

  /**
   * Run one job and forward its result. A result that arrives after the run
   * was superseded is recorded but never forwarded.
   */
  private async runJob(run: Run, spec: JobSpec, handle: ArtifactHandle, signal: AbortSignal): Promise<void> {
    this.assertJobTransition(run.jobResults[spec.name]?.status ?? JobStatus.Pending, JobStatus.Running);
    run.jobResults[spec.name] = {
      jobName: spec.name,
      group: spec.group,
      status: JobStatus.Running,
      startedAt: new Date().toISOString(),
    };
    await this.persist(run);
    await this.safePublishJobEvent(run, spec.name, 'job.started');

    const result = await this.deps.jobExecutor.run(spec, handle, signal);
    this.assertJobTransition(JobStatus.Running, result.status);
    run.jobResults[spec.name] = result;
    await this.persist(run);
    await this.safePublishJobEvent(run, spec.name, JOB_EVENT[result.status]);

    if (signal.aborted) return;

    try {
      const ack = await this.deps.aggregator.collect(result, {
        runId: run.id,
        lane: run.lane,
        ...(run.trigger.sha !== undefined ? { sha: run.trigger.sha } : {}),
      });
      if (ack) {
        result.coverageReported = true;
        await this.safePublishJobEvent(run, spec.name, 'coverage.reported');
      }
    } catch (err) {
      if (!(err instanceof ReportingError)) throw err;
      result.coverageReported = false;
      result.reportingError = err.typedError;
      await this.safePublishJobEvent(run, spec.name, 'coverage.failed');
    }
    await this.persist(run);
  }

  private async persist(run: Run): Promise<void> {
    await this.deps.store.runs.update(run.id, run);
  }

  private async transitionRun(run: Run, target: RunStatus): Promise<Run> {
    const result = transitionRunStatus(run.status, target);
    if (!result.success) {
      throw new OrchestratorError(result.error);
    }
    run.status = result.newStatus;
    await this.persist(run);
    return run;
  }

  private assertJobTransition(current: JobStatus, target: JobStatus): void {
    const result = transitionJobStatus(current, target);
    if (!result.success) {
      throw new OrchestratorError(result.error);
    }
  }

  private async failRun(run: Run, error: TypedError): Promise<Run> {
    run.status = RunStatus.Failed;
    run.phase = RunPhase.Complete;
    run.error = error;
    run.completedAt = new Date().toISOString();
    await this.persist(run);
    await this.safePublishRunEvent(run, 'run.failed');
    return run;
  }

  /** Mark the run and every unfinished job cancelled. */
  private async cancelRun(run: Run): Promise<Run> {
    const cancellation = this.deps.controller.cancellationOf(run.id);
    const now = new Date().toISOString();

    run.status = RunStatus.Cancelled;
    run.phase = RunPhase.Complete;
    run.cancelledAt = now;
    run.completedAt = now;
    if (cancellation) {
      run.supersededBy = cancellation.supersededBy;
      run.cancelReason = cancellation.reason;
      run.error = runSupersededError(run.id, cancellation.supersededBy);
    }

    for (const [jobName, result] of Object.entries(run.jobResults)) {
      if (!isTerminalJobStatus(result.status)) {
        run.jobResults[jobName] = { ...result, status: JobStatus.Cancelled, completedAt: now };
      }
    }

    await this.persist(run);
    await this.safePublishRunEvent(run, 'run.cancelled');
    return run;
  }

  // Event publishing is observational: a publisher failure is logged and
  // never changes the run's outcome.

  private async safePublishRunEvent(
    run: Run,
    eventType: PipelineEventType,
    extra?: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.deps.publisher.publishRunEvent(run, eventType, extra);
    } catch (err) {
      this.log.warn('Event publish failed', { runId: run.id, eventType, error: err instanceof Error ? err.message : String(err) });
    }
  }

  private async safePublishJobEvent(run: Run, jobName: string, eventType: PipelineEventType): Promise<void> {
    try {
      await this.deps.publisher.publishJobEvent(run, jobName, eventType);
    } catch (err) {
      this.log.warn('Event publish failed', { runId: run.id, jobName, eventType, error: err instanceof Error ? err.message : String(err) });
    }
  }
}

/** Orchestrator-specific error wrapper. */
export class OrchestratorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'OrchestratorError';
  }
}

