/**
 * Run domain model.
 *
 * A single invocation of the pipeline for one lane: one build, one
 * published artifact, and the results of every matrix job that ran
 * against it.
 */

import { TypedError } from './errors';
import { CoverageReport } from './coverage';
import { RunTrigger } from './trigger';

/** Run lifecycle states. */
export enum RunStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Cancelled = 'cancelled',
}

/** Which stage of the pipeline a run is in. */
export enum RunPhase {
  Admission = 'admission',
  Build = 'build',
  FanOut = 'fan-out',
  Complete = 'complete',
}

/** Job-level states. */
export enum JobStatus {
  Pending = 'pending',
  Running = 'running',
  Passed = 'passed',
  Failed = 'failed',
  TimedOut = 'timed-out',
  Cancelled = 'cancelled',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Pending]: [RunStatus.Running, RunStatus.Cancelled],
  [RunStatus.Running]: [RunStatus.Succeeded, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Succeeded]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Cancelled]: [],
};

/** Valid state transitions for jobs. */
export const VALID_JOB_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  [JobStatus.Pending]: [JobStatus.Running, JobStatus.Cancelled],
  [JobStatus.Running]: [JobStatus.Passed, JobStatus.Failed, JobStatus.TimedOut, JobStatus.Cancelled],
  [JobStatus.Passed]: [],
  [JobStatus.Failed]: [],
  [JobStatus.TimedOut]: [],
  [JobStatus.Cancelled]: [],
};

/** Outcome of executing one JobSpec. */
export interface JobResult {
  jobName: string;
  group: string;
  status: JobStatus;
  startedAt?: string;
  completedAt?: string;
  durationMs?: number;
  /** Present only when the job ran to completion (passed, or failed after running). */
  coverage?: CoverageReport;
  error?: TypedError;
  /** Set when forwarding this job's coverage failed. */
  reportingError?: TypedError;
  /** Whether the coverage aggregator accepted this job's report. */
  coverageReported?: boolean;
}

/** One invocation of the pipeline. */
export interface Run {
  id: string;
  /** Concurrency scope, usually the branch or ref. */
  lane: string;
  trigger: RunTrigger;
  /** Resolved from the trigger kind at creation time. */
  cancelOnSupersede: boolean;
  status: RunStatus;
  phase: RunPhase;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  artifactId?: string;
  /** Job results keyed by job name, in matrix order. */
  jobResults: Record<string, JobResult>;
  error?: TypedError;
  supersededBy?: string;
  cancelledAt?: string;
  cancelReason?: string;
}

/** Returned by the orchestrator for every trigger it evaluates. */
export type RunOutcome =
  | { kind: 'skipped'; trigger: RunTrigger; reason: TypedError }
  | { kind: 'completed'; run: Run; jobResults: JobResult[] };
