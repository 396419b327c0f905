import {
  transitionRunStatus,
  transitionJobStatus,
  isTerminalRunStatus,
  isTerminalJobStatus,
  jobRanToCompletion,
} from '../../src/engine/state-machine';
import { JobStatus, RunStatus } from '../../src/domain/run';

describe('Run State Machine', () => {
  test('valid transition: pending -> running', () => {
    const result = transitionRunStatus(RunStatus.Pending, RunStatus.Running);
    expect(result).toEqual({ success: true, newStatus: RunStatus.Running });
  });

  test('valid transition: pending -> cancelled', () => {
    expect(transitionRunStatus(RunStatus.Pending, RunStatus.Cancelled).success).toBe(true);
  });

  test('valid transitions out of running', () => {
    expect(transitionRunStatus(RunStatus.Running, RunStatus.Succeeded).success).toBe(true);
    expect(transitionRunStatus(RunStatus.Running, RunStatus.Failed).success).toBe(true);
    expect(transitionRunStatus(RunStatus.Running, RunStatus.Cancelled).success).toBe(true);
  });

  test('invalid transition: succeeded -> running', () => {
    const result = transitionRunStatus(RunStatus.Succeeded, RunStatus.Running);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('RUN.INVALID_TRANSITION');
      expect(result.error.details).toEqual({ current: 'succeeded', target: 'running', validTargets: [] });
    }
  });

  test('invalid transition: pending -> succeeded', () => {
    expect(transitionRunStatus(RunStatus.Pending, RunStatus.Succeeded).success).toBe(false);
  });

  test('terminal status detection', () => {
    expect(isTerminalRunStatus(RunStatus.Succeeded)).toBe(true);
    expect(isTerminalRunStatus(RunStatus.Failed)).toBe(true);
    expect(isTerminalRunStatus(RunStatus.Cancelled)).toBe(true);
    expect(isTerminalRunStatus(RunStatus.Pending)).toBe(false);
    expect(isTerminalRunStatus(RunStatus.Running)).toBe(false);
  });
});

describe('Job State Machine', () => {
  test('valid transition: pending -> running', () => {
    expect(transitionJobStatus(JobStatus.Pending, JobStatus.Running).success).toBe(true);
  });

  test('every terminal job status is reachable from running', () => {
    for (const target of [JobStatus.Passed, JobStatus.Failed, JobStatus.TimedOut, JobStatus.Cancelled]) {
      expect(transitionJobStatus(JobStatus.Running, target).success).toBe(true);
    }
  });

  test('invalid transition: timed-out -> passed', () => {
    const result = transitionJobStatus(JobStatus.TimedOut, JobStatus.Passed);
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('JOB.INVALID_TRANSITION');
    }
  });

  test('terminal status detection', () => {
    expect(isTerminalJobStatus(JobStatus.Passed)).toBe(true);
    expect(isTerminalJobStatus(JobStatus.TimedOut)).toBe(true);
    expect(isTerminalJobStatus(JobStatus.Cancelled)).toBe(true);
    expect(isTerminalJobStatus(JobStatus.Running)).toBe(false);
  });

  test('only passed and failed jobs ran to completion', () => {
    expect(jobRanToCompletion(JobStatus.Passed)).toBe(true);
    expect(jobRanToCompletion(JobStatus.Failed)).toBe(true);
    expect(jobRanToCompletion(JobStatus.TimedOut)).toBe(false);
    expect(jobRanToCompletion(JobStatus.Cancelled)).toBe(false);
  });
});
