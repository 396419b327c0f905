/**
 * Coverage aggregator — forwards each job's coverage report to the
 * external sink, tagged with the job name and the run it came from.
 *
 * There is no best-effort mode: any sink failure surfaces as a
 * `ReportingError`, which the orchestrator escalates to run failure.
 */

import { CoverageAck, CoverageContext, CoverageReport } from '../domain/coverage';
import { TypedError, coverageMissingError, reportingFailureError } from '../domain/errors';
import { JobResult, JobStatus } from '../domain/run';
import { logger } from '../logger';
import { CoverageSink, CoverageSinkError } from './collaborators';
import { jobRanToCompletion } from './state-machine';

const log = logger.child({ module: 'coverage-aggregator' });

/** Coverage reporting error wrapper. */
export class ReportingError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ReportingError';
  }
}

export class CoverageAggregator {
  constructor(private sink: CoverageSink) {}

  /** Upload one report. Throws `ReportingError` if the sink rejects it. */
  async report(jobName: string, coverage: CoverageReport, context: CoverageContext = {}): Promise<CoverageAck> {
    try {
      const ack = await this.sink.upload({ ...coverage, ...context, jobName });
      log.info('Coverage reported', { jobName, reference: ack.reference });
      return ack;
    } catch (err) {
      const statusCode = err instanceof CoverageSinkError ? err.statusCode : undefined;
      const message = err instanceof Error ? err.message : String(err);
      log.error('Coverage upload failed', { jobName, statusCode, error: message });
      throw new ReportingError(reportingFailureError(jobName, message, statusCode));
    }
  }

  /**
   * Forward whatever coverage a finished job has.
   *
   * Returns null when the job has nothing to forward (timed out, cancelled,
   * or failed before producing coverage). A passed job without coverage is
   * a reporting failure.
   */
  async collect(result: JobResult, context: CoverageContext = {}): Promise<CoverageAck | null> {
    if (result.coverage && jobRanToCompletion(result.status)) {
      return this.report(result.jobName, result.coverage, context);
    }
    if (result.status === JobStatus.Passed) {
      log.error('Passed job produced no coverage', { jobName: result.jobName });
      throw new ReportingError(coverageMissingError(result.jobName));
    }
    return null;
  }
}
