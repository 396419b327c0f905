/** Per-job coverage payload. The pipeline never looks inside `payload`. */
export interface CoverageReport {
  jobName: string;
  /** Payload format hint for the sink, e.g. `lcov`. */
  format: string;
  payload: string;
  /** Run the report came from. */
  runId?: string;
  lane?: string;
  /** Commit under test, when the trigger carried one. */
  sha?: string;
}

/** Where a report came from; attached to every upload. */
export type CoverageContext = Pick<CoverageReport, 'runId' | 'lane' | 'sha'>;

/** Acknowledgement returned by a coverage sink. */
export interface CoverageAck {
  jobName: string;
  /** Sink-assigned upload reference, when the sink returns one. */
  reference?: string;
  acceptedAt: string;
}
