/**
 * Pipeline event domain model.
 *
 * Events are emitted as stable, versioned schemas for downstream consumers
 * (dashboards, chat notifiers, the HTTP event feed).
 */

/** Event types emitted by the pipeline. */
export type PipelineEventType =
  | 'run.created'
  | 'run.superseded'
  | 'run.started'
  | 'run.succeeded'
  | 'run.failed'
  | 'run.cancelled'
  | 'build.started'
  | 'build.failed'
  | 'artifact.published'
  | 'job.started'
  | 'job.passed'
  | 'job.failed'
  | 'job.timed_out'
  | 'job.cancelled'
  | 'coverage.reported'
  | 'coverage.failed';

export const PIPELINE_EVENT_TYPES: readonly PipelineEventType[] = [
  'run.created',
  'run.superseded',
  'run.started',
  'run.succeeded',
  'run.failed',
  'run.cancelled',
  'build.started',
  'build.failed',
  'artifact.published',
  'job.started',
  'job.passed',
  'job.failed',
  'job.timed_out',
  'job.cancelled',
  'coverage.reported',
  'coverage.failed',
];

export function isPipelineEventType(value: unknown): value is PipelineEventType {
  return typeof value === 'string' && PIPELINE_EVENT_TYPES.some((type) => type === value);
}

/** A pipeline event with stable schema. */
export interface PipelineEvent {
  id: string;
  type: PipelineEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  runId: string;
  lane: string;
  jobName?: string;
  artifactId?: string;
  /** Event-specific payload. */
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Only deliver events for this lane. */
  lane?: string;
  /** Only deliver events for this run. */
  runId?: string;
  /** Filter by event types. */
  eventTypes?: PipelineEventType[];
  /** Callback for event delivery. */
  callback: (event: PipelineEvent) => void;
}
