/**
 * Storage layer interfaces.
 *
 * Defines the contract for data persistence with pluggable backends.
 * The only state the pipeline needs beyond a process lifetime is the run
 * history; the in-memory backend is the reference implementation.
 */

import { Artifact, ArtifactHandle, BuildOutput } from '../domain/artifact';
import { PipelineEvent, PipelineEventType } from '../domain/events';
import { Run, RunStatus } from '../domain/run';
import { TypedError } from '../domain/errors';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Paginated list result with metadata. */
export interface ListResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

/** Store interface for runs. */
export interface RunStore {
  create(run: Run): Promise<Run>;
  getById(id: string): Promise<Run | null>;
  update(id: string, run: Partial<Run>): Promise<Run | null>;
  /** Newest first. */
  list(options?: ListOptions & { lane?: string; status?: RunStatus }): Promise<ListResult<Run>>;
}

/**
 * Publish-once, read-many artifact storage keyed by run.
 *
 * `publish` is atomic: the artifact becomes visible to `fetch` in a single
 * step, and a failed build never produces a handle.
 */
export interface ArtifactStore {
  /** Throws `ArtifactStoreError` (BUILD.FAILED, ARTIFACT.ALREADY_PUBLISHED). */
  publish(run: Run, output: BuildOutput): Promise<ArtifactHandle>;
  /** Throws `ArtifactStoreError` (ARTIFACT.NOT_FOUND). */
  fetch(handle: ArtifactHandle): Promise<Artifact>;
  getByRunId(runId: string): Promise<Artifact | null>;
}

/** Store interface for pipeline events. */
export interface EventStore {
  create(event: PipelineEvent): Promise<PipelineEvent>;
  listByRun(runId: string, options?: ListOptions & { eventTypes?: PipelineEventType[] }): Promise<PipelineEvent[]>;
}

/** Build a paginated ListResult from items and total count. */
export function toListResult<T>(items: T[], total: number, options?: ListOptions): ListResult<T> {
  const limit = options?.limit ?? 100;
  const offset = options?.offset ?? 0;
  return {
    items,
    total,
    limit,
    offset,
    hasMore: offset + items.length < total,
  };
}

/** Composite store interface. */
export interface Store {
  runs: RunStore;
  artifacts: ArtifactStore;
  events: EventStore;
}

/** Artifact store error wrapper. */
export class ArtifactStoreError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ArtifactStoreError';
  }
}
