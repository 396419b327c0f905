/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Every read and
 * write goes through a deep copy so callers never alias stored records.
 */

import { v4 as uuid } from 'uuid';
import { Artifact, ArtifactHandle, BuildOutput } from '../domain/artifact';
import {
  artifactAlreadyPublishedError,
  artifactNotFoundError,
  buildFailureError,
} from '../domain/errors';
import { PipelineEvent, PipelineEventType } from '../domain/events';
import { Run, RunStatus } from '../domain/run';
import {
  Store,
  RunStore,
  ArtifactStore,
  ArtifactStoreError,
  EventStore,
  ListOptions,
  ListResult,
  toListResult,
} from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/**
 * Deep copy via `structuredClone`, so nested `jobResults` and pointers
 * are never shared between the store and its callers.
 */
function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, Run>();

  async create(run: Run): Promise<Run> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<Run | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<Run>): Promise<Run | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated: Run = { ...existing, ...deepCopy(updates), id, updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions & { lane?: string; status?: RunStatus }): Promise<ListResult<Run>> {
    const items = [...this.data.values()]
      .filter((r) => !options?.lane || r.lane === options.lane)
      .filter((r) => !options?.status || r.status === options.status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return toListResult(applyListOptions(items, options).map(deepCopy), items.length, options);
  }
}

class MemoryArtifactStore implements ArtifactStore {
  private data = new Map<string, Artifact>();
  private byRun = new Map<string, string>();

  async publish(run: Run, output: BuildOutput): Promise<ArtifactHandle> {
    if (output.status === 'failed') {
      throw new ArtifactStoreError(buildFailureError(run.id, output.message, output.details));
    }

    const existingId = this.byRun.get(run.id);
    if (existingId) {
      throw new ArtifactStoreError(artifactAlreadyPublishedError(run.id, existingId));
    }

    const artifact: Artifact = {
      id: `art_${uuid()}`,
      runId: run.id,
      pointer: { ...output.image.pointer },
      contentHash: output.image.contentHash,
      sizeBytes: output.image.sizeBytes,
      publishedAt: new Date().toISOString(),
    };

    // No await between the duplicate check and these writes: readers see
    // either no artifact or the complete one.
    this.data.set(artifact.id, deepCopy(artifact));
    this.byRun.set(run.id, artifact.id);

    return { artifactId: artifact.id, runId: run.id };
  }

  async fetch(handle: ArtifactHandle): Promise<Artifact> {
    const artifact = this.data.get(handle.artifactId);
    if (!artifact || artifact.runId !== handle.runId) {
      throw new ArtifactStoreError(artifactNotFoundError(handle.artifactId, handle.runId));
    }
    return deepCopy(artifact);
  }

  async getByRunId(runId: string): Promise<Artifact | null> {
    const id = this.byRun.get(runId);
    const artifact = id ? this.data.get(id) : undefined;
    return artifact ? deepCopy(artifact) : null;
  }
}

class MemoryEventStore implements EventStore {
  private data: PipelineEvent[] = [];

  async create(event: PipelineEvent): Promise<PipelineEvent> {
    this.data.push(deepCopy(event));
    return deepCopy(event);
  }

  async listByRun(
    runId: string,
    options?: ListOptions & { eventTypes?: PipelineEventType[] },
  ): Promise<PipelineEvent[]> {
    const types = options?.eventTypes;
    const items = this.data.filter(
      (e) => e.runId === runId && (!types?.length || types.includes(e.type)),
    );
    return applyListOptions(items, options).map(deepCopy);
  }
}

/** Create an in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    runs: new MemoryRunStore(),
    artifacts: new MemoryArtifactStore(),
    events: new MemoryEventStore(),
  };
}
