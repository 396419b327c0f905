/**
 * Tests for the in-memory store: copy isolation, publish-once artifacts
 * and run listing.
 */

import { createMemoryStore } from '../../src/storage/memory-store';
import { ArtifactStoreError } from '../../src/storage/store';
import { JobStatus, RunStatus } from '../../src/domain/run';
import { BuildOutput } from '../../src/domain/artifact';
import { makeRun } from '../helpers/fakes';

const BUILT: BuildOutput = {
  status: 'succeeded',
  image: { pointer: { kind: 'tarball', uri: '/tmp/run_1/image.tar' }, contentHash: 'sha256:abc', sizeBytes: 42 },
};

describe('MemoryRunStore', () => {
  test('returned runs do not alias stored state', async () => {
    const store = createMemoryStore();
    await store.runs.create(makeRun('run_1', { jobResults: { job1: { jobName: 'job1', group: 'A', status: JobStatus.Pending } } }));

    const fetched = await store.runs.getById('run_1');
    if (!fetched) throw new Error('run missing');
    fetched.jobResults.job1.status = JobStatus.Passed;

    const again = await store.runs.getById('run_1');
    expect(again?.jobResults.job1.status).toBe(JobStatus.Pending);
  });

  test('update merges fields and refreshes updatedAt', async () => {
    const store = createMemoryStore();
    await store.runs.create(makeRun('run_1'));

    const updated = await store.runs.update('run_1', { status: RunStatus.Succeeded });

    expect(updated?.status).toBe(RunStatus.Succeeded);
    expect(updated?.lane).toBe('feature-x');
    expect(updated?.updatedAt).not.toBe('2024-01-01T00:00:00Z');
  });

  test('update of an unknown run returns null', async () => {
    const store = createMemoryStore();
    expect(await store.runs.update('run_missing', { status: RunStatus.Failed })).toBeNull();
  });

  test('list filters by lane and status, newest first', async () => {
    const store = createMemoryStore();
    await store.runs.create(makeRun('run_1', { createdAt: '2024-01-01T00:00:00Z' }));
    await store.runs.create(makeRun('run_2', { createdAt: '2024-01-02T00:00:00Z' }));
    await store.runs.create(makeRun('run_3', { lane: 'main', createdAt: '2024-01-03T00:00:00Z' }));
    await store.runs.create(makeRun('run_4', { status: RunStatus.Failed, createdAt: '2024-01-04T00:00:00Z' }));

    const lane = await store.runs.list({ lane: 'feature-x' });
    expect(lane.items.map((r) => r.id)).toEqual(['run_4', 'run_2', 'run_1']);
    expect(lane.total).toBe(3);

    const failed = await store.runs.list({ status: RunStatus.Failed });
    expect(failed.items.map((r) => r.id)).toEqual(['run_4']);

    const page = await store.runs.list({ limit: 2, offset: 1 });
    expect(page.items.map((r) => r.id)).toEqual(['run_3', 'run_2']);
    expect(page.hasMore).toBe(true);
  });
});

describe('MemoryArtifactStore', () => {
  test('publishes once and serves the artifact to readers', async () => {
    const store = createMemoryStore();
    const run = makeRun('run_1');

    const handle = await store.artifacts.publish(run, BUILT);
    const artifact = await store.artifacts.fetch(handle);

    expect(handle.runId).toBe('run_1');
    expect(artifact.id).toBe(handle.artifactId);
    expect(artifact.pointer).toEqual({ kind: 'tarball', uri: '/tmp/run_1/image.tar' });
    expect(artifact.contentHash).toBe('sha256:abc');
    expect(await store.artifacts.getByRunId('run_1')).toEqual(artifact);
  });

  test('rejects a second publish for the same run', async () => {
    const store = createMemoryStore();
    const run = makeRun('run_1');
    const handle = await store.artifacts.publish(run, BUILT);

    await expect(store.artifacts.publish(run, BUILT)).rejects.toMatchObject({
      typedError: { code: 'ARTIFACT.ALREADY_PUBLISHED', details: { artifactId: handle.artifactId } },
    });
  });

  test('a failed build yields no handle and no artifact', async () => {
    const store = createMemoryStore();
    const run = makeRun('run_1');

    await expect(store.artifacts.publish(run, { status: 'failed', message: 'exit 1' })).rejects.toBeInstanceOf(
      ArtifactStoreError,
    );
    expect(await store.artifacts.getByRunId('run_1')).toBeNull();
  });

  test('fetch rejects a handle from another run', async () => {
    const store = createMemoryStore();
    const handle = await store.artifacts.publish(makeRun('run_1'), BUILT);

    await expect(store.artifacts.fetch({ artifactId: handle.artifactId, runId: 'run_2' })).rejects.toMatchObject({
      typedError: { code: 'ARTIFACT.NOT_FOUND' },
    });
  });

  test('concurrent readers during publish see nothing or the whole artifact', async () => {
    const store = createMemoryStore();
    const before = await store.artifacts.getByRunId('run_1');
    const [handle, during] = await Promise.all([
      store.artifacts.publish(makeRun('run_1'), BUILT),
      store.artifacts.getByRunId('run_1'),
    ]);

    expect(before).toBeNull();
    if (during !== null) {
      expect(during.id).toBe(handle.artifactId);
      expect(during.pointer.uri).toBe('/tmp/run_1/image.tar');
    }
  });
});
