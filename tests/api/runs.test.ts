import express from 'express';
import { createApp, createAppContext, AppContext } from '../../src/server';
import { PipelineConfig } from '../../src/config/pipeline-config';
import { PipelineEvent, PipelineEventType } from '../../src/domain/events';
import { FEATURE_MATRIX, FakeBuilder, FakeSandbox, FakeSink, TEST_RECIPE } from '../helpers/fakes';

const CONFIG: PipelineConfig = {
  policy: { admitKinds: ['pull_request'], cancelInProgressOn: ['pull_request'] },
  recipe: TEST_RECIPE,
  sandbox: { dockerfile: 'Dockerfile.tests', context: '.', coverageFile: 'lcov.info', coverageFormat: 'lcov' },
  coverage: {},
  matrix: FEATURE_MATRIX,
};

async function request(app: express.Application, method: string, path: string, body?: unknown) {
  return new Promise<{ status: number; body: unknown }>((resolve) => {
    const server = app.listen(0, () => {
      const addr = server.address();
      const port = typeof addr === 'object' && addr !== null ? addr.port : 0;
      const url = `http://127.0.0.1:${port}${path}`;
      const options: RequestInit = {
        method,
        headers: { 'Content-Type': 'application/json' },
      };
      if (body !== undefined) options.body = JSON.stringify(body);

      fetch(url, options)
        .then(async (res) => {
          const json: unknown = await res.json();
          server.close();
          resolve({ status: res.status, body: json });
        })
        .catch((err: unknown) => {
          server.close();
          resolve({ status: 500, body: { error: err instanceof Error ? err.message : String(err) } });
        });
    });
  });
}

/** Walk a parsed JSON body by keys. */
function pick(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Object.entries(current).find(([k]) => k === key)?.[1];
  }
  return current;
}

function waitForEvent(ctx: AppContext, type: PipelineEventType): Promise<PipelineEvent> {
  return new Promise((resolve) => {
    const unsubscribe = ctx.publisher.subscribe({
      id: `wait_${type}`,
      eventTypes: [type],
      callback: (event) => {
        unsubscribe();
        resolve(event);
      },
    });
  });
}

describe('Run API', () => {
  let app: express.Application;
  let ctx: AppContext;
  let sink: FakeSink;

  beforeEach(() => {
    sink = new FakeSink();
    ctx = createAppContext({ config: CONFIG, builder: new FakeBuilder(), sandbox: new FakeSandbox(), sink });
    app = createApp(ctx);
  });

  test('GET /health reports ok', async () => {
    const res = await request(app, 'GET', '/health');
    expect(res.status).toBe(200);
    expect(pick(res.body, 'status')).toBe('ok');
    expect(pick(res.body, 'activeLanes')).toBe(0);
  });

  test('POST /runs starts a run that completes in the background', async () => {
    const succeeded = waitForEvent(ctx, 'run.succeeded');

    const res = await request(app, 'POST', '/api/v1/runs', { kind: 'pull_request', lane: 'feature-x', sha: 'abc123' });

    expect(res.status).toBe(202);
    expect(pick(res.body, 'run', 'status')).toBe('pending');
    expect(pick(res.body, 'run', 'lane')).toBe('feature-x');
    const runId = pick(res.body, 'run', 'id');
    expect(typeof runId).toBe('string');

    const event = await succeeded;
    expect(event.runId).toBe(runId);

    const run = await request(app, 'GET', `/api/v1/runs/${event.runId}`);
    expect(run.status).toBe(200);
    expect(pick(run.body, 'run', 'status')).toBe('succeeded');
    expect(pick(run.body, 'run', 'jobResults', 'job3', 'status')).toBe('passed');
    expect(sink.uploadedNames()).toEqual(['job1', 'job2', 'job3']);

    const artifact = await request(app, 'GET', `/api/v1/runs/${event.runId}/artifact`);
    expect(artifact.status).toBe(200);
    expect(pick(artifact.body, 'artifact', 'runId')).toBe(event.runId);

    const events = await request(app, 'GET', `/api/v1/runs/${event.runId}/events?types=run.created,run.succeeded`);
    expect(pick(events.body, 'total')).toBe(2);

    const list = await request(app, 'GET', '/api/v1/runs?lane=feature-x&status=succeeded');
    expect(pick(list.body, 'total')).toBe(1);
  });

  test('POST /runs skips triggers that do not start runs', async () => {
    const res = await request(app, 'POST', '/api/v1/runs', { kind: 'push', lane: 'main' });

    expect(res.status).toBe(200);
    expect(pick(res.body, 'skipped')).toBe(true);
    expect(pick(res.body, 'reason', 'code')).toBe('TRIGGER.NOT_ADMITTED');
    expect((await ctx.store.runs.list()).total).toBe(0);
  });

  test('POST /runs validates the trigger', async () => {
    const unknownKind = await request(app, 'POST', '/api/v1/runs', { kind: 'merge_group', lane: 'main' });
    expect(unknownKind.status).toBe(400);
    expect(pick(unknownKind.body, 'error', 'code')).toBe('VALIDATION.SCHEMA');

    const missingLane = await request(app, 'POST', '/api/v1/runs', { kind: 'pull_request' });
    expect(missingLane.status).toBe(400);
    expect(pick(missingLane.body, 'error', 'message')).toBe('lane is required');

    const badSha = await request(app, 'POST', '/api/v1/runs', { kind: 'pull_request', lane: 'x', sha: 42 });
    expect(pick(badSha.body, 'error', 'message')).toBe('sha must be a string');
  });

  test('GET /runs/:runId returns 404 for an unknown run', async () => {
    const res = await request(app, 'GET', '/api/v1/runs/run_missing');
    expect(res.status).toBe(404);
    expect(pick(res.body, 'error', 'code')).toBe('RUN.NOT_FOUND');
  });

  test('GET /runs rejects an unknown status filter', async () => {
    const res = await request(app, 'GET', '/api/v1/runs?status=exploded');
    expect(res.status).toBe(400);
  });

  test('GET /matrix lists the jobs a trigger kind fans out to', async () => {
    const res = await request(app, 'GET', '/api/v1/matrix?kind=pull_request');

    expect(res.status).toBe(200);
    expect(pick(res.body, 'total')).toBe(3);
    expect(pick(res.body, 'jobs')).toEqual([
      { name: 'job1', group: 'A', timeoutMs: 1_800_000, index: 0 },
      { name: 'job2', group: 'A', timeoutMs: 1_800_000, index: 1 },
      { name: 'job3', group: 'B', timeoutMs: 2_400_000, index: 2 },
    ]);
  });

  test('GET /lanes is empty when nothing is running', async () => {
    const res = await request(app, 'GET', '/api/v1/lanes');
    expect(res.body).toEqual({ lanes: [], total: 0 });
  });
});

describe('createAppContext', () => {
  test('requires a coverage upload URL when no sink is supplied', () => {
    expect(() => createAppContext({ config: CONFIG, builder: new FakeBuilder(), sandbox: new FakeSandbox() })).toThrow(
      'No coverage upload URL configured',
    );
  });
});
