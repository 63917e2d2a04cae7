import express from 'express';
import { rmSync } from 'fs';
import { RunStatus } from '../../src/domain/run';
import { resetLogHandler, setLogHandler } from '../../src/logger';
import { AppContext } from '../../src/server';
import { createTestContext, pick, pickString, request, waitForRun } from './helpers';

const MATRIX = {
  dimensions: { target: ['a', 'b'], profile: ['dev', 'release'] },
  excludes: [{ target: 'b', profile: 'dev' }],
};

describe('Run API', () => {
  let app: express.Application;
  let ctx: AppContext;
  let root: string;

  beforeAll(() => setLogHandler(() => undefined));
  afterAll(() => resetLogHandler());

  beforeEach(() => {
    ({ ctx, app, root } = createTestContext());
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('POST /runs creates a run and executes it in the background', async () => {
    const res = await request(app, 'POST', '/api/v1/runs', { matrix: MATRIX, artifacts: { a: { dst: 'a.bin' } } });

    expect(res.status).toBe(201);
    expect(pick(res.body, 'run', 'status')).toBe(RunStatus.Created);
    expect(pick(res.body, 'run', 'jobs', 'a--dev', 'status')).toBe('pending');
    expect(pick(res.body, 'run', 'jobs', 'b--dev')).toBeUndefined();

    const runId = pickString(res.body, 'run', 'id');
    const finished = await waitForRun(ctx, runId);
    expect(finished.status).toBe(RunStatus.Succeeded);

    const fetched = await request(app, 'GET', `/api/v1/runs/${runId}`);
    expect(fetched.status).toBe(200);
    expect(pick(fetched.body, 'run', 'report', 'totals')).toEqual({
      jobs: 3,
      succeeded: 3,
      failed: 0,
      cancelled: 0,
      published: 2,
      skipped: 1,
      artifactFailures: 0,
    });
  });

  it('POST /runs passes run options through', async () => {
    const res = await request(app, 'POST', '/api/v1/runs', { matrix: MATRIX, failFast: true, concurrency: 2 });
    expect(res.status).toBe(201);
    expect(pick(res.body, 'run', 'options')).toEqual({
      failFast: true,
      concurrency: 2,
      artifactsMandatory: false,
      artifactsOnCancel: 'complete',
    });
    await waitForRun(ctx, pickString(res.body, 'run', 'id'));
  });

  it('POST /runs rejects a missing matrix', async () => {
    const res = await request(app, 'POST', '/api/v1/runs', {});
    expect(res.status).toBe(400);
    expect(pick(res.body, 'error', 'code')).toBe('VALIDATION.SCHEMA');
    expect(pick(res.body, 'error', 'message')).toBe('matrix: expected object, got undefined');
  });

  it('POST /runs rejects an invalid concurrency', async () => {
    const res = await request(app, 'POST', '/api/v1/runs', { matrix: MATRIX, concurrency: 0 });
    expect(res.status).toBe(400);
    expect(pick(res.body, 'error', 'code')).toBe('VALIDATION.INVALID_CONCURRENCY');
  });

  it('POST /runs answers identity collisions with 422', async () => {
    const res = await request(app, 'POST', '/api/v1/runs', {
      matrix: { dimensions: { target: ['a'], machine: ['x86', 'arm'] } },
    });
    expect(res.status).toBe(422);
    expect(pick(res.body, 'error', 'code')).toBe('MATRIX.COLLISION');
    expect(await ctx.store.runs.list()).toEqual([]);
  });

  it('rejects a body that is not JSON', async () => {
    const res = await request(app, 'POST', '/api/v1/runs', undefined, '{"matrix":');
    expect(res.status).toBe(400);
    expect(pick(res.body, 'error', 'message')).toBe('Request body is not valid JSON');
  });

  it('GET /runs lists runs with a status filter', async () => {
    const created = await ctx.orchestrator.createRun({ matrix: { dimensions: [{ name: 'target', values: ['a'] }] } });
    const done = await ctx.orchestrator.createRun({ matrix: { dimensions: [{ name: 'target', values: ['b'] }] } });
    await ctx.orchestrator.executeRun(done.id);

    const all = await request(app, 'GET', '/api/v1/runs');
    expect(pick(all.body, 'total')).toBe(2);

    const succeeded = await request(app, 'GET', '/api/v1/runs?status=succeeded&limit=10');
    expect(pick(succeeded.body, 'total')).toBe(1);
    expect(pick(succeeded.body, 'limit')).toBe(10);
    const items = pick(succeeded.body, 'items');
    expect(Array.isArray(items) && items.map((run) => pick(run, 'id'))).toEqual([done.id]);
    expect(created.status).toBe(RunStatus.Created);
  });

  it('GET /runs/:runId returns 404 for unknown runs', async () => {
    const res = await request(app, 'GET', '/api/v1/runs/run_missing');
    expect(res.status).toBe(404);
    expect(pick(res.body, 'error', 'code')).toBe('RUN.NOT_FOUND');
  });

  it('POST /runs/:runId/cancel cancels a created run', async () => {
    const run = await ctx.orchestrator.createRun({ matrix: { dimensions: [{ name: 'target', values: ['a'] }] } });
    const res = await request(app, 'POST', `/api/v1/runs/${run.id}/cancel`, { reason: 'superseded' });

    expect(res.status).toBe(200);
    expect(pick(res.body, 'run', 'status')).toBe(RunStatus.Canceled);
    expect(pick(res.body, 'run', 'cancelReason')).toBe('superseded');
  });

  it('POST /runs/:runId/cancel on a finished run is a conflict', async () => {
    const run = await ctx.orchestrator.createRun({ matrix: { dimensions: [{ name: 'target', values: ['a'] }] } });
    await ctx.orchestrator.executeRun(run.id);

    const res = await request(app, 'POST', `/api/v1/runs/${run.id}/cancel`, {});
    expect(res.status).toBe(409);
    expect(pick(res.body, 'error', 'code')).toBe('RUN.INVALID_TRANSITION');
  });

  it('GET /runs/:runId/events filters by type', async () => {
    const run = await ctx.orchestrator.createRun({ matrix: { dimensions: [{ name: 'target', values: ['a'] }] } });
    await ctx.orchestrator.executeRun(run.id);

    const res = await request(app, 'GET', `/api/v1/runs/${run.id}/events?types=run.created,run.succeeded`);
    expect(res.status).toBe(200);
    expect(pick(res.body, 'total')).toBe(2);
    const events = pick(res.body, 'events');
    expect(Array.isArray(events) && events.map((event) => pick(event, 'type'))).toEqual([
      'run.created',
      'run.succeeded',
    ]);
  });
});

describe('Run API cancellation of an executing run', () => {
  beforeAll(() => setLogHandler(() => undefined));
  afterAll(() => resetLogHandler());

  it('aborts the builds in flight', async () => {
    const { ctx, app, root } = createTestContext({ delayMs: 60_000 });
    try {
      const created = await request(app, 'POST', '/api/v1/runs', { matrix: MATRIX });
      const runId = pickString(created.body, 'run', 'id');

      const res = await request(app, 'POST', `/api/v1/runs/${runId}/cancel`, { reason: 'operator stop' });
      expect(res.status).toBe(200);

      const run = await waitForRun(ctx, runId);
      expect(run.status).toBe(RunStatus.Canceled);
      expect(run.cancelReason).toBe('operator stop');
      expect(run.report?.totals.cancelled).toBe(3);
    } finally {
      rmSync(root, { recursive: true, force: true });
    }
  });
});

describe('Health and unknown routes', () => {
  it('GET /health reports the backend', async () => {
    const { app, root } = createTestContext();
    try {
      const res = await request(app, 'GET', '/health');
      expect(res.status).toBe(200);
      expect(pick(res.body, 'status')).toBe('ok');
      expect(pick(res.body, 'backend')).toBe('dry-run');
      expect(pick(res.body, 'storage')).toBe('memory');
    } finally {
      rmSync(root, { recursive: true, force: true });
    }
  });

  it('unknown API paths answer 404 in the error envelope', async () => {
    const { app, root } = createTestContext();
    try {
      const res = await request(app, 'GET', '/api/v1/nothing');
      expect(res.status).toBe(404);
      expect(pick(res.body, 'error', 'code')).toBe('ROUTE.NOT_FOUND');
    } finally {
      rmSync(root, { recursive: true, force: true });
    }
  });
});
