import express from 'express';
import { mkdtempSync, writeFileSync } from 'fs';
import { AddressInfo } from 'net';
import { tmpdir } from 'os';
import { join } from 'path';
import { ExtractionPrimitives } from '../../src/artifacts/primitives';
import { AppConfig, loadConfig } from '../../src/config';
import { BuildHandle } from '../../src/domain/job';
import { isRecord } from '../../src/guards';
import { DryRunBuildBackend, DryRunOptions } from '../../src/engine/backends';
import { isTerminalRunStatus } from '../../src/engine/state-machine';
import { AppContext, createApp, createAppContext } from '../../src/server';
import { OrchestrationRun } from '../../src/domain/run';
import { PipelineRun, PipelineStatus } from '../../src/domain/pipeline';

export interface TestResponse {
  status: number;
  body: unknown;
}

/** One request against a server listening on an ephemeral port. */
export async function request(
  app: express.Application,
  method: string,
  path: string,
  body?: unknown,
  rawBody?: string,
): Promise<TestResponse> {
  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  try {
    const { port } = serverPort(server.address());
    const options: RequestInit = { method, headers: { 'Content-Type': 'application/json' } };
    if (rawBody !== undefined) options.body = rawBody;
    else if (body !== undefined) options.body = JSON.stringify(body);

    const res = await fetch(`http://127.0.0.1:${port}${path}`, options);
    const json: unknown = await res.json();
    return { status: res.status, body: json };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

function serverPort(address: string | AddressInfo | null): AddressInfo {
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return address;
}

/** Follow a key path through parsed JSON. */
export function pick(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function pickString(value: unknown, ...path: string[]): string {
  const found = pick(value, ...path);
  if (typeof found !== 'string') {
    throw new Error(`expected a string at ${path.join('.')}`);
  }
  return found;
}

export function fakePrimitives(): ExtractionPrimitives {
  return {
    copyFromImage: jest.fn(async (handle: BuildHandle, src: string, dest: string) => {
      writeFileSync(dest, `${handle.ref}:${src}`);
    }),
    saveImage: jest.fn(async (handle: BuildHandle, dest: string) => {
      writeFileSync(dest, `image ${handle.ref}`);
    }),
    moveLocalFile: jest.fn(async (src: string, dest: string) => {
      writeFileSync(dest, `moved ${src}`);
    }),
  };
}

/** Application context on temporary directories with a dry-run backend. */
export function createTestContext(
  backendOptions: DryRunOptions = {},
  overrides: Partial<AppConfig> = {},
): { ctx: AppContext; app: express.Application; root: string } {
  const root = mkdtempSync(join(tmpdir(), 'bakery-api-'));
  const config: AppConfig = {
    ...loadConfig({}),
    stagingDir: join(root, 'staging'),
    artifactDir: join(root, 'artifacts'),
    siteDir: join(root, 'site'),
    ...overrides,
  };
  const ctx = createAppContext({
    config,
    backend: new DryRunBuildBackend(backendOptions),
    primitives: fakePrimitives(),
  });
  return { ctx, app: createApp(ctx), root };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Wait for a background run to reach a terminal state. */
export async function waitForRun(ctx: AppContext, runId: string): Promise<OrchestrationRun> {
  for (let attempt = 0; attempt < 400; attempt++) {
    const run = await ctx.store.runs.getById(runId);
    if (run && isTerminalRunStatus(run.status)) return run;
    await sleep(5);
  }
  throw new Error(`run ${runId} did not finish`);
}

/** Wait for a background pipeline to finish. */
export async function waitForPipeline(ctx: AppContext, pipelineId: string): Promise<PipelineRun> {
  for (let attempt = 0; attempt < 400; attempt++) {
    const pipeline = await ctx.store.pipelines.getById(pipelineId);
    if (pipeline && pipeline.status !== PipelineStatus.Running) return pipeline;
    await sleep(5);
  }
  throw new Error(`pipeline ${pipelineId} did not finish`);
}
