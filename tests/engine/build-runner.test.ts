import {
  BuildBackend,
  abortReason,
  getBuildBackend,
  getRegisteredBackends,
  registerBuildBackend,
  runJob,
} from '../../src/engine/build-runner';
import { BuildOutcome, JobStatus, PlannedJob } from '../../src/domain/job';

const JOB: PlannedJob = { index: 1, identity: 'a--release', cell: { target: 'a', profile: 'release' } };

function backend(runBuild: BuildBackend['runBuild']): BuildBackend {
  return { name: 'test', runBuild };
}

/** A build that only ends when its signal fires. */
function hangingBuild(): BuildBackend['runBuild'] {
  return (_cell, context) =>
    new Promise<BuildOutcome>((resolve) => {
      context.signal.addEventListener('abort', () => resolve({ ok: false, reason: 'interrupted' }), { once: true });
    });
}

describe('Build runner', () => {
  test('a successful build carries its handle', async () => {
    const runBuild = jest.fn(async (): Promise<BuildOutcome> => ({ ok: true, handle: { ref: 'img:a' } }));
    const result = await runJob(JOB, backend(runBuild), { signal: new AbortController().signal });

    expect(result.outcome).toEqual({ status: JobStatus.Succeeded, handle: { ref: 'img:a' } });
    expect(result.identity).toBe('a--release');
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
    expect(runBuild).toHaveBeenCalledWith(JOB.cell, expect.objectContaining({ identity: 'a--release', index: 1 }));
  });

  test('a reported failure becomes a typed build error', async () => {
    const result = await runJob(JOB, backend(async () => ({ ok: false, reason: 'compile error' })), {
      signal: new AbortController().signal,
    });

    expect(result.outcome.status).toBe(JobStatus.Failed);
    if (result.outcome.status === JobStatus.Failed) {
      expect(result.outcome.error.code).toBe('BUILD.FAILED');
      expect(result.outcome.error.message).toBe('compile error');
      expect(result.outcome.error.identity).toBe('a--release');
    }
  });

  test('a thrown error is a build failure, never a rejection', async () => {
    const result = await runJob(
      JOB,
      backend(async () => {
        throw new Error('daemon unreachable');
      }),
      { signal: new AbortController().signal },
    );

    expect(result.outcome.status).toBe(JobStatus.Failed);
    if (result.outcome.status === JobStatus.Failed) {
      expect(result.outcome.error.message).toBe('daemon unreachable');
    }
  });

  test('a build past its timeout fails with a retryable timeout error', async () => {
    const result = await runJob(JOB, backend(hangingBuild()), {
      signal: new AbortController().signal,
      timeoutMs: 20,
    });

    expect(result.outcome.status).toBe(JobStatus.Failed);
    if (result.outcome.status === JobStatus.Failed) {
      expect(result.outcome.error.code).toBe('BUILD.TIMEOUT');
      expect(result.outcome.error.retryable).toBe(true);
      expect(result.outcome.error.message).toBe('Build timed out after 20ms');
    }
  });

  test('cancelling the run cancels the build in flight', async () => {
    const controller = new AbortController();
    const pending = runJob(JOB, backend(hangingBuild()), { signal: controller.signal });
    controller.abort('stopped by operator');

    const result = await pending;
    expect(result.outcome).toEqual({ status: JobStatus.Cancelled, reason: 'stopped by operator' });
  });

  test('an already cancelled run never starts the build', async () => {
    const controller = new AbortController();
    controller.abort('fail-fast: job "x" failed');
    const runBuild = jest.fn(hangingBuild());
    const result = await runJob(JOB, backend(runBuild), { signal: controller.signal });

    expect(result.outcome).toEqual({ status: JobStatus.Cancelled, reason: 'fail-fast: job "x" failed' });
    expect(runBuild).not.toHaveBeenCalled();
  });

  test('abortReason falls back for non-string reasons', () => {
    const controller = new AbortController();
    controller.abort();
    expect(abortReason(controller.signal)).toBe('run cancelled');
  });

  test('backends register by name', () => {
    const custom = backend(async () => ({ ok: true, handle: { ref: 'x' } }));
    registerBuildBackend({ ...custom, name: 'custom-test' });
    expect(getBuildBackend('custom-test')?.name).toBe('custom-test');
    expect(getRegisteredBackends()).toContain('custom-test');
    expect(getBuildBackend('missing')).toBeUndefined();
  });
});
