import {
  isTerminalArtifactState,
  isTerminalJobStatus,
  isTerminalRunStatus,
  transitionArtifactState,
  transitionJobStatus,
  transitionRunStatus,
} from '../../src/engine/state-machine';
import { ArtifactState } from '../../src/domain/artifact';
import { JobStatus } from '../../src/domain/job';
import { RunStatus } from '../../src/domain/run';

describe('Run State Machine', () => {
  test('valid transition: created -> running', () => {
    const result = transitionRunStatus(RunStatus.Created, RunStatus.Running);
    expect(result.success).toBe(true);
    expect(result.newStatus).toBe(RunStatus.Running);
  });

  test('valid transition: created -> canceled', () => {
    expect(transitionRunStatus(RunStatus.Created, RunStatus.Canceled).success).toBe(true);
  });

  test('valid transitions out of running', () => {
    expect(transitionRunStatus(RunStatus.Running, RunStatus.Succeeded).success).toBe(true);
    expect(transitionRunStatus(RunStatus.Running, RunStatus.Failed).success).toBe(true);
    expect(transitionRunStatus(RunStatus.Running, RunStatus.Canceled).success).toBe(true);
  });

  test('invalid transition: succeeded -> running', () => {
    const result = transitionRunStatus(RunStatus.Succeeded, RunStatus.Running);
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('RUN.INVALID_TRANSITION');
    expect(result.error?.message).toBe('Invalid run state transition: succeeded -> running');
    expect(result.error?.details).toEqual({ current: 'succeeded', target: 'running', validTargets: [] });
  });

  test('invalid transition: created -> succeeded', () => {
    expect(transitionRunStatus(RunStatus.Created, RunStatus.Succeeded).success).toBe(false);
  });

  test('terminal status detection', () => {
    expect(isTerminalRunStatus(RunStatus.Succeeded)).toBe(true);
    expect(isTerminalRunStatus(RunStatus.Failed)).toBe(true);
    expect(isTerminalRunStatus(RunStatus.Canceled)).toBe(true);
    expect(isTerminalRunStatus(RunStatus.Running)).toBe(false);
    expect(isTerminalRunStatus(RunStatus.Created)).toBe(false);
  });
});

describe('Job State Machine', () => {
  test('pending jobs start or are cancelled', () => {
    expect(transitionJobStatus(JobStatus.Pending, JobStatus.Running).success).toBe(true);
    expect(transitionJobStatus(JobStatus.Pending, JobStatus.Cancelled).success).toBe(true);
  });

  test('a pending job cannot finish without running', () => {
    const result = transitionJobStatus(JobStatus.Pending, JobStatus.Succeeded);
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('RUN.INVALID_JOB_TRANSITION');
  });

  test('a finished job stays finished', () => {
    expect(transitionJobStatus(JobStatus.Failed, JobStatus.Running).success).toBe(false);
    expect(transitionJobStatus(JobStatus.Cancelled, JobStatus.Succeeded).success).toBe(false);
  });

  test('terminal status detection', () => {
    expect(isTerminalJobStatus(JobStatus.Succeeded)).toBe(true);
    expect(isTerminalJobStatus(JobStatus.Cancelled)).toBe(true);
    expect(isTerminalJobStatus(JobStatus.Running)).toBe(false);
    expect(isTerminalJobStatus(JobStatus.Pending)).toBe(false);
  });
});

describe('Artifact State Machine', () => {
  test('full publication path', () => {
    const path = [
      ArtifactState.Built,
      ArtifactState.Extracted,
      ArtifactState.Published,
      ArtifactState.SitePublished,
      ArtifactState.Done,
    ];
    for (let i = 1; i < path.length; i++) {
      expect(transitionArtifactState(path[i - 1], path[i]).success).toBe(true);
    }
  });

  test('skip path', () => {
    expect(transitionArtifactState(ArtifactState.Built, ArtifactState.Skipped).success).toBe(true);
    expect(transitionArtifactState(ArtifactState.Skipped, ArtifactState.Done).success).toBe(true);
  });

  test('publication cannot happen before extraction', () => {
    const result = transitionArtifactState(ArtifactState.Built, ArtifactState.Published);
    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('ROUTING.INVALID_TRANSITION');
  });

  test('site publication cannot be failed after the fact', () => {
    expect(transitionArtifactState(ArtifactState.SitePublished, ArtifactState.Failed).success).toBe(false);
  });

  test('terminal state detection', () => {
    expect(isTerminalArtifactState(ArtifactState.Done)).toBe(true);
    expect(isTerminalArtifactState(ArtifactState.Failed)).toBe(true);
    expect(isTerminalArtifactState(ArtifactState.Skipped)).toBe(false);
  });
});
