/**
 * Build Orchestrator: the core run engine.
 *
 * Plans a matrix into a run, dispatches its jobs, routes each job's
 * artifact inside the job's worker slot, records a per-job ledger and
 * publishes lifecycle events as the run moves through its states.
 */

import { v4 as uuid } from 'uuid';
import { ArtifactChannel, SiteChannel } from '../artifacts/channels';
import { parseArtifactMap } from '../artifacts/artifact-spec';
import { artifactSpecFor, cellTarget } from '../artifacts/naming';
import { ExtractionPrimitives } from '../artifacts/primitives';
import { ArtifactRouter } from '../artifacts/router';
import { ArtifactState, ArtifactMap } from '../domain/artifact';
import {
  ConfigurationError,
  OrchestratorError,
  TypedError,
  createTypedError,
  notFoundError,
  runCanceledError,
  toTypedError,
} from '../domain/errors';
import { OrchestrationEventType } from '../domain/events';
import { JobResult, JobStatus, PlannedJob, RoutingOutcome, finalArtifactState } from '../domain/job';
import { CreateRunInput, JobRecord, OrchestrationRun, RunOptions, RunStatus } from '../domain/run';
import { EventPublisher } from '../data-plane/publisher';
import { logger } from '../logger';
import { MatrixPlan, planMatrixOrThrow } from '../matrix/planner';
import { Store } from '../storage/store';
import { BuildBackend } from './build-runner';
import { dispatch } from './dispatcher';
import { buildRunReport } from './report';
import { resolveRunOptions } from './run-options';
import { transitionJobStatus, transitionRunStatus } from './state-machine';

/** Orchestrator configuration. */
export interface OrchestratorConfig {
  backend: BuildBackend;
  stagingDir: string;
  primitives: ExtractionPrimitives;
  artifactChannel: ArtifactChannel;
  siteChannel: SiteChannel;
  /** Options applied where a run does not set its own. */
  defaultOptions?: Partial<RunOptions>;
}

const JOB_EVENT: Record<JobStatus, OrchestrationEventType | undefined> = {
  [JobStatus.Pending]: undefined,
  [JobStatus.Running]: 'job.started',
  [JobStatus.Succeeded]: 'job.succeeded',
  [JobStatus.Failed]: 'job.failed',
  [JobStatus.Cancelled]: 'job.canceled',
};

/** The build orchestrator. */
export class BuildOrchestrator {
  private readonly log = logger.child({ component: 'orchestrator' });
  /** Guard against concurrent executeRun calls on the same run. */
  private runningRuns = new Set<string>();
  /** Cancel reasons of running runs, by run ID. */
  private canceledRuns = new Map<string, string>();
  private controllers = new Map<string, AbortController>();

  constructor(
    private store: Store,
    private publisher: EventPublisher,
    private config: OrchestratorConfig,
  ) {}

  /** Plan a matrix and store it as a new run. Planning errors throw before anything is stored. */
  async createRun(input: CreateRunInput): Promise<OrchestrationRun> {
    const options = resolveRunOptions(this.config.defaultOptions, input.options);
    const { artifacts, warnings: artifactWarnings } = parseArtifactMap(input.artifacts);
    const plan = planMatrixOrThrow(input.matrix, { artifacts });
    checkArtifactTargets(plan, artifacts, artifactWarnings);

    const now = new Date().toISOString();
    const run: OrchestrationRun = {
      id: `run_${uuid()}`,
      pipelineId: input.pipelineId,
      stageId: input.stageId,
      status: RunStatus.Created,
      createdAt: now,
      updatedAt: now,
      matrix: input.matrix,
      artifacts,
      options,
      planHash: plan.planHash,
      candidateCount: plan.candidateCount,
      excludedCount: plan.excluded.length,
      jobs: {},
      warnings: [...plan.warnings, ...artifactWarnings],
    };

    // Initialize the job ledger
    for (const job of plan.jobs) {
      run.jobs[job.identity] = {
        index: job.index,
        identity: job.identity,
        cell: job.cell,
        status: JobStatus.Pending,
        artifact: ArtifactState.Built,
        publications: [],
      };
    }

    await this.store.runs.create(run);
    await this.safePublishRunEvent(run, 'run.created');
    this.log.info('Run created', { runId: run.id, jobs: plan.jobs.length, planHash: plan.planHash });

    return run;
  }

  /** Execute a created run to a terminal state. */
  async executeRun(runId: string): Promise<OrchestrationRun> {
    // Prevent concurrent execution of the same run
    if (this.runningRuns.has(runId)) {
      throw new OrchestratorError(
        createTypedError({
          code: 'RUN.ALREADY_RUNNING',
          message: `Run "${runId}" is already being executed`,
          runId,
        }),
      );
    }
    this.runningRuns.add(runId);
    // Registered before the first await: cancelRun looks it up
    const controller = new AbortController();
    this.controllers.set(runId, controller);

    try {
      return await this.executeRunInternal(runId, controller);
    } finally {
      this.runningRuns.delete(runId);
      this.canceledRuns.delete(runId);
      this.controllers.delete(runId);
    }
  }

  /**
   * Cancel a run. A running run is aborted and finishes through its own
   * execution; a created run is canceled immediately.
   */
  async cancelRun(runId: string, reason?: string): Promise<OrchestrationRun> {
    const run = await this.store.runs.getById(runId);
    if (!run) {
      throw new OrchestratorError(notFoundError('Run', runId));
    }

    const transition = transitionRunStatus(run.status, RunStatus.Canceled);
    if (!transition.success) {
      throw new OrchestratorError(transition.error ?? createTypedError({ code: 'RUN.INVALID_TRANSITION', message: 'Cannot cancel run' }));
    }

    const cancelReason = reason ?? 'canceled by user';
    run.cancelReason = cancelReason;

    const controller = this.controllers.get(runId);
    if (controller) {
      // Executing runs are finished by the execution loop
      this.canceledRuns.set(runId, cancelReason);
      controller.abort(cancelReason);
      await this.store.runs.update(run.id, { cancelReason });
      return run;
    }

    return this.cancelRunInternal(run);
  }

  private async executeRunInternal(runId: string, controller: AbortController): Promise<OrchestrationRun> {
    let run = await this.store.runs.getById(runId);
    if (!run) {
      throw new OrchestratorError(notFoundError('Run', runId));
    }

    const plan = planMatrixOrThrow(run.matrix, { artifacts: run.artifacts });

    // Transition to running
    run = this.transitionRun(run, RunStatus.Running);
    run.startedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    await this.safePublishRunEvent(run, 'run.started');

    const router = new ArtifactRouter({
      stagingDir: this.config.stagingDir,
      primitives: this.config.primitives,
      artifactChannel: this.config.artifactChannel,
      siteChannel: this.config.siteChannel,
      roles: plan.registry.roles,
      onCancel: run.options.artifactsOnCancel,
    });
    const current = run;

    try {
      await dispatch(plan.jobs, this.config.backend, {
        failFast: run.options.failFast,
        concurrency: run.options.concurrency,
        buildTimeoutMs: run.options.buildTimeoutMs,
        signal: controller.signal,
        onJobStart: (job) => this.markJobStarted(current, job),
        afterBuild: async (result, signal) => {
          await this.recordBuild(current, result);
          const spec = artifactSpecFor(current.artifacts, cellTarget(result.cell, plan.registry.roles));
          const outcome = await router.route(result, spec, signal);
          await this.recordRouting(current, result, outcome);
        },
      });
    } catch (err) {
      return this.failRun(run, toTypedError(err));
    }

    const report = buildRunReport(Object.values(run.jobs), run.options, run.warnings);
    run.report = report;
    const cancelReason = this.canceledRuns.get(runId);
    if (cancelReason !== undefined) {
      run.cancelReason = cancelReason;
      return this.cancelRunInternal(run);
    }

    const target = report.success ? RunStatus.Succeeded : RunStatus.Failed;
    run = this.transitionRun(run, target);
    run.completedAt = new Date().toISOString();
    await this.store.runs.update(run.id, run);
    await this.safePublishRunEvent(run, report.success ? 'run.succeeded' : 'run.failed');
    this.log.info('Run finished', { runId, status: run.status, totals: report.totals });

    return run;
  }

  private async markJobStarted(run: OrchestrationRun, job: PlannedJob): Promise<void> {
    const record = run.jobs[job.identity];
    this.moveJob(record, JobStatus.Running);
    record.startedAt = new Date().toISOString();
    await this.store.runs.update(run.id, { jobs: run.jobs });
    await this.safePublishJobEvent(run, record);
  }

  private async recordBuild(run: OrchestrationRun, result: JobResult): Promise<void> {
    const record = run.jobs[result.identity];
    this.moveJob(record, result.outcome.status);
    record.startedAt = result.startedAt ?? record.startedAt;
    record.completedAt = result.completedAt ?? new Date().toISOString();
    record.durationMs = result.durationMs;
    if (result.outcome.status === JobStatus.Failed) {
      record.error = { ...result.outcome.error, runId: run.id };
    } else if (result.outcome.status === JobStatus.Cancelled) {
      record.cancelReason = result.outcome.reason;
    }
    await this.store.runs.update(run.id, { jobs: run.jobs });
    await this.safePublishJobEvent(run, record);
  }

  private async recordRouting(run: OrchestrationRun, result: JobResult, outcome: RoutingOutcome): Promise<void> {
    const record = run.jobs[result.identity];
    record.artifact = finalArtifactState(outcome);

    if (outcome.kind !== 'skipped') {
      record.publications = outcome.publications;
    }
    if (outcome.kind === 'failed') {
      record.artifactError = { ...outcome.error, runId: run.id };
    }
    await this.store.runs.update(run.id, { jobs: run.jobs });

    if (outcome.kind === 'skipped') {
      await this.safePublishArtifactEvent(run, record, 'artifact.skipped');
    } else if (outcome.kind === 'failed') {
      await this.safePublishArtifactEvent(run, record, 'artifact.failed');
    } else {
      await this.safePublishArtifactEvent(run, record, 'artifact.published');
      if (outcome.publications.some((p) => p.channel === 'site')) {
        await this.safePublishArtifactEvent(run, record, 'artifact.site-published');
      }
    }
  }

  private moveJob(record: JobRecord, target: JobStatus): void {
    const transition = transitionJobStatus(record.status, target);
    if (!transition.success) {
      throw new OrchestratorError(
        transition.error ?? createTypedError({ code: 'RUN.INVALID_JOB_TRANSITION', message: 'Invalid job transition' }),
      );
    }
    record.status = target;
  }

  private transitionRun(run: OrchestrationRun, target: RunStatus): OrchestrationRun {
    const result = transitionRunStatus(run.status, target);
    if (!result.success) {
      throw new OrchestratorError(
        result.error ?? createTypedError({ code: 'RUN.INVALID_TRANSITION', message: 'Invalid run transition' }),
      );
    }
    run.status = target;
    run.updatedAt = new Date().toISOString();
    return run;
  }

  private async failRun(run: OrchestrationRun, error: TypedError): Promise<OrchestrationRun> {
    run.status = RunStatus.Failed;
    run.error = { ...error, runId: run.id };
    run.completedAt = new Date().toISOString();
    run.updatedAt = new Date().toISOString();
    run.report = buildRunReport(Object.values(run.jobs), run.options, run.warnings);
    await this.store.runs.update(run.id, run);
    await this.safePublishRunEvent(run, 'run.failed');
    this.log.error('Run failed', { runId: run.id, code: error.code, error: error.message });
    return run;
  }

  private async cancelRunInternal(run: OrchestrationRun): Promise<OrchestrationRun> {
    const now = new Date().toISOString();
    run.status = RunStatus.Canceled;
    run.error = runCanceledError(run.id, run.cancelReason);
    run.canceledAt = now;
    run.completedAt = now;
    run.updatedAt = now;

    // Jobs that never ran are cancelled with the run
    for (const record of Object.values(run.jobs)) {
      if (record.status === JobStatus.Pending || record.status === JobStatus.Running) {
        record.status = JobStatus.Cancelled;
        record.cancelReason = run.cancelReason;
        record.completedAt = now;
      }
    }
    run.report = buildRunReport(Object.values(run.jobs), run.options, run.warnings);

    await this.store.runs.update(run.id, run);
    await this.safePublishRunEvent(run, 'run.canceled');
    this.log.info('Run canceled', { runId: run.id, reason: run.cancelReason });
    return run;
  }

  // --- Safe event publishing: events never affect the run ---

  private async safePublishRunEvent(run: OrchestrationRun, type: OrchestrationEventType): Promise<void> {
    await this.safely(type, run.id, () => this.publisher.publishRunEvent(run, type));
  }

  private async safePublishJobEvent(run: OrchestrationRun, record: JobRecord): Promise<void> {
    const type = JOB_EVENT[record.status];
    if (!type) return;
    await this.safely(type, run.id, () => this.publisher.publishJobEvent(run, record, type));
  }

  private async safePublishArtifactEvent(
    run: OrchestrationRun,
    record: JobRecord,
    type: OrchestrationEventType,
  ): Promise<void> {
    await this.safely(type, run.id, () => this.publisher.publishArtifactEvent(run, record, type));
  }

  private async safely(type: OrchestrationEventType, runId: string, publish: () => Promise<unknown>): Promise<void> {
    try {
      await publish();
    } catch (err) {
      this.log.warn('Failed to publish event', {
        runId,
        eventType: type,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

/**
 * Artifact specs need a target dimension to be looked up by, and a spec
 * whose target no job builds is almost certainly misspelled.
 */
function checkArtifactTargets(plan: MatrixPlan, artifacts: ArtifactMap, warnings: string[]): void {
  const targets = Object.keys(artifacts);
  if (targets.length === 0) return;

  const targetDimension = plan.registry.roles.target;
  if (!plan.registry.has(targetDimension)) {
    throw new ConfigurationError([
      createTypedError({
        code: 'VALIDATION.NO_TARGET_DIMENSION',
        message: `Artifact specs are keyed by the "${targetDimension}" dimension, which the matrix does not declare`,
        details: { targetDimension },
      }),
    ]);
  }

  const built = new Set(plan.jobs.map((job) => cellTarget(job.cell, plan.registry.roles)));
  for (const target of targets) {
    if (!built.has(target)) {
      warnings.push(`Artifact spec for target "${target}" matches no job`);
    }
  }
}
