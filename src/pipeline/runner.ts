/**
 * Pipeline Runner.
 *
 * Runs the stages of a pipeline one after another in dependency order.
 * Each stage is an ordinary orchestration run over a matrix derived from
 * the pipeline defaults; a stage whose condition is unmet, or whose
 * dependencies did not all succeed, is skipped.
 */

import { v4 as uuid } from 'uuid';
import { ConfigurationError, OrchestratorError, TypedError, notFoundError, toTypedError } from '../domain/errors';
import { DEFAULT_DIMENSION_ROLES, Dimension, MatrixConfig, OverrideRule } from '../domain/matrix';
import {
  PipelineDefinition,
  PipelineRun,
  PipelineStatus,
  StageDefinition,
  StageRecord,
  StageStatus,
} from '../domain/pipeline';
import { RunStatus } from '../domain/run';
import { EventPublisher } from '../data-plane/publisher';
import { BuildOrchestrator } from '../engine/orchestrator';
import { logger } from '../logger';
import { Store } from '../storage/store';
import { stageOrder, validatePipeline } from './validator';

const TARGET_DIMENSION = DEFAULT_DIMENSION_ROLES.target;

const STAGE_STATUS: Record<RunStatus, StageStatus> = {
  [RunStatus.Created]: StageStatus.Pending,
  [RunStatus.Running]: StageStatus.Running,
  [RunStatus.Succeeded]: StageStatus.Succeeded,
  [RunStatus.Failed]: StageStatus.Failed,
  [RunStatus.Canceled]: StageStatus.Canceled,
};

/**
 * The matrix of one stage: the pipeline defaults with the stage's targets
 * as the target dimension and its pinned dimensions in place of the
 * defaults. Rules naming a dimension the stage lacks are dropped, and so
 * are inclusions that are not a full cell of this stage.
 */
export function stageMatrix(definition: PipelineDefinition, stage: StageDefinition): MatrixConfig {
  const values = new Map<string, string[]>();
  if (!Object.prototype.hasOwnProperty.call(definition.defaults, TARGET_DIMENSION)) {
    values.set(TARGET_DIMENSION, stage.targets);
  }
  for (const [name, defaults] of Object.entries(definition.defaults)) {
    values.set(name, name === TARGET_DIMENSION ? stage.targets : defaults);
  }
  for (const [name, pinned] of Object.entries(stage.dimensions ?? {})) {
    values.set(name, name === TARGET_DIMENSION ? stage.targets : pinned);
  }

  const dimensions: Dimension[] = [...values].map(([name, dimensionValues]) => ({ name, values: dimensionValues }));
  const declared = (rule: OverrideRule): boolean => Object.keys(rule.values).every((name) => values.has(name));
  const fullCell = (rule: OverrideRule): boolean =>
    declared(rule) &&
    Object.keys(rule.values).length === values.size &&
    stage.targets.includes(rule.values[TARGET_DIMENSION]);

  return {
    dimensions,
    excludes: (definition.excludes ?? []).filter(declared),
    includes: (definition.includes ?? []).filter(fullCell),
  };
}

/**
 * Replace the values of defaulted dimensions with configured ones.
 * Only dimensions the definition already declares are replaced.
 */
export function withDefaultOverrides(
  definition: PipelineDefinition,
  overrides: Readonly<Record<string, string[]>>,
): PipelineDefinition {
  const defaults: Record<string, string[]> = {};
  for (const [name, values] of Object.entries(definition.defaults)) {
    defaults[name] = Object.prototype.hasOwnProperty.call(overrides, name) ? [...overrides[name]] : values;
  }
  return { ...definition, defaults };
}

/** Why a stage's `when` condition is unmet, or undefined when it holds. */
export function unmetCondition(definition: PipelineDefinition, stage: StageDefinition): string | undefined {
  for (const [dimension, value] of Object.entries(stage.when ?? {})) {
    const defaults = Object.prototype.hasOwnProperty.call(definition.defaults, dimension)
      ? definition.defaults[dimension]
      : [];
    if (!defaults.includes(value)) {
      return `condition ${dimension}=${value} not met`;
    }
  }
  return undefined;
}

/** Runs pipelines on top of the build orchestrator. */
export class PipelineRunner {
  private readonly log = logger.child({ component: 'pipeline-runner' });

  constructor(
    private store: Store,
    private publisher: EventPublisher,
    private orchestrator: BuildOrchestrator,
  ) {}

  /** Validate and store a pipeline run. Nothing is built yet. */
  async createPipelineRun(definition: PipelineDefinition): Promise<PipelineRun> {
    const errors = validatePipeline(definition);
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }

    const order = stageOrder(definition.stages);
    const now = new Date().toISOString();
    const stages: Record<string, StageRecord> = {};
    for (const id of order) {
      stages[id] = { id, status: StageStatus.Pending };
    }

    const pipeline: PipelineRun = {
      id: `pipe_${uuid()}`,
      name: definition.name,
      definition,
      status: PipelineStatus.Running,
      createdAt: now,
      updatedAt: now,
      order,
      stages,
    };
    await this.store.pipelines.create(pipeline);
    return pipeline;
  }

  /** Run every stage of a stored pipeline to completion. */
  async executePipeline(pipelineId: string): Promise<PipelineRun> {
    const pipeline = await this.store.pipelines.getById(pipelineId);
    if (!pipeline) {
      throw new OrchestratorError(notFoundError('Pipeline', pipelineId));
    }
    const { definition } = pipeline;
    const stageMap = new Map(definition.stages.map((s) => [s.id, s]));
    const log = this.log.child({ pipelineId });

    await this.safePublish(pipeline, 'pipeline.started');
    log.info('Pipeline started', { order: pipeline.order });

    for (const stageId of pipeline.order) {
      const stage = stageMap.get(stageId);
      if (!stage) continue;
      const record = pipeline.stages[stageId];

      const blocked = (stage.needs ?? []).find((dep) => pipeline.stages[dep]?.status !== StageStatus.Succeeded);
      const skipReason = blocked !== undefined ? `needs "${blocked}", which did not succeed` : unmetCondition(definition, stage);
      if (skipReason) {
        record.status = StageStatus.Skipped;
        record.skipReason = skipReason;
        log.info('Stage skipped', { stageId, reason: skipReason });
      } else {
        record.status = StageStatus.Running;
        await this.store.pipelines.update(pipeline.id, { stages: pipeline.stages });
        await this.runStage(pipeline, stage, record);
      }
      pipeline.updatedAt = new Date().toISOString();
      await this.store.pipelines.update(pipeline.id, { stages: pipeline.stages, updatedAt: pipeline.updatedAt });
    }

    const success = Object.values(pipeline.stages).every(
      (s) => s.status === StageStatus.Succeeded || s.status === StageStatus.Skipped,
    );
    pipeline.success = success;
    pipeline.status = success ? PipelineStatus.Succeeded : PipelineStatus.Failed;
    pipeline.completedAt = new Date().toISOString();
    pipeline.updatedAt = pipeline.completedAt;
    await this.store.pipelines.update(pipeline.id, pipeline);
    await this.safePublish(pipeline, 'pipeline.completed');
    log.info('Pipeline completed', { status: pipeline.status });

    return pipeline;
  }

  /** Create and execute in one call. */
  async runPipeline(definition: PipelineDefinition): Promise<PipelineRun> {
    const pipeline = await this.createPipelineRun(definition);
    return this.executePipeline(pipeline.id);
  }

  private async runStage(pipeline: PipelineRun, stage: StageDefinition, record: StageRecord): Promise<void> {
    const { definition } = pipeline;
    try {
      const run = await this.orchestrator.createRun({
        matrix: stageMatrix(definition, stage),
        artifacts: stage.artifacts,
        options: { ...definition.options, ...(stage.failFast !== undefined ? { failFast: stage.failFast } : {}) },
        pipelineId: pipeline.id,
        stageId: stage.id,
      });
      record.runId = run.id;
      record.jobCount = Object.keys(run.jobs).length;

      const finished = await this.orchestrator.executeRun(run.id);
      record.status = STAGE_STATUS[finished.status];
      if (finished.error) record.error = finished.error;
    } catch (err) {
      const error: TypedError = toTypedError(err);
      record.status = StageStatus.Failed;
      record.error = error;
      this.log.warn('Stage failed to run', { pipelineId: pipeline.id, stageId: stage.id, code: error.code, error: error.message });
    }
  }

  private async safePublish(pipeline: PipelineRun, type: 'pipeline.started' | 'pipeline.completed'): Promise<void> {
    try {
      await this.publisher.publishPipelineEvent(pipeline, type);
    } catch (err) {
      this.log.warn('Failed to publish event', {
        pipelineId: pipeline.id,
        eventType: type,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
