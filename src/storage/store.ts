/**
 * Storage layer interfaces.
 *
 * Defines the contract for persisting runs, their events and pipeline
 * records, with pluggable backends.
 */

import { OrchestrationEvent } from '../domain/events';
import { PipelineRun } from '../domain/pipeline';
import { OrchestrationRun, RunStatus } from '../domain/run';

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

/** Store interface for orchestration runs. */
export interface RunStore {
  create(run: OrchestrationRun): Promise<OrchestrationRun>;
  getById(id: string): Promise<OrchestrationRun | null>;
  update(id: string, run: Partial<OrchestrationRun>): Promise<OrchestrationRun | null>;
  list(options?: ListOptions & { status?: RunStatus; pipelineId?: string }): Promise<OrchestrationRun[]>;
  /** Delete a run by ID. */
  delete(id: string): Promise<boolean>;
}

/** Store interface for lifecycle events. */
export interface EventStore {
  create(event: OrchestrationEvent): Promise<OrchestrationEvent>;
  listByRun(runId: string, options?: ListOptions): Promise<OrchestrationEvent[]>;
  listByPipeline(pipelineId: string, options?: ListOptions): Promise<OrchestrationEvent[]>;
}

/** Store interface for pipeline runs. */
export interface PipelineStore {
  create(pipeline: PipelineRun): Promise<PipelineRun>;
  getById(id: string): Promise<PipelineRun | null>;
  update(id: string, pipeline: Partial<PipelineRun>): Promise<PipelineRun | null>;
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
  events: EventStore;
  pipelines: PipelineStore;
}
