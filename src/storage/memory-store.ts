/**
 * In-memory storage implementation.
 *
 * Reference implementation for development and testing. Records are
 * deep-copied on the way in and on the way out, so callers never share
 * nested objects with the store.
 */

import { OrchestrationEvent } from '../domain/events';
import { PipelineRun } from '../domain/pipeline';
import { OrchestrationRun, RunStatus } from '../domain/run';
import { EventStore, ListOptions, PipelineStore, RunStore, Store } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, OrchestrationRun>();

  async create(run: OrchestrationRun): Promise<OrchestrationRun> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<OrchestrationRun | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async update(id: string, updates: Partial<OrchestrationRun>): Promise<OrchestrationRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions & { status?: RunStatus; pipelineId?: string }): Promise<OrchestrationRun[]> {
    const items = [...this.data.values()]
      .filter((run) => options?.status === undefined || run.status === options.status)
      .filter((run) => options?.pipelineId === undefined || run.pipelineId === options.pipelineId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt));
    return applyListOptions(items.map(deepCopy), options);
  }

  async delete(id: string): Promise<boolean> {
    return this.data.delete(id);
  }
}

class MemoryEventStore implements EventStore {
  private data: OrchestrationEvent[] = [];

  async create(event: OrchestrationEvent): Promise<OrchestrationEvent> {
    this.data.push(deepCopy(event));
    return deepCopy(event);
  }

  async listByRun(runId: string, options?: ListOptions): Promise<OrchestrationEvent[]> {
    const items = this.data.filter((e) => e.runId === runId);
    return applyListOptions(items.map(deepCopy), options);
  }

  async listByPipeline(pipelineId: string, options?: ListOptions): Promise<OrchestrationEvent[]> {
    const items = this.data.filter((e) => e.pipelineId === pipelineId);
    return applyListOptions(items.map(deepCopy), options);
  }
}

class MemoryPipelineStore implements PipelineStore {
  private data = new Map<string, PipelineRun>();

  async create(pipeline: PipelineRun): Promise<PipelineRun> {
    this.data.set(pipeline.id, deepCopy(pipeline));
    return deepCopy(pipeline);
  }

  async getById(id: string): Promise<PipelineRun | null> {
    const pipeline = this.data.get(id);
    return pipeline ? deepCopy(pipeline) : null;
  }

  async update(id: string, updates: Partial<PipelineRun>): Promise<PipelineRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    runs: new MemoryRunStore(),
    events: new MemoryEventStore(),
    pipelines: new MemoryPipelineStore(),
  };
}
