/**
 * Orchestration event domain model.
 *
 * Events are emitted at each run, job and artifact transition as stable,
 * versioned records for downstream consumers (dashboards, notifiers).
 */

/** Event types emitted by the orchestrator. */
export type OrchestrationEventType =
  | 'run.created'
  | 'run.started'
  | 'run.succeeded'
  | 'run.failed'
  | 'run.canceled'
  | 'job.started'
  | 'job.succeeded'
  | 'job.failed'
  | 'job.canceled'
  | 'artifact.skipped'
  | 'artifact.published'
  | 'artifact.site-published'
  | 'artifact.failed'
  | 'pipeline.started'
  | 'pipeline.completed';

export const EVENT_SCHEMA_VERSION = '1.0.0';

/** An orchestration event. */
export interface OrchestrationEvent {
  id: string;
  type: OrchestrationEventType;
  schemaVersion: string;
  timestamp: string;
  runId?: string;
  pipelineId?: string;
  identity?: string;
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Deliver only events of these runs. */
  runId?: string;
  eventTypes?: OrchestrationEventType[];
  callback: (event: OrchestrationEvent) => void;
}
