/**
 * Event Publisher.
 *
 * Emits stable, versioned lifecycle events for runs, jobs, artifacts and
 * pipelines, persists them as the run history, and delivers them to
 * in-process subscribers.
 */

import { v4 as uuid } from 'uuid';
import {
  EVENT_SCHEMA_VERSION,
  EventSubscription,
  OrchestrationEvent,
  OrchestrationEventType,
} from '../domain/events';
import { PipelineRun } from '../domain/pipeline';
import { JobRecord, OrchestrationRun } from '../domain/run';
import { logger } from '../logger';
import { Store } from '../storage/store';

const log = logger.child({ component: 'publisher' });

/** The event publisher. */
export class EventPublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(private store: Store) {}

  /** Publish a run lifecycle event. */
  async publishRunEvent(run: OrchestrationRun, eventType: OrchestrationEventType): Promise<OrchestrationEvent> {
    return this.publishEvent(
      this.createEvent(eventType, {
        runId: run.id,
        pipelineId: run.pipelineId,
        payload: {
          status: run.status,
          stageId: run.stageId,
          planHash: run.planHash,
          jobs: Object.keys(run.jobs).length,
          success: run.report?.success,
          error: run.error,
          cancelReason: run.cancelReason,
        },
      }),
    );
  }

  /** Publish a job build event. */
  async publishJobEvent(
    run: OrchestrationRun,
    job: JobRecord,
    eventType: OrchestrationEventType,
  ): Promise<OrchestrationEvent> {
    return this.publishEvent(
      this.createEvent(eventType, {
        runId: run.id,
        pipelineId: run.pipelineId,
        identity: job.identity,
        payload: {
          index: job.index,
          status: job.status,
          durationMs: job.durationMs,
          error: job.error,
          cancelReason: job.cancelReason,
        },
      }),
    );
  }

  /** Publish an artifact routing event. */
  async publishArtifactEvent(
    run: OrchestrationRun,
    job: JobRecord,
    eventType: OrchestrationEventType,
  ): Promise<OrchestrationEvent> {
    return this.publishEvent(
      this.createEvent(eventType, {
        runId: run.id,
        pipelineId: run.pipelineId,
        identity: job.identity,
        payload: {
          artifact: job.artifact,
          publications: job.publications,
          error: job.artifactError,
        },
      }),
    );
  }

  /** Publish a pipeline lifecycle event. */
  async publishPipelineEvent(
    pipeline: PipelineRun,
    eventType: OrchestrationEventType,
  ): Promise<OrchestrationEvent> {
    return this.publishEvent(
      this.createEvent(eventType, {
        pipelineId: pipeline.id,
        payload: {
          status: pipeline.status,
          order: pipeline.order,
          success: pipeline.success,
        },
      }),
    );
  }

  /** Publish an arbitrary event. */
  async publishEvent(event: OrchestrationEvent): Promise<OrchestrationEvent> {
    // Persist event
    await this.store.events.create(event);

    // Deliver to subscribers
    for (const sub of this.subscriptions) {
      if (this.matchesSubscription(event, sub)) {
        try {
          sub.callback(event);
        } catch (err) {
          log.warn('Event subscriber threw', {
            subscriptionId: sub.id,
            eventType: event.type,
            error: err instanceof Error ? err.message : String(err),
          });
        }
      }
    }

    return event;
  }

  /** Subscribe to events. Returns the unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Query events by run. */
  async getEventsByRun(runId: string): Promise<OrchestrationEvent[]> {
    return this.store.events.listByRun(runId, { limit: Number.MAX_SAFE_INTEGER });
  }

  /** Query events by pipeline. */
  async getEventsByPipeline(pipelineId: string): Promise<OrchestrationEvent[]> {
    return this.store.events.listByPipeline(pipelineId, { limit: Number.MAX_SAFE_INTEGER });
  }

  private createEvent(
    type: OrchestrationEventType,
    fields: Pick<OrchestrationEvent, 'runId' | 'pipelineId' | 'identity' | 'payload'>,
  ): OrchestrationEvent {
    return {
      id: `evt_${uuid()}`,
      type,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      ...fields,
    };
  }

  private matchesSubscription(event: OrchestrationEvent, sub: EventSubscription): boolean {
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
