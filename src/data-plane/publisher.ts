/**
 * Pipeline event publisher.
 *
 * Emits stable, versioned run, build, job and coverage events, persists
 * them as the run's history, and fans them out to in-process subscribers.
 */

import { v4 as uuid } from 'uuid';
import { PipelineEvent, PipelineEventType, EventSubscription } from '../domain/events';
import { Run } from '../domain/run';
import { logger } from '../logger';
import { Store } from '../storage/store';

const log = logger.child({ module: 'publisher' });

/** The pipeline event publisher. */
export class PipelinePublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(private store: Store) {}

  /** Publish a run lifecycle event. */
  async publishRunEvent(
    run: Run,
    eventType: PipelineEventType,
    extra?: Record<string, unknown>,
  ): Promise<PipelineEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: '1.0.0',
      timestamp: new Date().toISOString(),
      runId: run.id,
      lane: run.lane,
      artifactId: run.artifactId,
      payload: {
        status: run.status,
        phase: run.phase,
        triggerKind: run.trigger.kind,
        error: run.error,
        ...extra,
      },
    });
  }

  /** Publish a job lifecycle or coverage event. */
  async publishJobEvent(
    run: Run,
    jobName: string,
    eventType: PipelineEventType,
  ): Promise<PipelineEvent> {
    const result = run.jobResults[jobName];

    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: '1.0.0',
      timestamp: new Date().toISOString(),
      runId: run.id,
      lane: run.lane,
      jobName,
      artifactId: run.artifactId,
      payload: {
        group: result?.group,
        jobStatus: result?.status,
        durationMs: result?.durationMs,
        coverageReported: result?.coverageReported,
        error: result?.reportingError ?? result?.error,
      },
    });
  }

  /** Publish an arbitrary event. */
  async publishEvent(event: PipelineEvent): Promise<PipelineEvent> {
    await this.store.events.create(event);

    for (const sub of this.subscriptions) {
      if (!this.matchesSubscription(event, sub)) continue;
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

    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Query the recorded events of a run. */
  async getEventsByRun(runId: string, eventTypes?: PipelineEventType[]): Promise<PipelineEvent[]> {
    return this.store.events.listByRun(runId, { eventTypes, limit: Number.MAX_SAFE_INTEGER });
  }

  private matchesSubscription(event: PipelineEvent, sub: EventSubscription): boolean {
    if (sub.lane && event.lane !== sub.lane) return false;
    if (sub.runId && event.runId !== sub.runId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
