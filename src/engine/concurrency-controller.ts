/**
 * Run concurrency controller — at most one active run per lane.
 *
 * Latest wins: admitting a run always succeeds and never queues. When the
 * incoming run carries `cancelOnSupersede`, the lane's previous run is
 * aborted before `admit` returns; otherwise the previous run keeps going
 * but no longer owns the lane.
 *
 * Every lane-table read-modify-write happens synchronously inside one
 * method call, so two runs in the same lane can never both be active.
 */

import { Run } from '../domain/run';
import { logger } from '../logger';

const log = logger.child({ module: 'concurrency-controller' });

/** Why a run's signal was aborted. */
export interface Cancellation {
  supersededBy: string;
  reason: string;
  at: string;
}

export interface SupersededRun {
  runId: string;
  /** False when the incoming run's policy leaves the old run running. */
  cancelled: boolean;
}

export interface AdmissionDecision {
  admitted: true;
  runId: string;
  lane: string;
  /** Aborts when this run is superseded by a cancelling run. */
  signal: AbortSignal;
  superseded?: SupersededRun;
}

/** Snapshot of one lane-table entry. */
export interface ActiveLane {
  lane: string;
  runId: string;
  admittedAt: string;
}

interface ActiveRun {
  runId: string;
  admittedAt: string;
}

type AdmittableRun = Pick<Run, 'id' | 'lane' | 'cancelOnSupersede'>;

export class RunConcurrencyController {
  private lanes = new Map<string, ActiveRun>();
  private controllers = new Map<string, AbortController>();
  private cancellations = new Map<string, Cancellation>();

  admit(run: AdmittableRun): AdmissionDecision {
    const previous = this.lanes.get(run.lane);
    let superseded: SupersededRun | undefined;

    if (previous && previous.runId !== run.id) {
      const cancelled = run.cancelOnSupersede;
      if (cancelled) {
        this.abort(previous.runId, {
          supersededBy: run.id,
          reason: `superseded by ${run.id} in lane ${run.lane}`,
          at: new Date().toISOString(),
        });
      }
      superseded = { runId: previous.runId, cancelled };
      log.info('Run superseded', {
        lane: run.lane,
        runId: previous.runId,
        supersededBy: run.id,
        cancelled,
      });
    }

    const controller = this.controllers.get(run.id) ?? new AbortController();
    this.controllers.set(run.id, controller);
    this.lanes.set(run.lane, { runId: run.id, admittedAt: new Date().toISOString() });

    return {
      admitted: true,
      runId: run.id,
      lane: run.lane,
      signal: controller.signal,
      superseded,
    };
  }

  isCancelled(runId: string): boolean {
    return this.controllers.get(runId)?.signal.aborted ?? false;
  }

  /** The run's cancellation signal, or undefined if it was never admitted or is released. */
  signalFor(runId: string): AbortSignal | undefined {
    return this.controllers.get(runId)?.signal;
  }

  cancellationOf(runId: string): Cancellation | undefined {
    return this.cancellations.get(runId);
  }

  /** Whether the run still owns its lane. */
  isActive(run: Pick<Run, 'id' | 'lane'>): boolean {
    return this.lanes.get(run.lane)?.runId === run.id;
  }

  /**
   * Forget a finished run. The lane entry is removed only if this run still
   * owns it.
   */
  release(run: Pick<Run, 'id' | 'lane'>): void {
    if (this.isActive(run)) {
      this.lanes.delete(run.lane);
    }
    this.controllers.delete(run.id);
    this.cancellations.delete(run.id);
  }

  activeLanes(): ActiveLane[] {
    return [...this.lanes.entries()]
      .map(([lane, active]) => ({ lane, runId: active.runId, admittedAt: active.admittedAt }))
      .sort((a, b) => a.lane.localeCompare(b.lane));
  }

  private abort(runId: string, cancellation: Cancellation): void {
    const controller = this.controllers.get(runId);
    if (!controller || controller.signal.aborted) return;
    this.cancellations.set(runId, cancellation);
    controller.abort();
  }
}
