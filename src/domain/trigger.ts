/**
 * Trigger metadata supplied by whatever starts a run (a webhook, the API,
 * a scheduler).
 */

export type TriggerKind = 'pull_request' | 'push' | 'workflow_dispatch' | 'schedule';

export const TRIGGER_KINDS: readonly TriggerKind[] = ['pull_request', 'push', 'workflow_dispatch', 'schedule'];

export function isTriggerKind(value: unknown): value is TriggerKind {
  return typeof value === 'string' && TRIGGER_KINDS.some((kind) => kind === value);
}

export interface RunTrigger {
  kind: TriggerKind;
  /** Lane identity, e.g. `refs/pull/42/merge` or a branch name. */
  lane: string;
  /** Commit under test. */
  sha?: string;
  triggeredBy?: string;
  receivedAt: string;
}

/** Run-level admission and cancellation policy. */
export interface TriggerPolicy {
  /** Trigger kinds that start runs at all. */
  admitKinds: TriggerKind[];
  /** Trigger kinds whose runs cancel an older in-flight run in the same lane. */
  cancelInProgressOn: TriggerKind[];
}

export const DEFAULT_TRIGGER_POLICY: TriggerPolicy = {
  admitKinds: ['pull_request'],
  cancelInProgressOn: ['pull_request'],
};
