/**
 * Trigger gating, evaluated before a run exists.
 *
 * These are pure functions of trigger metadata and policy, so the
 * concurrency controller never needs to know what a trigger kind means.
 */

import { GroupCondition, MatrixGroup } from '../domain/matrix';
import { RunTrigger, TriggerKind, TriggerPolicy } from '../domain/trigger';

/** Whether this trigger starts a run at all. */
export function shouldAdmit(trigger: Pick<RunTrigger, 'kind'>, policy: TriggerPolicy): boolean {
  return policy.admitKinds.includes(trigger.kind);
}

/** Whether a run started by `kind` cancels an older in-flight run in its lane. */
export function resolveCancelOnSupersede(kind: TriggerKind, policy: TriggerPolicy): boolean {
  return policy.cancelInProgressOn.includes(kind);
}

/**
 * Whether a matrix group's jobs are dispatched for this trigger kind.
 * Groups without a condition, and groups declaring `'always'`, always run.
 */
export function isGroupAdmitted(group: Pick<MatrixGroup, 'when'>, kind: TriggerKind): boolean {
  const condition: GroupCondition = group.when ?? 'always';
  if (condition === 'always') return true;
  return condition.includes(kind);
}
