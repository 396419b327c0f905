/**
 * Matrix declaration and the job specs expanded from it.
 */

import { TriggerKind } from './trigger';

/**
 * Group admission predicate: `'always'`, or the trigger kinds for which
 * the group's jobs are dispatched.
 */
export type GroupCondition = 'always' | TriggerKind[];

/** Largest delay a single Node timer honours; longer ones fire at once. */
export const MAX_TIMER_MS = 2_147_483_647;

/** A named collection of test units sharing a timeout. */
export interface MatrixGroup {
  name: string;
  timeoutMs: number;
  /** Test unit names, dispatched in this order. */
  members: string[];
  /** Defaults to `'always'`. */
  when?: GroupCondition;
}

/** Ordered list of matrix groups, loaded once at run start. */
export interface MatrixDeclaration {
  groups: MatrixGroup[];
}

/** One unit of matrix work. Immutable once expanded. */
export interface JobSpec {
  readonly name: string;
  readonly group: string;
  readonly timeoutMs: number;
  /** Position in the expanded matrix. */
  readonly index: number;
}
