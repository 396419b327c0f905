/**
 * Matrix expansion: a static group declaration becomes an ordered list of
 * independent job specs.
 */

import { duplicateJobError, TypedError } from '../domain/errors';
import { JobSpec, MatrixDeclaration, MatrixGroup } from '../domain/matrix';

export interface ExpandOptions {
  /** Skip groups for which this returns false. */
  includeGroup?: (group: MatrixGroup) => boolean;
}

/** Matrix expansion error wrapper. */
export class MatrixError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'MatrixError';
  }
}

/**
 * Expand a declaration into job specs, group order first, then member order.
 * Each spec inherits its group's timeout. Pure: the same declaration always
 * yields equal specs in the same order.
 */
export function expandMatrix(declaration: MatrixDeclaration, options?: ExpandOptions): JobSpec[] {
  const seen = new Map<string, string>();
  for (const group of declaration.groups) {
    for (const member of group.members) {
      const firstGroup = seen.get(member);
      if (firstGroup !== undefined) {
        throw new MatrixError(duplicateJobError(member, [firstGroup, group.name]));
      }
      seen.set(member, group.name);
    }
  }

  const specs: JobSpec[] = [];
  for (const group of declaration.groups) {
    if (options?.includeGroup && !options.includeGroup(group)) continue;
    for (const member of group.members) {
      specs.push(
        Object.freeze({
          name: member,
          group: group.name,
          timeoutMs: group.timeoutMs,
          index: specs.length,
        }),
      );
    }
  }
  return specs;
}
