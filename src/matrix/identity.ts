/**
 * Job Identity Resolver.
 *
 * A job identity joins a cell's values in the registry's identity order.
 * It names the built image and the job's staging directory, so it must be
 * injective over the final job set. Collisions are detected eagerly, before
 * anything is dispatched.
 */

import { ConfigurationError, CollisionError, createTypedError } from '../domain/errors';
import { JobIdentity } from '../domain/job';
import { MatrixCell } from '../domain/matrix';
import { cellKey, describeCell } from './cell';
import { IDENTITY_SEPARATOR } from './schema';

export function identify(cell: MatrixCell, order: readonly string[], separator = IDENTITY_SEPARATOR): JobIdentity {
  return order
    .map((name) => {
      if (!Object.prototype.hasOwnProperty.call(cell, name)) {
        throw new ConfigurationError([
          createTypedError({
            code: 'VALIDATION.MISSING_DIMENSION',
            message: `Cell (${describeCell(cell)}) has no value for identity dimension "${name}"`,
            details: { cell, dimension: name },
          }),
        ]);
      }
      return cell[name];
    })
    .join(separator);
}

/**
 * Map every cell to its identity, preserving cell order. Throws
 * `CollisionError` naming each identity shared by distinct cells.
 */
export function resolveIdentities(
  cells: readonly MatrixCell[],
  order: readonly string[],
  separator = IDENTITY_SEPARATOR,
): Map<JobIdentity, MatrixCell> {
  const groups = new Map<JobIdentity, MatrixCell[]>();

  for (const cell of cells) {
    const identity = identify(cell, order, separator);
    const group = groups.get(identity);
    if (!group) {
      groups.set(identity, [cell]);
    } else if (!group.some((other) => cellKey(other) === cellKey(cell))) {
      group.push(cell);
    }
  }

  const collisions = [...groups.entries()]
    .filter(([, group]) => group.length > 1)
    .map(([identity, group]) => ({ identity, cells: group.map((cell) => ({ ...cell })) }));
  if (collisions.length > 0) {
    throw new CollisionError(collisions);
  }

  const identities = new Map<JobIdentity, MatrixCell>();
  for (const [identity, group] of groups) identities.set(identity, group[0]);
  return identities;
}
