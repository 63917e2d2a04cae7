/**
 * Matrix Expander.
 *
 * Computes the cartesian product of the declared dimensions. The first
 * dimension varies slowest and the last fastest, so identical input always
 * yields cells in identical order and job numbering in logs is reproducible.
 */

import { Dimension, MatrixCell } from '../domain/matrix';

/** Number of cells `expand` would produce. */
export function candidateCount(dimensions: readonly Dimension[]): number {
  if (dimensions.length === 0) return 0;
  return dimensions.reduce((product, dimension) => product * dimension.values.length, 1);
}

/**
 * Expand dimensions into cells. Any dimension without values collapses the
 * matrix to nothing, which is how a caller disables a run. No dimensions at
 * all also yields nothing.
 */
export function expand(dimensions: readonly Dimension[]): MatrixCell[] {
  if (candidateCount(dimensions) === 0) return [];

  const cells: MatrixCell[] = [];
  const cursor = dimensions.map(() => 0);

  for (;;) {
    const cell: Record<string, string> = {};
    dimensions.forEach((dimension, axis) => {
      cell[dimension.name] = dimension.values[cursor[axis]];
    });
    cells.push(Object.freeze(cell));

    // Advance the odometer from the fastest axis.
    let axis = dimensions.length - 1;
    while (axis >= 0) {
      cursor[axis] += 1;
      if (cursor[axis] < dimensions[axis].values.length) break;
      cursor[axis] = 0;
      axis -= 1;
    }
    if (axis < 0) return cells;
  }
}
