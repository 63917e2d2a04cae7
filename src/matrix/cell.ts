/**
 * Cell helpers shared by the expander, the override filter and the
 * identity resolver.
 */

import { MatrixCell, OverrideRule } from '../domain/matrix';

/**
 * Key that is equal for two cells iff their assignments are equal,
 * independent of key order.
 */
export function cellKey(cell: MatrixCell): string {
  return JSON.stringify(
    Object.keys(cell)
      .sort()
      .map((name) => [name, cell[name]]),
  );
}

/**
 * Build a frozen cell from an assignment, ordering keys by `order` first
 * and any remaining keys after them.
 */
export function freezeCell(values: Readonly<Record<string, string>>, order: readonly string[] = []): MatrixCell {
  const cell: Record<string, string> = {};
  for (const name of order) {
    if (Object.prototype.hasOwnProperty.call(values, name)) cell[name] = values[name];
  }
  for (const [name, value] of Object.entries(values)) {
    if (!(name in cell)) cell[name] = value;
  }
  return Object.freeze(cell);
}

/**
 * A rule matches a cell iff every key of the rule is present in the cell
 * with an equal value. A rule without keys matches every cell.
 */
export function matchesRule(cell: MatrixCell, rule: OverrideRule): boolean {
  for (const [name, value] of Object.entries(rule.values)) {
    if (!Object.prototype.hasOwnProperty.call(cell, name) || cell[name] !== value) return false;
  }
  return true;
}

/** Render a cell for logs and error messages: "target=a, profile=dev". */
export function describeCell(cell: MatrixCell): string {
  return Object.entries(cell)
    .map(([name, value]) => `${name}=${value}`)
    .join(', ');
}
