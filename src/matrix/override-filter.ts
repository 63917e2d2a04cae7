/**
 * Override Filter.
 *
 * Applies exclusion rules, then inclusion rules, to the expanded
 * candidates. Exclusion rules are OR-combined; each rule is AND-combined
 * over its own keys. Inclusion always wins: a candidate that an inclusion
 * rule names survives every exclusion rule and keeps its position, and
 * included cells that expansion never produced are appended in rule order.
 */

import { ExclusionRecord, FilterResult, MatrixCell, OverrideRule } from '../domain/matrix';
import { cellKey, freezeCell, matchesRule } from './cell';

/**
 * Filter candidates, reporting which rule dropped each excluded cell.
 * `order` fixes the key order of cells built from inclusion rules.
 */
export function filterCellsWithDiagnostics(
  candidates: readonly MatrixCell[],
  excludes: readonly OverrideRule[],
  includes: readonly OverrideRule[],
  order: readonly string[] = [],
): FilterResult {
  const includeCells = includes.map((rule) => freezeCell(rule.values, order));
  const includeKeys = new Set(includeCells.map(cellKey));

  const cells: MatrixCell[] = [];
  const excluded: ExclusionRecord[] = [];
  const restored: MatrixCell[] = [];
  const appended: MatrixCell[] = [];
  const seen = new Set<string>();

  for (const cell of candidates) {
    const key = cellKey(cell);
    if (seen.has(key)) continue;

    const ruleIndex = excludes.findIndex((rule) => matchesRule(cell, rule));
    if (ruleIndex !== -1) {
      if (!includeKeys.has(key)) {
        excluded.push({ cell, ruleIndex, rule: excludes[ruleIndex] });
        continue;
      }
      restored.push(cell);
    }

    seen.add(key);
    cells.push(cell);
  }

  for (const cell of includeCells) {
    const key = cellKey(cell);
    if (seen.has(key)) continue;
    seen.add(key);
    cells.push(cell);
    appended.push(cell);
  }

  return { cells, excluded, restored, appended };
}

/** Filter candidates down to the final job cells. */
export function filterCells(
  candidates: readonly MatrixCell[],
  excludes: readonly OverrideRule[],
  includes: readonly OverrideRule[],
  order: readonly string[] = [],
): MatrixCell[] {
  return filterCellsWithDiagnostics(candidates, excludes, includes, order).cells;
}
