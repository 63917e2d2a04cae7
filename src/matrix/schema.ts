/**
 * Matrix configuration schema constants.
 */

/** Joins dimension values into a job identity. */
export const IDENTITY_SEPARATOR = '--';

export const DIMENSION_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

/** Validation constraints. */
export const SCHEMA_CONSTRAINTS = {
  /** Maximum number of dimensions per matrix. */
  maxDimensions: 16,
  /** Maximum number of values per dimension. */
  maxValuesPerDimension: 64,
  /** Maximum candidate cells before filtering. */
  maxCells: 256,
  /** Maximum override rules of each kind. */
  maxRules: 256,
  /** Maximum length of a dimension value. */
  maxValueLength: 128,
} as const;
