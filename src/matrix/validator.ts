/**
 * Matrix Validator.
 *
 * Semantic checks on a structurally valid matrix configuration. Every
 * problem here fails the whole run before any job starts; warnings are
 * carried into the plan.
 */

import { TypedError, createTypedError } from '../domain/errors';
import { MatrixConfig, OverrideRule } from '../domain/matrix';
import { resolveRoles } from './registry';
import { DIMENSION_NAME_PATTERN, IDENTITY_SEPARATOR, SCHEMA_CONSTRAINTS } from './schema';

/** Validation result. */
export interface ValidationResult {
  valid: boolean;
  errors: TypedError[];
  warnings: string[];
}

/** Validate a matrix configuration. */
export function validateMatrixConfig(config: MatrixConfig): ValidationResult {
  const errors: TypedError[] = [];
  const warnings: string[] = [];

  validateDimensions(config, errors, warnings);
  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }

  const declared = new Set(config.dimensions.map((d) => d.name));
  validateRoles(config, declared, errors);
  validateIdentityDimensions(config, declared, errors);
  validateExcludes(config, declared, errors, warnings);
  validateIncludes(config, declared, errors, warnings);

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

function validateDimensions(config: MatrixConfig, errors: TypedError[], warnings: string[]): void {
  if (config.dimensions.length === 0) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.NO_DIMENSIONS',
        message: 'Matrix must declare at least one dimension',
        suggestedFixes: [{ type: 'ADD_DIMENSION', params: {}, description: 'Declare the build axes to expand' }],
      }),
    );
    return;
  }

  if (config.dimensions.length > SCHEMA_CONSTRAINTS.maxDimensions) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.TOO_MANY_DIMENSIONS',
        message: `Matrix exceeds maximum of ${SCHEMA_CONSTRAINTS.maxDimensions} dimensions`,
      }),
    );
  }

  const seenNames = new Set<string>();
  for (const dimension of config.dimensions) {
    if (!DIMENSION_NAME_PATTERN.test(dimension.name)) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.INVALID_DIMENSION_NAME',
          message: `Invalid dimension name "${dimension.name}"`,
          details: { dimension: dimension.name, pattern: DIMENSION_NAME_PATTERN.source },
        }),
      );
    }
    if (seenNames.has(dimension.name)) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.DUPLICATE_DIMENSION',
          message: `Duplicate dimension: ${dimension.name}`,
          details: { dimension: dimension.name },
        }),
      );
    }
    seenNames.add(dimension.name);

    if (dimension.values.length > SCHEMA_CONSTRAINTS.maxValuesPerDimension) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.TOO_MANY_VALUES',
          message: `Dimension "${dimension.name}" exceeds maximum of ${SCHEMA_CONSTRAINTS.maxValuesPerDimension} values`,
          details: { dimension: dimension.name },
        }),
      );
    }

    const seenValues = new Set<string>();
    for (const value of dimension.values) {
      validateValue(dimension.name, value, `dimension "${dimension.name}"`, errors, warnings);
      if (seenValues.has(value)) {
        errors.push(
          createTypedError({
            code: 'VALIDATION.DUPLICATE_VALUE',
            message: `Dimension "${dimension.name}": duplicate value "${value}"`,
            details: { dimension: dimension.name, value },
            suggestedFixes: [
              { type: 'REMOVE_VALUE', params: { dimension: dimension.name, value }, description: 'List each value once' },
            ],
          }),
        );
      }
      seenValues.add(value);
    }
  }

  const candidates = config.dimensions.reduce((product, d) => product * d.values.length, 1);
  if (candidates > SCHEMA_CONSTRAINTS.maxCells) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.TOO_MANY_CELLS',
        message: `Matrix expands to ${candidates} cells, more than the maximum of ${SCHEMA_CONSTRAINTS.maxCells}`,
        details: { candidates, maxCells: SCHEMA_CONSTRAINTS.maxCells },
        suggestedFixes: [
          { type: 'REDUCE_MATRIX', params: {}, description: 'Trim dimension values or split the matrix into stages' },
        ],
      }),
    );
  }
}

function validateValue(
  dimension: string,
  value: string,
  where: string,
  errors: TypedError[],
  warnings: string[],
): void {
  if (value.length === 0) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.EMPTY_VALUE',
        message: `${capitalize(where)}: values must be non-empty strings`,
        details: { dimension },
      }),
    );
    return;
  }
  if (value.length > SCHEMA_CONSTRAINTS.maxValueLength) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.VALUE_TOO_LONG',
        message: `${capitalize(where)}: value exceeds ${SCHEMA_CONSTRAINTS.maxValueLength} characters`,
        details: { dimension, value },
      }),
    );
  }
  if (/[/\\]/.test(value) || value === '.' || value === '..') {
    errors.push(
      createTypedError({
        code: 'VALIDATION.UNSAFE_VALUE',
        message: `${capitalize(where)}: value "${value}" cannot name a staging directory`,
        details: { dimension, value },
        suggestedFixes: [
          { type: 'RENAME_VALUE', params: { dimension, value }, description: 'Use values without path separators' },
        ],
      }),
    );
  }
  if (value.includes(IDENTITY_SEPARATOR)) {
    warnings.push(
      `${capitalize(where)}: value "${value}" contains the identity separator "${IDENTITY_SEPARATOR}"; identities may collide`,
    );
  }
}

function validateRoles(config: MatrixConfig, declared: Set<string>, errors: TypedError[]): void {
  if (!config.roles) return;
  const roles = resolveRoles(config.roles);
  for (const [role, name] of Object.entries(config.roles)) {
    if (name !== undefined && !declared.has(name)) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.UNKNOWN_DIMENSION',
          message: `Role "${role}" names undeclared dimension "${name}"`,
          details: { role, dimension: name },
        }),
      );
    }
  }
  if (roles.host === roles.target) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.ROLE_CONFLICT',
        message: `Dimension "${roles.host}" cannot be both target and host`,
        details: { dimension: roles.host },
      }),
    );
  }
}

function validateIdentityDimensions(config: MatrixConfig, declared: Set<string>, errors: TypedError[]): void {
  const order = config.identityDimensions;
  if (!order) return;

  if (order.length === 0) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.EMPTY_IDENTITY',
        message: 'identityDimensions must name at least one dimension',
      }),
    );
    return;
  }

  const seen = new Set<string>();
  for (const name of order) {
    if (!declared.has(name)) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.UNKNOWN_DIMENSION',
          message: `Identity dimension "${name}" is not declared`,
          details: { dimension: name, declared: [...declared] },
        }),
      );
    }
    if (seen.has(name)) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.DUPLICATE_DIMENSION',
          message: `Identity dimension "${name}" listed twice`,
          details: { dimension: name },
        }),
      );
    }
    seen.add(name);
  }
}

function validateExcludes(
  config: MatrixConfig,
  declared: Set<string>,
  errors: TypedError[],
  warnings: string[],
): void {
  const rules = config.excludes ?? [];
  validateRuleCount('excludes', rules, errors);

  rules.forEach((rule, index) => {
    const label = ruleLabel('Exclusion', index, rule);
    const keys = Object.keys(rule.values);

    if (keys.length === 0) {
      if (rule.unconditional) {
        warnings.push(`${label} is unconditional and disables the whole matrix`);
      } else {
        errors.push(
          createTypedError({
            code: 'VALIDATION.EMPTY_RULE',
            message: `${label} has no keys and would exclude every cell`,
            details: { ruleIndex: index },
            suggestedFixes: [
              {
                type: 'SET_UNCONDITIONAL',
                params: { ruleIndex: index, unconditional: true },
                description: 'Mark the rule unconditional to disable the run on purpose',
              },
            ],
          }),
        );
      }
      return;
    }

    for (const name of keys) {
      if (!declared.has(name)) {
        errors.push(
          createTypedError({
            code: 'VALIDATION.UNKNOWN_DIMENSION',
            message: `${label} names undeclared dimension "${name}"`,
            details: { ruleIndex: index, dimension: name, declared: [...declared] },
          }),
        );
        continue;
      }
      const value = rule.values[name];
      const values = config.dimensions.find((d) => d.name === name)?.values ?? [];
      if (!values.includes(value)) {
        warnings.push(`${label}: value "${value}" is not declared for "${name}"; the rule matches no expanded cell`);
      }
    }
  });
}

function validateIncludes(
  config: MatrixConfig,
  declared: Set<string>,
  errors: TypedError[],
  warnings: string[],
): void {
  const rules = config.includes ?? [];
  validateRuleCount('includes', rules, errors);

  rules.forEach((rule, index) => {
    const label = ruleLabel('Inclusion', index, rule);
    const keys = Object.keys(rule.values);

    for (const name of keys) {
      if (!declared.has(name)) {
        errors.push(
          createTypedError({
            code: 'VALIDATION.UNKNOWN_DIMENSION',
            message: `${label} names undeclared dimension "${name}"`,
            details: { ruleIndex: index, dimension: name },
          }),
        );
      } else {
        validateValue(name, rule.values[name], label, errors, warnings);
      }
    }

    const missing = [...declared].filter((name) => !keys.includes(name));
    if (missing.length > 0) {
      errors.push(
        createTypedError({
          code: 'VALIDATION.PARTIAL_INCLUDE',
          message: `${label} must assign every dimension; missing ${missing.join(', ')}`,
          details: { ruleIndex: index, missing },
          suggestedFixes: [
            { type: 'ASSIGN_DIMENSIONS', params: { ruleIndex: index, dimensions: missing } },
          ],
        }),
      );
    }
  });
}

function validateRuleCount(field: string, rules: readonly OverrideRule[], errors: TypedError[]): void {
  if (rules.length > SCHEMA_CONSTRAINTS.maxRules) {
    errors.push(
      createTypedError({
        code: 'VALIDATION.TOO_MANY_RULES',
        message: `${field} exceeds maximum of ${SCHEMA_CONSTRAINTS.maxRules} rules`,
      }),
    );
  }
}

function ruleLabel(kind: string, index: number, rule: OverrideRule): string {
  return rule.description ? `${kind} rule ${index} (${rule.description})` : `${kind} rule ${index}`;
}

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}
