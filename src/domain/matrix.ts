/**
 * Matrix domain model.
 *
 * A matrix is the cartesian product of named configuration axes
 * (dimensions), trimmed and patched by override rules. Each surviving
 * cell is one build job.
 */

/** One named configuration axis with its ordered values. */
export interface Dimension {
  name: string;
  values: readonly string[];
}

/**
 * One value per declared dimension. Key order follows dimension
 * declaration order; cells are frozen once produced.
 */
export type MatrixCell = Readonly<Record<string, string>>;

/** Dimensions with a fixed part to play in identity and artifact naming. */
export interface DimensionRoles {
  /** Build target (bake target / image prefix); keys the artifact map. */
  target: string;
  /** Compiler profile; qualifies generic artifact names. */
  profile: string;
  /** Feature set; qualifies generic artifact names. */
  featureSet: string;
  /** Execution host; left out of the identity by default. */
  host: string;
}

export const DEFAULT_DIMENSION_ROLES: DimensionRoles = {
  target: 'target',
  profile: 'profile',
  featureSet: 'feature_set',
  host: 'machine',
};

export type OverrideRuleKind = 'exclude' | 'include';

/**
 * A partial-match record. Exclusion rules drop every cell they match;
 * inclusion rules name one full cell to add or restore.
 */
export interface OverrideRule {
  kind: OverrideRuleKind;
  values: Readonly<Record<string, string>>;
  description?: string;
  /** Permits an empty exclusion rule, which disables the whole matrix. */
  unconditional?: boolean;
}

/** Caller-supplied matrix configuration. */
export interface MatrixConfig {
  dimensions: Dimension[];
  excludes?: OverrideRule[];
  includes?: OverrideRule[];
  roles?: Partial<DimensionRoles>;
  /** Dimensions joined into the job identity, in order. */
  identityDimensions?: string[];
}

/** Read-only registry of the axes of one orchestration run. */
export interface DimensionRegistry {
  readonly names: readonly string[];
  readonly dimensions: readonly Dimension[];
  readonly identityOrder: readonly string[];
  readonly roles: Readonly<DimensionRoles>;
  has(name: string): boolean;
  values(name: string): readonly string[];
}

/** Why a candidate cell did not survive filtering. */
export interface ExclusionRecord {
  cell: MatrixCell;
  /** Index of the first matching exclusion rule. */
  ruleIndex: number;
  rule: OverrideRule;
}

/** Filter output with diagnostics. */
export interface FilterResult {
  cells: MatrixCell[];
  excluded: ExclusionRecord[];
  /** Candidates matched by an exclusion rule but kept by an inclusion rule. */
  restored: MatrixCell[];
  /** Cells added by inclusion rules that expansion did not produce. */
  appended: MatrixCell[];
}
