/**
 * Dimension Registry.
 *
 * Frozen view of the axes of one orchestration run. Built once from
 * validated configuration and read-only thereafter.
 */

import { DEFAULT_DIMENSION_ROLES, Dimension, DimensionRegistry, DimensionRoles } from '../domain/matrix';

export interface RegistryOptions {
  roles?: Partial<DimensionRoles>;
  identityDimensions?: readonly string[];
}

/** Resolve role overrides against the defaults. */
export function resolveRoles(roles: Partial<DimensionRoles> = {}): DimensionRoles {
  return {
    target: roles.target ?? DEFAULT_DIMENSION_ROLES.target,
    profile: roles.profile ?? DEFAULT_DIMENSION_ROLES.profile,
    featureSet: roles.featureSet ?? DEFAULT_DIMENSION_ROLES.featureSet,
    host: roles.host ?? DEFAULT_DIMENSION_ROLES.host,
  };
}

/**
 * Default identity order: every declared dimension except the host. The
 * same image built on two hosts has one name.
 */
export function defaultIdentityOrder(names: readonly string[], roles: DimensionRoles): string[] {
  return names.filter((name) => name !== roles.host);
}

export function createDimensionRegistry(
  dimensions: readonly Dimension[],
  options: RegistryOptions = {},
): DimensionRegistry {
  const frozen = Object.freeze(
    dimensions.map((d) => Object.freeze({ name: d.name, values: Object.freeze([...d.values]) })),
  );
  const byName = new Map(frozen.map((d) => [d.name, d]));
  const names = Object.freeze(frozen.map((d) => d.name));
  const roles = Object.freeze(resolveRoles(options.roles));
  const identityOrder = Object.freeze(
    options.identityDimensions ? [...options.identityDimensions] : defaultIdentityOrder(names, roles),
  );

  return Object.freeze({
    names,
    dimensions: frozen,
    identityOrder,
    roles,
    has(name: string): boolean {
      return byName.has(name);
    },
    values(name: string): readonly string[] {
      return byName.get(name)?.values ?? [];
    },
  });
}
