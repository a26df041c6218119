import type { RoleCandidates } from './schema/EmissionsInputV1';

/**
 * Default column aliases per role, highest priority first.
 * Matching is case-insensitive: an exact match on an alias beats a substring
 * match on the same alias, and the first alias with any match wins.
 * Short aliases such as "co2" and "usage" come last so a column carrying a
 * more specific name is found first.
 */
export const ROLE_CANDIDATES = {
  Year: ['year', 'yr', 'reporting_year', 'period'],
  Region: ['region', 'country', 'entity', 'area', 'location', 'site'],
  Usage: ['usage_', 'usage ', 'activity', 'consumption', 'usage', 'denominator', 'output'],
  Projected: ['projected', 'forecast'],

  CO2: ['co2_', 'co2 ', 'carbon dioxide', 'carbon_dioxide', 'co2'],
  CH4: ['ch4', 'methane'],
  N2O: ['n2o', 'nitrous oxide', 'nitrous_oxide'],
  SF6: ['sf6', 'sulphur hexafluoride', 'sulfur hexafluoride'],
  Scope1: ['scope1', 'scope 1', 'scope_1'],
  Scope2: ['scope2', 'scope 2', 'scope_2'],
  Scope3: ['scope3', 'scope 3', 'scope_3'],
} as const satisfies RoleCandidates;

/**
 * Column-name fragments that rule a column out for a role, whatever alias
 * matched it. CO₂e totals are not raw CO₂, a ratio is not a denominator, and
 * a combined Scope 1+2 column is not Scope 1.
 */
export const ROLE_EXCLUSIONS = {
  Usage: ['intensity', 'per_usage', 'per usage', '/usage'],
  CO2: ['co2e', 'co2-e', 'co2eq'],
  Scope1: ['scope12', 'scope 12', 'scope_12', 'scope1+2', 'scope 1+2', 'scope1&2', 'scope 1&2', 'scope 1 & 2'],
} as const satisfies RoleCandidates;
