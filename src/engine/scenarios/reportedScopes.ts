import type { CoefficientScenario } from '../schema/EmissionsInputV1';

/**
 * Scope 1/2/3 figures are reported already in CO₂e, so each scope passes
 * through with a multiplier of 1.
 */
export const reportedScopesScenario: CoefficientScenario = {
  id: 'reported_scopes',
  label: 'Reported CO₂e (Scope 1/2/3)',
  description: 'Sums the reported Scope 1, 2 and 3 CO₂e columns without re-weighting.',
  coefficients: { Scope1: 1, Scope2: 1, Scope3: 1 },
};
