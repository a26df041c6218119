/**
 * ipccAssessments.ts
 *
 * 100-year GWP values from the IPCC assessment reports.
 * CH₄ values are the totals without climate-carbon feedbacks; AR6 uses the
 * combined fossil/non-fossil figure.
 */

import type { CoefficientScenario } from '../schema/EmissionsInputV1';

export const sarScenario: CoefficientScenario = {
  id: 'sar',
  label: 'IPCC SAR (GWP100)',
  description: 'Second Assessment Report values, still used for some national inventories.',
  coefficients: { CO2: 1, CH4: 21, N2O: 310, SF6: 23900 },
};

export const ar4Scenario: CoefficientScenario = {
  id: 'ar4',
  label: 'IPCC AR4 (GWP100)',
  description: 'Fourth Assessment Report values, used for Kyoto second-period reporting.',
  coefficients: { CO2: 1, CH4: 25, N2O: 298, SF6: 22800 },
};

export const ar5Scenario: CoefficientScenario = {
  id: 'ar5',
  label: 'IPCC AR5 (GWP100)',
  description: 'Fifth Assessment Report values, required under the Paris Agreement transparency framework.',
  coefficients: { CO2: 1, CH4: 28, N2O: 265, SF6: 23500 },
};

export const ar6Scenario: CoefficientScenario = {
  id: 'ar6',
  label: 'IPCC AR6 (GWP100)',
  description: 'Sixth Assessment Report values.',
  coefficients: { CO2: 1, CH4: 27.9, N2O: 273, SF6: 25200 },
};
