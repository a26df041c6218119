/**
 * gwpScenarioRegistry.ts
 *
 * Central registry of GWP coefficient scenarios.
 * Each scenario lives in its own file; this module imports and re-exports them.
 * New scenarios are added here and nowhere else.
 */

import type { CoefficientScenario } from '../schema/EmissionsInputV1';
import { ScenarioNotFoundError } from '../errors/EmissionsEngineError';
import { sarScenario, ar4Scenario, ar5Scenario, ar6Scenario } from './ipccAssessments';
import { reportedScopesScenario } from './reportedScopes';
export { sarScenario, ar4Scenario, ar5Scenario, ar6Scenario } from './ipccAssessments';
export { reportedScopesScenario } from './reportedScopes';

export const GWP_SCENARIOS: readonly CoefficientScenario[] = Object.freeze([
  sarScenario,
  ar4Scenario,
  ar5Scenario,
  ar6Scenario,
  reportedScopesScenario,
]);

export const DEFAULT_SCENARIO_ID = 'ar5';

export function getScenario(id: string): CoefficientScenario {
  const scenario = GWP_SCENARIOS.find(s => s.id === id);
  if (!scenario) {
    throw new ScenarioNotFoundError(id, GWP_SCENARIOS.map(s => s.id));
  }
  return scenario;
}
