import { resolvedGasRoles } from '../schema/EmissionsInputV1';
import type {
  CoefficientScenario,
  ColumnRoleMap,
  DerivedRecord,
  GasRole,
  IntensityStatus,
  MissingValueWarning,
  RawRecord,
} from '../schema/EmissionsInputV1';
import { CoefficientError } from '../errors/EmissionsEngineError';
import { coerceRecords } from './SchemaResolverModule';

/**
 * Configuration check, run once per recomputation rather than per row:
 * every resolved gas with at least one present value must be priced by the
 * scenario. Resolved gases whose column is entirely empty are tolerated.
 */
export function assertScenarioCovers(
  records: readonly RawRecord[],
  roles: ColumnRoleMap,
  scenario: CoefficientScenario,
): void {
  const coerced = coerceRecords(records, roles);
  for (const gas of resolvedGasRoles(roles)) {
    if (scenario.coefficients[gas] !== undefined) continue;
    if (coerced.some(r => r.rawByGas[gas] !== null)) {
      throw new CoefficientError(gas, scenario.id);
    }
  }
}

function intensityOf(
  total: number | null,
  usage: number | null,
  usageResolved: boolean,
): { intensity: number | null; intensityStatus: IntensityStatus } {
  if (!usageResolved) return { intensity: null, intensityStatus: 'usage_unresolved' };
  if (total === null) return { intensity: null, intensityStatus: 'total_missing' };
  if (usage === null) return { intensity: null, intensityStatus: 'usage_missing' };
  if (usage === 0) return { intensity: null, intensityStatus: 'usage_zero' };
  return { intensity: total / usage, intensityStatus: 'ok' };
}

/**
 * Recomputes per-gas CO₂e, the row total and intensity for every record.
 *
 * Gases the scenario prices but the data lacks contribute nothing. A missing
 * value on a resolved gas (or a missing year) flags the row and excludes it
 * from aggregates; the row itself is still returned.
 */
export function recompute(
  records: readonly RawRecord[],
  roles: ColumnRoleMap,
  scenario: CoefficientScenario,
): DerivedRecord[] {
  assertScenarioCovers(records, roles, scenario);

  const gases = resolvedGasRoles(roles);
  const usageResolved = typeof roles.Usage === 'string';

  return coerceRecords(records, roles).map(row => {
    const warnings: MissingValueWarning[] = [];
    const co2eByGas: Partial<Record<GasRole, number | null>> = {};
    let total: number | null = 0;

    for (const gas of gases) {
      const raw = row.rawByGas[gas] ?? null;
      // Only reachable with a null raw value: assertScenarioCovers rejects the rest.
      const coefficient = scenario.coefficients[gas];
      if (raw === null || coefficient === undefined) {
        co2eByGas[gas] = null;
        total = null;
        warnings.push({
          id: 'missing-value',
          rowIndex: row.rowIndex,
          role: gas,
          column: roles[gas] ?? gas,
          rawValue: row.source[roles[gas] ?? gas],
        });
        continue;
      }
      const co2e = raw * coefficient;
      co2eByGas[gas] = co2e;
      if (total !== null) total += co2e;
    }

    if (row.year === null) {
      warnings.push({
        id: 'missing-value',
        rowIndex: row.rowIndex,
        role: 'Year',
        column: roles.Year ?? 'Year',
        rawValue: row.source[roles.Year ?? 'Year'],
      });
    }

    return {
      rowIndex: row.rowIndex,
      year: row.year,
      region: row.region,
      rawByGas: row.rawByGas,
      co2eByGas,
      totalCo2e: total,
      usage: row.usage,
      ...intensityOf(total, row.usage, usageResolved),
      projected: row.projected,
      warnings,
      excluded: total === null || row.year === null,
    };
  });
}

/**
 * Largest-emitter view: included rows by total descending, ties broken by
 * input order.
 */
export function rankRecords(derived: readonly DerivedRecord[], n: number): DerivedRecord[] {
  return derived
    .filter(r => !r.excluded)
    .sort((a, b) => (b.totalCo2e ?? 0) - (a.totalCo2e ?? 0) || a.rowIndex - b.rowIndex)
    .slice(0, Math.max(0, n));
}

// ─── Cache ────────────────────────────────────────────────────────────────────

export interface RecomputeCache {
  recompute(
    records: readonly RawRecord[],
    roles: ColumnRoleMap,
    scenario: CoefficientScenario,
  ): DerivedRecord[];
  readonly hits: number;
  readonly misses: number;
}

/**
 * Memoises `recompute` on (records identity, roles identity, scenario id).
 * A fresh dataset or role map is a new object, so it always misses.
 */
export function createRecomputeCache(): RecomputeCache {
  const byRecords = new WeakMap<readonly RawRecord[], WeakMap<ColumnRoleMap, Map<string, DerivedRecord[]>>>();
  let hits = 0;
  let misses = 0;

  return {
    recompute(records, roles, scenario) {
      let byRoles = byRecords.get(records);
      if (!byRoles) {
        byRoles = new WeakMap();
        byRecords.set(records, byRoles);
      }
      let byScenario = byRoles.get(roles);
      if (!byScenario) {
        byScenario = new Map();
        byRoles.set(roles, byScenario);
      }
      const cached = byScenario.get(scenario.id);
      if (cached) {
        hits++;
        return cached;
      }
      misses++;
      const result = recompute(records, roles, scenario);
      byScenario.set(scenario.id, result);
      return result;
    },
    get hits() { return hits; },
    get misses() { return misses; },
  };
}
