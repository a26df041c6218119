import type { SummaryMetricsV1 } from '../contracts/EmissionsOutputV1';
import type { ColumnRoleMap, DerivedRecord, RawRecord } from './schema/EmissionsInputV1';
import { pooledIntensity } from './modules/AggregationModule';
import { toQuantity } from './modules/SchemaResolverModule';

/** Columns reported in CO₂e for Scope 1 and Scope 2, whatever the scenario prices. */
export interface ScopeColumns {
  Scope1: string | null;
  Scope2: string | null;
}

function reportedScope(record: RawRecord | undefined, column: string | null): number {
  if (record === undefined || column === null) return 0;
  return toQuantity(record[column]) ?? 0;
}

/**
 * KPI strip figures over the included rows.
 *
 * Intensity is pooled (Σ total ÷ Σ usage) the same way as the aggregates,
 * never an average of per-row ratios. Scope 1 & 2 is read straight from the
 * scope columns of `records` (the sequence `derived` was computed from), since
 * those figures are already CO₂e and an IPCC scenario does not price them.
 */
export function buildSummaryMetrics(
  derived: readonly DerivedRecord[],
  roles: ColumnRoleMap,
  records: readonly RawRecord[],
  scopeColumns: ScopeColumns = { Scope1: roles.Scope1 ?? null, Scope2: roles.Scope2 ?? null },
): SummaryMetricsV1 {
  const included = derived.filter(r => !r.excluded);
  const hasScope12 = scopeColumns.Scope1 !== null || scopeColumns.Scope2 !== null;
  const hasProjected = typeof roles.Projected === 'string';

  let totalCo2e = 0;
  let scope12 = 0;
  let projected = 0;
  let projectedCount = 0;
  let totalWithUsage = 0;
  let usageSum = 0;
  let usageCount = 0;

  for (const row of included) {
    const total = row.totalCo2e ?? 0;
    totalCo2e += total;
    const record = records[row.rowIndex];
    scope12 += reportedScope(record, scopeColumns.Scope1) + reportedScope(record, scopeColumns.Scope2);
    if (row.projected !== null) {
      projected += row.projected;
      projectedCount++;
    }
    if (row.usage !== null) {
      totalWithUsage += total;
      usageSum += row.usage;
      usageCount++;
    }
  }

  const projectedCo2e = hasProjected && projectedCount > 0 ? projected : null;
  const projectedChangePct =
    projectedCo2e !== null && totalCo2e !== 0
      ? ((projectedCo2e - totalCo2e) / totalCo2e) * 100
      : null;

  return {
    totalCo2e,
    scope12Co2e: hasScope12 ? scope12 : null,
    projectedCo2e,
    projectedChangePct,
    intensity: typeof roles.Usage === 'string' ? pooledIntensity(totalWithUsage, usageSum, usageCount) : null,
    includedRowCount: included.length,
    excludedRowCount: derived.length - included.length,
  };
}
