import { GAS_ROLES } from '../schema/EmissionsInputV1';
import type {
  AggregateRow,
  AggregateView,
  DerivedRecord,
  GroupBy,
} from '../schema/EmissionsInputV1';

export interface AggregateOptions {
  groupBy: GroupBy;
  /** When set, rank groups by total descending and keep the first N. */
  top?: number;
}

interface GroupAccumulator {
  row: AggregateRow;
  /** Σ total over members that also carry a usage value. */
  totalWithUsage: number;
  usageCount: number;
  /** First-appearance position of the region, for default ordering. */
  regionOrder: number;
}

function groupKey(year: number, region: string | null, groupBy: GroupBy): string {
  return groupBy === 'year' ? String(year) : `${year}|${region ?? ''}`;
}

/**
 * Aggregate intensity over a set of members: Σ total ÷ Σ usage, restricted to
 * members that have a usage value. Null when there is no usage or it sums to 0.
 */
export function pooledIntensity(totalWithUsage: number, usageSum: number, usageCount: number): number | null {
  if (usageCount === 0 || usageSum === 0) return null;
  return totalWithUsage / usageSum;
}

/**
 * Groups included rows by year (or year + region).
 *
 * Sums come first, intensity is recomputed from the sums, and only then is
 * the optional top-N ranking applied.
 */
export function aggregate(derived: readonly DerivedRecord[], options: AggregateOptions): AggregateView {
  const { groupBy } = options;
  const groups = new Map<string, GroupAccumulator>();
  const regionOrder = new Map<string | null, number>();
  const excludedRowIndexes: number[] = [];

  for (const record of derived) {
    if (record.excluded || record.year === null || record.totalCo2e === null) {
      excludedRowIndexes.push(record.rowIndex);
      continue;
    }

    const region = groupBy === 'year_region' ? record.region : null;
    if (!regionOrder.has(region)) regionOrder.set(region, regionOrder.size);

    const key = groupKey(record.year, region, groupBy);
    let acc = groups.get(key);
    if (!acc) {
      acc = {
        row: {
          key,
          year: record.year,
          region,
          rawByGas: {},
          co2eByGas: {},
          totalCo2e: 0,
          usage: null,
          intensity: null,
          projected: null,
          memberCount: 0,
          firstRowIndex: record.rowIndex,
        },
        totalWithUsage: 0,
        usageCount: 0,
        regionOrder: regionOrder.get(region) ?? 0,
      };
      groups.set(key, acc);
    }

    const { row } = acc;
    for (const gas of GAS_ROLES) {
      const raw = record.rawByGas[gas];
      const co2e = record.co2eByGas[gas];
      if (raw != null) row.rawByGas[gas] = (row.rawByGas[gas] ?? 0) + raw;
      if (co2e != null) row.co2eByGas[gas] = (row.co2eByGas[gas] ?? 0) + co2e;
    }
    row.totalCo2e += record.totalCo2e;
    row.memberCount++;
    row.firstRowIndex = Math.min(row.firstRowIndex, record.rowIndex);

    if (record.usage !== null) {
      row.usage = (row.usage ?? 0) + record.usage;
      acc.totalWithUsage += record.totalCo2e;
      acc.usageCount++;
    }
    if (record.projected !== null) {
      row.projected = (row.projected ?? 0) + record.projected;
    }
  }

  const accumulators = [...groups.values()];
  for (const acc of accumulators) {
    acc.row.intensity = pooledIntensity(acc.totalWithUsage, acc.row.usage ?? 0, acc.usageCount);
  }

  accumulators.sort((a, b) => a.row.year - b.row.year || a.regionOrder - b.regionOrder);
  let rows = accumulators.map(acc => acc.row);

  if (options.top !== undefined) {
    rows = [...rows]
      .sort((a, b) => b.totalCo2e - a.totalCo2e || a.firstRowIndex - b.firstRowIndex)
      .slice(0, Math.max(0, options.top));
  }

  return { groupBy, rows, excludedRowIndexes };
}
