import { ALL_REGIONS } from '../schema/EmissionsInputV1';
import type {
  ColumnRoleMap,
  FilterOptions,
  FilterSelection,
  RawRecord,
} from '../schema/EmissionsInputV1';
import { toRegion, toYear } from './SchemaResolverModule';

/** Distinct regions (sorted) and years (ascending) for the sidebar selectors. */
export function listFilterOptions(records: readonly RawRecord[], roles: ColumnRoleMap): FilterOptions {
  const regions = new Set<string>();
  const years = new Set<number>();
  const regionColumn = roles.Region;
  const yearColumn = roles.Year;

  for (const record of records) {
    if (typeof regionColumn === 'string') {
      const region = toRegion(record[regionColumn]);
      if (region !== null) regions.add(region);
    }
    if (typeof yearColumn === 'string') {
      const year = toYear(record[yearColumn]);
      if (year !== null) years.add(year);
    }
  }

  return {
    regions: [...regions].sort((a, b) => a.localeCompare(b)),
    years: [...years].sort((a, b) => a - b),
  };
}

/**
 * Applies the sidebar selection. The region filter is disabled when the
 * selection is "All" or the dataset has no region column; an empty year list
 * keeps every year, including rows whose year is missing.
 */
export function applyFilters(
  records: readonly RawRecord[],
  roles: ColumnRoleMap,
  selection: FilterSelection,
): RawRecord[] {
  const regionColumn =
    selection.region !== ALL_REGIONS && typeof roles.Region === 'string' ? roles.Region : null;
  const yearColumn = typeof roles.Year === 'string' ? roles.Year : null;
  const years = new Set(selection.years);

  return records.filter(record => {
    if (regionColumn !== null && toRegion(record[regionColumn]) !== selection.region) return false;
    if (years.size > 0) {
      const year = yearColumn !== null ? toYear(record[yearColumn]) : null;
      if (year === null || !years.has(year)) return false;
    }
    return true;
  });
}
