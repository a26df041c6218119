import { describe, it, expect } from 'vitest';
import { applyFilters, listFilterOptions } from '../modules/FilterModule';
import type { ColumnRoleMap, RawRecord } from '../schema/EmissionsInputV1';

const roles: ColumnRoleMap = { Year: 'Year', Region: 'Region', CO2: 'CO2' };

const records: RawRecord[] = [
  { Year: '2019', Region: 'Europe', CO2: 1 },
  { Year: '2020', Region: 'Asia', CO2: 2 },
  { Year: '2020', Region: ' Europe ', CO2: 3 },
  { Year: '', Region: 'Asia', CO2: 4 },
  { Year: '2018', Region: '', CO2: 5 },
];

describe('listFilterOptions', () => {
  it('returns distinct sorted regions and ascending years', () => {
    expect(listFilterOptions(records, roles)).toEqual({
      regions: ['Asia', 'Europe'],
      years: [2018, 2019, 2020],
    });
  });

  it('offers no regions when the region column is unresolved', () => {
    expect(listFilterOptions(records, { Year: 'Year', Region: null, CO2: 'CO2' }).regions).toEqual([]);
  });
});

describe('applyFilters', () => {
  it('keeps everything for All regions and no years', () => {
    expect(applyFilters(records, roles, { region: 'All', years: [] })).toHaveLength(5);
  });

  it('filters by region after trimming', () => {
    const kept = applyFilters(records, roles, { region: 'Europe', years: [] });
    expect(kept.map(r => r.CO2)).toEqual([1, 3]);
  });

  it('filters by year and drops rows without a year only when years are selected', () => {
    const kept = applyFilters(records, roles, { region: 'All', years: [2020, 2018] });
    expect(kept.map(r => r.CO2)).toEqual([2, 3, 5]);
  });

  it('combines region and year filters', () => {
    const kept = applyFilters(records, roles, { region: 'Asia', years: [2020] });
    expect(kept.map(r => r.CO2)).toEqual([2]);
  });

  it('disables the region filter when the region column is unresolved', () => {
    const kept = applyFilters(records, { Year: 'Year', Region: null, CO2: 'CO2' }, { region: 'Asia', years: [] });
    expect(kept).toHaveLength(5);
  });
});
