import { describe, it, expect, vi } from 'vitest';
import { runEmissionsPipeline } from '../Engine';
import { createRecomputeCache } from '../modules/RecalculationModule';
import type { RecomputeCache } from '../modules/RecalculationModule';
import { fromRowObjects } from '../loader/DatasetLoader';
import { SchemaError, ScenarioNotFoundError } from '../errors/EmissionsEngineError';
import demoRows from '../../data/demoEmissions.json';

const demo = fromRowObjects(demoRows);

describe('runEmissionsPipeline', () => {
  it('resolves the demo dataset columns for an IPCC scenario', () => {
    const out = runEmissionsPipeline({ records: demo.records, columns: demo.columns, scenarioId: 'ar5' });
    expect(out.roles).toEqual({
      Year: 'Year',
      Region: 'Region',
      Usage: 'Usage_MWh',
      Projected: 'Projected_ktCO2e',
      CO2: 'CO2_kt',
      CH4: 'CH4_kt',
      N2O: 'N2O_kt',
      SF6: null,
    });
  });

  it('resolves the scope columns for the reported-scopes scenario', () => {
    const { roles, meta } = runEmissionsPipeline({ records: demo.records, columns: demo.columns, scenarioId: 'reported_scopes' });
    expect(roles.Scope1).toBe('Scope1_ktCO2e');
    expect(roles.Scope3).toBe('Scope3_ktCO2e');
    expect(roles.CO2).toBeUndefined();
    expect(meta.notices.find(n => n.id === 'roles.data_gas_unpriced')?.detail).toBe(
      'Reported CO₂e (Scope 1/2/3) does not price CO2, CH4, N2O. ' +
      'The columns CO2_kt, CH4_kt, N2O_kt are left out of the totals.',
    );
  });

  it('produces row, yearly, regional and ranking views', () => {
    const out = runEmissionsPipeline({ records: demo.records, columns: demo.columns, scenarioId: 'ar5' });
    expect(out.rows).toHaveLength(18);
    expect(out.byYear.rows.map(r => r.year)).toEqual([2017, 2018, 2019, 2020, 2021, 2022]);
    expect(out.byYearRegion.rows).toHaveLength(18);
    expect(out.ranking).toHaveLength(5);
    expect(out.ranking[0]).toMatchObject({ year: 2022, region: 'Asia' });
    expect(out.filterOptions).toEqual({
      regions: ['Asia', 'Europe', 'North America'],
      years: [2017, 2018, 2019, 2020, 2021, 2022],
    });
    expect(out.meta.scenarioId).toBe('ar5');
    expect(out.meta.confidence.level).toBe('high');
    expect(out.meta.notices.map(n => n.id)).toEqual(['roles.scenario_gas_absent', 'roles.data_gas_unpriced']);
  });

  it('flags the scope columns an IPCC scenario leaves out', () => {
    const out = runEmissionsPipeline({ records: demo.records, columns: demo.columns, scenarioId: 'ar5' });
    const unpriced = out.meta.notices.find(n => n.id === 'roles.data_gas_unpriced');
    expect(unpriced?.detail).toBe(
      'IPCC AR5 (GWP100) does not price Scope1, Scope2, Scope3. ' +
      'The columns Scope1_ktCO2e, Scope2_ktCO2e, Scope3_ktCO2e are left out of the totals.',
    );
  });

  it('reports Scope 1 & 2 from the scope columns under an IPCC scenario', () => {
    const out = runEmissionsPipeline({ records: demo.records, columns: demo.columns, scenarioId: 'ar5' });
    const expected = demoRows.reduce((acc, r) => acc + (r.Scope1_ktCO2e + r.Scope2_ktCO2e), 0);
    expect(out.summary.scope12Co2e).not.toBeNull();
    expect(out.summary.scope12Co2e).toBeCloseTo(expected, 6);

    const scopes = runEmissionsPipeline({ records: demo.records, columns: demo.columns, scenarioId: 'reported_scopes' });
    expect(scopes.summary.scope12Co2e).toBeCloseTo(expected, 6);
  });

  it('keeps Scope 1 & 2 to the filtered rows', () => {
    const out = runEmissionsPipeline({
      records: demo.records,
      columns: demo.columns,
      scenarioId: 'ar6',
      filters: { region: 'Asia', years: [2022] },
    });
    const [asia2022] = demoRows.filter(r => r.Region === 'Asia' && r.Year === 2022);
    expect(out.summary.scope12Co2e).toBeCloseTo(asia2022.Scope1_ktCO2e + asia2022.Scope2_ktCO2e, 6);
  });

  it('keeps the summary total equal to the sum of the yearly totals', () => {
    const out = runEmissionsPipeline({ records: demo.records, columns: demo.columns, scenarioId: 'ar6' });
    const yearly = out.byYear.rows.reduce((acc, r) => acc + r.totalCo2e, 0);
    expect(out.summary.totalCo2e).toBeCloseTo(yearly, 6);
    expect(out.summary.excludedRowCount).toBe(0);
  });

  it('applies region and year filters before recomputing', () => {
    const out = runEmissionsPipeline({
      records: demo.records,
      columns: demo.columns,
      scenarioId: 'ar4',
      filters: { region: 'Europe', years: [2019, 2020] },
    });
    expect(out.rows).toHaveLength(2);
    expect(out.byYear.rows.map(r => r.key)).toEqual(['2019', '2020']);
    expect(out.byYearRegion.rows.every(r => r.region === 'Europe')).toBe(true);
    expect(out.meta.filters).toEqual({ region: 'Europe', years: [2019, 2020] });
  });

  it('changes totals but not raw quantities when the scenario changes', () => {
    const ar4 = runEmissionsPipeline({ records: demo.records, columns: demo.columns, scenarioId: 'ar4' });
    const ar6 = runEmissionsPipeline({ records: demo.records, columns: demo.columns, scenarioId: 'ar6' });
    expect(ar6.rows.map(r => r.rawByGas)).toEqual(ar4.rows.map(r => r.rawByGas));
    expect(ar6.summary.totalCo2e).not.toBe(ar4.summary.totalCo2e);
  });

  it('derives columns from the first record when none are given', () => {
    const out = runEmissionsPipeline({ records: [{ Year: 2020, CO2: 3 }], scenarioId: 'ar5' });
    expect(out.summary.totalCo2e).toBe(3);
  });

  it('stops with SchemaError before recomputing when Year is missing', () => {
    const recompute = vi.fn<RecomputeCache['recompute']>();
    const cache: RecomputeCache = { recompute, hits: 0, misses: 0 };
    const records = [{ Region: 'Asia', CO2: 10 }];

    expect(() => runEmissionsPipeline({ records, scenarioId: 'ar5', cache })).toThrow(SchemaError);
    expect(recompute).not.toHaveBeenCalled();
  });

  it('rejects an unknown scenario id', () => {
    expect(() => runEmissionsPipeline({ records: demo.records, scenarioId: 'gwp20' })).toThrow(ScenarioNotFoundError);
  });

  it('reuses cached rows for the same dataset, roles and scenario', () => {
    const cache = createRecomputeCache();
    const first = runEmissionsPipeline({ records: demo.records, columns: demo.columns, scenarioId: 'ar5', cache });
    const second = runEmissionsPipeline({ records: demo.records, roles: first.roles, scenarioId: 'ar5', cache });
    expect(second.rows).toBe(first.rows);

    runEmissionsPipeline({ records: demo.records, roles: first.roles, scenarioId: 'ar6', cache });
    expect(cache.hits).toBe(1);
    expect(cache.misses).toBe(2);
  });
});
