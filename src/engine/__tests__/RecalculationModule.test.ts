import { describe, it, expect } from 'vitest';
import {
  recompute,
  rankRecords,
  assertScenarioCovers,
  createRecomputeCache,
} from '../modules/RecalculationModule';
import { resolveColumnRoles, candidatesForScenario } from '../modules/SchemaResolverModule';
import { CoefficientError } from '../errors/EmissionsEngineError';
import { ROLE_CANDIDATES } from '../roles.catalog';
import { ar4Scenario, ar5Scenario, ar6Scenario } from '../scenarios/gwpScenarioRegistry';
import type { ColumnRoleMap, RawRecord } from '../schema/EmissionsInputV1';

const gasRecord: RawRecord = { Year: 2019, Region: 'Exampleland', CO2: 5_000_000, CH4: 38_095, N2O: 806 };

function rolesFor(columns: string[]): ColumnRoleMap {
  return resolveColumnRoles(columns, candidatesForScenario(ROLE_CANDIDATES, ar4Scenario));
}

const gasRoles = rolesFor(['Year', 'Region', 'CO2', 'CH4', 'N2O']);

describe('recompute', () => {
  it('reproduces the AR4 CO₂e figures exactly', () => {
    const [row] = recompute([gasRecord], gasRoles, ar4Scenario);
    expect(row.co2eByGas).toEqual({ CO2: 5_000_000, CH4: 952_375, N2O: 240_188 });
    expect(row.totalCo2e).toBe(6_192_563);
  });

  it('reproduces the AR6 CO₂e figures exactly', () => {
    const [row] = recompute([gasRecord], gasRoles, ar6Scenario);
    expect(row.co2eByGas.CH4).toBe(1_062_850.5);
    expect(row.co2eByGas.N2O).toBe(220_038);
    expect(row.totalCo2e).toBe(6_282_888.5);
  });

  it('is deterministic across repeated calls', () => {
    const records: RawRecord[] = [gasRecord, { Year: 2020, Region: 'Exampleland', CO2: 12.3, CH4: 0.7, N2O: 0.01 }];
    expect(recompute(records, gasRoles, ar6Scenario)).toEqual(recompute(records, gasRoles, ar6Scenario));
  });

  it('changes only coefficient-derived values when the scenario changes', () => {
    const [a] = recompute([gasRecord], gasRoles, ar4Scenario);
    const [b] = recompute([gasRecord], gasRoles, ar6Scenario);
    expect(b.rawByGas).toEqual(a.rawByGas);
    expect(b.rawByGas).toEqual({ CO2: 5_000_000, CH4: 38_095, N2O: 806 });
    expect(b.year).toBe(a.year);
    expect(b.totalCo2e).not.toBe(a.totalCo2e);
  });

  it('treats scenario gases absent from the data as contributing nothing', () => {
    const roles = rolesFor(['Year', 'CO2', 'CH4']);
    const [row] = recompute([{ Year: 2021, CO2: 100, CH4: 2 }], roles, ar4Scenario);
    expect(row.totalCo2e).toBe(150);
    expect(row.co2eByGas).toEqual({ CO2: 100, CH4: 50 });
    expect(row.excluded).toBe(false);
  });

  it('computes intensity as total ÷ usage', () => {
    const roles = rolesFor(['Year', 'CO2', 'Usage']);
    const [row] = recompute([{ Year: 2021, CO2: 300, Usage: 60 }], roles, ar5Scenario);
    expect(row.intensity).toBe(5);
    expect(row.intensityStatus).toBe('ok');
  });

  it('leaves intensity undefined when usage is zero', () => {
    const roles = rolesFor(['Year', 'CO2', 'Usage']);
    const [row] = recompute([{ Year: 2021, CO2: 300, Usage: 0 }], roles, ar5Scenario);
    expect(row.intensity).toBeNull();
    expect(row.intensityStatus).toBe('usage_zero');
    expect(row.totalCo2e).toBe(300);
    expect(row.excluded).toBe(false);
  });

  it('distinguishes missing usage from an absent usage column', () => {
    const withColumn = recompute([{ Year: 2021, CO2: 1, Usage: '' }], rolesFor(['Year', 'CO2', 'Usage']), ar5Scenario);
    const withoutColumn = recompute([{ Year: 2021, CO2: 1 }], rolesFor(['Year', 'CO2']), ar5Scenario);
    expect(withColumn[0].intensityStatus).toBe('usage_missing');
    expect(withoutColumn[0].intensityStatus).toBe('usage_unresolved');
  });

  it('flags and excludes a row with a non-numeric gas value but keeps it in the output', () => {
    const records: RawRecord[] = [
      { Year: 2019, CO2: 10, CH4: 'n/a' },
      { Year: 2019, CO2: 20, CH4: 1 },
    ];
    const rows = recompute(records, rolesFor(['Year', 'CO2', 'CH4']), ar4Scenario);
    expect(rows).toHaveLength(2);
    expect(rows[0].co2eByGas).toEqual({ CO2: 10, CH4: null });
    expect(rows[0].totalCo2e).toBeNull();
    expect(rows[0].intensityStatus).toBe('usage_unresolved');
    expect(rows[0].excluded).toBe(true);
    expect(rows[0].warnings).toEqual([
      { id: 'missing-value', rowIndex: 0, role: 'CH4', column: 'CH4', rawValue: 'n/a' },
    ]);
    expect(rows[1].totalCo2e).toBe(45);
    expect(rows[1].warnings).toHaveLength(0);
  });

  it('excludes a row whose year is missing', () => {
    const [row] = recompute([{ Year: 'unknown', CO2: 5 }], rolesFor(['Year', 'CO2']), ar4Scenario);
    expect(row.totalCo2e).toBe(5);
    expect(row.excluded).toBe(true);
    expect(row.warnings[0].role).toBe('Year');
  });
});

describe('assertScenarioCovers', () => {
  const scopeRoles: ColumnRoleMap = { Year: 'Year', CO2: 'CO2', Scope1: 'Scope1' };

  it('throws CoefficientError for a resolved gas the scenario does not price', () => {
    const records: RawRecord[] = [{ Year: 2020, CO2: 1, Scope1: 4 }];
    expect(() => recompute(records, scopeRoles, ar4Scenario)).toThrow(CoefficientError);
    try {
      assertScenarioCovers(records, scopeRoles, ar4Scenario);
    } catch (err) {
      expect(err).toBeInstanceOf(CoefficientError);
      if (err instanceof CoefficientError) {
        expect(err.gas).toBe('Scope1');
        expect(err.scenarioId).toBe('ar4');
      }
    }
  });

  it('tolerates an unpriced gas whose column is entirely empty', () => {
    const records: RawRecord[] = [{ Year: 2020, CO2: 1, Scope1: '' }];
    expect(() => assertScenarioCovers(records, scopeRoles, ar4Scenario)).not.toThrow();
  });
});

describe('rankRecords', () => {
  it('orders by total descending and breaks ties by input order', () => {
    const records: RawRecord[] = [
      { Year: 2020, CO2: 5 },
      { Year: 2020, CO2: 9 },
      { Year: 2020, CO2: 'bad' },
      { Year: 2020, CO2: 9 },
      { Year: 2020, CO2: 1 },
    ];
    const ranked = rankRecords(recompute(records, rolesFor(['Year', 'CO2']), ar5Scenario), 3);
    expect(ranked.map(r => r.rowIndex)).toEqual([1, 3, 0]);
  });
});

describe('createRecomputeCache', () => {
  it('reuses results for the same dataset, roles and scenario', () => {
    const cache = createRecomputeCache();
    const records: RawRecord[] = [gasRecord];
    const first = cache.recompute(records, gasRoles, ar4Scenario);
    const second = cache.recompute(records, gasRoles, ar4Scenario);
    expect(second).toBe(first);
    expect(cache.hits).toBe(1);
    expect(cache.misses).toBe(1);
  });

  it('misses when any part of the key changes', () => {
    const cache = createRecomputeCache();
    const records: RawRecord[] = [gasRecord];
    cache.recompute(records, gasRoles, ar4Scenario);
    cache.recompute(records, gasRoles, ar6Scenario);
    cache.recompute([gasRecord], gasRoles, ar4Scenario);
    cache.recompute(records, rolesFor(['Year', 'CO2', 'CH4', 'N2O']), ar4Scenario);
    expect(cache.hits).toBe(0);
    expect(cache.misses).toBe(4);
  });
});
