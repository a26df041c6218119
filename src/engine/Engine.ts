import type { EmissionsOutputV1 } from '../contracts/EmissionsOutputV1';
import { ENGINE_VERSION, CONTRACT_VERSION } from '../contracts/versions';
import { ALL_REGIONS } from './schema/EmissionsInputV1';
import type {
  ColumnRoleMap,
  DerivedRecord,
  FilterSelection,
  RawRecord,
  RoleCandidates,
} from './schema/EmissionsInputV1';
import { getScenario } from './scenarios/gwpScenarioRegistry';
import { ROLE_CANDIDATES, ROLE_EXCLUSIONS } from './roles.catalog';
import {
  candidatesForScenario,
  resolveColumnRoles,
  unpricedGasColumns,
} from './modules/SchemaResolverModule';
import { applyFilters, listFilterOptions } from './modules/FilterModule';
import { recompute, rankRecords } from './modules/RecalculationModule';
import type { RecomputeCache } from './modules/RecalculationModule';
import { aggregate } from './modules/AggregationModule';
import { buildSummaryMetrics } from './SummaryMetricsBuilder';
import { buildNoticesV1 } from './NoticesBuilder';

/** Rows shown in the largest-emitter table unless the caller asks otherwise. */
const DEFAULT_TOP_N = 5;

export interface EmissionsPipelineInput {
  records: readonly RawRecord[];
  /** Header names; derived from the first record when omitted. */
  columns?: readonly string[];
  scenarioId: string;
  filters?: FilterSelection;
  topN?: number;
  roleCatalog?: RoleCandidates;
  /** Name fragments that disqualify a column per role. Default: ROLE_EXCLUSIONS. */
  roleExclusions?: RoleCandidates;
  /**
   * Role map from an earlier run on the same dataset and scenario. Skips
   * resolution, and lets a cache recognise the pair.
   */
  roles?: ColumnRoleMap;
  cache?: RecomputeCache;
}

export const NO_FILTERS: FilterSelection = Object.freeze({ region: ALL_REGIONS, years: [] });

/**
 * raw table → roles → filter → recompute → aggregates + KPIs + notices.
 *
 * Stateless: the caller holds the selected scenario and filters and passes
 * them in on every call.
 */
export function runEmissionsPipeline(input: EmissionsPipelineInput): EmissionsOutputV1 {
  const scenario = getScenario(input.scenarioId);
  const filters = input.filters ?? NO_FILTERS;
  const columns = input.columns ?? Object.keys(input.records[0] ?? {});

  const catalog = input.roleCatalog ?? ROLE_CANDIDATES;
  const exclude = input.roleExclusions ?? ROLE_EXCLUSIONS;

  const roles = input.roles
    ?? resolveColumnRoles(columns, candidatesForScenario(catalog, scenario), { exclude });

  // Every gas column the data carries, priced by this scenario or not.
  const catalogRoles = resolveColumnRoles(columns, catalog, { required: [], requireAnyGas: false, exclude });
  const unpriced = unpricedGasColumns(catalogRoles, roles, scenario);
  const scopeColumns = {
    Scope1: roles.Scope1 ?? catalogRoles.Scope1 ?? null,
    Scope2: roles.Scope2 ?? catalogRoles.Scope2 ?? null,
  };

  const filterOptions = listFilterOptions(input.records, roles);
  const filtered = applyFilters(input.records, roles, filters);

  // Unfiltered runs hand the caller's own array to the cache so its identity holds.
  const unfiltered = filtered.length === input.records.length;
  const derived: DerivedRecord[] = input.cache && unfiltered
    ? input.cache.recompute(input.records, roles, scenario)
    : recompute(filtered, roles, scenario);

  const { confidence, notices } = buildNoticesV1(roles, scenario, derived, unpriced);

  return {
    meta: {
      engineVersion: ENGINE_VERSION,
      contractVersion: CONTRACT_VERSION,
      scenarioId: scenario.id,
      filters,
      confidence,
      notices,
    },
    roles,
    filterOptions,
    rows: derived,
    byYear: aggregate(derived, { groupBy: 'year' }),
    byYearRegion: aggregate(derived, { groupBy: 'year_region' }),
    ranking: rankRecords(derived, input.topN ?? DEFAULT_TOP_N),
    summary: buildSummaryMetrics(derived, roles, filtered, scopeColumns),
  };
}
