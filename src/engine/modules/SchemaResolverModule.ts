import {
  GAS_ROLES,
  DIMENSION_ROLES,
  resolvedGasRoles,
} from '../schema/EmissionsInputV1';
import type {
  CellValue,
  CoefficientScenario,
  CoercedRecord,
  ColumnRoleMap,
  GasRole,
  RawRecord,
  RoleCandidates,
  RoleId,
} from '../schema/EmissionsInputV1';
import { SchemaError } from '../errors/EmissionsEngineError';

export interface ResolveOptions {
  /** Roles that must resolve. Default: Year. */
  required?: RoleId[];
  /** Require at least one of the candidate gas roles to resolve. Default: true. */
  requireAnyGas?: boolean;
  /** Per-role name fragments that disqualify a column for that role. */
  exclude?: RoleCandidates;
}

export interface UnpricedGasColumn {
  gas: GasRole;
  column: string;
}

/** Cell spellings that mean "no value" in exported spreadsheets. */
const MISSING_TOKENS = new Set(['', 'na', 'n/a', 'nan', 'null', 'none', '-', '--']);

/** 1,234,567 or 1,234,567.89 — comma thousands separators only. */
const THOUSANDS_PATTERN = /^[+-]?\d{1,3}(,\d{3})+(\.\d+)?$/;

/**
 * Finds the column for one alias: an exact case-insensitive match first,
 * otherwise the first column containing the alias.
 */
function matchAlias(
  alias: string,
  columns: readonly string[],
  lowered: readonly string[],
  excluded: readonly string[],
): string | null {
  const needle = alias.trim().toLowerCase();
  if (needle.length === 0) return null;

  const eligible = (c: string) => !excluded.some(fragment => c.includes(fragment));

  const exact = lowered.findIndex(c => c === needle && eligible(c));
  if (exact !== -1) return columns[exact];

  const partial = lowered.findIndex(c => c.includes(needle) && eligible(c));
  return partial !== -1 ? columns[partial] : null;
}

/**
 * Maps every role in `roleCandidates` to an actual column name (or null).
 *
 * Aliases are tried in priority order and the first alias that matches any
 * column wins. Throws SchemaError when a required role stays unresolved, so
 * no computation can run on a partially-resolved schema.
 */
export function resolveColumnRoles(
  columnNames: readonly string[],
  roleCandidates: RoleCandidates,
  options: ResolveOptions = {},
): ColumnRoleMap {
  const required = options.required ?? ['Year'];
  const requireAnyGas = options.requireAnyGas ?? true;
  const lowered = columnNames.map(c => c.trim().toLowerCase());

  const roles: Partial<Record<RoleId, string | null>> = {};
  const orderedRoles: RoleId[] = [...DIMENSION_ROLES, ...GAS_ROLES];

  for (const role of orderedRoles) {
    const aliases = roleCandidates[role];
    if (aliases === undefined) continue;
    const excluded = (options.exclude?.[role] ?? []).map(f => f.toLowerCase());

    let column: string | null = null;
    for (const alias of aliases) {
      column = matchAlias(alias, columnNames, lowered, excluded);
      if (column !== null) break;
    }
    roles[role] = column;
  }

  const missing: RoleId[] = required.filter(role => typeof roles[role] !== 'string');

  if (requireAnyGas) {
    const candidateGases = GAS_ROLES.filter(gas => roleCandidates[gas] !== undefined);
    if (resolvedGasRoles(roles).length === 0) {
      missing.push(...candidateGases.filter(gas => !missing.includes(gas)));
    }
  }

  if (missing.length > 0) {
    throw new SchemaError(missing, [...columnNames]);
  }

  return Object.freeze(roles);
}

/**
 * Restricts a role catalog to the dimension roles plus the gases the scenario
 * prices, so columns for gases outside the scenario are never picked up.
 */
export function candidatesForScenario(
  catalog: RoleCandidates,
  scenario: CoefficientScenario,
): RoleCandidates {
  const candidates: RoleCandidates = {};
  for (const role of DIMENSION_ROLES) {
    const aliases = catalog[role];
    if (aliases !== undefined) candidates[role] = aliases;
  }
  for (const gas of GAS_ROLES) {
    const aliases = catalog[gas];
    if (aliases !== undefined && scenario.coefficients[gas] !== undefined) {
      candidates[gas] = aliases;
    }
  }
  return candidates;
}

/**
 * Gas columns the data carries (per `catalogRoles`, resolved against the full
 * catalog) that the scenario does not price and no other role already uses.
 */
export function unpricedGasColumns(
  catalogRoles: ColumnRoleMap,
  roles: ColumnRoleMap,
  scenario: CoefficientScenario,
): UnpricedGasColumn[] {
  const used = new Set(Object.values(roles).filter((c): c is string => typeof c === 'string'));
  const unpriced: UnpricedGasColumn[] = [];
  for (const gas of resolvedGasRoles(catalogRoles)) {
    const column = catalogRoles[gas];
    if (typeof column !== 'string' || used.has(column)) continue;
    if (scenario.coefficients[gas] === undefined) unpriced.push({ gas, column });
  }
  return unpriced;
}

// ─── Coercion ─────────────────────────────────────────────────────────────────

/** Numeric coercion; anything not fully parseable is null, never zero. */
export function toQuantity(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;

  const text = value.trim();
  if (MISSING_TOKENS.has(text.toLowerCase())) return null;

  const normalised = THOUSANDS_PATTERN.test(text) ? text.replace(/,/g, '') : text;
  const parsed = Number(normalised);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toYear(value: CellValue): number | null {
  const n = toQuantity(value);
  return n !== null && Number.isInteger(n) ? n : null;
}

export function toRegion(value: CellValue): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const text = value.trim();
  return text.length > 0 ? text : null;
}

function cell(record: RawRecord, column: string | null | undefined): CellValue {
  return typeof column === 'string' ? record[column] : undefined;
}

/**
 * Coerces the resolved numeric and dimension columns of every record.
 * Gas quantities are keyed only for gas roles that resolved.
 */
export function coerceRecords(records: readonly RawRecord[], roles: ColumnRoleMap): CoercedRecord[] {
  const gases = resolvedGasRoles(roles);

  return records.map((record, rowIndex) => {
    const rawByGas: Partial<Record<GasRole, number | null>> = {};
    for (const gas of gases) {
      rawByGas[gas] = toQuantity(cell(record, roles[gas]));
    }
    return {
      rowIndex,
      year: toYear(cell(record, roles.Year)),
      region: toRegion(cell(record, roles.Region)),
      usage: toQuantity(cell(record, roles.Usage)),
      projected: toQuantity(cell(record, roles.Projected)),
      rawByGas,
      source: record,
    };
  });
}

/** Roles in the map that did not resolve, split by kind for diagnostic display. */
export function unresolvedRoles(roles: ColumnRoleMap): { dimensions: RoleId[]; gases: GasRole[] } {
  return {
    dimensions: DIMENSION_ROLES.filter(role => roles[role] === null),
    gases: GAS_ROLES.filter(gas => roles[gas] === null),
  };
}
