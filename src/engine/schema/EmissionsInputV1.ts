// ─── Raw input ────────────────────────────────────────────────────────────────

/** A single cell as it arrives from a parsed file or an in-memory row object. */
export type CellValue = string | number | boolean | null | undefined;

/** One row of the input table: column name → cell value. Never mutated. */
export type RawRecord = Readonly<Record<string, CellValue>>;

// ─── Roles ────────────────────────────────────────────────────────────────────

/**
 * Gas-quantity roles, in the fixed order used for every summation.
 * Scope categories are treated as gas-like raw quantities already in CO₂e.
 */
export const GAS_ROLES = ['CO2', 'CH4', 'N2O', 'SF6', 'Scope1', 'Scope2', 'Scope3'] as const;

export type GasRole = typeof GAS_ROLES[number];

export const DIMENSION_ROLES = ['Year', 'Region', 'Usage', 'Projected'] as const;

export type DimensionRole = typeof DIMENSION_ROLES[number];

export type RoleId = DimensionRole | GasRole;

/** Ordered alias lists per role; the first alias that matches a column wins. */
export type RoleCandidates = Partial<Record<RoleId, readonly string[]>>;

/**
 * Resolved column per role. `null` means the role was asked for but no column
 * matched; roles that were never asked for are absent.
 */
export type ColumnRoleMap = Readonly<Partial<Record<RoleId, string | null>>>;

/** Gas roles that resolved to a column, in GAS_ROLES order. */
export function resolvedGasRoles(roles: ColumnRoleMap): GasRole[] {
  return GAS_ROLES.filter(gas => typeof roles[gas] === 'string');
}

// ─── Coefficient scenarios ────────────────────────────────────────────────────

export interface CoefficientScenario {
  /** Machine-readable identifier — never changes between releases. */
  id: string;
  /** User-facing label shown in the scenario selector. */
  label: string;
  description: string;
  /** GWP multiplier per gas role. Every entry is positive. */
  coefficients: Readonly<Partial<Record<GasRole, number>>>;
}

// ─── Coerced + derived rows ───────────────────────────────────────────────────

/** A RawRecord after numeric coercion. `null` is the explicit missing marker. */
export interface CoercedRecord {
  /** Position of the record in the input sequence (0-based). */
  rowIndex: number;
  year: number | null;
  region: string | null;
  usage: number | null;
  projected: number | null;
  rawByGas: Partial<Record<GasRole, number | null>>;
  source: RawRecord;
}

export interface MissingValueWarning {
  id: 'missing-value';
  rowIndex: number;
  role: RoleId;
  column: string;
  rawValue: CellValue;
}

export type IntensityStatus =
  | 'ok'
  | 'usage_unresolved'
  | 'usage_missing'
  | 'usage_zero'
  | 'total_missing';

export interface DerivedRecord {
  rowIndex: number;
  year: number | null;
  region: string | null;
  rawByGas: Partial<Record<GasRole, number | null>>;
  /** raw × coefficient, per resolved gas. */
  co2eByGas: Partial<Record<GasRole, number | null>>;
  totalCo2e: number | null;
  usage: number | null;
  /** total ÷ usage; `null` when undefined (see intensityStatus). */
  intensity: number | null;
  intensityStatus: IntensityStatus;
  projected: number | null;
  warnings: MissingValueWarning[];
  /** True when the row is left out of every aggregate. */
  excluded: boolean;
}

// ─── Aggregates ───────────────────────────────────────────────────────────────

export type GroupBy = 'year' | 'year_region';

export interface AggregateRow {
  /** Stable group key, e.g. "2019" or "2019|Europe". */
  key: string;
  year: number;
  /** Only set when grouping by year_region. */
  region: string | null;
  rawByGas: Partial<Record<GasRole, number>>;
  co2eByGas: Partial<Record<GasRole, number>>;
  totalCo2e: number;
  /** Σ usage over members whose usage is present; null when none is. */
  usage: number | null;
  /** Σ total ÷ Σ usage over members with usage. */
  intensity: number | null;
  projected: number | null;
  memberCount: number;
  /** Lowest member rowIndex; tie-break for rankings. */
  firstRowIndex: number;
}

export interface AggregateView {
  groupBy: GroupBy;
  rows: AggregateRow[];
  excludedRowIndexes: number[];
}

// ─── Filters ──────────────────────────────────────────────────────────────────

export const ALL_REGIONS = 'All' as const;

export interface FilterSelection {
  region: string;
  /** Empty → every year. */
  years: number[];
}

export interface FilterOptions {
  regions: string[];
  years: number[];
}
