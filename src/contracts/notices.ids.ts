export const NOTICE_IDS = {
  // Column roles
  REGION_UNRESOLVED: 'roles.region_unresolved',
  USAGE_UNRESOLVED: 'roles.usage_unresolved',
  PROJECTED_UNRESOLVED: 'roles.projected_unresolved',
  SCENARIO_GAS_ABSENT: 'roles.scenario_gas_absent',
  DATA_GAS_UNPRICED: 'roles.data_gas_unpriced',

  // Row values
  ROWS_EXCLUDED: 'rows.excluded_missing_values',
  USAGE_ZERO: 'rows.usage_zero',

  // Filters
  FILTER_EMPTY: 'filters.no_matching_rows',
} as const;

export type NoticeId = typeof NOTICE_IDS[keyof typeof NOTICE_IDS];
