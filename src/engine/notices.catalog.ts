import type { NoticeId } from '../contracts/notices.ids';

export const NOTICE_CATALOG: Record<NoticeId, {
  title: string;
  detail: string;
  severity: 'info' | 'warn';
  improveBy?: string;
}> = {
  'roles.region_unresolved': {
    title: 'No region column found',
    detail: 'The region filter and the year × region breakdown are disabled for this dataset.',
    severity: 'info',
    improveBy: 'Add a column whose name contains "Region" or "Country".',
  },
  'roles.usage_unresolved': {
    title: 'No usage column found',
    detail: 'Emission intensity cannot be calculated without an activity or usage denominator.',
    severity: 'warn',
    improveBy: 'Add a column whose name contains "Usage" or "Activity".',
  },
  'roles.projected_unresolved': {
    title: 'No projection column found',
    detail: 'The projected year-end figure is not shown.',
    severity: 'info',
  },
  'roles.scenario_gas_absent': {
    title: 'Some scenario gases are not in the data',
    detail: 'Gases priced by the selected scenario but missing from the dataset contribute nothing to the totals.',
    severity: 'info',
  },
  'roles.data_gas_unpriced': {
    title: 'Some gas columns are not priced by this scenario',
    detail: 'Gas columns in the dataset that the selected scenario has no coefficient for are left out of the totals.',
    severity: 'info',
    improveBy: 'Pick a scenario that prices these columns to include them.',
  },
  'rows.excluded_missing_values': {
    title: 'Rows excluded from totals',
    detail: 'Some rows have a non-numeric or empty value in a required field. They are listed in the row table but left out of every total.',
    severity: 'warn',
    improveBy: 'Fill in or correct the flagged cells in the source file.',
  },
  'rows.usage_zero': {
    title: 'Rows with zero usage',
    detail: 'Intensity is undefined for rows whose usage is zero.',
    severity: 'info',
  },
  'filters.no_matching_rows': {
    title: 'No rows match the current filters',
    detail: 'Every total is zero because the selected region and years leave no data.',
    severity: 'warn',
    improveBy: 'Choose "All" regions or clear the year selection.',
  },
};
