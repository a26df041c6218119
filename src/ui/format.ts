/**
 * Display formatting shared by the dashboard widgets.
 * Missing values render as an em dash rather than zero.
 */

const EM_DASH = '—';

/** 1234567.891 → "1,234,567.89" */
export function formatCo2e(value: number | null): string {
  if (value === null) return EM_DASH;
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

/** Intensity needs more precision than totals; six decimals as in the KPI strip. */
export function formatIntensity(value: number | null): string {
  if (value === null) return EM_DASH;
  return value.toFixed(6);
}

/** -10 → "-10.0%", 4.25 → "+4.3%" */
export function formatChangePct(value: number | null): string {
  if (value === null) return EM_DASH;
  const sign = value > 0 ? '+' : '';
  return `${sign}${value.toFixed(1)}%`;
}
