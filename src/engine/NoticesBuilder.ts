import type { ConfidenceV1, EngineNoticeV1 } from '../contracts/EmissionsOutputV1';
import type { NoticeId } from '../contracts/notices.ids';
import { NOTICE_IDS } from '../contracts/notices.ids';
import { GAS_ROLES } from './schema/EmissionsInputV1';
import type { CoefficientScenario, ColumnRoleMap, DerivedRecord } from './schema/EmissionsInputV1';
import type { UnpricedGasColumn } from './modules/SchemaResolverModule';
import { NOTICE_CATALOG } from './notices.catalog';

/** Share of excluded rows above which confidence drops straight to low. */
const LOW_CONFIDENCE_EXCLUDED_SHARE = 0.25;

function notice(id: NoticeId, detail?: string): EngineNoticeV1 {
  const entry = NOTICE_CATALOG[id];
  return { id, ...entry, detail: detail ?? entry.detail };
}

/**
 * Builds the diagnostic notices and the confidence level for one run.
 *
 * Rules:
 *  - Start high
 *  - One warn notice → medium
 *  - Two or more warn notices, or more than a quarter of rows excluded → low
 */
export function buildNoticesV1(
  roles: ColumnRoleMap,
  scenario: CoefficientScenario,
  derived: readonly DerivedRecord[],
  unpriced: readonly UnpricedGasColumn[] = [],
): { confidence: ConfidenceV1; notices: EngineNoticeV1[] } {
  const notices: EngineNoticeV1[] = [];
  const reasons: string[] = [];

  if (roles.Region === null) notices.push(notice(NOTICE_IDS.REGION_UNRESOLVED));
  if (roles.Usage === null) {
    notices.push(notice(NOTICE_IDS.USAGE_UNRESOLVED));
    reasons.push('Intensity is unavailable (no usage column).');
  }
  if (roles.Projected === null) notices.push(notice(NOTICE_IDS.PROJECTED_UNRESOLVED));

  const absentGases = GAS_ROLES.filter(
    gas => scenario.coefficients[gas] !== undefined && typeof roles[gas] !== 'string',
  );
  if (absentGases.length > 0) {
    notices.push(notice(
      NOTICE_IDS.SCENARIO_GAS_ABSENT,
      `${scenario.label} prices ${absentGases.join(', ')}, which the dataset does not contain. ` +
      `These gases contribute nothing to the totals.`,
    ));
  }

  if (unpriced.length > 0) {
    notices.push(notice(
      NOTICE_IDS.DATA_GAS_UNPRICED,
      `${scenario.label} does not price ${unpriced.map(u => u.gas).join(', ')}. ` +
      `The columns ${unpriced.map(u => u.column).join(', ')} are left out of the totals.`,
    ));
  }

  if (derived.length === 0) {
    notices.push(notice(NOTICE_IDS.FILTER_EMPTY));
    reasons.push('No rows match the current filters.');
  }

  const excluded = derived.filter(r => r.excluded);
  if (excluded.length > 0) {
    const rows = excluded.map(r => r.rowIndex + 1).join(', ');
    notices.push(notice(
      NOTICE_IDS.ROWS_EXCLUDED,
      `${excluded.length} of ${derived.length} rows have a non-numeric or empty value in a required field ` +
      `(rows ${rows}). They are listed in the row table but left out of every total.`,
    ));
    reasons.push(`${excluded.length} row(s) excluded for missing values.`);
  }

  const zeroUsage = derived.filter(r => r.intensityStatus === 'usage_zero');
  if (zeroUsage.length > 0) {
    notices.push(notice(
      NOTICE_IDS.USAGE_ZERO,
      `Intensity is undefined for ${zeroUsage.length} row(s) whose usage is zero.`,
    ));
  }

  const warnCount = notices.filter(n => n.severity === 'warn').length;
  const excludedShare = derived.length > 0 ? excluded.length / derived.length : 0;

  let level: ConfidenceV1['level'] = 'high';
  if (warnCount >= 2 || excludedShare > LOW_CONFIDENCE_EXCLUDED_SHARE) level = 'low';
  else if (warnCount === 1) level = 'medium';

  return { confidence: { level, reasons }, notices };
}
