import type { ENGINE_VERSION, CONTRACT_VERSION } from './versions';
import type { NoticeId } from './notices.ids';
import type {
  AggregateView,
  ColumnRoleMap,
  DerivedRecord,
  FilterOptions,
  FilterSelection,
} from '../engine/schema/EmissionsInputV1';

export interface EngineNoticeV1 {
  id: NoticeId;
  title: string;
  detail: string;
  severity: 'info' | 'warn';
  improveBy?: string;
}

export interface ConfidenceV1 {
  level: 'high' | 'medium' | 'low';
  reasons: string[];
}

export interface SummaryMetricsV1 {
  totalCo2e: number;
  /** Scope 1 + Scope 2 CO₂e; null when neither scope column resolved. */
  scope12Co2e: number | null;
  /** Σ projected year-end figures; null when there is no projected column. */
  projectedCo2e: number | null;
  /** (projected − total) ÷ total × 100. */
  projectedChangePct: number | null;
  /** Σ total ÷ Σ usage over included rows with usage. */
  intensity: number | null;
  includedRowCount: number;
  excludedRowCount: number;
}

export interface EmissionsMetaV1 {
  engineVersion: typeof ENGINE_VERSION;
  contractVersion: typeof CONTRACT_VERSION;
  scenarioId: string;
  filters: FilterSelection;
  confidence: ConfidenceV1;
  notices: EngineNoticeV1[];
}

export interface EmissionsOutputV1 {
  meta: EmissionsMetaV1;
  roles: ColumnRoleMap;
  filterOptions: FilterOptions;
  rows: DerivedRecord[];
  byYear: AggregateView;
  byYearRegion: AggregateView;
  /** Largest emitters among the filtered rows. */
  ranking: DerivedRecord[];
  summary: SummaryMetricsV1;
}
