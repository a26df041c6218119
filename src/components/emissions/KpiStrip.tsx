import type { SummaryMetricsV1 } from '../../contracts/EmissionsOutputV1';
import { formatChangePct, formatCo2e, formatIntensity } from '../../ui/format';

function KpiCard({ label, value, delta }: { label: string; value: string; delta?: string }) {
  const negative = delta?.startsWith('-') ?? false;
  return (
    <div style={{
      flex: 1, minWidth: 180, padding: '0.9rem 1rem',
      background: '#fff', border: '1px solid #e2e8f0', borderRadius: 10,
    }}>
      <div style={{ fontSize: '0.75rem', color: '#718096', marginBottom: 4 }}>{label}</div>
      <div style={{ fontSize: '1.35rem', fontWeight: 700, color: '#2d3748' }}>{value}</div>
      {delta && (
        <div style={{ fontSize: '0.8rem', fontWeight: 600, color: negative ? '#276749' : '#c53030' }}>
          {delta}
        </div>
      )}
    </div>
  );
}

export default function KpiStrip({ summary }: { summary: SummaryMetricsV1 }) {
  return (
    <div style={{ display: 'flex', gap: 12, flexWrap: 'wrap' }}>
      <KpiCard label="Total Emissions (CO₂e)" value={formatCo2e(summary.totalCo2e)} />
      <KpiCard label="Scope 1 & 2 (CO₂e)" value={formatCo2e(summary.scope12Co2e)} />
      <KpiCard
        label="Projected Year-End (CO₂e)"
        value={formatCo2e(summary.projectedCo2e)}
        delta={summary.projectedChangePct !== null ? formatChangePct(summary.projectedChangePct) : undefined}
      />
      <KpiCard label="Carbon Intensity" value={formatIntensity(summary.intensity)} />
    </div>
  );
}
