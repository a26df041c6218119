import type { DerivedRecord } from '../../engine/schema/EmissionsInputV1';
import { formatCo2e, formatIntensity } from '../../ui/format';

const cell = { padding: '8px', fontSize: '0.82rem', borderBottom: '1px solid #edf2f7' };

export default function TopEmittersTable({ rows }: { rows: DerivedRecord[] }) {
  if (rows.length === 0) {
    return <p style={{ color: '#718096', fontSize: '0.85rem' }}>No rows to rank.</p>;
  }
  return (
    <table style={{ width: '100%', borderCollapse: 'collapse' }}>
      <thead>
        <tr style={{ textAlign: 'left', color: '#4a5568' }}>
          <th style={cell}>#</th>
          <th style={cell}>Region</th>
          <th style={cell}>Year</th>
          <th style={{ ...cell, textAlign: 'right' }}>CO₂e</th>
          <th style={{ ...cell, textAlign: 'right' }}>Intensity</th>
        </tr>
      </thead>
      <tbody>
        {rows.map((row, i) => (
          <tr key={row.rowIndex}>
            <td style={cell}>{i + 1}</td>
            <td style={cell}>{row.region ?? '—'}</td>
            <td style={cell}>{row.year ?? '—'}</td>
            <td style={{ ...cell, textAlign: 'right' }}>{formatCo2e(row.totalCo2e)}</td>
            <td style={{ ...cell, textAlign: 'right' }}>{formatIntensity(row.intensity)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}
