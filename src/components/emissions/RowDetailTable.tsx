/**
 * RowDetailTable
 *
 * Every filtered row with its recomputed figures. Rows excluded from the
 * totals stay visible and are marked with the fields that failed to parse.
 */
import { useState } from 'react';
import type { DerivedRecord, GasRole } from '../../engine/schema/EmissionsInputV1';
import { formatCo2e, formatIntensity } from '../../ui/format';

const cell = { padding: '6px 8px', fontSize: '0.8rem', borderBottom: '1px solid #edf2f7' };

/** Rows rendered before the "show all" toggle. */
const COLLAPSED_ROW_LIMIT = 12;

export default function RowDetailTable({ rows, gases }: { rows: DerivedRecord[]; gases: GasRole[] }) {
  const [expanded, setExpanded] = useState(false);
  const visible = expanded ? rows : rows.slice(0, COLLAPSED_ROW_LIMIT);

  return (
    <div style={{ overflowX: 'auto' }}>
      <table style={{ width: '100%', borderCollapse: 'collapse' }}>
        <thead>
          <tr style={{ textAlign: 'left', color: '#4a5568' }}>
            <th style={cell}>Row</th>
            <th style={cell}>Year</th>
            <th style={cell}>Region</th>
            {gases.map(gas => (
              <th key={gas} style={{ ...cell, textAlign: 'right' }}>{gas} CO₂e</th>
            ))}
            <th style={{ ...cell, textAlign: 'right' }}>Total</th>
            <th style={{ ...cell, textAlign: 'right' }}>Intensity</th>
            <th style={cell}>Status</th>
          </tr>
        </thead>
        <tbody>
          {visible.map(row => (
            <tr key={row.rowIndex} style={{ background: row.excluded ? '#fff5f5' : undefined }}>
              <td style={cell}>{row.rowIndex + 1}</td>
              <td style={cell}>{row.year ?? '—'}</td>
              <td style={cell}>{row.region ?? '—'}</td>
              {gases.map(gas => (
                <td key={gas} style={{ ...cell, textAlign: 'right' }}>{formatCo2e(row.co2eByGas[gas] ?? null)}</td>
              ))}
              <td style={{ ...cell, textAlign: 'right', fontWeight: 600 }}>{formatCo2e(row.totalCo2e)}</td>
              <td style={{ ...cell, textAlign: 'right' }}>{formatIntensity(row.intensity)}</td>
              <td style={{ ...cell, color: row.excluded ? '#c53030' : '#718096' }}>
                {row.excluded
                  ? `Missing ${row.warnings.map(w => w.column).join(', ')}`
                  : row.intensityStatus === 'usage_zero' ? 'Zero usage' : 'OK'}
              </td>
            </tr>
          ))}
        </tbody>
      </table>
      {rows.length > COLLAPSED_ROW_LIMIT && (
        <button
          onClick={() => setExpanded(prev => !prev)}
          style={{ marginTop: 8, fontSize: '0.8rem', background: 'none', border: 'none', color: '#3182ce', cursor: 'pointer' }}
        >
          {expanded ? 'Show fewer rows' : `Show all ${rows.length} rows`}
        </button>
      )}
    </div>
  );
}
