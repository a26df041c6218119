import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
} from 'recharts';
import type { AggregateView } from '../../engine/schema/EmissionsInputV1';
import { formatIntensity } from '../../ui/format';

/**
 * Pooled intensity (Σ CO₂e ÷ Σ usage) per year. Years without usage leave a
 * gap rather than dropping to zero.
 */
export default function IntensityTrendChart({ view }: { view: AggregateView }) {
  const data = view.rows.map(row => ({ year: String(row.year), intensity: row.intensity }));

  return (
    <ResponsiveContainer width="100%" height="100%">
      <LineChart data={data} margin={{ top: 5, right: 20, left: 10, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis dataKey="year" tick={{ fontSize: 11 }} />
        <YAxis tick={{ fontSize: 10 }} width={80} />
        <Tooltip
          contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
          formatter={value => formatIntensity(Number(value))}
        />
        <Line
          type="monotone"
          dataKey="intensity"
          name="CO₂e per unit usage"
          stroke="#3182ce"
          strokeWidth={2.5}
          connectNulls={false}
        />
      </LineChart>
    </ResponsiveContainer>
  );
}
