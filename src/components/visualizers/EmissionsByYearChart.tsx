import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from 'recharts';
import type { AggregateView, GasRole } from '../../engine/schema/EmissionsInputV1';
import { formatCo2e } from '../../ui/format';

const GAS_COLORS: Record<GasRole, string> = {
  CO2: '#4a5568',
  CH4: '#ed8936',
  N2O: '#3182ce',
  SF6: '#805ad5',
  Scope1: '#c53030',
  Scope2: '#dd6b20',
  Scope3: '#38a169',
};

interface Props {
  view: AggregateView;
  gases: GasRole[];
}

/** Stacked CO₂e per gas (or scope) for each year. */
export default function EmissionsByYearChart({ view, gases }: Props) {
  const data = view.rows.map(row => {
    const point: Record<string, number | string> = { year: String(row.year) };
    for (const gas of gases) point[gas] = row.co2eByGas[gas] ?? 0;
    return point;
  });

  return (
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={data} margin={{ top: 5, right: 20, left: 10, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis dataKey="year" tick={{ fontSize: 11 }} />
        <YAxis tick={{ fontSize: 10 }} width={80} />
        <Tooltip
          contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
          formatter={value => formatCo2e(Number(value))}
        />
        <Legend wrapperStyle={{ fontSize: '0.8rem', paddingTop: '8px' }} />
        {gases.map(gas => (
          <Bar key={gas} dataKey={gas} stackId="co2e" fill={GAS_COLORS[gas]} />
        ))}
      </BarChart>
    </ResponsiveContainer>
  );
}
