/**
 * FilterSidebar
 *
 * Region, year and GWP scenario selectors. Holds no state of its own: the
 * dashboard owns the selection and re-runs the pipeline on every change.
 */
import { ALL_REGIONS } from '../../engine/schema/EmissionsInputV1';
import type { CoefficientScenario, FilterOptions, FilterSelection } from '../../engine/schema/EmissionsInputV1';

interface Props {
  options: FilterOptions;
  selection: FilterSelection;
  scenarios: readonly CoefficientScenario[];
  scenarioId: string;
  onSelectionChange: (next: FilterSelection) => void;
  onScenarioChange: (scenarioId: string) => void;
}

const labelStyle = { display: 'block', fontSize: '0.8rem', fontWeight: 700, color: '#4a5568', marginBottom: 6 };

export default function FilterSidebar({
  options,
  selection,
  scenarios,
  scenarioId,
  onSelectionChange,
  onScenarioChange,
}: Props) {
  const activeScenario = scenarios.find(s => s.id === scenarioId);

  function toggleYear(year: number) {
    const years = selection.years.includes(year)
      ? selection.years.filter(y => y !== year)
      : [...selection.years, year].sort((a, b) => a - b);
    onSelectionChange({ ...selection, years });
  }

  return (
    <aside style={{ width: 240, flexShrink: 0, padding: '1rem', background: '#f7fafc', borderRadius: 10 }}>
      <h3 style={{ marginTop: 0, fontSize: '1rem' }}>Filter Options</h3>

      <div style={{ marginBottom: '1rem' }}>
        <label htmlFor="scenario-select" style={labelStyle}>GWP scenario</label>
        <select
          id="scenario-select"
          value={scenarioId}
          onChange={e => onScenarioChange(e.target.value)}
          style={{ width: '100%', padding: '6px 8px' }}
        >
          {scenarios.map(s => (
            <option key={s.id} value={s.id}>{s.label}</option>
          ))}
        </select>
        {activeScenario && (
          <p style={{ fontSize: '0.75rem', color: '#718096', margin: '6px 0 0' }}>
            {activeScenario.description}
          </p>
        )}
      </div>

      <div style={{ marginBottom: '1rem' }}>
        <label htmlFor="region-select" style={labelStyle}>Select Region</label>
        <select
          id="region-select"
          value={selection.region}
          disabled={options.regions.length === 0}
          onChange={e => onSelectionChange({ ...selection, region: e.target.value })}
          style={{ width: '100%', padding: '6px 8px' }}
        >
          <option value={ALL_REGIONS}>All</option>
          {options.regions.map(r => (
            <option key={r} value={r}>{r}</option>
          ))}
        </select>
      </div>

      <fieldset style={{ border: 'none', padding: 0, margin: 0 }}>
        <legend style={labelStyle}>Select Year</legend>
        {options.years.map(year => (
          <label key={year} style={{ display: 'flex', gap: 6, fontSize: '0.85rem', marginBottom: 4 }}>
            <input
              type="checkbox"
              checked={selection.years.includes(year)}
              onChange={() => toggleYear(year)}
            />
            {year}
          </label>
        ))}
        {selection.years.length > 0 && (
          <button
            onClick={() => onSelectionChange({ ...selection, years: [] })}
            style={{ marginTop: 6, fontSize: '0.75rem', background: 'none', border: 'none', color: '#3182ce', cursor: 'pointer', padding: 0 }}
          >
            Clear years
          </button>
        )}
      </fieldset>
    </aside>
  );
}
