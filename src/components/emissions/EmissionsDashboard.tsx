/**
 * EmissionsDashboard
 *
 * GHG emissions reporting view: sidebar filters and GWP scenario on the left,
 * KPI strip, charts and tables on the right. Selection state lives here and
 * is passed into the engine on every recomputation.
 */
import { useMemo, useState } from 'react';
import type { ReactNode } from 'react';
import { runEmissionsPipeline, NO_FILTERS } from '../../engine/Engine';
import type { EmissionsOutputV1 } from '../../contracts/EmissionsOutputV1';
import { createRecomputeCache } from '../../engine/modules/RecalculationModule';
import { GWP_SCENARIOS, DEFAULT_SCENARIO_ID } from '../../engine/scenarios/gwpScenarioRegistry';
import { EmissionsEngineError } from '../../engine/errors/EmissionsEngineError';
import { resolvedGasRoles } from '../../engine/schema/EmissionsInputV1';
import type { FilterSelection } from '../../engine/schema/EmissionsInputV1';
import type { LoadedDataset } from '../../engine/loader/DatasetLoader';
import FilterSidebar from './FilterSidebar';
import KpiStrip from './KpiStrip';
import TopEmittersTable from './TopEmittersTable';
import RowDetailTable from './RowDetailTable';
import DiagnosticsPanel from './DiagnosticsPanel';
import EngineErrorPanel from './EngineErrorPanel';
import EmissionsByYearChart from '../visualizers/EmissionsByYearChart';
import IntensityTrendChart from '../visualizers/IntensityTrendChart';

interface Props {
  dataset: LoadedDataset;
  datasetName: string;
  toolbar?: ReactNode;
}

type PipelineState =
  | { ok: true; output: EmissionsOutputV1 }
  | { ok: false; error: EmissionsEngineError };

function Section({ title, children, height }: { title: string; children: ReactNode; height?: number }) {
  return (
    <section style={{ background: '#fff', border: '1px solid #e2e8f0', borderRadius: 10, padding: '1rem' }}>
      <h3 style={{ margin: '0 0 0.75rem', fontSize: '0.95rem' }}>{title}</h3>
      {height !== undefined ? <div style={{ height }}>{children}</div> : children}
    </section>
  );
}

export default function EmissionsDashboard({ dataset, datasetName, toolbar }: Props) {
  const [scenarioId, setScenarioId] = useState<string>(DEFAULT_SCENARIO_ID);
  const [filters, setFilters] = useState<FilterSelection>(NO_FILTERS);
  const [cache] = useState(createRecomputeCache);

  const state = useMemo<PipelineState>(() => {
    try {
      return {
        ok: true,
        output: runEmissionsPipeline({
          records: dataset.records,
          columns: dataset.columns,
          scenarioId,
          filters,
          cache,
        }),
      };
    } catch (err) {
      if (err instanceof EmissionsEngineError) return { ok: false, error: err };
      throw err;
    }
  }, [dataset, scenarioId, filters, cache]);

  const output = state.ok ? state.output : null;
  const gases = output ? resolvedGasRoles(output.roles) : [];

  return (
    <div style={{ maxWidth: 1200, margin: '0 auto', padding: '1.5rem 1rem' }}>
      <header style={{ display: 'flex', justifyContent: 'space-between', alignItems: 'center', marginBottom: '1rem' }}>
        <div>
          <h1 style={{ margin: 0, fontSize: '1.5rem' }}>GHG Emissions Dashboard</h1>
          <div style={{ fontSize: '0.8rem', color: '#718096' }}>
            {datasetName} · {dataset.records.length} rows
          </div>
        </div>
        {toolbar}
      </header>

      <div style={{ display: 'flex', gap: 20, alignItems: 'flex-start' }}>
        <FilterSidebar
          options={output?.filterOptions ?? { regions: [], years: [] }}
          selection={filters}
          scenarios={GWP_SCENARIOS}
          scenarioId={scenarioId}
          onSelectionChange={setFilters}
          onScenarioChange={setScenarioId}
        />

        <main style={{ flex: 1, display: 'flex', flexDirection: 'column', gap: 16, minWidth: 0 }}>
          {!state.ok && <EngineErrorPanel error={state.error} />}

          {output && (
            <>
              <KpiStrip summary={output.summary} />

              <Section title="📊 Total Emissions by Year (CO₂e)" height={300}>
                <EmissionsByYearChart view={output.byYear} gases={gases} />
              </Section>

              {output.roles.Usage && (
                <Section title="📈 Emission Intensity (CO₂e / Usage)" height={260}>
                  <IntensityTrendChart view={output.byYear} />
                </Section>
              )}

              <Section title="Largest Emitters">
                <TopEmittersTable rows={output.ranking} />
              </Section>

              <Section title="Row Detail">
                <RowDetailTable rows={output.rows} gases={gases} />
              </Section>

              <Section title="Diagnostics">
                <DiagnosticsPanel roles={output.roles} meta={output.meta} />
              </Section>
            </>
          )}
        </main>
      </div>
    </div>
  );
}
