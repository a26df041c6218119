import { useState } from 'react';
import EmissionsDashboard from './components/emissions/EmissionsDashboard';
import DatasetUpload from './components/emissions/DatasetUpload';
import EngineErrorPanel from './components/emissions/EngineErrorPanel';
import { fromRowObjects } from './engine/loader/DatasetLoader';
import type { LoadedDataset } from './engine/loader/DatasetLoader';
import { openDatasetSession } from './ui/datasetSession';
import demoRows from './data/demoEmissions.json';
import './App.css';

const DEMO_NAME = 'Demo dataset';
const demoDataset = fromRowObjects(demoRows);

export default function App() {
  const [session, setSession] = useState(() => openDatasetSession(null, demoDataset, DEMO_NAME));
  const [loadError, setLoadError] = useState<Error | null>(null);

  function handleLoaded(next: LoadedDataset, name: string) {
    setLoadError(null);
    setSession(prev => openDatasetSession(prev, next, name));
  }

  const toolbar = (
    <div style={{ display: 'flex', gap: 8, alignItems: 'center' }}>
      {session.dataset !== demoDataset && (
        <button
          onClick={() => handleLoaded(demoDataset, DEMO_NAME)}
          style={{ padding: '0.5rem 1rem', background: 'none', border: '1px solid #cbd5e0', borderRadius: 8, cursor: 'pointer' }}
        >
          Use demo data
        </button>
      )}
      <DatasetUpload onLoaded={handleLoaded} onError={setLoadError} />
    </div>
  );

  return (
    <>
      {loadError && (
        <div style={{ maxWidth: 1200, margin: '1rem auto 0', padding: '0 1rem' }}>
          <EngineErrorPanel error={loadError} />
        </div>
      )}
      {/* Keyed per load so filters and scenario reset, even for a file with the same name. */}
      <EmissionsDashboard
        key={session.loadId}
        dataset={session.dataset}
        datasetName={session.name}
        toolbar={toolbar}
      />
    </>
  );
}
