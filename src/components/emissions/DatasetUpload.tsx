import { useState } from 'react';
import type { ChangeEvent } from 'react';
import { parseDelimitedDataset } from '../../engine/loader/DatasetLoader';
import type { LoadedDataset } from '../../engine/loader/DatasetLoader';

interface Props {
  onLoaded: (dataset: LoadedDataset, name: string) => void;
  onError: (error: Error) => void;
}

export default function DatasetUpload({ onLoaded, onError }: Props) {
  const [busy, setBusy] = useState(false);

  async function handleChange(e: ChangeEvent<HTMLInputElement>) {
    const file = e.target.files?.[0];
    if (!file) return;
    setBusy(true);
    try {
      const text = await file.text();
      onLoaded(parseDelimitedDataset(text), file.name);
    } catch (err) {
      onError(err instanceof Error ? err : new Error(String(err)));
    } finally {
      setBusy(false);
      e.target.value = '';
    }
  }

  return (
    <label style={{
      display: 'inline-flex', alignItems: 'center', gap: 8,
      padding: '0.5rem 1rem', background: '#3182ce', color: 'white',
      borderRadius: 8, fontSize: '0.85rem', cursor: busy ? 'wait' : 'pointer',
    }}>
      {busy ? 'Loading…' : 'Upload CSV'}
      <input
        type="file"
        accept=".csv,.tsv,.txt,text/csv"
        onChange={e => void handleChange(e)}
        style={{ display: 'none' }}
      />
    </label>
  );
}
