import type { LoadedDataset } from '../engine/loader/DatasetLoader';

/** The dataset on screen. `loadId` changes on every load, so it keys the dashboard. */
export interface DatasetSession {
  dataset: LoadedDataset;
  name: string;
  loadId: number;
}

export function openDatasetSession(
  previous: DatasetSession | null,
  dataset: LoadedDataset,
  name: string,
): DatasetSession {
  return { dataset, name, loadId: (previous?.loadId ?? 0) + 1 };
}
