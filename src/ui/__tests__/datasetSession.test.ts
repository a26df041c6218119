import { describe, it, expect } from 'vitest';
import { openDatasetSession } from '../datasetSession';
import { parseDelimitedDataset } from '../../engine/loader/DatasetLoader';

describe('openDatasetSession', () => {
  it('gives every load a new id, even for a file with the same name', () => {
    const first = openDatasetSession(null, parseDelimitedDataset('Year,CO2\n2020,1'), 'emissions.csv');
    const second = openDatasetSession(first, parseDelimitedDataset('Year,CO2\n2021,2'), 'emissions.csv');
    const third = openDatasetSession(second, second.dataset, 'emissions.csv');

    expect(first.loadId).toBe(1);
    expect(second.loadId).toBe(2);
    expect(third.loadId).toBe(3);
    expect(second.name).toBe(first.name);
  });
});
