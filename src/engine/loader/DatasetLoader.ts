import Papa from 'papaparse';
import type { CellValue, RawRecord } from '../schema/EmissionsInputV1';
import { DatasetError } from '../errors/EmissionsEngineError';

export interface LoadedDataset {
  /** Header names in file order, trimmed. */
  columns: string[];
  records: RawRecord[];
}

export interface ParseOptions {
  /** Field delimiter; auto-detected when omitted. */
  delimiter?: string;
}

/**
 * Parses a delimited text file with a header row.
 *
 * Cells stay strings: numeric coercion belongs to the schema resolver, which
 * marks unparseable values as missing instead of guessing.
 */
export function parseDelimitedDataset(text: string, options: ParseOptions = {}): LoadedDataset {
  const parsed = Papa.parse<Record<string, string>>(text, {
    header: true,
    dynamicTyping: false,
    skipEmptyLines: 'greedy',
    delimiter: options.delimiter ?? '',
    transformHeader: header => header.trim(),
  });

  const columns = (parsed.meta.fields ?? []).filter(c => c.length > 0);
  if (columns.length === 0) {
    throw new DatasetError('dataset.empty', 'The dataset has no header row.');
  }

  // A single-column file has no delimiter to detect; papaparse falls back to a comma.
  const [firstError] = parsed.errors.filter(e => e.code !== 'UndetectableDelimiter');
  if (firstError) {
    const row = firstError.row !== undefined ? firstError.row + 1 : undefined;
    throw new DatasetError(
      'dataset.parse_failed',
      `Could not parse the dataset${row !== undefined ? ` at row ${row}` : ''}: ${firstError.message}`,
      row,
    );
  }

  return { columns, records: parsed.data.map(row => Object.freeze({ ...row })) };
}

/**
 * Accepts rows already held in memory. Columns are the union of keys in
 * first-appearance order.
 */
export function fromRowObjects(rows: readonly Readonly<Record<string, CellValue>>[]): LoadedDataset {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return { columns, records: rows.map(row => Object.freeze({ ...row })) };
}
