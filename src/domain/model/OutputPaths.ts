import { basename, dirname, join } from 'node:path';

/** Input suffixes recognised as CSV, longest first. */
export const CSV_SUFFIXES: readonly string[] = ['.csv.gz', '.csv'];

export const PARQUET_SUFFIX = '.parquet';

/** Prefix marking the staging file next to the destination. */
export const TEMP_PREFIX = '.tmp.';

/** Destination and staging paths derived from an input path. */
export interface OutputPaths {
  readonly outputPath: string;
  readonly tempPath: string;
}

/** Strip a recognised CSV suffix from a file name, or return `null` when there is none. */
export function stripCsvSuffix(fileName: string): string | null {
  for (const suffix of CSV_SUFFIXES) {
    if (fileName.endsWith(suffix)) {
      return fileName.slice(0, -suffix.length);
    }
  }
  return null;
}

/**
 * `data/trips.csv.gz` maps to `data/trips.parquet`, staged as `data/.tmp.trips.parquet`.
 * Returns `null` for names without a CSV suffix.
 */
export function deriveOutputPaths(inputPath: string): OutputPaths | null {
  const stem = stripCsvSuffix(basename(inputPath));
  if (stem === null) return null;

  const directory = dirname(inputPath);
  const outputName = `${stem}${PARQUET_SUFFIX}`;
  return {
    outputPath: join(directory, outputName),
    tempPath: join(directory, `${TEMP_PREFIX}${outputName}`),
  };
}
