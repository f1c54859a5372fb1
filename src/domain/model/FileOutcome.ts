import type { ColumnSchema } from './ColumnSchema.js';

/** Why a file was left alone. */
export type SkipReason = 'not-found' | 'not-a-file' | 'unsupported-extension' | 'output-exists' | 'temp-exists';

/** Stages a conversion passes through. Entry guards run in `check-guards`. */
export type ConversionStage =
  | 'check-guards'
  | 'infer-schema'
  | 'rewrite-schema'
  | 'print-only'
  | 'open-sink'
  | 'stream-rows'
  | 'commit';

export interface SkippedOutcome {
  readonly status: 'skipped';
  readonly filePath: string;
  readonly reason: SkipReason;
  /** The path that triggered the skip (the input, the output or the temp file). */
  readonly path: string;
}

export interface PrintedOutcome {
  readonly status: 'printed';
  readonly filePath: string;
  readonly schema: ColumnSchema;
}

export interface ConvertedOutcome {
  readonly status: 'converted';
  readonly filePath: string;
  readonly outputPath: string;
  readonly schema: ColumnSchema;
  readonly rowCount: number;
  readonly inputRemoved: boolean;
}

export interface FailedOutcome {
  readonly status: 'failed';
  readonly filePath: string;
  readonly stage: ConversionStage;
  readonly error: Error;
}

/** Terminal state of one file's conversion. */
export type FileOutcome = SkippedOutcome | PrintedOutcome | ConvertedOutcome | FailedOutcome;

/** Outcomes of a run, in input order. Processing stops after the first `failed` outcome. */
export interface RunSummary {
  readonly outcomes: readonly FileOutcome[];
  readonly converted: number;
  readonly skipped: number;
  readonly printed: number;
  readonly failed: FailedOutcome | undefined;
}

export function summarizeOutcomes(outcomes: readonly FileOutcome[]): RunSummary {
  let failed: FailedOutcome | undefined;
  let converted = 0;
  let skipped = 0;
  let printed = 0;
  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'converted':
        converted++;
        break;
      case 'skipped':
        skipped++;
        break;
      case 'printed':
        printed++;
        break;
      case 'failed':
        failed = outcome;
        break;
    }
  }
  return { outcomes, converted, skipped, printed, failed };
}
