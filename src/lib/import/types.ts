export const VALIDATION_REASONS = {
  keyConstraint: 'key constraint',
  valueRequired: 'value required',
  duplicateInBatch: 'duplicate in batch',
} as const;

export type ValidationReason = (typeof VALIDATION_REASONS)[keyof typeof VALIDATION_REASONS];

export interface ImportOptions {
  /** Reject entries with an empty value (defaults to the `requireValue` setting) */
  requireValue?: boolean;
}

/**
 * Per-key result of a single import call
 */
export type ImportOutcome =
  | { kind: 'created'; key: string }
  | { kind: 'overwritten'; key: string }
  | { kind: 'skipped'; key: string }
  | { kind: 'failed-validation'; key: string; reason: ValidationReason }
  | { kind: 'failed-conflict'; key: string };

export type ImportOutcomeKind = ImportOutcome['kind'];

export interface FailedEntry {
  key: string;
  reason: string;
}

export interface ImportReport {
  readonly created: readonly string[];
  readonly overwritten: readonly string[];
  readonly skipped: readonly string[];
  readonly failed: readonly FailedEntry[];
  /** Every entry's outcome, in input order */
  readonly outcomes: readonly ImportOutcome[];
}

export interface ImportCounts {
  created: number;
  overwritten: number;
  skipped: number;
  failed: number;
}
