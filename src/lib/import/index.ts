export { VariableImporter } from './importVariables';
export { validateBatch, validateEntry, type BatchValidation } from './validate';
export { resolveConflict } from './conflict';
export { buildReport, countReport } from './report';
export {
  VALIDATION_REASONS,
  type FailedEntry,
  type ImportCounts,
  type ImportOptions,
  type ImportOutcome,
  type ImportOutcomeKind,
  type ImportReport,
  type ValidationReason,
} from './types';
