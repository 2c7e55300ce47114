import { MAX_KEY_LENGTH } from '@/types';
import type { VariableEntry } from '@/types';
import { VALIDATION_REASONS } from './types';
import type { ImportOutcome, ValidationReason } from './types';

export interface BatchValidation {
  /** Entries that passed every check, in input order */
  valid: VariableEntry[];
  /** One `failed-validation` outcome per rejected entry, in input order */
  failures: Extract<ImportOutcome, { kind: 'failed-validation' }>[];
  /** Input-order index of each entry mapped to its failure, if any */
  reasons: (ValidationReason | null)[];
}

/**
 * Check a single entry in isolation (duplicates are a batch concern)
 */
export function validateEntry(
  entry: VariableEntry,
  requireValue: boolean
): ValidationReason | null {
  // Length is counted in code points, not UTF-16 units
  if (!entry.key || [...entry.key].length > MAX_KEY_LENGTH) {
    return VALIDATION_REASONS.keyConstraint;
  }

  if (requireValue && !entry.value) {
    return VALIDATION_REASONS.valueRequired;
  }

  return null;
}

/**
 * Run the validation pass over a batch without touching any store.
 * Only the first occurrence of a key counts; later ones are duplicates
 * even when the first occurrence was itself invalid.
 */
export function validateBatch(
  entries: readonly VariableEntry[],
  requireValue: boolean
): BatchValidation {
  const valid: VariableEntry[] = [];
  const failures: BatchValidation['failures'] = [];
  const reasons: BatchValidation['reasons'] = [];
  const seenKeys = new Set<string>();

  for (const entry of entries) {
    let reason = validateEntry(entry, requireValue);

    if (reason === null && seenKeys.has(entry.key)) {
      reason = VALIDATION_REASONS.duplicateInBatch;
    }
    seenKeys.add(entry.key);

    reasons.push(reason);
    if (reason === null) {
      valid.push(entry);
    } else {
      failures.push({ kind: 'failed-validation', key: entry.key, reason });
    }
  }

  return { valid, failures, reasons };
}
