import { createVariableFromEntry, type VariableStore } from '@/lib/db/variables';
import { ConflictError, ValidationError } from '@/lib/errors';
import { getSettings } from '@/lib/settings';
import type { ConflictPolicy, Settings, VariableEntry } from '@/types';
import { resolveConflict } from './conflict';
import { buildReport } from './report';
import type { ImportOptions, ImportOutcome, ImportReport } from './types';
import { validateBatch, type BatchValidation } from './validate';

/**
 * Imports batches of variables into a store under a conflict policy.
 * Assumes at most one import in flight per store; callers serialize.
 */
export class VariableImporter {
  constructor(
    private readonly store: VariableStore,
    private readonly settings: Settings = getSettings()
  ) {}

  get defaultPolicy(): ConflictPolicy {
    return this.settings.defaultConflictPolicy;
  }

  /**
   * Apply a batch. Under `fail` the batch is all-or-nothing and throws
   * ValidationError or ConflictError with the store untouched; under
   * `overwrite` and `skip` every independently valid entry is committed.
   */
  async apply(
    entries: readonly VariableEntry[],
    policy: ConflictPolicy = this.defaultPolicy,
    options: ImportOptions = {}
  ): Promise<ImportReport> {
    const requireValue = options.requireValue ?? this.settings.requireValue;
    const validation = validateBatch(entries, requireValue);

    if (policy === 'fail' && validation.failures.length > 0) {
      throw new ValidationError(
        validation.failures.map(({ key, reason }) => ({ key, reason }))
      );
    }

    const outcomes = await this.store.transaction(() =>
      policy === 'fail'
        ? this.applyAllOrNothing(validation.valid)
        : this.applyPerKey(entries, validation, policy)
    );

    const report = buildReport(outcomes);
    console.info(
      `[import] policy=${policy} created=${report.created.length} overwritten=${report.overwritten.length} skipped=${report.skipped.length} failed=${report.failed.length}`
    );
    return report;
  }

  private async applyAllOrNothing(entries: readonly VariableEntry[]): Promise<ImportOutcome[]> {
    // Pre-scan every key before the first write
    const conflicts: string[] = [];
    for (const entry of entries) {
      if (await this.store.has(entry.key)) {
        conflicts.push(entry.key);
      }
    }

    if (conflicts.length > 0) {
      throw new ConflictError(conflicts);
    }

    const now = Date.now();
    const outcomes: ImportOutcome[] = [];
    for (const entry of entries) {
      await this.store.put(createVariableFromEntry(entry, undefined, now));
      outcomes.push({ kind: 'created', key: entry.key });
    }
    return outcomes;
  }

  private async applyPerKey(
    entries: readonly VariableEntry[],
    validation: BatchValidation,
    policy: Exclude<ConflictPolicy, 'fail'>
  ): Promise<ImportOutcome[]> {
    const now = Date.now();
    const outcomes: ImportOutcome[] = [];

    for (const [index, entry] of entries.entries()) {
      const reason = validation.reasons[index];
      if (reason) {
        outcomes.push({ kind: 'failed-validation', key: entry.key, reason });
        continue;
      }

      const existing = await this.store.get(entry.key);
      const outcome = resolveConflict(entry.key, existing !== undefined, policy);

      if (outcome.kind === 'created' || outcome.kind === 'overwritten') {
        await this.store.put(createVariableFromEntry(entry, existing, now));
      }
      outcomes.push(outcome);
    }

    return outcomes;
  }
}
