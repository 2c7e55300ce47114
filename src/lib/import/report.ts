import type { FailedEntry, ImportCounts, ImportOutcome, ImportReport } from './types';

/**
 * Partition outcomes into report categories, keeping input order
 */
export function buildReport(outcomes: readonly ImportOutcome[]): ImportReport {
  const created: string[] = [];
  const overwritten: string[] = [];
  const skipped: string[] = [];
  const failed: FailedEntry[] = [];

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'created':
        created.push(outcome.key);
        break;
      case 'overwritten':
        overwritten.push(outcome.key);
        break;
      case 'skipped':
        skipped.push(outcome.key);
        break;
      case 'failed-validation':
        failed.push({ key: outcome.key, reason: outcome.reason });
        break;
      case 'failed-conflict':
        failed.push({ key: outcome.key, reason: 'conflict' });
        break;
    }
  }

  return Object.freeze({
    created: Object.freeze(created),
    overwritten: Object.freeze(overwritten),
    skipped: Object.freeze(skipped),
    failed: Object.freeze(failed.map((entry) => Object.freeze(entry))),
    outcomes: Object.freeze(outcomes.map((outcome) => Object.freeze({ ...outcome }))),
  });
}

export function countReport(report: ImportReport): ImportCounts {
  return {
    created: report.created.length,
    overwritten: report.overwritten.length,
    skipped: report.skipped.length,
    failed: report.failed.length,
  };
}
