import { ConflictError, ValidationError } from '@/lib/errors';
import { countReport } from '@/lib/import/report';
import type { ImportCounts, ImportReport } from '@/lib/import/types';
import type { MessageResolver } from './resolver';

const IMPORT_NAMESPACE = 'variables.import';

const SUMMARY_ORDER: (keyof ImportCounts)[] = ['created', 'overwritten', 'skipped', 'failed'];

/**
 * One line per non-empty report category, e.g. "2 variables created"
 */
export function describeImportReport(resolver: MessageResolver, report: ImportReport): string[] {
  const counts = countReport(report);

  const lines = SUMMARY_ORDER.filter((category) => counts[category] > 0).map((category) =>
    resolver.resolve(IMPORT_NAMESPACE, category, counts[category], {
      count: String(counts[category]),
    })
  );

  return lines.length > 0 ? lines : [resolver.resolve(IMPORT_NAMESPACE, 'nothingImported')];
}

/**
 * Per-entry lines for everything in `failed`
 */
export function describeFailedEntries(resolver: MessageResolver, report: ImportReport): string[] {
  return report.failed.map(({ key, reason }) =>
    resolver.resolve(IMPORT_NAMESPACE, 'failedEntry', undefined, { key, reason })
  );
}

export function describeImportFailure(resolver: MessageResolver, error: unknown): string {
  if (error instanceof ConflictError) {
    return resolver.resolve(IMPORT_NAMESPACE, 'conflict', error.keys.length, {
      count: String(error.keys.length),
      key: error.firstKey,
    });
  }

  if (error instanceof ValidationError) {
    const first = error.failures[0];
    return resolver.resolve(IMPORT_NAMESPACE, 'invalid', error.failures.length, {
      count: String(error.failures.length),
      key: first?.key ?? '',
      reason: first?.reason ?? '',
    });
  }

  return error instanceof Error ? error.message : resolver.resolve(IMPORT_NAMESPACE, 'error');
}
