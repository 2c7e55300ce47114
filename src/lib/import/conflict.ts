import type { ConflictPolicy } from '@/types';
import type { ImportOutcome } from './types';

/**
 * Decide the outcome for one valid entry.
 * Under `fail` an existing key yields `failed-conflict`; the importer turns
 * that into a batch-level ConflictError before anything is written.
 */
export function resolveConflict(
  key: string,
  exists: boolean,
  policy: ConflictPolicy
): ImportOutcome {
  if (!exists) {
    return { kind: 'created', key };
  }

  switch (policy) {
    case 'fail':
      return { kind: 'failed-conflict', key };
    case 'overwrite':
      return { kind: 'overwritten', key };
    case 'skip':
      return { kind: 'skipped', key };
  }
}
