import type { VariableStore } from '@/lib/db/variables';
import type { VariableEntry } from '@/types';
import type { VariablesExport } from './types';

/**
 * Export every variable, sorted by key
 */
export async function exportVariables(
  store: VariableStore,
  source: string = 'varport'
): Promise<VariablesExport> {
  const variables = await store.list();

  const mapping: Record<string, string> = Object.fromEntries(
    variables.map((variable) => [variable.key, variable.value])
  );

  return {
    version: 1,
    exportedAt: new Date().toISOString(),
    source,
    stats: {
      totalVariables: variables.length,
      encryptedCount: variables.filter((v) => v.isEncrypted).length,
    },
    variables: mapping,
  };
}

/**
 * Turn an export back into import entries.
 * Exports carry no encryption flag, so isEncryptedHint is false.
 */
export function exportToEntries(data: VariablesExport): VariableEntry[] {
  return Object.entries(data.variables).map(([key, value]) => ({
    key,
    value,
    isEncryptedHint: false,
  }));
}

/**
 * Serialize an export for writing to disk
 */
export function exportToString(data: VariablesExport): string {
  return JSON.stringify(data, null, 2);
}

/**
 * Generate a filename for the export
 */
export function generateExportFilename(now: Date = new Date()): string {
  const date = now.toISOString().split('T')[0];
  return `variables-export-${date}.json`;
}
