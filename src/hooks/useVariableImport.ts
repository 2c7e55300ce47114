import { useState, useCallback } from 'react';
import { describeImportFailure, describeImportReport, type MessageResolver } from '@/lib/i18n';
import type { ImportOptions, ImportReport, VariableImporter } from '@/lib/import';
import type { ConflictPolicy, VariableEntry } from '@/types';

type Status = 'idle' | 'importing' | 'success' | 'error';

interface UseVariableImportReturn {
  confirmImport: (
    entries: readonly VariableEntry[],
    policy: ConflictPolicy,
    options?: ImportOptions
  ) => Promise<void>;
  isImporting: boolean;
  report: ImportReport | null;

  // Status
  status: Status;
  message: string | null;
  clearMessage: () => void;
}

export function useVariableImport(
  importer: VariableImporter,
  resolver: MessageResolver
): UseVariableImportReturn {
  const [status, setStatus] = useState<Status>('idle');
  const [message, setMessage] = useState<string | null>(null);
  const [report, setReport] = useState<ImportReport | null>(null);

  const clearMessage = useCallback(() => {
    setMessage(null);
    setStatus('idle');
  }, []);

  const confirmImport = useCallback(
    async (entries: readonly VariableEntry[], policy: ConflictPolicy, options?: ImportOptions) => {
      setStatus('importing');
      setMessage(null);
      setReport(null);

      try {
        const result = await importer.apply(entries, policy, options);
        setReport(result);
        setStatus('success');
        setMessage(describeImportReport(resolver, result).join(', '));
      } catch (error) {
        console.error('Variable import failed:', error);
        setStatus('error');
        setMessage(describeImportFailure(resolver, error));
      }
    },
    [importer, resolver]
  );

  return {
    confirmImport,
    isImporting: status === 'importing',
    report,

    // Status
    status,
    message,
    clearMessage,
  };
}
