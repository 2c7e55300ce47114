/**
 * Export format for varport variables
 */

export interface VariablesExport {
  version: 1;
  exportedAt: string;
  source: string;
  stats: {
    totalVariables: number;
    encryptedCount: number;
  };
  /** Plain key -> value mapping, the shape import files use */
  variables: Record<string, string>;
}
