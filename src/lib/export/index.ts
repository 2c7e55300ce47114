export {
  exportVariables,
  exportToEntries,
  exportToString,
  generateExportFilename,
} from './exportJson';
export type { VariablesExport } from './types';
