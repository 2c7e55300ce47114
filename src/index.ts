export * from '@/types';
export { getSettings } from '@/lib/settings';
export {
  VarportError,
  ValidationError,
  ConflictError,
  MissingTranslationError,
  MissingParameterError,
  CatalogFormatError,
} from '@/lib/errors';
export { VariableDatabase, DEFAULT_DATABASE_NAME } from '@/lib/db/schema';
export { DexieVariableStore, createVariableFromEntry, type VariableStore } from '@/lib/db/variables';
export { MemoryVariableStore } from '@/lib/db/memory';
export { deleteVariables, clearAllVariables, type DeleteResult } from '@/lib/db/clear';
export * from '@/lib/import';
export * from '@/lib/export';
export * from '@/lib/i18n';
export { useVariableImport } from '@/hooks/useVariableImport';
