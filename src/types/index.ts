// ============================================
// Database Entities
// ============================================

export interface Variable {
  key: string;
  value: string;
  isEncrypted: boolean;
  createdAt: number;
  updatedAt: number;
}

// ============================================
// Import Input
// ============================================

/**
 * A single proposed key/value pair submitted for import
 */
export interface VariableEntry {
  key: string;
  value: string;
  isEncryptedHint: boolean;
}

export const CONFLICT_POLICIES = ['fail', 'overwrite', 'skip'] as const;

export type ConflictPolicy = (typeof CONFLICT_POLICIES)[number];

export const MAX_KEY_LENGTH = 250;

export function isConflictPolicy(value: unknown): value is ConflictPolicy {
  return CONFLICT_POLICIES.some((policy) => policy === value);
}

// ============================================
// Settings
// ============================================

export interface Settings {
  strictMessages: boolean;
  defaultConflictPolicy: ConflictPolicy;
  requireValue: boolean;
}

export const DEFAULT_SETTINGS: Settings = {
  strictMessages: true,
  defaultConflictPolicy: 'fail',
  requireValue: true,
};
