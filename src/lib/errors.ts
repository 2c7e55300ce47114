import type { FailedEntry } from '@/lib/import/types';

/**
 * Base class for every error thrown by varport
 */
export class VarportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Batch rejected by the validation pass under the `fail` policy
 */
export class ValidationError extends VarportError {
  readonly failures: readonly FailedEntry[];

  constructor(failures: readonly FailedEntry[]) {
    const first = failures[0];
    const detail = first ? `: "${first.key}" (${first.reason})` : '';
    super(`import failed, ${failures.length} invalid entries${detail}`);
    this.failures = failures;
  }
}

/**
 * Batch rejected because keys already exist under the `fail` policy.
 * Keys are listed in input order; the store has not been modified.
 */
export class ConflictError extends VarportError {
  readonly keys: readonly string[];

  constructor(keys: readonly string[]) {
    super(`import failed, ${keys.length} conflicting keys starting with ${keys[0] ?? ''}`);
    this.keys = keys;
  }

  get firstKey(): string {
    return this.keys[0] ?? '';
  }
}

export class MissingTranslationError extends VarportError {
  readonly fullKey: string;

  constructor(fullKey: string) {
    super(`Missing translation key "${fullKey}"`);
    this.fullKey = fullKey;
  }
}

export class MissingParameterError extends VarportError {
  readonly parameter: string;
  readonly fullKey: string;

  constructor(parameter: string, fullKey: string) {
    super(`Missing parameter "${parameter}" for message "${fullKey}"`);
    this.parameter = parameter;
    this.fullKey = fullKey;
  }
}

/**
 * Locale bundle could not be turned into a catalog
 */
export class CatalogFormatError extends VarportError {
  readonly path: string;

  constructor(path: string, detail: string) {
    super(`Invalid locale bundle at "${path}": ${detail}`);
    this.path = path;
  }
}
