import { VariableDatabase } from './schema';
import type { Variable, VariableEntry } from '@/types';

/**
 * Key/value storage the importer writes to.
 * Implementations own their own per-call concurrency control.
 */
export interface VariableStore {
  get(key: string): Promise<Variable | undefined>;
  has(key: string): Promise<boolean>;
  put(variable: Variable): Promise<void>;
  list(): Promise<Variable[]>;
  count(): Promise<number>;
  /** Returns the number of keys that existed and were removed */
  delete(keys: readonly string[]): Promise<number>;
  clear(): Promise<void>;
  /** Run `scope` so that its writes commit together where the backend supports it */
  transaction<T>(scope: () => Promise<T>): Promise<T>;
}

/**
 * Build the stored record for an entry, keeping createdAt of an existing one
 */
export function createVariableFromEntry(
  entry: VariableEntry,
  existing?: Variable,
  now: number = Date.now()
): Variable {
  return {
    key: entry.key,
    value: entry.value,
    isEncrypted: entry.isEncryptedHint,
    createdAt: existing?.createdAt ?? now,
    updatedAt: now,
  };
}

export class DexieVariableStore implements VariableStore {
  constructor(private readonly db: VariableDatabase = new VariableDatabase()) {}

  get(key: string): Promise<Variable | undefined> {
    return this.db.variables.get(key);
  }

  async has(key: string): Promise<boolean> {
    const matches = await this.db.variables.where('key').equals(key).count();
    return matches > 0;
  }

  async put(variable: Variable): Promise<void> {
    await this.db.variables.put(variable);
  }

  list(): Promise<Variable[]> {
    return this.db.variables.orderBy('key').toArray();
  }

  count(): Promise<number> {
    return this.db.variables.count();
  }

  delete(keys: readonly string[]): Promise<number> {
    return this.db.transaction('rw', this.db.variables, async () => {
      const existing = await this.db.variables.bulkGet([...new Set(keys)]);
      const present = existing.filter((variable): variable is Variable => variable !== undefined);
      await this.db.variables.bulkDelete(present.map((variable) => variable.key));
      return present.length;
    });
  }

  async clear(): Promise<void> {
    await this.db.variables.clear();
  }

  transaction<T>(scope: () => Promise<T>): Promise<T> {
    return this.db.transaction('rw', this.db.variables, scope);
  }
}
