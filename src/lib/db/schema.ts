import Dexie, { type DexieOptions, type Table } from 'dexie';
import type { Variable } from '@/types';

export const DEFAULT_DATABASE_NAME = 'varport';

export class VariableDatabase extends Dexie {
  variables!: Table<Variable, string>;

  /**
   * @param options - Dexie options; in Node pass an IndexedDB implementation
   *   (`indexedDB` and `IDBKeyRange`) since there is no global one
   */
  constructor(name: string = DEFAULT_DATABASE_NAME, options?: DexieOptions) {
    super(name, options);

    // Version 1: variables keyed by their key string
    this.version(1).stores({
      variables: 'key, updatedAt',
    });
  }
}
