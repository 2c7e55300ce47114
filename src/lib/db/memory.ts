import type { Variable } from '@/types';
import type { VariableStore } from './variables';

/**
 * In-process store for hosts without IndexedDB.
 * Writes are applied immediately; `transaction` only sequences the scope.
 */
export class MemoryVariableStore implements VariableStore {
  private readonly variables = new Map<string, Variable>();

  constructor(initial: readonly Variable[] = []) {
    for (const variable of initial) {
      this.variables.set(variable.key, { ...variable });
    }
  }

  async get(key: string): Promise<Variable | undefined> {
    const variable = this.variables.get(key);
    return variable ? { ...variable } : undefined;
  }

  async has(key: string): Promise<boolean> {
    return this.variables.has(key);
  }

  async put(variable: Variable): Promise<void> {
    this.variables.set(variable.key, { ...variable });
  }

  async list(): Promise<Variable[]> {
    return [...this.variables.values()]
      .map((variable) => ({ ...variable }))
      .sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
  }

  async count(): Promise<number> {
    return this.variables.size;
  }

  async delete(keys: readonly string[]): Promise<number> {
    let deleted = 0;
    for (const key of keys) {
      if (this.variables.delete(key)) deleted++;
    }
    return deleted;
  }

  async clear(): Promise<void> {
    this.variables.clear();
  }

  transaction<T>(scope: () => Promise<T>): Promise<T> {
    return scope();
  }
}
