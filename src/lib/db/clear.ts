import type { VariableStore } from './variables';

export interface DeleteResult {
  success: boolean;
  requested: number;
  deleted: number;
  error?: string;
}

/**
 * Delete the given keys. Keys that do not exist are ignored.
 */
export async function deleteVariables(
  store: VariableStore,
  keys: readonly string[]
): Promise<DeleteResult> {
  const requested = new Set(keys).size;

  try {
    const deleted = await store.delete(keys);
    return { success: true, requested, deleted };
  } catch (error) {
    return {
      success: false,
      requested,
      deleted: 0,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}

/**
 * Permanently delete every variable in the store
 */
export async function clearAllVariables(store: VariableStore): Promise<DeleteResult> {
  try {
    const count = await store.transaction(async () => {
      const total = await store.count();
      await store.clear();
      return total;
    });

    return { success: true, requested: count, deleted: count };
  } catch (error) {
    return {
      success: false,
      requested: 0,
      deleted: 0,
      error: error instanceof Error ? error.message : 'Unknown error',
    };
  }
}
