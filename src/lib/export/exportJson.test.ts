import { describe, it, expect } from 'vitest';
import { MemoryVariableStore } from '@/lib/db/memory';
import { exportToEntries, exportToString, exportVariables, generateExportFilename } from './exportJson';

describe('exportVariables', () => {
  const store = new MemoryVariableStore([
    { key: 'b', value: '2', isEncrypted: true, createdAt: 1, updatedAt: 1 },
    { key: 'a', value: '1', isEncrypted: false, createdAt: 1, updatedAt: 1 },
  ]);

  it('exports a key to value mapping with stats', async () => {
    const data = await exportVariables(store, 'unit-test');

    expect(data.version).toBe(1);
    expect(data.source).toBe('unit-test');
    expect(data.stats).toEqual({ totalVariables: 2, encryptedCount: 1 });
    expect(data.variables).toEqual({ a: '1', b: '2' });
    expect(Object.keys(data.variables)).toEqual(['a', 'b']);
  });

  it('round-trips into import entries', async () => {
    const data = await exportVariables(store);

    expect(exportToEntries(data)).toEqual([
      { key: 'a', value: '1', isEncryptedHint: false },
      { key: 'b', value: '2', isEncryptedHint: false },
    ]);
  });

  it('serializes with two-space indentation', async () => {
    const data = await exportVariables(new MemoryVariableStore());
    const text = exportToString(data);

    expect(JSON.parse(text)).toEqual(data);
    expect(text.split('\n')[1]).toBe('  "version": 1,');
  });
});

describe('generateExportFilename', () => {
  it('uses the ISO date', () => {
    expect(generateExportFilename(new Date('2024-03-05T12:00:00Z'))).toBe(
      'variables-export-2024-03-05.json'
    );
  });
});
