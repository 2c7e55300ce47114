import { afterEach, describe, expect, it, vi } from 'vitest';
import { MissingParameterError, MissingTranslationError } from '@/lib/errors';
import { createMessageCatalog } from './catalog';
import { MessageResolver, messageKey } from './resolver';

const catalog = createMessageCatalog({
  variables: {
    delete: {
      deleteVariable_one: 'Delete 1 Variable',
      deleteVariable_other: 'Delete {{count}} Variables',
      deleted_zero: 'No variables deleted',
      deleted_one: '1 variable deleted',
      deleted_other: '{{count}} variables deleted',
    },
    title: 'Variables',
  },
  common: {
    validation: {
      maxLength: '{{field}} must be at most {{ max }} characters',
    },
  },
});

describe('MessageResolver', () => {
  const resolver = new MessageResolver(catalog, { strict: true });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the one form for a count of 1', () => {
    expect(resolver.resolve('variables.delete', 'deleteVariable', 1)).toBe('Delete 1 Variable');
  });

  it('substitutes the count into the other form', () => {
    expect(resolver.resolve('variables.delete', 'deleteVariable', 3, { count: '3' })).toBe(
      'Delete 3 Variables'
    );
  });

  it('uses the other form for zero when no zero form exists', () => {
    expect(resolver.resolve('variables.delete', 'deleteVariable', 0, { count: '0' })).toBe(
      'Delete 0 Variables'
    );
  });

  it('uses the zero form when one exists', () => {
    expect(resolver.resolve('variables.delete', 'deleted', 0)).toBe('No variables deleted');
  });

  it('falls back to other for absent, negative and fractional counts', () => {
    const params = { count: 'n' };
    expect(resolver.resolve('variables.delete', 'deleted', undefined, params)).toBe('n variables deleted');
    expect(resolver.resolve('variables.delete', 'deleted', -1, params)).toBe('n variables deleted');
    expect(resolver.resolve('variables.delete', 'deleted', 1.5, params)).toBe('n variables deleted');
  });

  it('ignores the count for plain messages', () => {
    expect(resolver.resolve('variables', 'title', 5)).toBe('Variables');
  });

  it('accepts the namespace split at any level', () => {
    expect(resolver.resolve('variables', 'delete.deleteVariable', 1)).toBe('Delete 1 Variable');
    expect(resolver.resolve('', 'variables.title')).toBe('Variables');
  });

  it('substitutes named parameters', () => {
    expect(
      resolver.resolve('common.validation', 'maxLength', undefined, { field: 'Key', max: '250' })
    ).toBe('Key must be at most 250 characters');
  });

  it('substitutes parameter names containing dashes and dots', () => {
    const dotted = new MessageResolver(
      createMessageCatalog({ connections: { missing: 'No connection {{conn-id}} for {{item.key}}' } }),
      { strict: true }
    );

    expect(
      dotted.resolve('connections', 'missing', undefined, { 'conn-id': 'pg', 'item.key': 'db_url' })
    ).toBe('No connection pg for db_url');
    expect(() => dotted.resolve('connections', 'missing', undefined, { 'conn-id': 'pg' })).toThrow(
      'Missing parameter "item.key" for message "connections.missing"'
    );
  });

  it('throws MissingParameterError instead of leaving a placeholder', () => {
    expect(() => resolver.resolve('variables.delete', 'deleteVariable', 3, {})).toThrow(
      MissingParameterError
    );
    expect(() => resolver.resolve('variables.delete', 'deleteVariable', 3)).toThrow(
      'Missing parameter "count" for message "variables.delete.deleteVariable"'
    );
  });

  it('reports whether a message exists', () => {
    expect(resolver.has('variables', 'title')).toBe(true);
    expect(resolver.has('variables', 'nope')).toBe(false);
  });

  describe('missing translations', () => {
    it('throws in strict mode', () => {
      expect(() => resolver.resolve('variables', 'nope')).toThrow(MissingTranslationError);
    });

    it('returns the raw key and warns once in lenient mode', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const lenient = new MessageResolver(catalog, { strict: false });

      expect(lenient.resolve('variables', 'nope')).toBe('variables.nope');
      expect(lenient.resolve('variables', 'nope', 2)).toBe('variables.nope');
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn).toHaveBeenCalledWith('[i18n] Missing translation key "variables.nope"');
    });
  });
});

describe('messageKey', () => {
  it('joins namespace and key with a dot', () => {
    expect(messageKey('variables.import', 'title')).toBe('variables.import.title');
    expect(messageKey('', 'title')).toBe('title');
  });
});
