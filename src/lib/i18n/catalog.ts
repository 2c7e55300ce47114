import { CatalogFormatError } from '@/lib/errors';
import { PLURAL_CATEGORIES, PLURAL_SUFFIXES } from './types';
import type { MessageCatalog, MessageTemplate, PluralCategory, PluralForms } from './types';

export const PLACEHOLDER_PATTERN = /\{\{\s*([^{}\s]+)\s*\}\}/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function joinKey(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}

export function extractPlaceholders(...texts: string[]): ReadonlySet<string> {
  const names = new Set<string>();
  for (const text of texts) {
    for (const match of text.matchAll(PLACEHOLDER_PATTERN)) {
      names.add(match[1]);
    }
  }
  return names;
}

function splitPluralKey(key: string): { base: string; category: PluralCategory } | null {
  for (const category of PLURAL_CATEGORIES) {
    const suffix = PLURAL_SUFFIXES[category];
    if (key.length > suffix.length && key.endsWith(suffix)) {
      return { base: key.slice(0, -suffix.length), category };
    }
  }
  return null;
}

class FrozenMessageCatalog implements MessageCatalog {
  constructor(private readonly templates: ReadonlyMap<string, MessageTemplate>) {}

  get(fullKey: string): MessageTemplate | undefined {
    return this.templates.get(fullKey);
  }

  get size(): number {
    return this.templates.size;
  }

  keys(): string[] {
    return [...this.templates.keys()];
  }
}

/**
 * Flatten a nested locale bundle into an immutable catalog.
 * Throws CatalogFormatError on non-string leaves, incomplete plural
 * groups and keys defined twice.
 */
export function createMessageCatalog(bundle: unknown): MessageCatalog {
  if (!isRecord(bundle)) {
    throw new CatalogFormatError('', 'expected an object');
  }

  const templates = new Map<string, MessageTemplate>();

  const define = (fullKey: string, template: MessageTemplate): void => {
    if (templates.has(fullKey)) {
      throw new CatalogFormatError(fullKey, 'message defined more than once');
    }
    templates.set(fullKey, template);
  };

  const visit = (node: Record<string, unknown>, prefix: string): void => {
    const pluralGroups = new Map<string, Partial<Record<PluralCategory, string>>>();

    for (const [key, value] of Object.entries(node)) {
      const path = joinKey(prefix, key);

      if (isRecord(value)) {
        visit(value, path);
        continue;
      }

      if (typeof value !== 'string') {
        throw new CatalogFormatError(path, 'expected a string or an object');
      }

      const plural = splitPluralKey(key);
      if (!plural) {
        define(path, { kind: 'plain', text: value, placeholders: extractPlaceholders(value) });
        continue;
      }

      const group = pluralGroups.get(plural.base) ?? {};
      group[plural.category] = value;
      pluralGroups.set(plural.base, group);
    }

    for (const [base, group] of pluralGroups) {
      const path = joinKey(prefix, base);
      if (group.one === undefined || group.other === undefined) {
        throw new CatalogFormatError(path, 'plural messages need both _one and _other forms');
      }

      const forms: PluralForms = { one: group.one, other: group.other };
      if (group.zero !== undefined) forms.zero = group.zero;

      define(path, {
        kind: 'plural',
        forms: Object.freeze(forms),
        placeholders: extractPlaceholders(forms.one, forms.other, forms.zero ?? ''),
      });
    }
  };

  visit(bundle, '');
  return new FrozenMessageCatalog(templates);
}
