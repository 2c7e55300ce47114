export type I18nParams = Record<string, string>;

export type PluralCategory = 'zero' | 'one' | 'other';

export const PLURAL_CATEGORIES: readonly PluralCategory[] = ['zero', 'one', 'other'];

export const PLURAL_SUFFIXES: Record<PluralCategory, string> = {
  zero: '_zero',
  one: '_one',
  other: '_other',
};

export interface PluralForms {
  zero?: string;
  one: string;
  other: string;
}

export type MessageTemplate =
  | { kind: 'plain'; text: string; placeholders: ReadonlySet<string> }
  | { kind: 'plural'; forms: Readonly<PluralForms>; placeholders: ReadonlySet<string> };

/**
 * Nested locale bundle as stored on disk: leaves are strings, plural
 * variants are sibling keys ending in `_zero`, `_one` and `_other`
 */
export interface LocaleBundle {
  [key: string]: string | LocaleBundle;
}

export interface MessageCatalog {
  /** Look up a template by its full dotted key */
  get(fullKey: string): MessageTemplate | undefined;
  readonly size: number;
  keys(): string[];
}
