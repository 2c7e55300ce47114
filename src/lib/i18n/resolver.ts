import { MissingParameterError, MissingTranslationError } from '@/lib/errors';
import { PLACEHOLDER_PATTERN } from './catalog';
import type { I18nParams, MessageCatalog, MessageTemplate } from './types';

export interface MessageResolverOptions {
  /** Throw on unknown keys instead of falling back to the key itself */
  strict: boolean;
}

export function messageKey(namespace: string, key: string): string {
  return namespace ? `${namespace}.${key}` : key;
}

/**
 * Pick the template text for a count. Only zero/one/other are supported;
 * anything that is not exactly 0 or 1 uses `other`.
 */
export function selectForm(template: MessageTemplate, count?: number): string {
  if (template.kind === 'plain') return template.text;

  const { forms } = template;
  if (count === 0 && forms.zero !== undefined) return forms.zero;
  if (count === 1) return forms.one;
  return forms.other;
}

function interpolate(text: string, fullKey: string, params?: I18nParams): string {
  return text.replace(PLACEHOLDER_PATTERN, (_, name: string) => {
    const value = params && Object.hasOwn(params, name) ? params[name] : undefined;
    if (value === undefined) {
      throw new MissingParameterError(name, fullKey);
    }
    return value;
  });
}

export class MessageResolver {
  private readonly missingKeyWarnings = new Set<string>();

  constructor(
    private readonly catalog: MessageCatalog,
    private readonly options: MessageResolverOptions
  ) {}

  has(namespace: string, key: string): boolean {
    return this.catalog.get(messageKey(namespace, key)) !== undefined;
  }

  resolve(namespace: string, key: string, count?: number, params?: I18nParams): string {
    const fullKey = messageKey(namespace, key);
    const template = this.catalog.get(fullKey);

    if (!template) {
      if (this.options.strict) {
        throw new MissingTranslationError(fullKey);
      }
      this.warnMissingKeyOnce(fullKey);
      return fullKey;
    }

    return interpolate(selectForm(template, count), fullKey, params);
  }

  private warnMissingKeyOnce(fullKey: string): void {
    if (this.missingKeyWarnings.has(fullKey)) return;
    this.missingKeyWarnings.add(fullKey);
    console.warn(`[i18n] Missing translation key "${fullKey}"`);
  }
}
