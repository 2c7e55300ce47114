import en from '@/locales/en.json';
import { getSettings } from '@/lib/settings';
import { createMessageCatalog } from './catalog';
import { MessageResolver } from './resolver';

// Built once at module load; read-only afterwards
export const defaultCatalog = createMessageCatalog(en);

export function createDefaultResolver(strict: boolean = getSettings().strictMessages): MessageResolver {
  return new MessageResolver(defaultCatalog, { strict });
}

export { createMessageCatalog, extractPlaceholders } from './catalog';
export { MessageResolver, messageKey, selectForm, type MessageResolverOptions } from './resolver';
export { describeImportReport, describeFailedEntries, describeImportFailure } from './importSummary';
export type {
  I18nParams,
  LocaleBundle,
  MessageCatalog,
  MessageTemplate,
  PluralCategory,
  PluralForms,
} from './types';
