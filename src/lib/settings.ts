import type { Settings } from '@/types';
import { DEFAULT_SETTINGS, isConflictPolicy } from '@/types';

type Env = Record<string, string | undefined>;

function parseBoolean(name: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw === '') return undefined;

  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;

  console.warn(`[settings] Ignoring ${name}="${raw}": expected true or false`);
  return undefined;
}

/**
 * Get all settings, merging environment overrides over the defaults
 */
export function getSettings(env: Env = process.env): Settings {
  const settings: Settings = { ...DEFAULT_SETTINGS };

  // Lenient message lookup in production unless explicitly configured
  const strict = parseBoolean('VARPORT_STRICT_MESSAGES', env.VARPORT_STRICT_MESSAGES);
  settings.strictMessages = strict ?? env.NODE_ENV !== 'production';

  const policy = env.VARPORT_CONFLICT_POLICY;
  if (policy !== undefined && policy !== '') {
    if (isConflictPolicy(policy)) {
      settings.defaultConflictPolicy = policy;
    } else {
      console.warn(`[settings] Ignoring VARPORT_CONFLICT_POLICY="${policy}": expected fail, overwrite or skip`);
    }
  }

  const requireValue = parseBoolean('VARPORT_REQUIRE_VALUE', env.VARPORT_REQUIRE_VALUE);
  if (requireValue !== undefined) {
    settings.requireValue = requireValue;
  }

  return settings;
}
