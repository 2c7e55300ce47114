import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_SETTINGS } from '@/types';
import { getSettings } from './settings';

describe('getSettings', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns defaults for an empty environment', () => {
    expect(getSettings({})).toEqual(DEFAULT_SETTINGS);
  });

  it('is lenient about messages in production', () => {
    expect(getSettings({ NODE_ENV: 'production' }).strictMessages).toBe(false);
  });

  it('lets VARPORT_STRICT_MESSAGES override NODE_ENV', () => {
    expect(
      getSettings({ NODE_ENV: 'production', VARPORT_STRICT_MESSAGES: 'true' }).strictMessages
    ).toBe(true);
    expect(getSettings({ VARPORT_STRICT_MESSAGES: '0' }).strictMessages).toBe(false);
  });

  it('reads the conflict policy and value requirement', () => {
    expect(
      getSettings({ VARPORT_CONFLICT_POLICY: 'overwrite', VARPORT_REQUIRE_VALUE: 'false' })
    ).toEqual({ strictMessages: true, defaultConflictPolicy: 'overwrite', requireValue: false });
  });

  it('ignores and warns about invalid values', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const settings = getSettings({ VARPORT_CONFLICT_POLICY: 'merge', VARPORT_REQUIRE_VALUE: 'maybe' });

    expect(settings).toEqual(DEFAULT_SETTINGS);
    expect(warn).toHaveBeenCalledWith(
      '[settings] Ignoring VARPORT_CONFLICT_POLICY="merge": expected fail, overwrite or skip'
    );
    expect(warn).toHaveBeenCalledWith(
      '[settings] Ignoring VARPORT_REQUIRE_VALUE="maybe": expected true or false'
    );
  });
});
