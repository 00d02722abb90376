import { afterEach, describe, it, expect, vi } from 'vitest';
import { Gs1OptionsError } from '../gs1/errors';
import { DEFAULT_PARSE_OPTIONS } from '../gs1/options';
import { getDecoderDefaults, getParseCacheTtl } from './decoder';

describe('getDecoderDefaults', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('should use the built-in defaults without GS1_* variables', () => {
    expect(getDecoderDefaults()).toEqual(DEFAULT_PARSE_OPTIONS);
  });

  it('should read settings from the environment', () => {
    vi.stubEnv('GS1_STRICT_MODE', 'TRUE');
    vi.stubEnv('GS1_CENTURY_PIVOT', '40');
    vi.stubEnv('GS1_ALLOW_AMBIGUOUS', 'false');
    vi.stubEnv('GS1_VENDOR_WHITELIST', ' 91, 92 ,');
    expect(getDecoderDefaults()).toMatchObject({
      strictMode: true,
      centuryPivot: 40,
      allowAmbiguous: false,
      vendorWhitelist: ['91', '92'],
    });
  });

  it('should warn and fall back on a malformed integer', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.stubEnv('GS1_BEAM_WIDTH', 'wide');
    expect(getDecoderDefaults().beamWidth).toBe(200);
    expect(warn).toHaveBeenCalledWith('⚠️ Ignoring GS1_BEAM_WIDTH="wide" (expected an integer)');
  });

  it('should reject values out of range', () => {
    vi.stubEnv('GS1_MAX_ALTERNATIVES', '100');
    expect(() => getDecoderDefaults()).toThrow(Gs1OptionsError);
  });
});

describe('getParseCacheTtl', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should default to five minutes', () => {
    expect(getParseCacheTtl()).toBe(300);
  });

  it('should read GS1_CACHE_TTL', () => {
    vi.stubEnv('GS1_CACHE_TTL', '60');
    expect(getParseCacheTtl()).toBe(60);
  });
});
