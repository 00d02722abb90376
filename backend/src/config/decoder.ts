import { DEFAULT_PARSE_OPTIONS, resolveOptions } from '../gs1/options';
import type { ParseOptions } from '../gs1/types';

const readInt = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    console.warn(`⚠️ Ignoring ${name}="${raw}" (expected an integer)`);
    return fallback;
  }
  return value;
};

const readBool = (name: string, fallback: boolean): boolean => {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return raw.trim().toLowerCase() === 'true';
};

const readList = (name: string): string[] =>
  (process.env[name] ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);

/**
 * Decoder defaults for this process, from GS1_* environment variables.
 * Read on every call so tests and reloaded .env files take effect.
 */
export const getDecoderDefaults = (): ParseOptions => {
  const d = DEFAULT_PARSE_OPTIONS;
  return resolveOptions({
    centuryPivot: readInt('GS1_CENTURY_PIVOT', d.centuryPivot),
    maxAlternatives: readInt('GS1_MAX_ALTERNATIVES', d.maxAlternatives),
    beamWidth: readInt('GS1_BEAM_WIDTH', d.beamWidth),
    maxIterations: readInt('GS1_MAX_ITERATIONS', d.maxIterations),
    strictMode: readBool('GS1_STRICT_MODE', d.strictMode),
    allowAmbiguous: readBool('GS1_ALLOW_AMBIGUOUS', d.allowAmbiguous),
    normalizeSeparators: readBool('GS1_NORMALIZE_SEPARATORS', d.normalizeSeparators),
    decodeAsciiTriplets: readBool('GS1_DECODE_ASCII_TRIPLETS', d.decodeAsciiTriplets),
    vendorWhitelist: readList('GS1_VENDOR_WHITELIST'),
  });
};

// Cache TTL for parse responses (seconds)
export const getParseCacheTtl = (): number => readInt('GS1_CACHE_TTL', 300);
