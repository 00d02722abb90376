import { DEFAULT_CENTURY_PIVOT } from '../utils/dateParsing';
import { Gs1OptionsError } from './errors';
import { DEFAULT_SCORING_WEIGHTS } from './scoringRules';
import type { ParseOptions, ScoringWeights } from './types';

export type ParseOptionsInput = Partial<Omit<ParseOptions, 'scoringWeights'>> & {
  scoringWeights?: Partial<ScoringWeights>;
};

export const DEFAULT_PARSE_OPTIONS: ParseOptions = {
  strictMode: false,
  maxAlternatives: 5,
  centuryPivot: DEFAULT_CENTURY_PIVOT,
  normalizeSeparators: true,
  allowAmbiguous: true,
  beamWidth: 200,
  maxIterations: 20,
  vendorWhitelist: [],
  decodeAsciiTriplets: false,
  scoringWeights: DEFAULT_SCORING_WEIGHTS,
};

const BOOLEAN_OPTIONS = ['strictMode', 'normalizeSeparators', 'allowAmbiguous', 'decodeAsciiTriplets'] as const;

const INTEGER_OPTIONS = ['maxAlternatives', 'centuryPivot', 'beamWidth', 'maxIterations'] as const;

/** Inclusive bounds for integer options */
const INTEGER_BOUNDS: Record<(typeof INTEGER_OPTIONS)[number], readonly [number, number]> = {
  maxAlternatives: [0, 50],
  centuryPivot: [0, 99],
  beamWidth: [1, 1000],
  maxIterations: [1, 50],
};

const WEIGHT_KEYS: ReadonlyArray<keyof ScoringWeights> = [
  'validGtin',
  'validExpiry',
  'unknownDayPenalty',
  'tailOrder',
  'embeddedExpiry',
  'fullOrder',
  'gtinThenExpiry',
  'batchLengthBonus',
  'serialLengthBonus',
  'absorbableInternalCode',
  'repeatedBatch',
  'repeatedSerial',
  'internalAfterBatchAndSerial',
  'longBatch',
  'shortSerial',
  'compactCompletion',
  'ambiguityGap',
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function checkInteger(field: (typeof INTEGER_OPTIONS)[number], value: number): number {
  const [min, max] = INTEGER_BOUNDS[field];
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Gs1OptionsError(field, 'OUT_OF_RANGE', `${field} must be an integer between ${min} and ${max}`);
  }
  return value;
}

function checkWhitelist(codes: readonly string[]): string[] {
  for (const code of codes) {
    if (!/^9\d$/.test(code)) {
      throw new Gs1OptionsError('vendorWhitelist', 'UNKNOWN_AI', `vendorWhitelist entry "${code}" is not an internal-use AI (90-99)`);
    }
  }
  return [...codes];
}

/** Merge overrides onto a base set of options, rejecting out-of-range values */
export function resolveOptions(input: ParseOptionsInput = {}, base: ParseOptions = DEFAULT_PARSE_OPTIONS): ParseOptions {
  const merged: ParseOptions = {
    ...base,
    ...input,
    scoringWeights: { ...base.scoringWeights, ...input.scoringWeights },
  };
  for (const field of INTEGER_OPTIONS) {
    checkInteger(field, merged[field]);
  }
  merged.vendorWhitelist = checkWhitelist(merged.vendorWhitelist);
  for (const key of WEIGHT_KEYS) {
    if (!Number.isFinite(merged.scoringWeights[key])) {
      throw new Gs1OptionsError(`scoringWeights.${key}`, 'INVALID_TYPE', `scoringWeights.${key} must be a finite number`);
    }
  }
  return merged;
}

/** Narrow untrusted JSON (request bodies, socket payloads) into option overrides */
export function parseOptionsInput(raw: unknown): ParseOptionsInput {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) throw new Gs1OptionsError('options', 'INVALID_TYPE', 'options must be an object');

  const input: ParseOptionsInput = {};
  for (const field of BOOLEAN_OPTIONS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') throw new Gs1OptionsError(field, 'INVALID_TYPE', `${field} must be a boolean`);
    input[field] = value;
  }
  for (const field of INTEGER_OPTIONS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value !== 'number') throw new Gs1OptionsError(field, 'INVALID_TYPE', `${field} must be a number`);
    input[field] = checkInteger(field, value);
  }

  const whitelist = raw.vendorWhitelist;
  if (whitelist !== undefined) {
    if (!Array.isArray(whitelist) || !whitelist.every((code): code is string => typeof code === 'string')) {
      throw new Gs1OptionsError('vendorWhitelist', 'INVALID_TYPE', 'vendorWhitelist must be an array of strings');
    }
    input.vendorWhitelist = checkWhitelist(whitelist);
  }

  const weights = raw.scoringWeights;
  if (weights !== undefined) {
    if (!isRecord(weights)) throw new Gs1OptionsError('scoringWeights', 'INVALID_TYPE', 'scoringWeights must be an object');
    const parsed: Partial<ScoringWeights> = {};
    for (const key of WEIGHT_KEYS) {
      const value = weights[key];
      if (value === undefined) continue;
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new Gs1OptionsError(`scoringWeights.${key}`, 'INVALID_TYPE', `scoringWeights.${key} must be a finite number`);
      }
      parsed[key] = value;
    }
    input.scoringWeights = parsed;
  }
  return input;
}

/** Search-cost options a caller may lower but never raise above the server setting */
const SERVER_CAPPED_OPTIONS = ['beamWidth', 'maxIterations'] as const;

/** Options for one request or socket message, layered on the server defaults */
export function resolveRequestOptions(raw: unknown, server: ParseOptions): ParseOptions {
  const input = parseOptionsInput(raw);
  for (const field of SERVER_CAPPED_OPTIONS) {
    const value = input[field];
    if (value !== undefined && value > server[field]) {
      throw new Gs1OptionsError(field, 'OUT_OF_RANGE', `${field} cannot exceed the server setting of ${server[field]}`);
    }
  }
  return resolveOptions(input, server);
}
