import { describe, it, expect } from 'vitest';
import { GS } from '../utils/barcodeNormalization';
import { MAX_ELEMENT_STRING_LENGTH, normalizeInput, parseGs1 } from './assembler';
import { getCatalog } from './catalog';
import { Gs1OptionsError } from './errors';
import { DEFAULT_PARSE_OPTIONS } from './options';
import type { ParseResult } from './types';

const pairs = (result: ParseResult) => result.elements.map((e) => [e.ai, e.raw]);

const NO_VALID_PARSE = { code: 'INVALID_FORMAT', severity: 'error', message: 'No valid parse found' };

describe('parseGs1 without separators', () => {
  it('should decode a GTIN/expiry/batch/serial label', () => {
    const result = parseGs1('01062867400002491728043010GB2C2171490437969853');
    expect(result.strategy).toBe('no-separator');
    expect(result.separatorSeen).toBe(false);
    expect(pairs(result)).toEqual([
      ['01', '06286740000249'],
      ['17', '280430'],
      ['10', 'GB2C'],
      ['21', '71490437969853'],
    ]);
    expect(result.elements[1].value).toBe('2028-04-30');
    expect(result.confidence).toBe(0.8252);
    expect(result.diagnostics).toEqual([
      { code: 'MISSING_SEPARATOR', severity: 'warning', message: 'No separators present; field boundaries were inferred' },
    ]);
    expect(result.reasoning).toEqual([
      '+1000: Valid GTIN with correct check digit',
      '+250: Valid expiry date',
      '+15: Expiry immediately follows GTIN',
      '+20: Typical batch length (4)',
      '+120: Conventional field order (17,10,21)',
      '+30: Complete GS1 sequence (01,17,10,21)',
      '+15: Typical serial length (14)',
      '+10: Complete parse with few elements',
    ]);
  });

  it('should rank alternatives against the best score', () => {
    const result = parseGs1('01062867400002491728043010GB2C2171490437969853');
    expect(result.alternatives).toHaveLength(5);
    expect(result.alternatives[0].score).toBe(1225);
    expect(result.alternatives[0].confidence).toBe(0.839);
    expect(result.alternatives[0].elements.map((e) => e.raw)).toEqual([
      '06286740000249',
      '280430',
      'GB2C2171490437969853',
    ]);
  });

  it('should honour maxAlternatives', () => {
    expect(parseGs1('01062867400002491728043010GB2C2171490437969853', { maxAlternatives: 0 }).alternatives).toEqual([]);
  });

  it('should read a serial before expiry and batch', () => {
    const result = parseGs1('01062911037315552164SSI54CE688QZ1727021410C601');
    expect(pairs(result)).toEqual([
      ['01', '06291103731555'],
      ['21', '64SSI54CE688QZ'],
      ['17', '270214'],
      ['10', 'C601'],
    ]);
    expect(result.confidence).toBe(0.9132);
  });

  it('should not emit internal codes out of a long serial', () => {
    const result = parseGs1('010622300001036517270903103056442130564439945626');
    expect(result.elements.map((e) => e.ai)).toEqual(['01', '17', '10', '21']);
    expect(result.elements[3].raw).toBe('30564439945626');
  });

  it('should flag an expiry with an unspecified day', () => {
    const result = parseGs1('010625115902606717290400104562202106902409792902');
    expect(result.elements.map((e) => e.ai)).toEqual(['01', '17', '10', '21']);
    expect(result.elements[1].value).toBe('2029-04-30');
    expect(result.elements[1].meta.dayUnspecified).toBe(true);
    expect(result.elements[3].raw).toBe('06902409792902');
    expect(result.confidence).toBe(0.7685);
  });

  it('should apply the century pivot', () => {
    expect(parseGs1('010628509600084217500131').elements[1].value).toBe('2050-01-31');
    expect(parseGs1('010628509600084217500131', { centuryPivot: 40 }).elements[1].value).toBe('1950-01-31');
  });

  it('should fall back to the left-to-right reading for AIs outside the beam subset', () => {
    const decimal = parseGs1('3102001234');
    expect(decimal.strategy).toBe('fast-path');
    expect(decimal.elements[0]).toMatchObject({ ai: '3102', value: 12.34, valid: true });
    expect(decimal.elements[0].meta.decimalDisplay).toBe('12.34');
    expect(decimal.confidence).toBe(0.5);
    expect(decimal.diagnostics).toEqual([
      { code: 'MISSING_SEPARATOR', severity: 'warning', message: 'No separators present; field boundaries were inferred' },
    ]);
  });

  it('should return nothing when the leading GTIN fails its check digit', () => {
    for (const barcode of [
      '0106285096000841172901311012345',
      '01062867400002481728043010GB2C2171490437969853',
    ]) {
      const result = parseGs1(barcode);
      expect(result.strategy).toBe('no-separator');
      expect(result.elements).toEqual([]);
      expect(result.alternatives).toEqual([]);
      expect(result.confidence).toBe(0);
      expect(result.diagnostics.map((d) => d.code)).toEqual(['MISSING_SEPARATOR', 'INVALID_CHECK_DIGIT', 'INVALID_FORMAT']);
      expect(result.diagnostics[2]).toEqual(NO_VALID_PARSE);
    }
  });

  it('should stay bounded on long adversarial digit strings', () => {
    const text = '9'.repeat(300);
    const result = parseGs1(text);
    expect(result.strategy).toBe('solver');
    expect(result.elements[result.elements.length - 1].end).toBe(300);

    const label = `010628509600084210${'2110'.repeat(71)}`;
    const labelResult = parseGs1(label);
    expect(labelResult.elements[0].ai).toBe('01');
    expect(labelResult.elements[labelResult.elements.length - 1].end).toBe(label.length);
    expect(labelResult.confidence).toBeLessThanOrEqual(0.5);
  }, 30000);

  it('should refuse element strings over the length limit', () => {
    const result = parseGs1('9'.repeat(MAX_ELEMENT_STRING_LENGTH + 1));
    expect(result.strategy).toBeNull();
    expect(result.elements).toEqual([]);
    expect(result.confidence).toBe(0);
    expect(result.diagnostics).toEqual([
      { code: 'INVALID_LENGTH', severity: 'error', message: 'Element string has 513 characters; at most 512 are decoded' },
      NO_VALID_PARSE,
    ]);
  });
});

describe('parseGs1 with separators', () => {
  const label = `01062850960008421729013110ABC123${GS}21SN-77`;

  it('should take the fast path', () => {
    const result = parseGs1(label);
    expect(result.strategy).toBe('fast-path');
    expect(result.separatorSeen).toBe(true);
    expect(result.confidence).toBe(1);
    expect(result.diagnostics).toEqual([]);
    expect(result.elements.map((e) => e.value)).toEqual(['06285096000842', '2029-01-31', 'ABC123', 'SN-77']);
  });

  it('should report an unknown AI and carry on', () => {
    const result = parseGs1(`0106285096000842${GS}77ABC${GS}10LOT1`);
    expect(pairs(result)).toEqual([
      ['01', '06285096000842'],
      ['10', 'LOT1'],
    ]);
    expect(result.diagnostics.map((d) => d.code)).toEqual(['EXTRA_SEPARATOR', 'UNKNOWN_AI']);
    expect(result.confidence).toBe(0.85);
  });

  it('should lift element errors into diagnostics', () => {
    const result = parseGs1('0106285096');
    expect(result.strategy).toBe('fast-path');
    expect(result.elements[0].valid).toBe(false);
    expect(result.diagnostics.map((d) => d.code)).toEqual([
      'MISSING_SEPARATOR',
      'TRUNCATED_DATA',
      'INVALID_LENGTH',
      'INVALID_CHECK_DIGIT',
    ]);
    expect(result.diagnostics[2].message).toBe('AI(01): Length must be 14, got 8');
    expect(result.confidence).toBe(0.5);
  });

  it('should resolve a missing separator with the solver', () => {
    const result = parseGs1(`0106285096000842${GS}10ABC2112345`);
    expect(result.strategy).toBe('solver');
    expect(pairs(result)).toEqual([
      ['01', '06285096000842'],
      ['10', 'ABC'],
      ['21', '12345'],
    ]);
    expect(result.confidence).toBe(1);
    expect(result.reasoning).toEqual(['Guessed boundary for AI(10)']);
    expect(result.diagnostics).toEqual([
      { code: 'MISSING_SEPARATOR', severity: 'warning', message: 'Guessed boundary for AI(10)' },
      { code: 'AMBIGUOUS_PARSE', severity: 'warning', message: '2 complete readings found; best chosen by score' },
    ]);
    expect(result.alternatives).toHaveLength(1);
    expect(result.alternatives[0]).toMatchObject({ score: 0.935, confidence: 0.935, reasoning: [] });
  });

  it('should keep the left-to-right reading when ambiguity is not allowed', () => {
    const result = parseGs1(`0106285096000842${GS}10ABC2112345`, { allowAmbiguous: false });
    expect(result.strategy).toBe('fast-path');
    expect(pairs(result)).toEqual([
      ['01', '06285096000842'],
      ['10', 'ABC2112345'],
    ]);
    expect(result.confidence).toBe(0.5);
    expect(result.diagnostics.map((d) => d.code)).toEqual(['MISSING_SEPARATOR', 'AMBIGUOUS_PARSE']);
  });

  it('should skip the beam when ambiguity is not allowed', () => {
    const result = parseGs1('01062867400002491728043010GB2C2171490437969853', { allowAmbiguous: false });
    expect(result.strategy).toBe('fast-path');
    expect(result.elements[2].raw).toBe('GB2C2171490437969853');
    expect(result.confidence).toBe(0.5);
  });
});

describe('parseGs1 strict mode', () => {
  it('should return nothing when any element is invalid', () => {
    const result = parseGs1('0106285096', { strictMode: true });
    expect(result.elements).toEqual([]);
    expect(result.confidence).toBe(0);
    expect(result.diagnostics[result.diagnostics.length - 1]).toEqual(NO_VALID_PARSE);
  });

  it('should still decode clean input', () => {
    expect(parseGs1('01062867400002491728043010GB2C2171490437969853', { strictMode: true }).elements).toHaveLength(4);
  });
});

describe('parseGs1 input handling', () => {
  it('should report empty input without throwing', () => {
    for (const input of ['', '   ', null, undefined, `${GS}${GS}`]) {
      const result = parseGs1(input);
      expect(result.strategy).toBeNull();
      expect(result.elements).toEqual([]);
      expect(result.confidence).toBe(0);
      expect(result.diagnostics).toEqual([NO_VALID_PARSE]);
    }
  });

  it('should accept the printed human-readable form', () => {
    const result = parseGs1('(01)06285096000842(17)290131(10)ABC123(21)SN-77');
    expect(result.normalized).toBe(`01062850960008421729013110ABC123${GS}21SN-77`);
    expect(result.strategy).toBe('fast-path');
    expect(result.elements).toHaveLength(4);
  });

  it('should strip and report the symbology identifier', () => {
    const result = parseGs1(`]d201062850960008421729013110ABC123${GS}21SN-77`);
    expect(result.symbology).toEqual({ identifier: ']d2', name: 'GS1 DataMatrix' });
    expect(result.raw.startsWith(']d2')).toBe(true);
    expect(result.elements).toHaveLength(4);
  });

  it('should map separator stand-ins unless told not to', () => {
    expect(parseGs1('10ABC123|21SN-77').normalized).toBe(`10ABC123${GS}21SN-77`);

    const literal = parseGs1('0106285096000842|10ABC', { normalizeSeparators: false });
    expect(literal.elements.map((e) => e.ai)).toEqual(['01']);
    expect(literal.diagnostics.map((d) => d.code)).toEqual(['MISSING_SEPARATOR', 'UNKNOWN_AI']);
    expect(literal.confidence).toBe(0.5);
  });

  it('should decode ASCII triplets when enabled', () => {
    const triplets = [...'0106285096000842'].map((ch) => String(ch.charCodeAt(0)).padStart(3, '0')).join('');
    const result = parseGs1(triplets, { decodeAsciiTriplets: true });
    expect(result.normalized).toBe('0106285096000842');
    expect(result.confidence).toBe(0.95);
  });

  it('should drop a leading FNC1 separator', () => {
    const { text } = normalizeInput(`${GS}0106285096000842`, DEFAULT_PARSE_OPTIONS, getCatalog());
    expect(text).toBe('0106285096000842');
  });

  it('should throw on invalid options', () => {
    expect(() => parseGs1('0106285096000842', { maxAlternatives: -1 })).toThrow(Gs1OptionsError);
  });
});
