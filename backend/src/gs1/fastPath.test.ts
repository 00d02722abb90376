import { describe, it, expect } from 'vitest';
import { GS } from '../utils/barcodeNormalization';
import { getCatalog } from './catalog';
import { scanFastPath } from './fastPath';

const scan = (text: string) => scanFastPath(text, getCatalog(), { centuryPivot: 51, separatorSeen: text.includes(GS) });

const pairs = (text: string) => scan(text).elements.map((e) => [e.ai, e.raw]);

describe('scanFastPath', () => {
  it('should read fixed fields back to back and stop variable fields at GS', () => {
    const outcome = scan(`01062850960008421729013110ABC123${GS}21SN-77`);
    expect(outcome.diagnostics).toEqual([]);
    expect(outcome.needsSolver).toBe(false);
    expect(outcome.elements.map((e) => [e.ai, e.raw, e.start, e.end])).toEqual([
      ['01', '06285096000842', 0, 16],
      ['17', '290131', 16, 24],
      ['10', 'ABC123', 24, 32],
      ['21', 'SN-77', 33, 40],
    ]);
    expect(outcome.elements[1].value).toBe('2029-01-31');
  });

  it('should warn about consecutive separators', () => {
    const outcome = scan(`10ABC${GS}${GS}21X`);
    expect(outcome.diagnostics).toEqual([
      { code: 'EXTRA_SEPARATOR', severity: 'warning', message: 'Consecutive separators at position 6', index: 6 },
    ]);
    expect(pairs(`10ABC${GS}${GS}21X`)).toEqual([['10', 'ABC'], ['21', 'X']]);
  });

  it('should warn about a trailing separator after a fixed field', () => {
    expect(scan(`0106285096000842${GS}`).diagnostics).toEqual([
      {
        code: 'EXTRA_SEPARATOR',
        severity: 'warning',
        message: 'Separator after fixed-length AI(01) is not followed by an AI',
        index: 16,
        ai: '01',
      },
    ]);
  });

  it('should accept a separator after a fixed field when an AI follows', () => {
    expect(scan(`0106285096000842${GS}10ABC`).diagnostics).toEqual([]);
  });

  it('should skip to the next separator after an unknown AI', () => {
    const outcome = scan(`0106285096000842${GS}77ABC${GS}10LOT1`);
    expect(outcome.diagnostics.map((d) => [d.code, d.severity, d.index])).toEqual([
      ['EXTRA_SEPARATOR', 'warning', 16],
      ['UNKNOWN_AI', 'error', 17],
    ]);
    expect(outcome.diagnostics[1].message).toBe('Unknown AI at position 17: "77AB"');
    expect(pairs(`0106285096000842${GS}77ABC${GS}10LOT1`)).toEqual([
      ['01', '06285096000842'],
      ['10', 'LOT1'],
    ]);
  });

  it('should report a fixed field cut short by a separator', () => {
    const outcome = scan(`0106285096${GS}10ABC`);
    expect(outcome.diagnostics).toEqual([
      {
        code: 'TRUNCATED_DATA',
        severity: 'error',
        message: 'AI(01) expects 14 characters, found 8',
        index: 0,
        ai: '01',
      },
    ]);
    expect(pairs(`0106285096${GS}10ABC`)).toEqual([['01', '06285096'], ['10', 'ABC']]);
    expect(outcome.elements[0].valid).toBe(false);
  });

  it('should hand an unterminated field hiding an AI to the solver', () => {
    const silent = scanFastPath('10ABC2112345', getCatalog(), { centuryPivot: 51, separatorSeen: false });
    expect(silent.needsSolver).toBe(true);
    expect(silent.diagnostics).toEqual([]);
    expect(silent.elements.map((e) => e.raw)).toEqual(['ABC2112345']);

    const warned = scanFastPath('10ABC2112345', getCatalog(), { centuryPivot: 51, separatorSeen: true });
    expect(warned.diagnostics).toEqual([
      {
        code: 'MISSING_SEPARATOR',
        severity: 'warning',
        message: 'AI(10) may run into another AI at position 5',
        index: 5,
        ai: '10',
      },
    ]);
  });

  it('should not escalate when no AI fits inside the tail', () => {
    expect(scan(`0106285096000842${GS}10ABC`).needsSolver).toBe(false);
  });
});
