import { describe, it, expect } from 'vitest';
import { GS } from '../utils/barcodeNormalization';
import { parseGs1 } from './assembler';
import { getCatalog } from './catalog';
import { encodeElementString, toHumanReadable, type ElementInput } from './encoder';

const label: ElementInput[] = [
  { ai: '01', value: '06285096000842' },
  { ai: '17', value: '290131' },
  { ai: '10', value: 'ABC123' },
  { ai: '21', value: 'SN-77' },
];

describe('encodeElementString', () => {
  it('should separate only variable-length fields that are not last', () => {
    expect(encodeElementString(label, getCatalog())).toBe(`01062850960008421729013110ABC123${GS}21SN-77`);
  });

  it('should treat unknown AIs as variable length', () => {
    expect(encodeElementString([{ ai: '77', value: 'X' }, label[0]], getCatalog())).toBe(`77X${GS}0106285096000842`);
  });

  it('should decode back to the same pairs', () => {
    const encoded = encodeElementString([label[2], label[3], { ai: '91', value: 'INT-9' }], getCatalog());
    const result = parseGs1(encoded);
    expect(result.strategy).toBe('fast-path');
    expect(result.elements.map((e) => ({ ai: e.ai, value: e.raw }))).toEqual([
      label[2],
      label[3],
      { ai: '91', value: 'INT-9' },
    ]);
  });

  it('should not round-trip a final value that hides an AI', () => {
    const encoded = encodeElementString(
      [
        { ai: '10', value: 'ABC' },
        { ai: '21', value: 'A1729013110X' },
      ],
      getCatalog()
    );
    expect(encoded).toBe(`10ABC${GS}21A1729013110X`);
    // Nothing terminates the last field, so the solver splits it
    expect(parseGs1(encoded).elements.map((e) => [e.ai, e.raw])).toEqual([
      ['10', 'ABC'],
      ['21', 'A17290131'],
      ['10', 'X'],
    ]);
  });
});

describe('toHumanReadable', () => {
  it('should wrap each AI in parentheses', () => {
    expect(toHumanReadable(label.slice(0, 2))).toBe('(01)06285096000842(17)290131');
  });
});
