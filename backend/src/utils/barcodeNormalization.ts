/**
 * Barcode normalization utilities
 *
 * Scanners deliver GS1 element strings in several shapes:
 * - prefixed with an ISO/IEC 15424 symbology identifier ("]d2", "]C1", ...)
 * - with the FNC1 separator (GS, 0x1D) replaced by a printable stand-in
 * - ASCII-triplet encoded by some wired scanners, e.g. "048049..." => "01..."
 *
 * We canonicalize these into one element string with GS as the only separator.
 */
import type { SymbologyInfo } from '../gs1/types';

export const GS = '\x1d';

/** Printable stand-ins for GS, longest first so "<GS>" wins over single chars */
export const SEPARATOR_STAND_INS = ['<GS>', '[GS]', '{GS}', '~', '|', '^'] as const;

export const SYMBOLOGY_IDENTIFIERS: Record<string, string> = {
  ']d2': 'GS1 DataMatrix',
  ']C1': 'GS1-128',
  ']e0': 'GS1 DataBar',
  ']e1': 'GS1 DataBar Limited',
  ']e2': 'GS1 DataBar Expanded',
  ']Q3': 'GS1 QR Code',
};

const stripUnsafeControlChars = (s: string) => {
  // Keep tab/newline/carriage return and the GS separator; remove other control chars.
  return s.replace(/[\x00-\x08\x0B\x0C\x0E-\x1C\x1E\x1F\x7F]/g, '');
};

const isLikelyAsciiTriplets = (s: string) => {
  const trimmed = s.trim();
  if (trimmed.length < 6) return false;
  if (trimmed.length % 3 !== 0) return false;
  if (!/^\d+$/.test(trimmed)) return false;
  return true;
};

export const decodeAsciiTriplets = (input: string): string | null => {
  const s = input.trim();
  if (!isLikelyAsciiTriplets(s)) return null;

  const bytes: number[] = [];
  for (let i = 0; i < s.length; i += 3) {
    const code = Number(s.slice(i, i + 3));
    if (!Number.isFinite(code) || code < 0 || code > 255) return null;
    bytes.push(code);
  }

  const decoded = String.fromCharCode(...bytes);

  // Heuristic: require most chars to be printable ASCII or GS.
  const printable = decoded.match(/[\x09\x0A\x0D\x1D\x20-\x7E]/g)?.length ?? 0;
  const ratio = decoded.length > 0 ? printable / decoded.length : 0;
  if (ratio < 0.85) return null;

  return decoded;
};

export const canonicalizeBarcode = (input: unknown, opts?: { decodeTriplets?: boolean }): string => {
  const s = stripUnsafeControlChars(String(input ?? '')).replace(/\r\n/g, '\n');
  if (opts?.decodeTriplets) {
    const decoded = decodeAsciiTriplets(s);
    if (decoded !== null) return stripUnsafeControlChars(decoded);
  }
  return s;
};

export interface SymbologySplit {
  symbology: SymbologyInfo | null;
  body: string;
}

export const stripSymbologyIdentifier = (input: string): SymbologySplit => {
  const identifier = input.slice(0, 3);
  const name = SYMBOLOGY_IDENTIFIERS[identifier];
  if (!name) return { symbology: null, body: input };
  return { symbology: { identifier, name }, body: input.slice(3) };
};

export const normalizeSeparators = (input: string): string => {
  let out = input;
  for (const standIn of SEPARATOR_STAND_INS) {
    out = out.split(standIn).join(GS);
  }
  return out;
};

/** "(01)0628...(17)290131" style, as printed under the barcode */
export const isHumanReadable = (input: string): boolean => /^\(\d{2,4}\)/.test(input);

export const splitHumanReadable = (input: string): Array<{ ai: string; value: string }> => {
  const pairs: Array<{ ai: string; value: string }> = [];
  for (const match of input.matchAll(/\((\d{2,4})\)([^()]*)/g)) {
    pairs.push({ ai: match[1], value: match[2].trim() });
  }
  return pairs;
};
