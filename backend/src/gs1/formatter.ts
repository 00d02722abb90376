import type { ParsedElement, ParseResult } from './types';

export const FRIENDLY_FIELD_NAMES: Record<string, string> = {
  '00': 'SSCC',
  '01': 'GTIN Code',
  '02': 'Contained GTIN',
  '10': 'Batch/Lot Number',
  '11': 'Production Date',
  '13': 'Packaging Date',
  '15': 'Best Before Date',
  '16': 'Sell By Date',
  '17': 'Expiry Date',
  '21': 'Serial Number',
  '30': 'Variable Count',
  '37': 'Count of Trade Items',
};

export interface FieldMapOptions {
  includeConfidence?: boolean;
  includeRaw?: boolean;
}

export type FieldValue = string | number | boolean;

export interface FieldMap {
  [field: string]: FieldValue | Record<string, string>;
}

export function friendlyFieldName(element: Pick<ParsedElement, 'ai' | 'title'>): string {
  const known = FRIENDLY_FIELD_NAMES[element.ai];
  if (known) return known;
  if (/^9\d$/.test(element.ai)) return `Internal Company Code ${Number(element.ai[1]) + 1}`;
  return element.title;
}

const fieldValue = (element: ParsedElement): FieldValue => {
  if (element.meta.displayDate && element.valid) return element.meta.displayDate;
  return element.value;
};

/**
 * Flatten a parse result into a `{ "GTIN Code": ..., "Expiry Date": "30/04/2028" }`
 * object. A repeated AI keeps its first value.
 */
export function toFieldMap(result: ParseResult, options: FieldMapOptions = {}): FieldMap {
  const fields: FieldMap = {};
  const raw: Record<string, string> = {};

  for (const element of result.elements) {
    const name = friendlyFieldName(element);
    if (name in fields) continue;
    fields[name] = fieldValue(element);
    raw[name] = element.raw;
  }

  if (options.includeConfidence) {
    fields['Confidence'] = Math.round(result.confidence * 10000) / 100;
  }
  if (options.includeRaw) {
    fields['raw'] = raw;
  }
  return fields;
}
