import {
  DEFAULT_CENTURY_PIVOT,
  decodeGs1Date,
  toDisplayDate,
  toIsoDateOnly,
  toIsoDateTime,
} from '../utils/dateParsing';
import type {
  AIComponent,
  AIDefinition,
  ComponentCharset,
  DateFormat,
  ElementError,
  ElementMeta,
} from './types';

export interface ValidationResult {
  valid: boolean;
  errors: ElementError[];
  meta: ElementMeta;
}

/** GS1 AI encodable character set 82 */
export const CSET82 = new Set(
  '!"%&\'()*+,-./0123456789:;<=>?ABCDEFGHIJKLMNOPQRSTUVWXYZ_abcdefghijklmnopqrstuvwxyz'
);

/** GS1 AI encodable character set 39 */
export const CSET39 = new Set('#-/0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ');

const isDigits = (s: string) => /^\d+$/.test(s);

const ok = (meta: ElementMeta = {}): ValidationResult => ({ valid: true, errors: [], meta });

const fail = (code: ElementError['code'], message: string, meta: ElementMeta = {}): ValidationResult => ({
  valid: false,
  errors: [{ code, message }],
  meta,
});

/**
 * Mod-10 check digit: weights 3,1,3,1... from the right.
 * Returns null for empty or non-numeric input.
 */
export function calculateCheckDigit(digits: string): number | null {
  if (!digits || !isDigits(digits)) return null;
  let sum = 0;
  for (let i = 0; i < digits.length; i++) {
    const digit = Number(digits[digits.length - 1 - i]);
    sum += digit * (i % 2 === 0 ? 3 : 1);
  }
  return (10 - (sum % 10)) % 10;
}

/** Validate a numeric value whose last digit is its Mod-10 check digit */
export function validateCheckDigit(value: string): ValidationResult {
  if (!isDigits(value)) return fail('INVALID_FORMAT', 'Value must be numeric for check digit validation');
  if (value.length < 2) return fail('INVALID_LENGTH', 'Value too short for check digit validation');

  const provided = Number(value[value.length - 1]);
  const calculated = calculateCheckDigit(value.slice(0, -1)) ?? -1;
  const meta: ElementMeta = {
    calculatedCheckDigit: calculated,
    providedCheckDigit: provided,
    checkDigitValid: provided === calculated,
  };
  if (provided !== calculated) {
    return fail('INVALID_CHECK_DIGIT', `Check digit mismatch: expected ${calculated}, got ${provided}`, meta);
  }
  return ok(meta);
}

export function validateDate(
  value: string,
  format: DateFormat,
  pivot: number = DEFAULT_CENTURY_PIVOT
): ValidationResult {
  const outcome = decodeGs1Date(value, format, pivot);
  if (!outcome.ok) return fail('INVALID_DATE', outcome.error);

  const { date } = outcome;
  const meta: ElementMeta = {
    year: date.year,
    month: date.month,
    day: date.day,
    isoDate: toIsoDateOnly(date),
    displayDate: toDisplayDate(date),
  };
  if (date.dayUnspecified) meta.dayUnspecified = true;
  if (date.hour !== undefined) {
    meta.hour = date.hour;
    if (date.minute !== undefined) meta.minute = date.minute;
    meta.isoDateTime = toIsoDateTime(date);
  }
  return ok(meta);
}

export function validateCharset(value: string, charset: ComponentCharset): ValidationResult {
  if (charset === 'numeric') {
    return isDigits(value) || value === '' ? ok() : fail('INVALID_FORMAT', 'Value must be numeric');
  }
  const allowed = charset === 'cset39' ? CSET39 : CSET82;
  const invalid = [...new Set(value)].filter((ch) => !allowed.has(ch));
  if (invalid.length > 0) {
    const shown = invalid.map((ch) => JSON.stringify(ch)).join(', ');
    return fail('INVALID_FORMAT', `Invalid characters for ${charset.toUpperCase()}: ${shown}`);
  }
  return ok();
}

export interface LengthPolicy {
  fixedLength: number | null;
  minLength: number;
  maxLength: number;
}

export function validateLength(value: string, policy: LengthPolicy): ValidationResult {
  const { length } = value;
  if (policy.fixedLength !== null) {
    return length === policy.fixedLength
      ? ok()
      : fail('INVALID_LENGTH', `Length must be ${policy.fixedLength}, got ${length}`);
  }
  if (length < policy.minLength) {
    return fail('INVALID_LENGTH', `Length ${length} below minimum ${policy.minLength}`);
  }
  if (length > policy.maxLength) {
    return fail('INVALID_LENGTH', `Length ${length} exceeds maximum ${policy.maxLength}`);
  }
  return ok();
}

export interface DecodedDecimal {
  value: number;
  display: string;
}

/** "001234" with 2 implied places -> 12.34 / "12.34" */
export function decodeDecimal(digits: string, places: number): DecodedDecimal | null {
  if (!isDigits(digits) || !Number.isInteger(places) || places < 0) return null;
  if (places === 0) {
    const whole = digits.replace(/^0+(?=\d)/, '');
    return { value: Number(whole), display: whole };
  }
  const padded = digits.padStart(places + 1, '0');
  const whole = padded.slice(0, -places).replace(/^0+(?=\d)/, '');
  const fraction = padded.slice(-places);
  const display = `${whole}.${fraction}`;
  return { value: Number(display), display };
}

/** Split a value into the slices each component covers; the last takes the rest */
export function splitComponents(value: string, components: readonly AIComponent[]): string[] {
  const slices: string[] = [];
  let offset = 0;
  components.forEach((component, index) => {
    if (index === components.length - 1) {
      slices.push(value.slice(offset));
    } else {
      slices.push(value.slice(offset, offset + component.maxLength));
      offset += component.maxLength;
    }
  });
  return slices;
}

export interface ValidatedElement extends ValidationResult {
  value: string | number;
}

/**
 * Validate a raw element value against its definition and derive the
 * normalized value: ISO date for dates, number for decimal AIs.
 */
export function validateElement(
  definition: AIDefinition,
  raw: string,
  pivot: number = DEFAULT_CENTURY_PIVOT
): ValidatedElement {
  const errors: ElementError[] = [];
  const meta: ElementMeta = {};
  const absorb = (result: ValidationResult) => {
    errors.push(...result.errors);
    Object.assign(meta, result.meta);
  };

  absorb(validateLength(raw, definition));

  const slices = splitComponents(raw, definition.components);
  definition.components.forEach((component, index) => {
    const slice = slices[index];
    if (!slice) return;
    absorb(validateCharset(slice, component.charset));
    if (component.checkDigit && isDigits(slice) && slice.length >= 2) {
      absorb(validateCheckDigit(slice));
    }
    if (component.dateFormat && isDigits(slice)) {
      absorb(validateDate(slice, component.dateFormat, pivot));
    }
  });

  let value: string | number = raw;
  if (definition.dateFormat && errors.length === 0) {
    value = meta.isoDateTime ?? meta.isoDate ?? raw;
  }
  if (definition.decimalPositions !== null) {
    // Amount AIs (391n, 393n) carry a currency code ahead of the measured digits
    const decoded = decodeDecimal(slices[slices.length - 1] ?? raw, definition.decimalPositions);
    if (decoded) {
      meta.decimalValue = decoded.value;
      meta.decimalDisplay = decoded.display;
      meta.decimalPositions = definition.decimalPositions;
      value = decoded.value;
    }
  }

  return { valid: errors.length === 0, errors, meta, value };
}
