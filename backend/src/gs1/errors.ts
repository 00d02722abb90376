export type OptionsErrorCode = 'INVALID_TYPE' | 'OUT_OF_RANGE' | 'UNKNOWN_AI';

/**
 * Thrown for programmer errors in decoder options. Scanner input never throws.
 */
export class Gs1OptionsError extends Error {
  public readonly code: OptionsErrorCode;
  public readonly field: string;

  constructor(field: string, code: OptionsErrorCode, message: string) {
    super(message);
    this.name = 'Gs1OptionsError';
    this.code = code;
    this.field = field;
  }
}
