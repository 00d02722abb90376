export type DataType = 'numeric' | 'alphanumeric';

export type ComponentCharset = 'numeric' | 'cset82' | 'cset39';

export type DateFormat = 'YYMMDD' | 'YYMMD0' | 'YYYYMMDD' | 'YYMMDDHH';

export interface AIComponent {
  charset: ComponentCharset;
  minLength: number;
  maxLength: number;
  /** Mod-10 check digit carried in the last digit of this component */
  checkDigit: boolean;
  dateFormat: DateFormat | null;
  /** Linters named in the table that are not enforced (iso3166, pcenc, ...) */
  extraLinters: readonly string[];
}

export interface AIDefinition {
  readonly code: string;
  readonly title: string;
  readonly dataType: DataType;
  /** Set for predefined-length AIs; those never need a trailing separator */
  readonly fixedLength: number | null;
  readonly minLength: number;
  readonly maxLength: number;
  readonly separatorRequired: boolean;
  readonly checkDigit: boolean;
  readonly dateFormat: DateFormat | null;
  readonly decimalPositions: number | null;
  readonly requiredAis: readonly string[];
  readonly exclusiveAis: readonly string[];
  readonly digitalLinkKey: boolean;
  readonly components: readonly AIComponent[];
}

export type DiagnosticCode =
  | 'UNKNOWN_AI'
  | 'INVALID_LENGTH'
  | 'INVALID_FORMAT'
  | 'INVALID_CHECK_DIGIT'
  | 'INVALID_DATE'
  | 'MISSING_SEPARATOR'
  | 'AMBIGUOUS_PARSE'
  | 'EXTRA_SEPARATOR'
  | 'TRUNCATED_DATA';

export type Severity = 'error' | 'warning';

export interface Diagnostic {
  code: DiagnosticCode;
  severity: Severity;
  message: string;
  /** Offset into the normalized input */
  index?: number;
  ai?: string;
}

export interface ElementError {
  code: DiagnosticCode;
  message: string;
}

export interface ElementMeta {
  checkDigitValid?: boolean;
  calculatedCheckDigit?: number;
  providedCheckDigit?: number;
  year?: number;
  month?: number;
  day?: number;
  hour?: number;
  minute?: number;
  isoDate?: string;
  isoDateTime?: string;
  /** DD/MM/YYYY */
  displayDate?: string;
  /** YYMMD0 with day 00; `day` then holds the month's last day */
  dayUnspecified?: boolean;
  decimalValue?: number;
  decimalDisplay?: string;
  decimalPositions?: number;
}

export interface ParsedElement {
  ai: string;
  title: string;
  raw: string;
  value: string | number;
  valid: boolean;
  errors: ElementError[];
  meta: ElementMeta;
  /** Span of AI code plus data in the normalized input, end exclusive */
  start: number;
  end: number;
}

export type ParseStrategy = 'fast-path' | 'solver' | 'no-separator';

export interface ParseAlternative {
  elements: ParsedElement[];
  score: number;
  confidence: number;
  reasoning: string[];
}

export interface SymbologyInfo {
  identifier: string;
  name: string;
}

export interface ParseResult {
  raw: string;
  normalized: string;
  symbology: SymbologyInfo | null;
  separatorSeen: boolean;
  /** Engine that produced the elements; null when there was nothing to parse */
  strategy: ParseStrategy | null;
  elements: ParsedElement[];
  diagnostics: Diagnostic[];
  alternatives: ParseAlternative[];
  confidence: number;
  /** Scoring hits or boundary notes behind the chosen elements */
  reasoning: string[];
}

export interface ScoringWeights {
  validGtin: number;
  validExpiry: number;
  unknownDayPenalty: number;
  tailOrder: number;
  embeddedExpiry: number;
  fullOrder: number;
  gtinThenExpiry: number;
  batchLengthBonus: number;
  serialLengthBonus: number;
  absorbableInternalCode: number;
  repeatedBatch: number;
  repeatedSerial: number;
  internalAfterBatchAndSerial: number;
  longBatch: number;
  shortSerial: number;
  compactCompletion: number;
  /** Score gap under which the winner is reported as ambiguous */
  ambiguityGap: number;
}

export interface ParseOptions {
  /** Invalid elements eliminate their candidate instead of being flagged */
  strictMode: boolean;
  maxAlternatives: number;
  centuryPivot: number;
  normalizeSeparators: boolean;
  allowAmbiguous: boolean;
  beamWidth: number;
  maxIterations: number;
  /** Internal-use codes (90..99) exempt from the absorption penalties */
  vendorWhitelist: readonly string[];
  decodeAsciiTriplets: boolean;
  scoringWeights: ScoringWeights;
}
