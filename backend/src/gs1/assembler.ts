/**
 * Entry point of the decoder: normalizes scanner input, routes it to the
 * matching engine and folds the outcome into one ParseResult.
 *
 * Never throws on scanner input. Only bad options raise Gs1OptionsError.
 */
import {
  GS,
  canonicalizeBarcode,
  isHumanReadable,
  normalizeSeparators,
  splitHumanReadable,
  stripSymbologyIdentifier,
} from '../utils/barcodeNormalization';
import { parseWithoutSeparators, type BeamOutcome } from './beam';
import { getCatalog, type Catalog } from './catalog';
import { encodeElementString } from './encoder';
import { scanFastPath, type FastPathOutcome } from './fastPath';
import { resolveOptions, type ParseOptionsInput } from './options';
import { solve, type SolvedParse } from './solver';
import type { Diagnostic, ParseOptions, ParsedElement, ParseResult, SymbologyInfo } from './types';

interface NormalizedInput {
  raw: string;
  text: string;
  symbology: SymbologyInfo | null;
}

type ResultBody = Omit<ParseResult, 'raw' | 'normalized' | 'symbology' | 'separatorSeen'>;

const NO_VALID_PARSE: Diagnostic = { code: 'INVALID_FORMAT', severity: 'error', message: 'No valid parse found' };

const INFERRED_BOUNDARIES: Diagnostic = {
  code: 'MISSING_SEPARATOR',
  severity: 'warning',
  message: 'No separators present; field boundaries were inferred',
};

/** Longest normalized element string handed to the engines */
export const MAX_ELEMENT_STRING_LENGTH = 512;

/** Ceiling for readings the beam could not produce */
const FALLBACK_CONFIDENCE_CAP = 0.5;

const round = (n: number) => Math.round(n * 10000) / 10000;

export function normalizeInput(input: unknown, options: ParseOptions, catalog: Catalog): NormalizedInput {
  const raw = String(input ?? '');
  const canonical = canonicalizeBarcode(raw, { decodeTriplets: options.decodeAsciiTriplets }).trim();
  const { symbology, body } = stripSymbologyIdentifier(canonical);
  let text = options.normalizeSeparators ? normalizeSeparators(body) : body;
  if (isHumanReadable(text)) {
    text = encodeElementString(splitHumanReadable(text), catalog);
  }
  // A leading FNC1 only announces GS1 data
  text = text.replace(/^\x1d+/, '').trim();
  return { raw, text, symbology };
}

/** Lift element-level validation errors into top-level diagnostics */
export function elementDiagnostics(elements: readonly ParsedElement[]): Diagnostic[] {
  return elements.flatMap((element) =>
    element.errors.map((error): Diagnostic => ({
      code: error.code,
      severity: 'error',
      message: `AI(${element.ai}): ${error.message}`,
      index: element.start,
      ai: element.ai,
    }))
  );
}

export function fastPathConfidence(outcome: FastPathOutcome): number {
  const { elements, diagnostics } = outcome;
  if (elements.length === 0) return 0;
  const structuralErrors = diagnostics.filter((d) => d.severity === 'error').length;
  const base = structuralErrors === 0 ? 1 : Math.max(0, 0.9 - 0.05 * structuralErrors);
  const validRatio = elements.filter((e) => e.valid).length / elements.length;
  return round(base * (0.8 + 0.2 * validRatio));
}

function fromFastPath(outcome: FastPathOutcome, options: ParseOptions): ResultBody {
  const diagnostics = [...outcome.diagnostics, ...elementDiagnostics(outcome.elements)];
  if (options.strictMode && outcome.elements.some((e) => !e.valid)) {
    return {
      strategy: 'fast-path',
      elements: [],
      diagnostics: [...diagnostics, NO_VALID_PARSE],
      alternatives: [],
      confidence: 0,
      reasoning: [],
    };
  }
  return {
    strategy: 'fast-path',
    elements: outcome.elements,
    diagnostics,
    alternatives: [],
    confidence: fastPathConfidence(outcome),
    reasoning: [],
  };
}

function fromSolver(solved: readonly SolvedParse[], options: ParseOptions): ResultBody {
  const [best, ...rest] = solved;
  const diagnostics = best.notes.map((note): Diagnostic => ({
    code: 'MISSING_SEPARATOR',
    severity: 'warning',
    message: note,
  }));
  if (rest.length > 0) {
    diagnostics.push({
      code: 'AMBIGUOUS_PARSE',
      severity: 'warning',
      message: `${solved.length} complete readings found; best chosen by score`,
    });
  }
  diagnostics.push(...elementDiagnostics(best.elements));

  return {
    strategy: 'solver',
    elements: best.elements,
    diagnostics,
    alternatives: rest.slice(0, options.maxAlternatives).map((alt) => ({
      elements: alt.elements,
      score: round(alt.confidence),
      confidence: round(alt.confidence),
      reasoning: alt.notes,
    })),
    confidence: round(best.confidence),
    reasoning: best.notes,
  };
}

function fromBeam(outcome: BeamOutcome, options: ParseOptions): ResultBody {
  const [best, ...rest] = outcome.candidates;
  const diagnostics: Diagnostic[] = [INFERRED_BOUNDARIES];
  if (outcome.ambiguous && outcome.gap !== null) {
    diagnostics.push({
      code: 'AMBIGUOUS_PARSE',
      severity: 'warning',
      message: `Best reading leads the runner-up by only ${outcome.gap} points`,
    });
  }
  diagnostics.push(...elementDiagnostics(best.elements));

  return {
    strategy: 'no-separator',
    elements: best.elements,
    diagnostics,
    alternatives: rest.slice(0, options.maxAlternatives).map((alt) => ({
      elements: alt.elements,
      score: alt.score,
      confidence: best.score > 0 ? round(Math.min(1, Math.max(0, alt.score / best.score))) : 0,
      reasoning: alt.reasoning,
    })),
    confidence: round(outcome.confidence),
    reasoning: best.reasoning,
  };
}

/** Fast path, escalating to the solver when a boundary is in doubt */
function parseGeneral(text: string, separatorSeen: boolean, options: ParseOptions, catalog: Catalog): ResultBody {
  const fast = scanFastPath(text, catalog, { centuryPivot: options.centuryPivot, separatorSeen });
  if (!fast.needsSolver) return fromFastPath(fast, options);

  if (options.allowAmbiguous) {
    const solved = solve(text, catalog, {
      centuryPivot: options.centuryPivot,
      strictMode: options.strictMode,
      maxAlternatives: options.maxAlternatives,
      separatorSeen,
    });
    if (solved.length > 0) return fromSolver(solved, options);
  }

  const fallback = fromFastPath(fast, options);
  fallback.diagnostics.push({
    code: options.allowAmbiguous ? 'INVALID_FORMAT' : 'AMBIGUOUS_PARSE',
    severity: 'warning',
    message: options.allowAmbiguous
      ? 'No complete reading found for an ambiguous boundary; kept the left-to-right reading'
      : 'Ambiguous boundary left unresolved because ambiguity resolution is disabled',
  });
  fallback.confidence = Math.min(fallback.confidence, FALLBACK_CONFIDENCE_CAP);
  return fallback;
}

const emptyBody = (strategy: ParseResult['strategy'], diagnostics: Diagnostic[]): ResultBody => ({
  strategy,
  elements: [],
  diagnostics,
  alternatives: [],
  confidence: 0,
  reasoning: [],
});

export function parseGs1(input: unknown, overrides?: ParseOptionsInput, catalog: Catalog = getCatalog()): ParseResult {
  const options = resolveOptions(overrides);
  const { raw, text, symbology } = normalizeInput(input, options, catalog);
  const separatorSeen = text.includes(GS);
  const header = { raw, normalized: text, symbology, separatorSeen };

  if (!text) return { ...header, ...emptyBody(null, [NO_VALID_PARSE]) };

  if (text.length > MAX_ELEMENT_STRING_LENGTH) {
    return {
      ...header,
      ...emptyBody(null, [
        {
          code: 'INVALID_LENGTH',
          severity: 'error',
          message: `Element string has ${text.length} characters; at most ${MAX_ELEMENT_STRING_LENGTH} are decoded`,
        },
        NO_VALID_PARSE,
      ]),
    };
  }

  if (!separatorSeen && options.allowAmbiguous) {
    const beam = parseWithoutSeparators(text, catalog, options);
    if (beam.candidates.length > 0) return { ...header, ...fromBeam(beam, options) };

    if (beam.leadingCheckDigitRejected) {
      return {
        ...header,
        ...emptyBody('no-separator', [
          INFERRED_BOUNDARIES,
          {
            code: 'INVALID_CHECK_DIGIT',
            severity: 'error',
            message: 'AI(01): Check digit mismatch; no reading can start with this GTIN',
            index: 0,
            ai: '01',
          },
          NO_VALID_PARSE,
        ]),
      };
    }

    // AIs outside the beam subset, or a field cut short
    const general = parseGeneral(text, separatorSeen, options, catalog);
    return {
      ...header,
      ...general,
      diagnostics: [INFERRED_BOUNDARIES, ...general.diagnostics],
      confidence: Math.min(general.confidence, FALLBACK_CONFIDENCE_CAP),
    };
  }

  return { ...header, ...parseGeneral(text, separatorSeen, options, catalog) };
}
