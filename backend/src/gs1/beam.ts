/**
 * Beam-search parser for element strings with every separator stripped.
 *
 * Only GTIN, expiry, batch, serial and the internal-use codes take part:
 * unrestricted search across all variable-length AIs does not stay bounded.
 * Candidates are ranked by the rules in scoringRules.ts.
 */
import type { Catalog } from './catalog';
import { buildElement, isInternalAi } from './element';
import { scoreAppend } from './scoringRules';
import type { AIDefinition, ParsedElement, ScoringWeights } from './types';

export const BEAM_AI_CODES = ['01', '17', '10', '21', '90', '91', '92', '93', '94', '95', '96', '97', '98', '99'];

/** Internal-use fields only try this many lengths from their minimum */
export const INTERNAL_LENGTH_WINDOW = 10;

export interface BeamOptions {
  beamWidth: number;
  maxIterations: number;
  centuryPivot: number;
  strictMode: boolean;
  vendorWhitelist: readonly string[];
  scoringWeights: ScoringWeights;
}

export interface BeamCandidate {
  elements: ParsedElement[];
  position: number;
  score: number;
  reasoning: string[];
}

export interface BeamOutcome {
  /** Candidates that consumed the whole input, best first */
  candidates: BeamCandidate[];
  confidence: number;
  /** Best minus runner-up score; null with fewer than two candidates */
  gap: number | null;
  ambiguous: boolean;
  iterations: number;
  /** The element at position 0 failed its check digit, so no reading can start */
  leadingCheckDigitRejected: boolean;
}

export function beamConfidence(candidates: readonly BeamCandidate[]): { confidence: number; gap: number | null } {
  const [best, runnerUp] = candidates;
  if (!best || best.elements.length === 0) return { confidence: 0, gap: null };
  if (!runnerUp) return { confidence: 0.95, gap: null };
  const gap = best.score - runnerUp.score;
  return { confidence: Math.min(1, Math.max(0.5, 1 / (1 + 50 / (gap + 1)))), gap };
}

class BeamSearch {
  private readonly definitions: AIDefinition[];
  private readonly whitelist: ReadonlySet<string>;
  private leadingCheckDigitRejected = false;

  constructor(
    private readonly text: string,
    private readonly catalog: Catalog,
    private readonly options: BeamOptions
  ) {
    this.definitions = BEAM_AI_CODES.map((code) => catalog.lookup(code)).filter(
      (definition): definition is AIDefinition => definition !== null
    );
    this.whitelist = new Set(options.vendorWhitelist);
  }

  private startsKnownAi(pos: number): boolean {
    return this.definitions.some((d) => this.text.startsWith(d.code, pos));
  }

  private lengthsToTry(definition: AIDefinition, dataStart: number): number[] {
    const remaining = this.text.length - dataStart;
    if (definition.fixedLength !== null) {
      return definition.fixedLength <= remaining ? [definition.fixedLength] : [];
    }

    const max = Math.min(definition.maxLength, remaining);
    const lengths: number[] = [];
    if (isInternalAi(definition.code)) {
      const windowEnd = Math.min(max, definition.minLength + INTERNAL_LENGTH_WINDOW - 1);
      for (let length = definition.minLength; length <= windowEnd; length++) lengths.push(length);
      return lengths;
    }
    for (let length = definition.minLength; length <= max; length++) {
      const next = dataStart + length;
      if (next >= this.text.length || this.startsKnownAi(next) || length === max) lengths.push(length);
    }
    return lengths;
  }

  extend(candidate: BeamCandidate): BeamCandidate[] {
    const extensions: BeamCandidate[] = [];
    const { centuryPivot, strictMode, scoringWeights } = this.options;

    for (const definition of this.definitions) {
      if (!this.text.startsWith(definition.code, candidate.position)) continue;
      const dataStart = candidate.position + definition.code.length;

      for (const length of this.lengthsToTry(definition, dataStart)) {
        const raw = this.text.slice(dataStart, dataStart + length);
        const element = buildElement(definition, raw, candidate.position, centuryPivot);
        if (definition.checkDigit && element.meta.checkDigitValid === false) {
          if (candidate.position === 0) this.leadingCheckDigitRejected = true;
          continue;
        }
        if (strictMode && !element.valid) continue;

        const elements = [...candidate.elements, element];
        const outcome = scoreAppend({
          elements,
          element,
          position: element.end,
          inputLength: this.text.length,
          weights: scoringWeights,
          whitelist: this.whitelist,
          centuryPivot,
          maxLengthOf: (ai) => this.catalog.lookup(ai)?.maxLength ?? 0,
        });
        if (outcome.eliminated) continue;

        extensions.push({
          elements,
          position: element.end,
          score: candidate.score + outcome.delta,
          reasoning: [...candidate.reasoning, ...outcome.reasons],
        });
      }
    }
    return extensions;
  }

  run(): BeamOutcome {
    let beam: BeamCandidate[] = [{ elements: [], position: 0, score: 0, reasoning: [] }];
    const complete: BeamCandidate[] = [];
    let iterations = 0;

    while (beam.length > 0 && iterations < this.options.maxIterations) {
      iterations++;
      const next: BeamCandidate[] = [];
      for (const candidate of beam) {
        if (candidate.position >= this.text.length) complete.push(candidate);
        else next.push(...this.extend(candidate));
      }
      next.sort((a, b) => b.score - a.score);
      beam = next.slice(0, this.options.beamWidth);
    }
    complete.push(...beam.filter((c) => c.position >= this.text.length));

    const candidates = complete.filter((c) => c.elements.length > 0).sort((a, b) => b.score - a.score);
    const { confidence, gap } = beamConfidence(candidates);
    return {
      candidates,
      confidence,
      gap,
      ambiguous: gap !== null && gap < this.options.scoringWeights.ambiguityGap,
      iterations,
      leadingCheckDigitRejected: this.leadingCheckDigitRejected,
    };
  }
}

export function parseWithoutSeparators(text: string, catalog: Catalog, options: BeamOptions): BeamOutcome {
  return new BeamSearch(text, catalog, options).run();
}
