/**
 * Ambiguity solver for element strings where one variable field may have lost
 * its separator.
 *
 * Completions are computed per position from the end of the input backwards
 * into an explicit position-indexed table, so every position is solved once
 * and only its best `memoLimit` completions are kept.
 */
import { GS } from '../utils/barcodeNormalization';
import type { Catalog } from './catalog';
import { buildElement } from './element';
import type { AIDefinition, ParsedElement } from './types';

export const SEPARATOR_BONUS = 1.05;
export const INVALID_ELEMENT_WEIGHT = 0.7;
export const HIDDEN_AI_WEIGHT = 0.7;
const VALID_RATIO_WEIGHT = 0.2;

export interface SolverOptions {
  centuryPivot: number;
  strictMode: boolean;
  maxAlternatives: number;
  separatorSeen: boolean;
}

/** A completion from some position to the end, sharing its tail with others */
interface Completion {
  element: ParsedElement | null;
  guessedBoundary: boolean;
  rest: Completion | null;
  confidence: number;
  validCount: number;
  count: number;
}

export interface SolvedParse {
  elements: ParsedElement[];
  /** Ranking score clamped to [0, 1] */
  confidence: number;
  notes: string[];
}

const EMPTY: Completion = { element: null, guessedBoundary: false, rest: null, confidence: 1, validCount: 0, count: 0 };

const rankOf = (c: Completion) => c.confidence + VALID_RATIO_WEIGHT * (c.count > 0 ? c.validCount / c.count : 0);

const byRank = (a: Completion, b: Completion) => rankOf(b) - rankOf(a) || b.confidence - a.confidence;

const clamp01 = (n: number) => Math.min(1, Math.max(0, n));

function materialize(completion: Completion): SolvedParse {
  const elements: ParsedElement[] = [];
  const notes: string[] = [];
  for (let node: Completion | null = completion; node; node = node.rest) {
    if (!node.element) continue;
    elements.push(node.element);
    if (node.guessedBoundary) notes.push(`Guessed boundary for AI(${node.element.ai})`);
  }
  return { elements, confidence: clamp01(rankOf(completion)), notes };
}

/** Lengths to try for a field, longest first until a separator has been seen */
function candidateLengths(definition: AIDefinition, text: string, dataStart: number, separatorSeen: boolean): number[] {
  if (definition.fixedLength !== null) return [definition.fixedLength];

  const nextSeparator = text.indexOf(GS, dataStart);
  const available = (nextSeparator < 0 ? text.length : nextSeparator) - dataStart;
  const max = Math.min(definition.maxLength, available);
  const lengths: number[] = [];
  for (let length = definition.minLength; length <= max; length++) lengths.push(length);
  return separatorSeen ? lengths : lengths.reverse();
}

function hidesAi(text: string, dataStart: number, rawLength: number, minLength: number, catalog: Catalog): boolean {
  for (let k = minLength; k < rawLength - 1; k++) {
    if (catalog.startsPlausibleAi(text, dataStart + k)) return true;
  }
  return false;
}

export function solve(text: string, catalog: Catalog, options: SolverOptions): SolvedParse[] {
  const n = text.length;
  const memoLimit = Math.max(2, options.maxAlternatives * 2);
  const table: Completion[][] = new Array(n + 1);
  table[n] = [EMPTY];

  for (let pos = n - 1; pos >= 0; pos--) {
    const completions: Completion[] = [];

    if (text[pos] === GS) {
      for (const rest of table[pos + 1]) {
        completions.push({ ...rest, confidence: Math.min(1, rest.confidence * SEPARATOR_BONUS) });
      }
      table[pos] = completions.slice(0, memoLimit);
      continue;
    }

    // Shorter registered codes inside a longer match allow reinterpretation
    for (const definition of catalog.matchesAt(text, pos)) {
      const dataStart = pos + definition.code.length;
      for (const length of candidateLengths(definition, text, dataStart, options.separatorSeen)) {
        const end = dataStart + length;
        if (end > n) continue;
        const raw = text.slice(dataStart, end);
        if (raw.includes(GS)) continue;
        if (definition.dataType === 'numeric' && !/^\d+$/.test(raw)) continue;
        if (end < n && text[end] !== GS && !catalog.startsPlausibleAi(text, end)) continue;
        const continuations = table[end];
        if (continuations.length === 0) continue;

        const element = buildElement(definition, raw, pos, options.centuryPivot);
        if (options.strictMode && !element.valid) continue;

        let weight = element.valid ? 1 : INVALID_ELEMENT_WEIGHT;
        const unterminated = definition.separatorRequired && end < n && text[end] !== GS;
        if (unterminated) {
          weight *= 0.8 + 0.2 * Math.min(1, length / definition.maxLength);
        }
        if (definition.separatorRequired && end === n && hidesAi(text, dataStart, length, definition.minLength, catalog)) {
          weight *= HIDDEN_AI_WEIGHT;
        }

        for (const rest of continuations) {
          completions.push({
            element,
            guessedBoundary: unterminated,
            rest,
            confidence: weight * rest.confidence,
            validCount: rest.validCount + (element.valid ? 1 : 0),
            count: rest.count + 1,
          });
        }
      }
    }

    completions.sort(byRank);
    table[pos] = completions.slice(0, memoLimit);
  }

  return table[0].slice(0, options.maxAlternatives + 1).map(materialize);
}
