/**
 * Single left-to-right scan for element strings that carry separators.
 *
 * SCAN -> MATCH_AI -> CONSUME(fixed | variable) -> SCAN
 *
 * Structural problems become diagnostics and the scan carries on. A variable
 * field with no later separator that could be hiding another AI is read to its
 * maximum length and reported through `needsSolver`.
 */
import { GS } from '../utils/barcodeNormalization';
import type { Catalog } from './catalog';
import { buildElement } from './element';
import type { AIDefinition, Diagnostic, ParsedElement } from './types';

export interface FastPathOptions {
  centuryPivot: number;
  separatorSeen: boolean;
}

export interface FastPathOutcome {
  elements: ParsedElement[];
  diagnostics: Diagnostic[];
  needsSolver: boolean;
}

/** First offset in [min, max) of the data where another AI could begin */
function findHiddenAi(text: string, dataStart: number, definition: AIDefinition, catalog: Catalog): number | null {
  const limit = Math.min(definition.maxLength, text.length - dataStart);
  for (let k = definition.minLength; k < limit; k++) {
    if (catalog.startsPlausibleAi(text, dataStart + k)) return k;
  }
  return null;
}

export function scanFastPath(text: string, catalog: Catalog, options: FastPathOptions): FastPathOutcome {
  const elements: ParsedElement[] = [];
  const diagnostics: Diagnostic[] = [];
  let needsSolver = false;
  let pos = 0;

  while (pos < text.length) {
    if (text[pos] === GS) {
      const last = elements[elements.length - 1];
      const lastDefinition = last ? catalog.lookup(last.ai) : null;
      if (pos > 0 && text[pos - 1] === GS) {
        diagnostics.push({
          code: 'EXTRA_SEPARATOR',
          severity: 'warning',
          message: `Consecutive separators at position ${pos}`,
          index: pos,
        });
      } else if (last && last.end === pos && lastDefinition && !lastDefinition.separatorRequired) {
        const next = pos + 1;
        if (next >= text.length || !catalog.longestMatch(text, next).definition) {
          diagnostics.push({
            code: 'EXTRA_SEPARATOR',
            severity: 'warning',
            message: `Separator after fixed-length AI(${last.ai}) is not followed by an AI`,
            index: pos,
            ai: last.ai,
          });
        }
      }
      pos++;
      continue;
    }

    const { definition, length } = catalog.longestMatch(text, pos);
    if (!definition) {
      const nextSeparator = text.indexOf(GS, pos);
      diagnostics.push({
        code: 'UNKNOWN_AI',
        severity: 'error',
        message: `Unknown AI at position ${pos}: "${text.slice(pos, pos + 4)}"`,
        index: pos,
      });
      pos = nextSeparator < 0 ? text.length : nextSeparator;
      continue;
    }

    const dataStart = pos + length;
    const nextSeparator = text.indexOf(GS, dataStart);
    let raw: string;

    if (definition.fixedLength !== null) {
      const available = nextSeparator < 0 ? text.length : nextSeparator;
      raw = text.slice(dataStart, Math.min(dataStart + definition.fixedLength, available));
      if (raw.length < definition.fixedLength) {
        diagnostics.push({
          code: 'TRUNCATED_DATA',
          severity: 'error',
          message: `AI(${definition.code}) expects ${definition.fixedLength} characters, found ${raw.length}`,
          index: pos,
          ai: definition.code,
        });
      }
    } else if (nextSeparator >= 0) {
      raw = text.slice(dataStart, nextSeparator);
    } else {
      const hidden = findHiddenAi(text, dataStart, definition, catalog);
      if (hidden === null) {
        raw = text.slice(dataStart);
      } else {
        needsSolver = true;
        raw = text.slice(dataStart, dataStart + definition.maxLength);
        if (options.separatorSeen) {
          diagnostics.push({
            code: 'MISSING_SEPARATOR',
            severity: 'warning',
            message: `AI(${definition.code}) may run into another AI at position ${dataStart + hidden}`,
            index: dataStart + hidden,
            ai: definition.code,
          });
        }
      }
    }

    const element = buildElement(definition, raw, pos, options.centuryPivot);
    elements.push(element);
    pos = element.end;
  }

  return { elements, diagnostics, needsSolver };
}
