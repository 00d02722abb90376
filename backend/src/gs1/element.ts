import type { AIDefinition, ParsedElement } from './types';
import { validateElement } from './validators';

/** Validate raw data for an AI found at `start` and wrap it as an element */
export function buildElement(
  definition: AIDefinition,
  raw: string,
  start: number,
  centuryPivot: number
): ParsedElement {
  const validated = validateElement(definition, raw, centuryPivot);
  return {
    ai: definition.code,
    title: definition.title,
    raw,
    value: validated.value,
    valid: validated.valid,
    errors: validated.errors,
    meta: validated.meta,
    start,
    end: start + definition.code.length + raw.length,
  };
}

export const isInternalAi = (ai: string) => /^9\d$/.test(ai);
