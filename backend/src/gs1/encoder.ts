import { GS } from '../utils/barcodeNormalization';
import type { Catalog } from './catalog';

export interface ElementInput {
  ai: string;
  value: string;
}

/**
 * Concatenate AI/value pairs into an element string. A separator follows every
 * variable-length (or unknown) field except the last one.
 */
export function encodeElementString(elements: readonly ElementInput[], catalog: Catalog): string {
  return elements
    .map(({ ai, value }, index) => {
      const isLast = index === elements.length - 1;
      const definition = catalog.lookup(ai);
      const needsSeparator = !isLast && (!definition || definition.separatorRequired);
      return `${ai}${value}${needsSeparator ? GS : ''}`;
    })
    .join('');
}

export function toHumanReadable(elements: readonly ElementInput[]): string {
  return elements.map(({ ai, value }) => `(${ai})${value}`).join('');
}
