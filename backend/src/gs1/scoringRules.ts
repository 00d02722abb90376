/**
 * Scoring rules for the no-separator beam parser.
 *
 * Each rule looks at a candidate right after an element was appended and
 * yields at most one hit: a score delta and the reason behind it. Rules run
 * in list order; an eliminating hit drops the candidate.
 */
import { decodeGs1Date } from '../utils/dateParsing';
import { isInternalAi } from './element';
import type { ParsedElement, ScoringWeights } from './types';

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = {
  validGtin: 1000,
  validExpiry: 250,
  unknownDayPenalty: 60,
  tailOrder: 120,
  embeddedExpiry: 90,
  fullOrder: 30,
  gtinThenExpiry: 15,
  batchLengthBonus: 20,
  serialLengthBonus: 15,
  absorbableInternalCode: -200,
  repeatedBatch: -150,
  repeatedSerial: -120,
  internalAfterBatchAndSerial: -80,
  longBatch: -50,
  shortSerial: -50,
  compactCompletion: 10,
  ambiguityGap: 40,
};

export interface RuleContext {
  /** Element sequence including the appended element */
  elements: readonly ParsedElement[];
  element: ParsedElement;
  /** Scan position after the appended element */
  position: number;
  inputLength: number;
  weights: ScoringWeights;
  whitelist: ReadonlySet<string>;
  centuryPivot: number;
  maxLengthOf: (ai: string) => number;
}

export interface RuleHit {
  delta: number;
  reason: string;
  eliminate?: boolean;
}

export interface ScoringRule {
  id: string;
  evaluate: (ctx: RuleContext) => RuleHit | null;
}

const tail = (ctx: RuleContext, size: number) =>
  ctx.elements.slice(-size).map((e) => e.ai).join(',');

const countOf = (ctx: RuleContext, ai: string) => ctx.elements.filter((e) => e.ai === ai).length;

const hasAi = (ctx: RuleContext, ai: string) => ctx.elements.some((e) => e.ai === ai);

const isExemptInternal = (ctx: RuleContext) => isInternalAi(ctx.element.ai) && ctx.whitelist.has(ctx.element.ai);

const EMBEDDED_EXPIRY = /17(\d{6})10/;

export const SCORING_RULES: readonly ScoringRule[] = [
  {
    id: 'gtin-check-digit',
    evaluate: ({ element, weights }) => {
      if (element.ai !== '01') return null;
      if (element.valid && element.meta.checkDigitValid) {
        return { delta: weights.validGtin, reason: 'Valid GTIN with correct check digit' };
      }
      return { delta: -Infinity, reason: 'Invalid GTIN', eliminate: true };
    },
  },
  {
    id: 'valid-expiry',
    evaluate: ({ element, weights }) => {
      if (element.ai !== '17' || !element.valid) return null;
      if (element.meta.dayUnspecified) {
        return {
          delta: weights.validExpiry - weights.unknownDayPenalty,
          reason: 'Valid expiry date with unspecified day (00)',
        };
      }
      return { delta: weights.validExpiry, reason: 'Valid expiry date' };
    },
  },
  {
    id: 'tail-order',
    evaluate: (ctx) => {
      const order = tail(ctx, 3);
      if (ctx.elements.length < 3 || (order !== '17,10,21' && order !== '21,17,10')) return null;
      return { delta: ctx.weights.tailOrder, reason: `Conventional field order (${order})` };
    },
  },
  {
    id: 'embedded-expiry',
    evaluate: ({ element, weights, centuryPivot }) => {
      if (element.ai !== '21') return null;
      const match = EMBEDDED_EXPIRY.exec(element.raw);
      if (!match || !decodeGs1Date(match[1], 'YYMMDD', centuryPivot).ok) return null;
      return { delta: weights.embeddedExpiry, reason: `Serial embeds an expiry/batch pattern (17${match[1]}10)` };
    },
  },
  {
    id: 'gtin-then-expiry',
    evaluate: ({ elements, element, weights }) => {
      const previous = elements[elements.length - 2];
      if (element.ai !== '17' || !previous || previous.ai !== '01') return null;
      return { delta: weights.gtinThenExpiry, reason: 'Expiry immediately follows GTIN' };
    },
  },
  {
    id: 'full-order',
    evaluate: (ctx) => {
      const order = tail(ctx, 4);
      if (ctx.elements.length < 4 || (order !== '01,17,10,21' && order !== '01,21,17,10')) return null;
      return { delta: ctx.weights.fullOrder, reason: `Complete GS1 sequence (${order})` };
    },
  },
  {
    id: 'batch-length',
    evaluate: ({ element, weights }) => {
      if (element.ai !== '10' || element.raw.length < 2 || element.raw.length > 10) return null;
      return { delta: weights.batchLengthBonus, reason: `Typical batch length (${element.raw.length})` };
    },
  },
  {
    id: 'serial-length',
    evaluate: ({ element, weights }) => {
      if (element.ai !== '21' || element.raw.length < 6 || element.raw.length > 20) return null;
      return { delta: weights.serialLengthBonus, reason: `Typical serial length (${element.raw.length})` };
    },
  },
  {
    id: 'absorbable-internal-code',
    evaluate: (ctx) => {
      const { element, elements } = ctx;
      if (!isInternalAi(element.ai) || isExemptInternal(ctx)) return null;
      const previous = elements[elements.length - 2];
      if (!previous || (previous.ai !== '10' && previous.ai !== '21')) return null;
      const absorbedLength = previous.raw.length + element.ai.length + element.raw.length;
      if (absorbedLength > ctx.maxLengthOf(previous.ai)) return null;
      return {
        delta: ctx.weights.absorbableInternalCode,
        reason: `AI(${element.ai}) could belong to the preceding AI(${previous.ai}) value`,
      };
    },
  },
  {
    id: 'repeated-batch',
    evaluate: (ctx) => {
      if (ctx.element.ai !== '10' || countOf(ctx, '10') < 2) return null;
      return { delta: ctx.weights.repeatedBatch, reason: 'Batch AI(10) repeated' };
    },
  },
  {
    id: 'repeated-serial',
    evaluate: (ctx) => {
      if (ctx.element.ai !== '21' || countOf(ctx, '21') < 2) return null;
      return { delta: ctx.weights.repeatedSerial, reason: 'Serial AI(21) repeated' };
    },
  },
  {
    id: 'internal-after-batch-and-serial',
    evaluate: (ctx) => {
      if (!isInternalAi(ctx.element.ai) || isExemptInternal(ctx)) return null;
      if (!hasAi(ctx, '10') || !hasAi(ctx, '21')) return null;
      return {
        delta: ctx.weights.internalAfterBatchAndSerial,
        reason: `AI(${ctx.element.ai}) used although batch and serial are present`,
      };
    },
  },
  {
    id: 'long-batch',
    evaluate: ({ element, weights }) => {
      if (element.ai !== '10' || element.raw.length <= 12) return null;
      return { delta: weights.longBatch, reason: `Unusually long batch (${element.raw.length})` };
    },
  },
  {
    id: 'short-serial',
    evaluate: ({ element, weights }) => {
      if (element.ai !== '21' || element.raw.length >= 4) return null;
      return { delta: weights.shortSerial, reason: `Unusually short serial (${element.raw.length})` };
    },
  },
  {
    id: 'compact-completion',
    evaluate: ({ position, inputLength, elements, weights }) => {
      if (position < inputLength || elements.length > 4) return null;
      return { delta: weights.compactCompletion, reason: 'Complete parse with few elements' };
    },
  },
];

export interface ScoreOutcome {
  delta: number;
  reasons: string[];
  eliminated: boolean;
}

export const formatReason = (hit: RuleHit) =>
  `${hit.delta > 0 ? '+' : ''}${hit.delta}: ${hit.reason}`;

export function scoreAppend(ctx: RuleContext, rules: readonly ScoringRule[] = SCORING_RULES): ScoreOutcome {
  let delta = 0;
  const reasons: string[] = [];
  for (const rule of rules) {
    const hit = rule.evaluate(ctx);
    if (!hit) continue;
    reasons.push(formatReason(hit));
    if (hit.eliminate) return { delta: -Infinity, reasons, eliminated: true };
    delta += hit.delta;
  }
  return { delta, reasons, eliminated: false };
}
