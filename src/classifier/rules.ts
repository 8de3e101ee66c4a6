import {segmentBounds} from 'src/normalizer';
import {AMOUNT_TYPES, type AmountType, type NumericToken} from 'src/types';

import {summarize} from './summary';
import type {Classification, TokenLabel} from './types';

const KEYWORD_CONFIDENCE = 0.6;
const DEFAULT_CONFIDENCE = 0.3;
const DEFAULT_TYPE: AmountType = 'item_cost';

/**
 * Keyword patterns per amount type. Vowels and `l` accept the digits OCR
 * tends to swap them with, so "T0tal" and "Pald" still match.
 */
const KEYWORDS: Record<AmountType, RegExp> = {
  discount: /\b(?:disc(?:[o0]unt)?|off|savings?|rebate)\b/gi,
  tax: /\b(?:tax(?:es)?|[cs]?gst|vat)\b/gi,
  paid: /\b(?:p[a4][il1]d|payment|received|advance|cash|card)\b/gi,
  due: /\b(?:d[uv]e|balance|[o0]utstanding|payable|pending)\b/gi,
  total_bill: /\b(?:(?:grand\s+)?t[o0]t[a4][l1i]|net\s+amount|bill\s+amount)\b/gi,
  other_fee: /\b(?:fees?|charges?|delivery|service|surcharge|admission)\b/gi,
  item_cost:
    /\b(?:price|rate|cost|items?|qty|mrp|medicines?|tests?|c[o0]nsultati[o0]n)\b/gi,
};

interface KeywordHit {
  type: AmountType;
  start: number;
  end: number;
}

function findKeywords(text: string): KeywordHit[] {
  return AMOUNT_TYPES.flatMap(type =>
    [...text.matchAll(KEYWORDS[type])].map(match => ({
      type,
      start: match.index ?? 0,
      end: (match.index ?? 0) + match[0].length,
    }))
  );
}

/**
 * Labels a single token using the keyword nearest to it in its segment,
 * preferring keywords written before the amount.
 */
export function labelToken(text: string, token: NumericToken): TokenLabel {
  const tokenEnd = token.index + token.raw.length;
  const segment = segmentBounds(text, token.index, tokenEnd);

  const before = findKeywords(text.slice(segment.start, token.index));
  const nearestBefore = before.reduce<KeywordHit | null>(
    (nearest, hit) => (nearest === null || hit.end > nearest.end ? hit : nearest),
    null
  );

  if (nearestBefore !== null) {
    return {type: nearestBefore.type, confidence: KEYWORD_CONFIDENCE};
  }

  const after = findKeywords(text.slice(tokenEnd, segment.end));
  const nearestAfter = after.reduce<KeywordHit | null>(
    (nearest, hit) => (nearest === null || hit.start < nearest.start ? hit : nearest),
    null
  );

  if (nearestAfter !== null) {
    return {type: nearestAfter.type, confidence: KEYWORD_CONFIDENCE};
  }

  return {type: DEFAULT_TYPE, confidence: DEFAULT_CONFIDENCE};
}

/**
 * Classifies every token by the keywords around it. Used when no language
 * model is configured, or when it keeps failing.
 */
export function classifyByRules(text: string, tokens: NumericToken[]): Classification {
  return summarize(
    tokens.map(token => labelToken(text, token)),
    'rules'
  );
}
