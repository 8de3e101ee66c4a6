import type {Classification} from 'src/classifier/types';
import type {Env} from 'src/env';
import {detectCurrency} from 'src/normalizer';
import type {
  DetectionResult,
  ExtractedAmount,
  NoAmountsFound,
  NumericToken,
} from 'src/types';

export const NO_AMOUNTS_REASON = 'document too noisy or no numeric tokens found';

/**
 * The guardrail response for documents without anything to report
 */
export function noAmountsFound(reason = NO_AMOUNTS_REASON): NoAmountsFound {
  return {status: 'no_amounts_found', reason};
}

/**
 * Assembles the response for a classified document. Every amount keeps the
 * snippet it was read from as its source.
 */
export function finalizeResult(
  text: string,
  tokens: NumericToken[],
  classification: Classification,
  env: Env
): DetectionResult {
  const amounts = tokens.flatMap<ExtractedAmount>(token => {
    const label = classification.labels[token.id];
    return label ? [{type: label.type, value: token.value, source: token.context}] : [];
  });

  if (amounts.length === 0) {
    return noAmountsFound();
  }

  return {
    status: 'ok',
    currency: detectCurrency(text, tokens) ?? env.DEFAULT_CURRENCY ?? null,
    amounts,
    confidence: classification.confidence,
  };
}
