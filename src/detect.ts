import {classifyTokens} from './classifier';
import type {Env} from './env';
import {finalizeResult, noAmountsFound} from './finalizer';
import {extractTokens} from './normalizer';
import type {DetectionResult} from './types';

/**
 * Runs a document through tokenization, classification and finalization.
 */
export async function detectAmounts(text: string, env: Env): Promise<DetectionResult> {
  const tokens = extractTokens(text);

  console.log('Extracted numeric tokens', {
    count: tokens.length,
    values: tokens.map(token => token.value),
  });

  if (tokens.length === 0) {
    return noAmountsFound();
  }

  const classification = await classifyTokens(text, tokens, env);

  console.log('Classified amounts', {
    method: classification.method,
    confidence: classification.confidence,
  });

  return finalizeResult(text, tokens, classification, env);
}
