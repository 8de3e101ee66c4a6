import {captureException} from '@sentry/node';
import {z} from 'zod';

import type {Env} from 'src/env';
import {AMOUNT_TYPES, type NumericToken} from 'src/types';
import {withRetry} from 'src/utils/retry';

import {requestClassification} from './prompt';
import {classifyByRules, labelToken} from './rules';
import {summarize} from './summary';
import type {Classification, ModelAmount} from './types';

const MODEL_CLASSIFICATION = z.object({
  amounts: z.array(
    z.object({
      id: z.number().int().nonnegative(),
      type: z.enum(AMOUNT_TYPES),
      confidence: z.number().min(0).max(1),
    })
  ),
});

/**
 * The model answered, but not with something we can use.
 */
export class MalformedClassificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedClassificationError';
  }
}

/**
 * Validates the model's output against the expected schema and the tokens
 * that were sent to it.
 */
export function parseModelClassification(
  output: unknown,
  tokens: NumericToken[]
): ModelAmount[] {
  const result = MODEL_CLASSIFICATION.safeParse(output);

  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new MalformedClassificationError(`Model output failed validation: ${details}`);
  }

  const seen = new Set<number>();

  for (const amount of result.data.amounts) {
    if (amount.id >= tokens.length) {
      throw new MalformedClassificationError(`Model returned unknown amount id ${amount.id}`);
    }
    if (seen.has(amount.id)) {
      throw new MalformedClassificationError(`Model returned amount id ${amount.id} twice`);
    }
    seen.add(amount.id);
  }

  return result.data.amounts;
}

async function classifyWithModel(
  text: string,
  tokens: NumericToken[],
  env: Env
): Promise<Classification> {
  const amounts = await withRetry(
    async () => parseModelClassification(await requestClassification(text, tokens, env), tokens),
    {
      attempts: env.CLASSIFIER_MAX_ATTEMPTS,
      baseDelayMs: env.CLASSIFIER_BACKOFF_MS,
      onRetry: (error, attempt) =>
        console.warn(`Model classification attempt ${attempt} failed, retrying`, error),
    }
  );

  const byId = new Map(amounts.map(amount => [amount.id, amount]));

  // Amounts the model skipped fall back to the keyword rules
  const labels = tokens.map(token => {
    const amount = byId.get(token.id);
    return amount !== undefined
      ? {type: amount.type, confidence: amount.confidence}
      : labelToken(text, token);
  });

  return summarize(labels, 'llm');
}

/**
 * Assigns an amount type to every token. Uses the language model when an API
 * key is configured, and the keyword rules otherwise or when the model keeps
 * failing.
 */
export async function classifyTokens(
  text: string,
  tokens: NumericToken[],
  env: Env
): Promise<Classification> {
  if (env.OPENAI_API_KEY === undefined) {
    console.warn('OPENAI_API_KEY not configured, classifying amounts by keywords');
    return classifyByRules(text, tokens);
  }

  try {
    return await classifyWithModel(text, tokens, env);
  } catch (error) {
    captureException(error);
    console.error('Model classification failed, falling back to keywords', error);
    return classifyByRules(text, tokens);
  }
}
