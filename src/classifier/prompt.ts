import OpenAI from 'openai';

import type {Env} from 'src/env';
import {AMOUNT_TYPES, type NumericToken} from 'src/types';

import type {ModelAmount, ModelClassification} from './types';

export const MODEL_AMOUNT_PROPERTIES = {
  id: {
    description: 'The id of the detected amount being classified, copied from the input.',
    type: 'integer',
    minimum: 0,
  },
  type: {
    description:
      'What the amount represents on the bill. total_bill is the billed total, paid is what was already paid, due is the remaining balance, item_cost is the price of a single line item, other_fee covers service, delivery and similar charges.',
    type: 'string',
    enum: AMOUNT_TYPES,
  },
  confidence: {
    description:
      'How certain the classification is, from 0 (a guess) to 1 (stated explicitly in the text).',
    type: 'number',
    minimum: 0,
    maximum: 1,
  },
} as const satisfies Record<keyof ModelAmount, unknown>;

export const MODEL_CLASSIFICATION_PROPERTIES = {
  amounts: {
    description: 'One entry for every detected amount, in the order they were given.',
    type: 'array',
    items: {
      type: 'object',
      properties: MODEL_AMOUNT_PROPERTIES,
      required: Object.keys(MODEL_AMOUNT_PROPERTIES),
      additionalProperties: false,
    },
  },
} as const satisfies Record<keyof ModelClassification, unknown>;

const SCHEMA = {
  type: 'json_schema',
  name: 'amount_classification',
  schema: {
    type: 'object',
    properties: MODEL_CLASSIFICATION_PROPERTIES,
    required: Object.keys(MODEL_CLASSIFICATION_PROPERTIES),
    additionalProperties: false,
  },
} as const;

const PROMPT = `
You are a financial document classifier for medical bills and receipts. The
document text comes from OCR and may contain misread characters, such as "l"
or "I" in place of "1" and "O" in place of "0".

You are given the document text and a list of amounts already detected in it.
Each amount has an id, the raw token as it appears in the text, its corrected
value and the text around it.

Classify every amount as exactly one of: total_bill, paid, due, tax, discount,
item_cost or other_fee. Base the classification on the labels and wording
around the amount.

Absolutely do not invent amounts, and do not change ids or values.
`;

function describeTokens(tokens: NumericToken[]) {
  return tokens.map(token => ({
    id: token.id,
    raw_token: token.raw,
    value: token.value,
    context: token.context,
  }));
}

/**
 * Asks OpenAI to classify the detected amounts. Returns the parsed, not yet
 * validated, model output.
 */
export async function requestClassification(
  text: string,
  tokens: NumericToken[],
  env: Env
): Promise<unknown> {
  const client = new OpenAI({
    apiKey: env.OPENAI_API_KEY,
    timeout: env.CLASSIFIER_TIMEOUT_MS,
    // Attempts and backoff are handled by the classifier's own retry loop
    maxRetries: 0,
  });

  const query = [
    'Document text:',
    '---',
    text,
    '---',
    `Detected amounts: ${JSON.stringify(describeTokens(tokens))}`,
  ].join('\n');

  const response = await client.responses.create({
    model: env.OPENAI_MODEL,
    text: {format: SCHEMA},
    input: [
      {
        role: 'system',
        content: [{type: 'input_text', text: PROMPT}],
      },
      {
        role: 'user',
        content: [{type: 'input_text', text: query}],
      },
    ],
  });

  return JSON.parse(response.output_text);
}
