import type {AmountType} from 'src/types';

/**
 * The type assigned to a single token, and how sure the classifier is of it.
 */
export interface TokenLabel {
  type: AmountType;
  /**
   * Between 0 and 1
   */
  confidence: number;
}

export interface Classification {
  /**
   * One label per token, indexed by token id.
   */
  labels: TokenLabel[];
  /**
   * Mean confidence over all labels, rounded to two decimals.
   */
  confidence: number;
  /**
   * Whether the labels came from the language model or the keyword rules.
   */
  method: 'llm' | 'rules';
}

/**
 * A single entry of the model's structured output.
 */
export interface ModelAmount {
  /**
   * The id of the token being classified.
   */
  id: number;
  /**
   * The assigned amount type.
   */
  type: AmountType;
  /**
   * The model's confidence in the type, between 0 and 1.
   */
  confidence: number;
}

export interface ModelClassification {
  amounts: ModelAmount[];
}
