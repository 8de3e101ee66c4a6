import type {Env} from './env';

export const AMOUNT_TYPES = [
  'total_bill',
  'paid',
  'due',
  'tax',
  'discount',
  'item_cost',
  'other_fee',
] as const;

export type AmountType = (typeof AMOUNT_TYPES)[number];

/**
 * A numeric candidate found in the document text, after OCR corrections.
 */
export interface NumericToken {
  /**
   * Position of the token in document order, starting at 0
   */
  id: number;
  /**
   * The text exactly as it was matched, e.g. "l200"
   */
  raw: string;
  /**
   * The corrected numeric value, e.g. 1200
   */
  value: number;
  /**
   * Offset of `raw` within the document text
   */
  index: number;
  /**
   * Currency code of a marker written right next to the token
   */
  currencyHint: string | null;
  /**
   * Snippet of the surrounding text. Always a verbatim substring of the
   * document.
   */
  context: string;
}

export interface ExtractedAmount {
  type: AmountType;
  value: number;
  /**
   * The text fragment the value was read from
   */
  source: string;
}

export interface DetectionSuccess {
  status: 'ok';
  currency: string | null;
  amounts: ExtractedAmount[];
  /**
   * How sure the classifier is about the assigned types, from 0 to 1
   */
  confidence: number;
}

export interface NoAmountsFound {
  status: 'no_amounts_found';
  reason: string;
}

export type DetectionResult = DetectionSuccess | NoAmountsFound;

export interface ErrorResponse {
  status: 'error';
  reason: string;
}

export interface DetectRequestBody {
  document_text?: string;
  image_base64?: string;
}

export type DocumentRequest =
  | {kind: 'json'; body: DetectRequestBody}
  | {kind: 'upload'; contentType: string; data: Buffer};

export interface InputSource {
  /**
   * String identifier for this source.
   */
  identifier: string;
  /**
   * Determines if this source is responsible for reading this request
   */
  matchRequest: (request: DocumentRequest) => boolean;
  /**
   * Produce the document text carried by the request.
   */
  extractText: (request: DocumentRequest, env: Env) => Promise<string>;
}
