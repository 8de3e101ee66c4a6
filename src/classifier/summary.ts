import type {Classification, TokenLabel} from './types';

export function summarize(
  labels: TokenLabel[],
  method: Classification['method']
): Classification {
  const total = labels.reduce((sum, label) => sum + label.confidence, 0);
  const mean = labels.length === 0 ? 0 : total / labels.length;
  const confidence = Math.round(Math.min(1, Math.max(0, mean)) * 100) / 100;

  return {labels, confidence, method};
}
