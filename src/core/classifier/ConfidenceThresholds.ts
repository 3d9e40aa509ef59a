export const ConfidenceThresholds = {
  /** At or above: act without asking. */
  ROUTE: 0.75,
  /** At or above (and below ROUTE): ask a yes/no question. Below: clarify. */
  CONFIRM: 0.5,
  /** Lowest confidence at which the model's guess is still offered as a suggestion. */
  SUGGEST: 0.3,
} as const;

export type ConfidenceTier = 'route' | 'confirm' | 'clarify';

export function tierFor(confidence: number): ConfidenceTier {
  if (confidence >= ConfidenceThresholds.ROUTE) return 'route';
  if (confidence >= ConfidenceThresholds.CONFIRM) return 'confirm';
  return 'clarify';
}
