import { classification } from '../models/classification.js';
import type { ClassificationResult, ParsedIntent } from '../models/classification.js';
import { describeEntities } from '../models/entities.js';
import type { IntentRegistry } from '../registry/IntentRegistry.js';
import type { ClarificationGenerator } from '../clarification/ClarificationGenerator.js';
import { tierFor } from './ConfidenceThresholds.js';

const MAX_CONFIRM_DETAILS = 2;

/** Pure mapping from a parsed intent's confidence to the outcome shown to the player. */
export class ConfidenceRouter {
  constructor(
    private readonly registry: IntentRegistry,
    private readonly clarifier: ClarificationGenerator
  ) {}

  decide(intent: ParsedIntent, originalInput: string, normalizedInput?: string): ClassificationResult {
    switch (tierFor(intent.confidence)) {
      case 'route': {
        const target = intent.routingTarget ?? this.registry.buildRoutingTarget(intent.intentType, intent.entities);
        return classification.route(Object.freeze({ ...intent, routingTarget: target }), target);
      }
      case 'confirm':
        return classification.confirm(intent, this.confirmationMessage(intent));
      case 'clarify':
        return classification.clarify(this.clarifier.generate(originalInput, intent, normalizedInput), intent);
    }
  }

  confirmationMessage(intent: ParsedIntent): string {
    const { confirmPhrase } = this.registry.getSchema(intent.intentType);
    const details = describeEntities(intent.entities).slice(0, MAX_CONFIRM_DETAILS);
    const suffix = details.length > 0 ? ` (${details.join(', ')})` : '';
    return `Did you want to ${confirmPhrase}${suffix}?`;
  }
}
